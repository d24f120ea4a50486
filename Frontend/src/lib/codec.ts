import type { ControlFrame, InboundFrame } from "./types"

type Json = Record<string, unknown>

const isObject = (v: unknown): v is Json => typeof v === "object" && v !== null && !Array.isArray(v)
const isStr = (v: unknown): v is string => typeof v === "string"
const isCount = (v: unknown): v is number => typeof v === "number" && Number.isInteger(v) && v >= 0

export function encodeControl(frame: ControlFrame): string {
  return JSON.stringify(frame)
}

function toControl(m: Json): ControlFrame | string {
  switch (m.type) {
    case "msg":
      if (!isStr(m.sender) || !isStr(m.text)) return "msg needs string sender and text"
      return { type: "msg", sender: m.sender, text: m.text }
    case "file-meta":
      if (!isStr(m.fileId) || !isStr(m.name) || !isStr(m.mime) || !isStr(m.sender)) return "file-meta has a non-string field"
      if (!isCount(m.size) || !isCount(m.totalChunks)) return "file-meta size/totalChunks must be non-negative integers"
      if (m.totalChunks > m.size) return "file-meta totalChunks exceeds size"
      return { type: "file-meta", fileId: m.fileId, name: m.name, size: m.size, mime: m.mime, totalChunks: m.totalChunks, sender: m.sender }
    case "file-header":
      if (!isStr(m.fileId)) return "file-header needs a string fileId"
      if (!isCount(m.idx) || !isCount(m.total) || !isCount(m.size)) return "file-header idx/total/size must be non-negative integers"
      return { type: "file-header", fileId: m.fileId, idx: m.idx, total: m.total, size: m.size }
    default:
      return `unknown type ${JSON.stringify(m.type)}`
  }
}

/**
 * Classifies one inbound unit. Text is always a control frame candidate,
 * bytes are always a binary frame.
 */
export function decodeFrame(data: string | ArrayBuffer | Uint8Array): InboundFrame {
  if (typeof data !== "string") {
    return { kind: "binary", data: data instanceof Uint8Array ? data : new Uint8Array(data) }
  }

  let m: unknown
  try { m = JSON.parse(data) } catch { return { kind: "invalid", raw: data, reason: "not JSON" } }
  if (!isObject(m)) return { kind: "invalid", raw: data, reason: "not a JSON object" }

  const frame = toControl(m)
  return typeof frame === "string"
    ? { kind: "invalid", raw: data, reason: frame }
    : { kind: "control", frame }
}
