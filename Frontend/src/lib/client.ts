import WebSocket, { type RawData } from "ws"
import { decodeFrame, encodeControl } from "./codec"
import { TransferReceiver } from "./receiver"
import { newFileId, sendFile, type SentFile } from "./sender"
import type { ChatMsg, FrameSink, ReceivedFile, Status } from "./types"

export const DEFAULT_SENDER = "Web User"

export type RoomClientOptions = {
  baseUrl: string           // ws://host:port
  roomId: string
  username?: string
  chunkSize?: number
  onStatus?: (s: Status) => void
  onChat?: (m: ChatMsg) => void
  onFile?: (f: ReceivedFile) => void
  onSendProgress?: (fileId: string, fraction: number) => void
  onReceiveProgress?: (fileId: string, fraction: number) => void
  onLog?: (s: string) => void
}

export function roomUrl(baseUrl: string, roomId: string) {
  return `${baseUrl.replace(/\/+$/, "")}/room/${encodeURIComponent(roomId)}`
}

// Text frames become strings and binary frames bytes; fragments are joined.
export function messageData(data: RawData, isBinary: boolean): string | Uint8Array {
  const buf = Buffer.isBuffer(data) ? data : Array.isArray(data) ? Buffer.concat(data) : Buffer.from(data)
  return isBinary ? buf : buf.toString("utf8")
}

/**
 * One connection to one room: chat out, files out, and the receiving state
 * machine for everything that comes back.
 */
export class RoomClient {
  private ws: WebSocket | null = null
  private _status: Status = "closed"
  private readonly receiver: TransferReceiver
  private readonly sink: FrameSink

  constructor(private readonly opts: RoomClientOptions) {
    this.receiver = new TransferReceiver({
      onFile: f => opts.onFile?.(f),
      onProgress: (id, p) => opts.onReceiveProgress?.(id, p),
      onLog: s => this.log(s),
    })
    this.sink = {
      send: data => {
        if (!this.ws) throw new Error("not connected")
        this.ws.send(data)
      },
      isOpen: () => this.ws?.readyState === WebSocket.OPEN,
    }
  }

  get status() { return this._status }

  get sender() { return this.opts.username?.trim() || DEFAULT_SENDER }

  private log(s: string) { this.opts.onLog?.(s) }

  private setStatus(s: Status) {
    this._status = s
    this.opts.onStatus?.(s)
  }

  connect(): Promise<void> {
    if (this.ws && this._status !== "closed") return Promise.reject(new Error(`already ${this._status}`))

    const ws = new WebSocket(roomUrl(this.opts.baseUrl, this.opts.roomId))
    ws.binaryType = "nodebuffer"
    this.ws = ws
    this.setStatus("connecting")

    ws.on("message", (data, isBinary) => {
      if (this.ws !== ws) return
      const frame = decodeFrame(messageData(data, isBinary))

      if (frame.kind === "invalid") { this.log(`[client] ignoring frame (${frame.reason}): ${frame.raw.slice(0, 80)}`); return }
      try {
        if (frame.kind === "control" && frame.frame.type === "msg") this.opts.onChat?.(frame.frame)
        else this.receiver.handle(frame)
      } catch (err) {
        this.log(`[client] dropped frame: ${err instanceof Error ? err.message : String(err)}`)
      }
    })

    ws.on("close", () => {
      if (this.ws !== ws) return
      this.ws = null
      this.receiver.reset()
      this.setStatus("closed")
      this.log(`[client] ✗ disconnected from ${this.opts.roomId}`)
    })

    ws.on("error", err => this.log(`[client] ⚠ connection error: ${err.message}`))

    return new Promise<void>((resolve, reject) => {
      const failed = () => reject(new Error(`could not connect to room ${this.opts.roomId}`))
      ws.once("close", failed)
      ws.once("open", () => {
        ws.off("close", failed)
        this.setStatus("open")
        this.log(`[client] ✓ connected to room ${this.opts.roomId}`)
        resolve()
      })
    })
  }

  sendChat(text: string) {
    const msg: ChatMsg = { type: "msg", sender: this.sender, text }
    this.sink.send(encodeControl(msg))
    return msg
  }

  async sendFile(file: Blob, name = "file"): Promise<SentFile> {
    const fileId = newFileId()
    const sent = await sendFile(this.sink, file, {
      fileId,
      name,
      sender: this.sender,
      chunkSize: this.opts.chunkSize,
      onProgress: p => this.opts.onSendProgress?.(fileId, p),
    })
    this.log(`[client] ✓ sent ${name} (${sent.size} bytes)`)
    return sent
  }

  close() {
    this.ws?.close()
  }
}
