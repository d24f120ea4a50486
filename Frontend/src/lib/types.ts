export type ChatMsg = { type: "msg"; sender: string; text: string }

export type FileMeta = {
  type: "file-meta"
  fileId: string
  name: string
  size: number
  mime: string
  totalChunks: number
  sender: string
}

// Announces the next binary frame on the same connection.
export type FileHeader = {
  type: "file-header"
  fileId: string
  idx: number
  total: number
  size: number      // byte length of the binary frame that follows
}

export type ControlFrame = ChatMsg | FileMeta | FileHeader

export type InboundFrame =
  | { kind: "control"; frame: ControlFrame }
  | { kind: "binary"; data: Uint8Array }
  | { kind: "invalid"; raw: string; reason: string }

export type ReceivedFile = {
  fileId: string
  name: string
  mime: string
  size: number
  sender: string
  blob: Blob
}

// Anything frames can be written to: a browser WebSocket, a ws client, a test double.
export interface FrameSink {
  send(data: string | Uint8Array): void
  isOpen(): boolean
}

export type Status = "connecting" | "open" | "closed"
