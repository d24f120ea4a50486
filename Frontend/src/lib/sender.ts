import { CHUNK_BYTES, chunkCount, readFileChunks } from "./chunker"
import { encodeControl } from "./codec"
import type { FileMeta, FrameSink } from "./types"

export class TransferAbortedError extends Error {
  constructor(readonly fileId: string, readonly chunksSent: number) {
    super(`transfer ${fileId} aborted after ${chunksSent} chunk(s): connection closed`)
    this.name = "TransferAbortedError"
  }
}

export type SendFileOptions = {
  fileId?: string   // generated when absent
  name: string
  sender: string
  mime?: string
  chunkSize?: number
  onProgress?: (fraction: number, sentBytes: number) => void  // 0..1, 1 only after the last chunk
}

export type SentFile = Omit<FileMeta, "type">

type RandomSource = { randomUUID?: () => string } | undefined

// Web Crypto where the runtime has it, timestamp + random otherwise.
export function newFileId(source: RandomSource = globalThis.crypto): string {
  return source?.randomUUID?.() ?? `T-${Date.now()}-${Math.random().toString(36).slice(2)}`
}

/**
 * Streams `file` as one file-meta frame followed by a file-header + binary
 * pair per chunk. The pair of each chunk goes out back-to-back, so frames
 * from other calls on the same sink can only land between pairs.
 */
export async function sendFile(sink: FrameSink, file: Blob, opts: SendFileOptions): Promise<SentFile> {
  const chunkSize = opts.chunkSize ?? CHUNK_BYTES
  const meta: FileMeta = {
    type: "file-meta",
    fileId: opts.fileId ?? newFileId(),
    name: opts.name,
    size: file.size,
    mime: opts.mime || file.type || "application/octet-stream",
    totalChunks: chunkCount(file.size, chunkSize),
    sender: opts.sender,
  }
  const { fileId, totalChunks } = meta

  if (!sink.isOpen()) throw new TransferAbortedError(fileId, 0)
  sink.send(encodeControl(meta))
  if (totalChunks === 0) opts.onProgress?.(1, 0)

  let sent = 0
  for await (const { index, bytes } of readFileChunks(file, chunkSize)) {
    if (!sink.isOpen()) throw new TransferAbortedError(fileId, index)
    sink.send(encodeControl({ type: "file-header", fileId, idx: index, total: totalChunks, size: bytes.byteLength }))
    sink.send(bytes)
    sent += bytes.byteLength
    opts.onProgress?.(index === totalChunks - 1 ? 1 : sent / file.size, sent)
  }

  const { type: _type, ...sentFile } = meta
  return sentFile
}
