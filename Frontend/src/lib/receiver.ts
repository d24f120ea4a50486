import type { FileHeader, FileMeta, InboundFrame, ReceivedFile } from "./types"

type Session = {
  meta: FileMeta
  chunks: Map<number, Uint8Array>   // chunk index -> bytes
}

// "The next binary frame belongs to fileId/idx."
type PendingHeader = Pick<FileHeader, "fileId" | "idx">

export type ReceiverOptions = {
  onFile?: (file: ReceivedFile) => void
  onProgress?: (fileId: string, fraction: number) => void
  onLog?: (line: string) => void
}

/**
 * Reassembles incoming files for one connection. Holds at most one pending
 * header: a second file-header before the binary frame replaces the first.
 */
export class TransferReceiver {
  private readonly sessions = new Map<string, Session>()
  private pending: PendingHeader | null = null

  constructor(private readonly opts: ReceiverOptions = {}) {}

  /** Feeds file frames in; chat and invalid frames are not this class's business. */
  handle(frame: InboundFrame) {
    if (frame.kind === "binary") { this.onBinary(frame.data); return }
    if (frame.kind !== "control") return
    const c = frame.frame
    if (c.type === "file-meta") this.onMeta(c)
    else if (c.type === "file-header") this.onHeader(c)
  }

  onMeta(meta: FileMeta) {
    // every chunk carries at least one byte
    if (meta.totalChunks > meta.size) {
      this.opts.onLog?.(`[recv] ignoring ${meta.fileId}: ${meta.totalChunks} chunks for ${meta.size} bytes`)
      return
    }
    this.sessions.set(meta.fileId, { meta, chunks: new Map() })
    this.opts.onLog?.(`[recv] ${meta.name} from ${meta.sender} (${meta.size} bytes, ${meta.totalChunks} chunks)`)
    this.opts.onProgress?.(meta.fileId, 0)
    if (meta.totalChunks === 0) this.complete(meta.fileId)
  }

  onHeader(header: FileHeader) {
    this.pending = { fileId: header.fileId, idx: header.idx }
  }

  onBinary(bytes: Uint8Array) {
    const pending = this.pending
    if (!pending) return
    this.pending = null

    const s = this.sessions.get(pending.fileId)
    if (!s || pending.idx >= s.meta.totalChunks) return

    s.chunks.set(pending.idx, bytes)   // a refilled index replaces, never counts twice

    const { totalChunks } = s.meta
    this.opts.onProgress?.(pending.fileId, s.chunks.size / totalChunks)
    if (s.chunks.size === totalChunks) this.complete(pending.fileId)
  }

  private complete(fileId: string) {
    const s = this.sessions.get(fileId)
    if (!s) return
    this.sessions.delete(fileId)

    const parts: Uint8Array[] = []
    for (let i = 0; i < s.meta.totalChunks; i++) {
      const chunk = s.chunks.get(i)
      if (chunk) parts.push(chunk)
    }
    const { name, mime, size, sender } = s.meta
    this.opts.onLog?.(`[recv] ✓ ${name}`)
    this.opts.onFile?.({ fileId, name, mime, size, sender, blob: new Blob(parts, { type: mime }) })
  }

  /** Forgets every in-flight file. Called when the connection goes away. */
  reset() {
    const dropped = this.sessions.size
    this.sessions.clear()
    this.pending = null
    if (dropped) this.opts.onLog?.(`[recv] discarded ${dropped} unfinished transfer(s)`)
  }

  get activeTransfers(): string[] { return [...this.sessions.keys()] }

  get pendingHeader(): Readonly<PendingHeader> | null { return this.pending }
}
