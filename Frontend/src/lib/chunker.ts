export const CHUNK_BYTES = 256 * 1024 // 256KB per header+binary pair

export function chunkCount(size: number, chunkSize = CHUNK_BYTES) {
  if (!Number.isInteger(chunkSize) || chunkSize <= 0) throw new RangeError(`chunkSize must be a positive integer, got ${chunkSize}`)
  return Math.ceil(size / chunkSize)
}

export async function* readFileChunks(file: Blob, chunkSize = CHUNK_BYTES) {
  const count = chunkCount(file.size, chunkSize)
  for (let index = 0; index < count; index++) {
    const offset = index * chunkSize
    const end = Math.min(offset + chunkSize, file.size)
    const bytes = new Uint8Array(await file.slice(offset, end).arrayBuffer())
    yield { index, offset, bytes }
  }
}
