import crypto from "crypto"
import type { RawData } from "ws"

export const now = () => Date.now()

const ROOM_ALPHABET = "ABCDEFGHJKMNPQRSTUVWXYZ23456789"

export function genRoomCode(len = 6) {
  // A-Z0-9, unambiguous
  const bytes = crypto.randomBytes(len)
  let out = ""
  for (let i = 0; i < len; i++) out += ROOM_ALPHABET[bytes[i] % ROOM_ALPHABET.length]
  return out
}

export function genPeerId() {
  return "p_" + crypto.randomBytes(6).toString("hex")
}

// ws hands over a Buffer, an ArrayBuffer or fragments depending on binaryType.
export function toBuffer(raw: RawData): Buffer {
  if (Buffer.isBuffer(raw)) return raw
  if (Array.isArray(raw)) return Buffer.concat(raw)
  return Buffer.from(raw)
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err)
}
