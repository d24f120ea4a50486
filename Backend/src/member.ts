import { WebSocket } from "ws"
import type { Pingable } from "./heartbeat"
import type { RelayFrame, RoomMember } from "./types"
import { genPeerId } from "./utils"

export class SlowConsumerError extends Error {
  constructor(readonly buffered: number) {
    super(`slow_consumer: ${buffered} bytes still buffered`)
    this.name = "SlowConsumerError"
  }
}

export type SocketMember = RoomMember & Pingable

// The parts of a ws socket a member drives.
export type MemberSocket = {
  readonly readyState: number
  readonly bufferedAmount: number
  send(data: Buffer, options: { binary: boolean }, cb: (err?: Error) => void): void
  ping(): void
  terminate(): void
}

type SocketMemberOptions = {
  maxBufferedBytes: number
  // write failures reported by ws after send() has already returned
  onSendError: (member: SocketMember, err: Error) => void
}

export function createSocketMember(ws: MemberSocket, opts: SocketMemberOptions): SocketMember {
  const member: SocketMember = {
    id: genPeerId(),
    isAlive: true,
    send(frame: RelayFrame) {
      if (ws.readyState !== WebSocket.OPEN) throw new Error(`socket_not_open: state=${ws.readyState}`)
      if (ws.bufferedAmount > opts.maxBufferedBytes) throw new SlowConsumerError(ws.bufferedAmount)
      ws.send(frame.data, { binary: frame.binary }, (err) => { if (err) opts.onSendError(member, err) })
    },
    ping() { ws.ping() },
    terminate() { ws.terminate() },
  }
  return member
}
