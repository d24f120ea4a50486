import type { Log, RelayFrame, Room, RoomMember, RoomStats } from "./types"
import { errorMessage, now } from "./utils"

export type RoomRegistryOptions = {
  name?: string   // log prefix, e.g. "rooms" or "signal"
  onLog?: Log
}

/**
 * Room id -> live members. A room exists exactly while it has at least one
 * member: the first join creates it, the last leave deletes it.
 */
export class RoomRegistry {
  private readonly rooms = new Map<string, Room>()
  private readonly memberRoom = new Map<RoomMember, Room>()
  private readonly prefix: string
  private readonly log: Log

  constructor(opts: RoomRegistryOptions = {}) {
    this.prefix = `[${opts.name ?? "rooms"}]`
    this.log = opts.onLog ?? (() => {})
  }

  join(roomId: string, member: RoomMember): Room {
    const current = this.memberRoom.get(member)
    if (current) throw new Error(`already_joined: ${member.id} is in room ${current.id}`)

    let room = this.rooms.get(roomId)
    if (!room) {
      room = { id: roomId, createdAt: now(), members: new Map() }
      this.rooms.set(roomId, room)
      this.log(`${this.prefix} created room ${roomId}`)
    }
    room.members.set(member.id, member)
    this.memberRoom.set(member, room)
    this.log(`${this.prefix} ${member.id} joined ${roomId} (${room.members.size})`)
    return room
  }

  // Safe to call more than once per member; every termination path ends here.
  leave(member: RoomMember): { roomGone: boolean } | undefined {
    const room = this.memberRoom.get(member)
    if (!room) return undefined
    this.memberRoom.delete(member)
    room.members.delete(member.id)
    this.log(`${this.prefix} ${member.id} left ${room.id} (${room.members.size})`)

    if (room.members.size > 0) return { roomGone: false }
    this.rooms.delete(room.id)
    this.log(`${this.prefix} removed empty room ${room.id}`)
    return { roomGone: true }
  }

  /**
   * Delivers `frame` to every other member of the sender's room and returns
   * how many took it. A member that fails the write is dropped from the room.
   */
  broadcast(sender: RoomMember, frame: RelayFrame): number {
    const room = this.memberRoom.get(sender)
    if (!room) return 0

    let delivered = 0
    for (const member of [...room.members.values()]) {
      if (member === sender) continue
      try {
        member.send(frame)
        delivered++
      } catch (err) {
        this.log(`${this.prefix} dropping ${member.id} from ${room.id}: ${errorMessage(err)}`)
        this.leave(member)
        member.terminate()
      }
    }
    return delivered
  }

  get(roomId: string): Room | undefined { return this.rooms.get(roomId) }

  has(member: RoomMember): boolean { return this.memberRoom.has(member) }

  roomOf(member: RoomMember): string | undefined { return this.memberRoom.get(member)?.id }

  stats(roomId: string): RoomStats {
    const room = this.rooms.get(roomId)
    return { roomId, exists: room !== undefined, members: room?.members.size ?? 0 }
  }

  get roomCount(): number { return this.rooms.size }
}
