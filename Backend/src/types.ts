// A frame as it crossed the wire: bytes plus the text/binary flag it arrived with.
// The relay never looks inside.
export type RelayFrame = {
  data: Buffer
  binary: boolean
}

// What the registry needs from a connection. Transport details stay behind it.
export interface RoomMember {
  readonly id: string
  send(frame: RelayFrame): void   // throws when the member can no longer take frames
  terminate(): void
}

export type Room = {
  id: string
  createdAt: number
  members: Map<string, RoomMember> // member id -> member
}

export type RoomStats = {
  roomId: string
  exists: boolean
  members: number
}

export type Log = (line: string) => void
