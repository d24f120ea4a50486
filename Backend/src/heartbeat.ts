import type { Log } from "./types"
import { errorMessage } from "./utils"

export type Pingable = {
  readonly id: string
  isAlive: boolean   // set back to true by the pong handler
  ping(): void
}

/**
 * Pings every live socket each interval. A socket that has not answered the
 * previous ping by the next tick is handed to `onDead`.
 */
export function startHeartbeat<T extends Pingable>(
  members: () => Iterable<T>,
  intervalMs: number,
  onDead: (member: T) => void,
  log: Log,
) {
  const timer = setInterval(() => {
    for (const m of [...members()]) {
      if (!m.isAlive) {
        log(`[ws] ${m.id} missed heartbeat`)
        onDead(m)
        continue
      }
      m.isAlive = false
      try { m.ping() } catch (err) { log(`[ws] ping ${m.id} failed: ${errorMessage(err)}`) }
    }
  }, intervalMs)
  timer.unref()
  return () => clearInterval(timer)
}
