export type ServerConfig = {
  port: number
  host: string
  heartbeatMs: number
  maxPayloadBytes: number    // largest single frame accepted from a client
  maxBufferedBytes: number   // per-recipient backlog before it counts as too slow
}

export const DEFAULTS: ServerConfig = {
  port: 8787,
  host: "0.0.0.0",
  heartbeatMs: 10_000,
  maxPayloadBytes: 16 * 1024 * 1024,
  maxBufferedBytes: 8 * 1024 * 1024,
}

type Env = Record<string, string | undefined>

function positiveInt(env: Env, name: string, fallback: number) {
  const raw = env[name]
  if (raw === undefined || raw.trim() === "") return fallback
  const v = Number(raw)
  if (!Number.isInteger(v) || v <= 0) throw new Error(`${name} must be a positive integer`)
  return v
}

export function loadConfig(env: Env = process.env): ServerConfig {
  return {
    port: positiveInt(env, "PORT", DEFAULTS.port),
    host: env.HOST?.trim() || DEFAULTS.host,
    heartbeatMs: positiveInt(env, "HEARTBEAT_MS", DEFAULTS.heartbeatMs),
    maxPayloadBytes: positiveInt(env, "MAX_PAYLOAD_BYTES", DEFAULTS.maxPayloadBytes),
    maxBufferedBytes: positiveInt(env, "MAX_BUFFERED_BYTES", DEFAULTS.maxBufferedBytes),
  }
}
