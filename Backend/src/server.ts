import express from "express";
import cors from "cors";
import { STATUS_CODES, type IncomingMessage, type Server } from "http";
import type { Duplex } from "stream";
import { WebSocketServer, type WebSocket } from "ws";

import { DEFAULTS, type ServerConfig } from "./config";
import { startHeartbeat } from "./heartbeat";
import { createSocketMember, type SocketMember } from "./member";
import { RoomRegistry } from "./rooms";
import type { Log } from "./types";
import { errorMessage, genRoomCode, toBuffer } from "./utils";

// ----- HTTP APP (/health, /api/rooms/*) -----
export function buildHttpApp(rooms: RoomRegistry) {
  const app = express();

  app.use(cors({ origin: true, credentials: false, methods: ["GET", "POST", "OPTIONS"] }));
  app.options(/.*/, cors());

  app.get("/health", (_req, res) => res.json({ ok: true, rooms: rooms.roomCount }));

  // Fresh code that no live room is using yet.
  app.post("/api/rooms", (_req, res) => {
    let roomId = genRoomCode();
    while (rooms.get(roomId)) roomId = genRoomCode();
    res.json({ roomId });
  });

  app.get("/api/rooms/:roomId", (req, res) => res.json(rooms.stats(req.params.roomId)));

  return app;
}

// ----- WS ROOMS -----
export type Channel = "rooms" | "signal";

export type UpgradeTarget =
  | { ok: true; channel: Channel; roomId: string }
  | { ok: false; status: 400 | 404 };

const ROUTES: Array<{ prefix: string; channel: Channel }> = [
  { prefix: "/room/", channel: "rooms" },
  { prefix: "/ws/", channel: "rooms" },      // older clients
  { prefix: "/signal/", channel: "signal" },
];

export function parseUpgradePath(url: string | undefined): UpgradeTarget {
  const { pathname } = new URL(url ?? "/", "http://relay.invalid");
  const route = ROUTES.find(r => pathname.startsWith(r.prefix));
  if (!route) return { ok: false, status: 404 };

  const segment = pathname.slice(route.prefix.length);
  if (!segment || segment.includes("/")) return { ok: false, status: 400 };
  try {
    return { ok: true, channel: route.channel, roomId: decodeURIComponent(segment) };
  } catch {
    return { ok: false, status: 400 }; // malformed percent-encoding
  }
}

export type RelayOptions = {
  config?: ServerConfig;
  onLog?: Log;
};

export type Relay = {
  rooms: RoomRegistry;
  signals: RoomRegistry;
  close(): Promise<void>;
};

export function createRelay(opts: RelayOptions = {}) {
  const log = opts.onLog ?? ((line: string) => console.log(line));
  return {
    config: opts.config ?? DEFAULTS,
    log,
    rooms: new RoomRegistry({ name: "rooms", onLog: log }),
    signals: new RoomRegistry({ name: "signal", onLog: log }),
  };
}

export type RelayContext = ReturnType<typeof createRelay>;

export function createWSServer(server: Server, relay: RelayContext): Relay {
  const { config, log, rooms, signals } = relay;
  const wss = new WebSocketServer({ noServer: true, maxPayload: config.maxPayloadBytes });
  const live = new Set<SocketMember>();

  function drop(m: SocketMember) {
    rooms.leave(m);
    signals.leave(m);
    m.terminate();
  }

  function attach(ws: WebSocket, channel: Channel, roomId: string) {
    const registry = channel === "signal" ? signals : rooms;
    const member = createSocketMember(ws, {
      maxBufferedBytes: config.maxBufferedBytes,
      onSendError: (m, err) => { log(`[ws] write to ${m.id} failed: ${err.message}`); drop(m); },
    });
    live.add(member);
    registry.join(roomId, member);

    ws.on("pong", () => { member.isAlive = true });

    ws.on("message", (raw, isBinary) => {
      registry.broadcast(member, { data: toBuffer(raw), binary: isBinary });
    });

    ws.on("error", (err) => { log(`[ws] ${member.id} error: ${errorMessage(err)}`); drop(member); });

    ws.on("close", () => {
      live.delete(member);
      registry.leave(member);
    });
  }

  function refuse(socket: Duplex, status: 400 | 404) {
    socket.once("finish", () => socket.destroy());
    socket.end(`HTTP/1.1 ${status} ${STATUS_CODES[status]}\r\nConnection: close\r\nContent-Length: 0\r\n\r\n`);
  }

  const onUpgrade = (req: IncomingMessage, socket: Duplex, head: Buffer) => {
    const target = parseUpgradePath(req.url);
    if (!target.ok) { refuse(socket, target.status); return; }
    wss.handleUpgrade(req, socket, head, (ws) => attach(ws, target.channel, target.roomId));
  };
  server.on("upgrade", onUpgrade);

  const stopHeartbeat = startHeartbeat(() => live, config.heartbeatMs, drop, log);

  log("✅ WebSocket relay attached");

  return {
    rooms,
    signals,
    close() {
      stopHeartbeat();
      server.off("upgrade", onUpgrade);
      for (const m of live) drop(m);
      return new Promise<void>((resolve, reject) => {
        wss.close((err) => (err ? reject(err) : resolve()));
      });
    },
  };
}
