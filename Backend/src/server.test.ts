/**
 * Relay end-to-end: a real http + ws server on an ephemeral localhost port,
 * driven by RoomClient and bare ws sockets from inside the test process.
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as http from 'http';
import WebSocket from 'ws';
import { buildHttpApp, createRelay, createWSServer, parseUpgradePath, type Relay } from './server';
import { RoomClient } from '../../Frontend/src/lib/client';
import type { ChatMsg, ReceivedFile } from '../../Frontend/src/lib/types';

// =============================================================================
// Test Utilities
// =============================================================================

let server: http.Server;
let relay: Relay;
let host: string;
const clients: RoomClient[] = [];
const sockets: WebSocket[] = [];

beforeEach(async () => {
  const ctx = createRelay({ onLog: () => {} });
  server = http.createServer(buildHttpApp(ctx.rooms));
  relay = createWSServer(server, ctx);
  await new Promise<void>(resolve => server.listen(0, '127.0.0.1', () => resolve()));
  const addr = server.address();
  if (!addr || typeof addr === 'string') throw new Error('server has no port');
  host = `127.0.0.1:${addr.port}`;
});

afterEach(async () => {
  for (const c of clients.splice(0)) c.close();
  for (const ws of sockets.splice(0)) ws.terminate();
  await relay.close();
  await new Promise<void>(resolve => server.close(() => resolve()));
});

async function waitFor(check: () => boolean, timeoutMs = 3000) {
  const start = Date.now();
  while (!check()) {
    if (Date.now() - start > timeoutMs) throw new Error('condition not met in time');
    await new Promise(resolve => setTimeout(resolve, 10));
  }
}

async function joinAs(username: string, roomId: string) {
  const chats: ChatMsg[] = [];
  const files: ReceivedFile[] = [];
  const progress: number[] = [];
  const client = new RoomClient({
    baseUrl: `ws://${host}`,
    roomId,
    username,
    onChat: m => chats.push(m),
    onFile: f => files.push(f),
    onReceiveProgress: (_id, p) => progress.push(p),
  });
  clients.push(client);
  await client.connect();
  return { client, chats, files, progress };
}

function openRaw(path: string) {
  const ws = new WebSocket(`ws://${host}${path}`);
  sockets.push(ws);
  return new Promise<WebSocket>((resolve, reject) => {
    ws.once('open', () => resolve(ws));
    ws.once('error', reject);
  });
}

function nextMessage(ws: WebSocket) {
  return new Promise<{ text: string; isBinary: boolean }>(resolve => {
    ws.once('message', (data, isBinary) => resolve({ text: data.toString(), isBinary }));
  });
}

// =============================================================================
// Rooms
// =============================================================================

describe('room relay', () => {
  it('relays chat to the other member and not back to the sender', async () => {
    const a = await joinAs('alice', 'ABCD12');
    const b = await joinAs('bob', 'ABCD12');

    a.client.sendChat('hi');
    await waitFor(() => b.chats.length === 1);
    expect(b.chats).toEqual([{ type: 'msg', sender: 'alice', text: 'hi' }]);

    // B's reply arriving at A shows A's own message would have arrived first
    b.client.sendChat('hey');
    await waitFor(() => a.chats.length === 1);
    expect(a.chats).toEqual([{ type: 'msg', sender: 'bob', text: 'hey' }]);
  });

  it('transfers a 600000-byte file in three chunks', async () => {
    const a = await joinAs('alice', 'ABCD12');
    const b = await joinAs('bob', 'ABCD12');
    const original = Uint8Array.from({ length: 600000 }, (_, i) => (i * 7) % 256);

    const sent = await a.client.sendFile(new Blob([original]), 'data.bin');
    expect(sent.totalChunks).toBe(3);

    await waitFor(() => b.files.length === 1);
    const [file] = b.files;
    expect(file).toMatchObject({ fileId: sent.fileId, name: 'data.bin', size: 600000, sender: 'alice' });
    const got = new Uint8Array(await file.blob.arrayBuffer());
    expect(Buffer.from(got).equals(Buffer.from(original))).toBe(true);
    expect(b.progress).toEqual([0, 1 / 3, 2 / 3, 1]);
    expect(a.files).toEqual([]);
  });

  it('keeps a connection open after a malformed frame', async () => {
    const raw = await openRaw('/room/R1');
    const b = await joinAs('bob', 'R1');

    raw.send('this is not json');
    raw.send(JSON.stringify({ type: 'msg', sender: 'raw', text: 'still here' }));

    await waitFor(() => b.chats.length === 1);
    expect(b.chats[0].text).toBe('still here');
    expect(b.client.status).toBe('open');
  });

  it('removes a member from its room when it disconnects', async () => {
    const a = await joinAs('alice', 'ABCD12');
    const b = await joinAs('bob', 'ABCD12');
    expect(relay.rooms.stats('ABCD12').members).toBe(2);

    b.client.close();
    await waitFor(() => relay.rooms.stats('ABCD12').members === 1);
    await waitFor(() => b.client.status === 'closed');

    await a.client.sendFile(new Blob([new Uint8Array(1000)]), 'late.bin');
    a.client.close();
    await waitFor(() => !relay.rooms.stats('ABCD12').exists);
  });

  it('url-decodes the room segment', async () => {
    await openRaw('/room/team%20one');
    expect(relay.rooms.stats('team one')).toEqual({ roomId: 'team one', exists: true, members: 1 });
  });

  it('accepts the legacy /ws/ path', async () => {
    const raw = await openRaw('/ws/ABCD12');
    const b = await joinAs('bob', 'ABCD12');

    const got = nextMessage(raw);
    b.client.sendChat('legacy');
    expect(JSON.parse((await got).text)).toEqual({ type: 'msg', sender: 'bob', text: 'legacy' });
  });

  it('refuses unknown paths', async () => {
    const ws = new WebSocket(`ws://${host}/nope/ABCD12`);
    sockets.push(ws);
    const err = await new Promise<Error>(resolve => ws.once('error', resolve));
    expect(err.message).toBe('Unexpected server response: 404');
  });
});

// =============================================================================
// Signaling
// =============================================================================

describe('signal relay', () => {
  it('relays opaque payloads between members of a signal room', async () => {
    const one = await openRaw('/signal/S1');
    const two = await openRaw('/signal/S1');

    const got = nextMessage(two);
    one.send('opaque-offer-blob');
    expect(await got).toEqual({ text: 'opaque-offer-blob', isBinary: false });

    expect(relay.signals.stats('S1').members).toBe(2);
    expect(relay.rooms.stats('S1').exists).toBe(false);
  });

  it('keeps binary payloads binary', async () => {
    const one = await openRaw('/signal/S2');
    const two = await openRaw('/signal/S2');

    const got = nextMessage(two);
    one.send(Buffer.from([1, 2, 3]));
    expect((await got).isBinary).toBe(true);
  });
});

// =============================================================================
// HTTP
// =============================================================================

describe('http api', () => {
  it('reports health', async () => {
    const res = await fetch(`http://${host}/health`);
    expect(await res.json()).toEqual({ ok: true, rooms: 0 });
  });

  it('hands out unambiguous room codes', async () => {
    const res = await fetch(`http://${host}/api/rooms`, { method: 'POST' });
    expect(await res.json()).toEqual({ roomId: expect.stringMatching(/^[ABCDEFGHJKMNPQRSTUVWXYZ23456789]{6}$/) });
  });

  it('describes a room', async () => {
    await joinAs('alice', 'ABCD12');
    const res = await fetch(`http://${host}/api/rooms/ABCD12`);
    expect(await res.json()).toEqual({ roomId: 'ABCD12', exists: true, members: 1 });

    const missing = await fetch(`http://${host}/api/rooms/NOPE42`);
    expect(await missing.json()).toEqual({ roomId: 'NOPE42', exists: false, members: 0 });
  });
});

describe('parseUpgradePath', () => {
  it('routes room and signal paths', () => {
    expect(parseUpgradePath('/room/ABCD12')).toEqual({ ok: true, channel: 'rooms', roomId: 'ABCD12' });
    expect(parseUpgradePath('/ws/ABCD12?x=1')).toEqual({ ok: true, channel: 'rooms', roomId: 'ABCD12' });
    expect(parseUpgradePath('/signal/a%2Fb')).toEqual({ ok: true, channel: 'signal', roomId: 'a/b' });
  });

  it('rejects empty, nested and malformed room segments', () => {
    expect(parseUpgradePath('/room/')).toEqual({ ok: false, status: 400 });
    expect(parseUpgradePath('/room/a/b')).toEqual({ ok: false, status: 400 });
    expect(parseUpgradePath('/room/%E0%A4%A')).toEqual({ ok: false, status: 400 });
  });

  it('rejects unknown paths', () => {
    expect(parseUpgradePath('/')).toEqual({ ok: false, status: 404 });
    expect(parseUpgradePath(undefined)).toEqual({ ok: false, status: 404 });
  });
});
