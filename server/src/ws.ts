import { WebSocketServer, WebSocket } from "ws";
import { log } from "shared";
import type { FeedErrorMessage, GameStateView, SnapshotMessage } from "shared";
import type { Arena } from "./arena.js";
import { config } from "./config.js";

/** The slice of a socket the feed needs; lets tests pass plain mocks */
export interface FeedClient {
  readyState: number;
  send(data: string): void;
}

export function snapshotMessage(state: GameStateView): SnapshotMessage {
  return { v: 1, type: "snapshot", tick: state.tick, state };
}

/** Send one snapshot to every open client; returns how many were reached */
export function broadcastSnapshot(clients: Iterable<FeedClient>, state: GameStateView): number {
  const payload = JSON.stringify(snapshotMessage(state));
  let sent = 0;
  for (const client of clients) {
    if (client.readyState !== WebSocket.OPEN) continue;
    try {
      client.send(payload);
      sent++;
    } catch (err) {
      log.warn("Failed to send snapshot", { gameId: state.game_id, error: String(err) });
    }
  }
  return sent;
}

const READ_ONLY: FeedErrorMessage = { v: 1, type: "feed_error", error: "read_only" };

/** Read-only spectator feed: a snapshot on connect and after every advance step */
export function createWSServer(port: number, arena: Arena): WebSocketServer {
  const wss = new WebSocketServer({ port, host: config.host });

  const unsubscribe = arena.onTick((state) => {
    broadcastSnapshot(wss.clients, state);
  });

  wss.on("connection", (ws) => {
    log.debug("Spectator connected", { gameId: arena.gameId, spectators: wss.clients.size });
    ws.send(JSON.stringify(snapshotMessage(arena.getState())));

    ws.on("message", () => {
      ws.send(JSON.stringify(READ_ONLY));
    });

    ws.on("close", () => {
      log.debug("Spectator disconnected", { gameId: arena.gameId, spectators: wss.clients.size });
    });
  });

  wss.on("close", unsubscribe);

  return wss;
}
