import type { IncomingMessage, Server } from "node:http";
import type { Duplex } from "node:stream";
import { WebSocket, WebSocketServer, type RawData } from "ws";
import { errorMessage } from "./errors.js";
import { getLogger } from "./logger.js";
import type { ProgressReporter, ProgressStatus } from "../types.js";

const log = getLogger("ws");
const SESSION_PATH = /^\/ws\/([^/?#]+)\/?$/;

export type GenerationState = {
  progress: number;
  message: string;
  status: ProgressStatus;
  updated_at: string;
};

export type HubStats = {
  total_connections: number;
  active_sessions: number;
  generations_tracked: number;
};

const now = () => new Date().toISOString();

/**
 * WebSocket endpoint `/ws/:sessionId`. Clients of a session receive the
 * progress and completion of plan generations started with that session id.
 */
export class ProgressHub implements ProgressReporter {
  private readonly wss = new WebSocketServer({ noServer: true });
  private readonly sessions = new Map<string, Set<WebSocket>>();
  private readonly generations = new Map<string, GenerationState>();

  /** Route HTTP upgrades for `/ws/:sessionId` on `server` to this hub. */
  attach(server: Server): void {
    server.on("upgrade", (req: IncomingMessage, socket: Duplex, head: Buffer) => {
      const match = SESSION_PATH.exec(new URL(req.url ?? "/", "http://localhost").pathname);
      if (!match) {
        socket.write("HTTP/1.1 404 Not Found\r\nConnection: close\r\n\r\n");
        socket.destroy();
        return;
      }
      const sessionId = decodeURIComponent(match[1]);
      this.wss.handleUpgrade(req, socket, head, ws => this.connect(ws, sessionId));
    });
  }

  private connect(ws: WebSocket, sessionId: string): void {
    const sockets = this.sessions.get(sessionId) ?? new Set<WebSocket>();
    sockets.add(ws);
    this.sessions.set(sessionId, sockets);
    log.info({ sessionId, connections: this.connectionCount() }, "client connected");

    this.send(ws, {
      type: "connection_established",
      session_id: sessionId,
      message: "Connected to TaskFlow real-time updates",
      timestamp: now(),
    });

    ws.on("message", data => this.receive(ws, sessionId, data));
    ws.on("close", () => this.disconnect(ws, sessionId));
    ws.on("error", err => log.warn({ sessionId, err: errorMessage(err) }, "socket error"));
  }

  private receive(ws: WebSocket, sessionId: string, data: RawData): void {
    let message: unknown;
    try {
      message = JSON.parse(data.toString());
    } catch {
      this.send(ws, { type: "error", message: "Invalid JSON format", timestamp: now() });
      return;
    }
    const type = typeof message === "object" && message !== null && "type" in message ? message.type : undefined;
    if (type === "ping") {
      this.send(ws, { type: "pong", timestamp: now() });
    } else {
      this.send(ws, { type: "message_received", session_id: sessionId, timestamp: now() });
    }
  }

  private disconnect(ws: WebSocket, sessionId: string): void {
    const sockets = this.sessions.get(sessionId);
    sockets?.delete(ws);
    if (sockets && sockets.size === 0) this.sessions.delete(sessionId);
    log.info({ sessionId, connections: this.connectionCount() }, "client disconnected");
  }

  private send(ws: WebSocket, payload: Record<string, unknown>): void {
    if (ws.readyState !== WebSocket.OPEN) return;
    ws.send(JSON.stringify(payload), err => {
      if (err) log.warn({ err: errorMessage(err) }, "failed to send message");
    });
  }

  private sendToSession(sessionId: string, payload: Record<string, unknown>): void {
    for (const ws of this.sessions.get(sessionId) ?? []) this.send(ws, payload);
  }

  progress(sessionId: string, progress: number, message: string, status: ProgressStatus = "processing"): void {
    this.generations.set(sessionId, { progress, message, status, updated_at: now() });
    this.sendToSession(sessionId, {
      type: "generation_progress",
      session_id: sessionId,
      progress,
      message,
      status,
      timestamp: now(),
    });
  }

  complete(sessionId: string, outcome: { success: true; planId: string } | { success: false; error: string }): void {
    this.generations.delete(sessionId);
    this.sendToSession(sessionId, {
      type: "generation_complete",
      session_id: sessionId,
      success: outcome.success,
      ...(outcome.success
        ? { plan_id: outcome.planId, message: "Task plan generated successfully!" }
        : { error: outcome.error, message: "Task plan generation failed" }),
      timestamp: now(),
    });
  }

  generationState(sessionId: string): GenerationState | undefined {
    return this.generations.get(sessionId);
  }

  private connectionCount(): number {
    let total = 0;
    for (const sockets of this.sessions.values()) total += sockets.size;
    return total;
  }

  stats(): HubStats {
    return {
      total_connections: this.connectionCount(),
      active_sessions: this.sessions.size,
      generations_tracked: this.generations.size,
    };
  }

  close(): void {
    for (const sockets of this.sessions.values()) {
      for (const ws of sockets) ws.close(1001, "Server shutting down");
    }
    this.sessions.clear();
    this.wss.close();
  }
}
