import { useCallback, useEffect, useRef, useState } from "react";
import { z } from "zod";
import type { GenerationProgress } from "../lib/types.js";

const PING_INTERVAL_MS = 30_000;
const RECONNECT_DELAY_MS = 3_000;
const OPEN_TIMEOUT_MS = 2_000;
const CONNECTING = 0;

const serverMessageSchema = z.discriminatedUnion("type", [
  z.object({ type: z.literal("connection_established"), session_id: z.string(), message: z.string().optional() }),
  z.object({
    type: z.literal("generation_progress"),
    progress: z.number(),
    message: z.string(),
    status: z.enum(["processing", "completed", "error"]).default("processing"),
  }),
  z.object({
    type: z.literal("generation_complete"),
    success: z.boolean(),
    plan_id: z.string().optional(),
    error: z.string().optional(),
    message: z.string().optional(),
  }),
  z.object({ type: z.literal("pong") }),
  z.object({ type: z.literal("message_received") }),
  z.object({ type: z.literal("error"), message: z.string() }),
]);

export type ServerMessage = z.infer<typeof serverMessageSchema>;

export function parseServerMessage(data: string): ServerMessage | undefined {
  let value: unknown;
  try {
    value = JSON.parse(data);
  } catch {
    return undefined;
  }
  const parsed = serverMessageSchema.safeParse(value);
  return parsed.success ? parsed.data : undefined;
}

/** How a server message changes the displayed progress; undefined leaves it as is. */
export function progressFromMessage(message: ServerMessage): GenerationProgress | undefined {
  switch (message.type) {
    case "generation_progress":
      return { progress: message.progress, message: message.message, status: message.status };
    case "generation_complete":
      return message.success
        ? { progress: 100, message: message.message ?? "Task plan generated successfully!", status: "completed" }
        : { progress: 0, message: message.error ?? "Generation failed", status: "error" };
    default:
      return undefined;
  }
}

export function newSessionId(now: number = Date.now()): string {
  return `session_${now}_${Math.random().toString(36).slice(2, 11)}`;
}

function socketUrl(sessionId: string): string {
  const configured = import.meta.env.VITE_WS_URL?.trim().replace(/\/+$/, "");
  const base = configured || `${window.location.protocol === "https:" ? "wss" : "ws"}://${window.location.host}`;
  return `${base}/ws/${encodeURIComponent(sessionId)}`;
}

type SocketEvent = "open" | "error" | "close";

type Openable = {
  readyState: number;
  addEventListener(type: SocketEvent, listener: () => void): void;
  removeEventListener(type: SocketEvent, listener: () => void): void;
};

/** Settles once the socket has opened, failed or closed, or after `timeoutMs`. Never rejects. */
export function waitForOpen(socket: Openable, timeoutMs: number): Promise<void> {
  if (socket.readyState !== CONNECTING) return Promise.resolve();
  const events: SocketEvent[] = ["open", "error", "close"];
  return new Promise(resolve => {
    const done = () => {
      clearTimeout(timer);
      for (const type of events) socket.removeEventListener(type, done);
      resolve();
    };
    const timer = setTimeout(done, timeoutMs);
    for (const type of events) socket.addEventListener(type, done);
  });
}

export type UseWebSocket = {
  sessionId: string | null;
  connected: boolean;
  progress: GenerationProgress | null;
  error: string | null;
  /** Open a socket for a fresh session; resolves with its id once the socket is open or gave up. */
  connect: () => Promise<string>;
  disconnect: () => void;
};

/** Progress channel for one plan generation at a time. */
export function useWebSocket(): UseWebSocket {
  const [sessionId, setSessionId] = useState<string | null>(null);
  const [connected, setConnected] = useState(false);
  const [progress, setProgress] = useState<GenerationProgress | null>(null);
  const [error, setError] = useState<string | null>(null);

  const socket = useRef<WebSocket | null>(null);
  const pingTimer = useRef<ReturnType<typeof setInterval> | null>(null);
  const reconnectTimer = useRef<ReturnType<typeof setTimeout> | null>(null);

  const clearTimers = () => {
    if (pingTimer.current) clearInterval(pingTimer.current);
    if (reconnectTimer.current) clearTimeout(reconnectTimer.current);
    pingTimer.current = null;
    reconnectTimer.current = null;
  };

  const open = useCallback((id: string): WebSocket => {
    const ws = new WebSocket(socketUrl(id));
    socket.current = ws;

    ws.onopen = () => {
      setConnected(true);
      setError(null);
      pingTimer.current = setInterval(() => {
        if (ws.readyState === WebSocket.OPEN) ws.send(JSON.stringify({ type: "ping" }));
      }, PING_INTERVAL_MS);
    };

    ws.onmessage = event => {
      if (typeof event.data !== "string") return;
      const message = parseServerMessage(event.data);
      if (!message) return;
      if (message.type === "error") setError(message.message);
      const next = progressFromMessage(message);
      if (next) setProgress(next);
    };

    ws.onerror = () => setError("WebSocket connection error");

    ws.onclose = event => {
      setConnected(false);
      clearTimers();
      if (socket.current !== ws) return;
      socket.current = null;
      // 1000 and 1001 are deliberate closes by either side
      if (event.code !== 1000 && event.code !== 1001) {
        reconnectTimer.current = setTimeout(() => open(id), RECONNECT_DELAY_MS);
      }
    };
    return ws;
  }, []);

  const disconnect = useCallback(() => {
    clearTimers();
    const ws = socket.current;
    socket.current = null;
    if (ws && ws.readyState <= WebSocket.OPEN) ws.close(1000, "Client disconnect");
    setConnected(false);
  }, []);

  const connect = useCallback(async () => {
    disconnect();
    const id = newSessionId();
    setSessionId(id);
    setProgress(null);
    setError(null);
    await waitForOpen(open(id), OPEN_TIMEOUT_MS);
    return id;
  }, [disconnect, open]);

  useEffect(() => disconnect, [disconnect]);

  return { sessionId, connected, progress, error, connect, disconnect };
}
