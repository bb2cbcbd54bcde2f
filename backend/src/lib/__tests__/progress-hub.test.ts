import http from "node:http";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { WebSocket } from "ws";
import { ProgressHub } from "../progress-hub.js";

type Message = Record<string, unknown>;

/** Client socket whose messages can be awaited one at a time. */
class TestClient {
  private readonly received: Message[] = [];
  private waiting: Array<(m: Message) => void> = [];
  readonly ws: WebSocket;

  constructor(url: string) {
    this.ws = new WebSocket(url);
    this.ws.on("message", data => {
      const parsed: unknown = JSON.parse(data.toString());
      const message: Message = typeof parsed === "object" && parsed !== null ? { ...parsed } : {};
      const waiter = this.waiting.shift();
      if (waiter) waiter(message);
      else this.received.push(message);
    });
  }

  next(): Promise<Message> {
    const queued = this.received.shift();
    if (queued) return Promise.resolve(queued);
    return new Promise(resolve => this.waiting.push(resolve));
  }

  async close(): Promise<void> {
    if (this.ws.readyState === WebSocket.CLOSED) return;
    await new Promise<void>(resolve => {
      this.ws.once("close", () => resolve());
      this.ws.close();
    });
  }
}

describe("ProgressHub", () => {
  let server: http.Server;
  let hub: ProgressHub;
  let base: string;
  const clients: TestClient[] = [];

  const connect = async (sessionId: string) => {
    const client = new TestClient(`${base}/ws/${sessionId}`);
    clients.push(client);
    expect(await client.next()).toMatchObject({ type: "connection_established", session_id: sessionId });
    return client;
  };

  beforeEach(async () => {
    hub = new ProgressHub();
    server = http.createServer();
    hub.attach(server);
    await new Promise<void>(resolve => server.listen(0, "127.0.0.1", resolve));
    const address = server.address();
    if (address === null || typeof address === "string") throw new Error("server is not listening on a port");
    base = `ws://127.0.0.1:${address.port}`;
  });

  afterEach(async () => {
    await Promise.all(clients.splice(0).map(c => c.close()));
    hub.close();
    await new Promise<void>(resolve => server.close(() => resolve()));
  });

  it("answers pings and acknowledges other messages", async () => {
    const client = await connect("s1");
    client.ws.send(JSON.stringify({ type: "ping" }));
    expect(await client.next()).toMatchObject({ type: "pong" });
    client.ws.send(JSON.stringify({ type: "hello" }));
    expect(await client.next()).toMatchObject({ type: "message_received", session_id: "s1" });
    client.ws.send("not json");
    expect(await client.next()).toMatchObject({ type: "error", message: "Invalid JSON format" });
  });

  it("sends progress only to the session's clients", async () => {
    const mine = await connect("s1");
    const other = await connect("s2");

    hub.progress("s1", 30, "Sending request to AI model...");
    expect(await mine.next()).toMatchObject({
      type: "generation_progress",
      session_id: "s1",
      progress: 30,
      message: "Sending request to AI model...",
      status: "processing",
    });
    expect(hub.generationState("s1")).toMatchObject({ progress: 30, status: "processing" });

    hub.complete("s2", { success: false, error: "boom" });
    expect(await other.next()).toMatchObject({ type: "generation_complete", success: false, error: "boom" });

    hub.complete("s1", { success: true, planId: "p1" });
    expect(await mine.next()).toMatchObject({ type: "generation_complete", success: true, plan_id: "p1" });
    expect(hub.generationState("s1")).toBeUndefined();
  });

  it("counts connections per session", async () => {
    await connect("s1");
    await connect("s1");
    await connect("s2");
    expect(hub.stats()).toEqual({ total_connections: 3, active_sessions: 2, generations_tracked: 0 });
  });

  it("rejects upgrades outside /ws/:sessionId", async () => {
    const ws = new WebSocket(`${base}/other`);
    const status = await new Promise<number | undefined>(resolve => {
      ws.on("unexpected-response", (_req, res) => resolve(res.statusCode));
      ws.on("error", () => resolve(undefined));
    });
    ws.terminate();
    expect(status).toBe(404);
  });
});
