import { describe, it, expect, beforeEach } from "vitest";
import { WebSocket } from "ws";
import { Broadcaster } from "../src/core/services/Broadcaster.js";
import { DROPPED_CLOSE_CODE, WebSocketFeed, type FeedSocket } from "../src/infrastructure/feed/WebSocketFeed.js";
import { logEvent, status } from "./fakes.js";

class FakeSocket implements FeedSocket {
  readyState: number = WebSocket.OPEN;
  readonly sent: string[] = [];
  closed: { code?: number; reason?: string } | null = null;
  failSends = false;
  private readonly closeListeners: Array<() => void> = [];

  send(data: string, cb: (error?: Error) => void): void {
    if (this.failSends) {
      cb(new Error("write EPIPE"));
      return;
    }
    this.sent.push(data);
    cb();
  }

  close(code?: number, reason?: string): void {
    this.closed = { code, reason };
    this.disconnect();
  }

  /** The peer went away. */
  disconnect(): void {
    this.readyState = WebSocket.CLOSED;
    for (const listener of this.closeListeners.splice(0)) listener();
  }

  once(_event: "close", listener: () => void): this {
    this.closeListeners.push(listener);
    return this;
  }

  on(_event: "error", _listener: (error: Error) => void): this {
    return this;
  }

  frames(): unknown[] {
    return this.sent.map((frame) => JSON.parse(frame));
  }
}

describe("WebSocketFeed", () => {
  let broadcaster: Broadcaster;
  let feed: WebSocketFeed;

  beforeEach(() => {
    broadcaster = new Broadcaster({ initialStatus: status(false, null) });
    feed = new WebSocketFeed(broadcaster, { host: "127.0.0.1", port: 0 });
  });

  it("sends the status snapshot as the first frame", async () => {
    const socket = new FakeSocket();

    const id = feed.attach(socket);
    await broadcaster.settled();

    expect(broadcaster.observerIds()).toEqual([id]);
    expect(socket.frames()).toEqual([status(false, null)]);
  });

  it("sends each event as one JSON frame in order", async () => {
    const socket = new FakeSocket();
    feed.attach(socket);

    broadcaster.publish(status(true, 4242));
    broadcaster.publish(logEvent(1, "\u001b[32mB\u001b[0m", "B"));
    await broadcaster.settled();

    expect(socket.frames()).toEqual([status(false, null), status(true, 4242), logEvent(1, "\u001b[32mB\u001b[0m", "B")]);
  });

  it("unsubscribes a socket that disconnects", () => {
    const socket = new FakeSocket();
    feed.attach(socket);

    socket.disconnect();

    expect(broadcaster.observerIds()).toEqual([]);
    expect(feed.connectionCount).toBe(0);
  });

  it("closes the socket of an observer whose send failed", async () => {
    const socket = new FakeSocket();
    feed.attach(socket);
    await broadcaster.settled();

    socket.failSends = true;
    broadcaster.publish(logEvent(1, "A"));
    await broadcaster.settled();

    expect(socket.closed).toEqual({ code: DROPPED_CLOSE_CODE, reason: "delivery failed: write EPIPE" });
    expect(broadcaster.observerIds()).toEqual([]);
    expect(feed.connectionCount).toBe(0);
  });

  it("disconnects everyone on close", async () => {
    const a = new FakeSocket();
    const b = new FakeSocket();
    feed.attach(a);
    feed.attach(b);

    await feed.close();

    expect(a.closed).toEqual({ code: 1001, reason: "server shutting down" });
    expect(b.closed).toEqual({ code: 1001, reason: "server shutting down" });
    expect(broadcaster.observerCount).toBe(0);
  });
});
