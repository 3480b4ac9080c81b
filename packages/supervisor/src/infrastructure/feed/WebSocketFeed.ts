import { randomUUID } from "node:crypto";
import { WebSocket, WebSocketServer } from "ws";
import { silentLogger, type Logger } from "@console-relay/core";
import type { Observer } from "../../core/ports/Observer.js";
import type { Broadcaster } from "../../core/services/Broadcaster.js";

/** The part of a `ws` socket the feed uses. */
export interface FeedSocket {
  readonly readyState: number;
  send(data: string, cb: (error?: Error) => void): void;
  close(code?: number, reason?: string): void;
  once(event: "close", listener: () => void): unknown;
  on(event: "error", listener: (error: Error) => void): unknown;
}

export interface WebSocketFeedOptions {
  host: string;
  port: number;
  /** Default: /events */
  path?: string;
  logger?: Logger;
}

export const FEED_PATH = "/events";
/** Close code for observers the broadcaster dropped */
export const DROPPED_CLOSE_CODE = 4000;
const GOING_AWAY_CLOSE_CODE = 1001;
// Close reasons are limited to 123 bytes
const MAX_REASON_LENGTH = 120;

function send(socket: FeedSocket, data: string): Promise<void> {
  if (socket.readyState !== WebSocket.OPEN) {
    return Promise.reject(new Error("socket is not open"));
  }
  return new Promise((resolve, reject) => {
    socket.send(data, (error) => (error ? reject(error) : resolve()));
  });
}

function closeSocket(socket: FeedSocket, code: number, reason: string): void {
  if (socket.readyState === WebSocket.CONNECTING || socket.readyState === WebSocket.OPEN) {
    socket.close(code, reason.slice(0, MAX_REASON_LENGTH));
  }
}

/**
 * Observer feed: every WebSocket connection on `path` becomes an Observer,
 * and every event it receives goes out as one JSON text frame.
 */
export class WebSocketFeed {
  private readonly sockets = new Map<string, FeedSocket>();
  private readonly logger: Logger;
  private server: WebSocketServer | null = null;

  constructor(
    private readonly broadcaster: Broadcaster,
    private readonly options: WebSocketFeedOptions
  ) {
    this.logger = options.logger ?? silentLogger;
  }

  get connectionCount(): number {
    return this.sockets.size;
  }

  /** Subscribe a connected socket. Returns its observer id. */
  attach(socket: FeedSocket): string {
    const id = randomUUID();
    const observer: Observer = {
      id,
      deliver: (event) => send(socket, JSON.stringify(event)),
      close: (reason) => closeSocket(socket, DROPPED_CLOSE_CODE, reason),
    };

    socket.once("close", () => {
      this.sockets.delete(id);
      if (this.broadcaster.unsubscribe(id)) {
        this.logger.info(`Observer ${id} disconnected`);
      }
    });
    socket.on("error", (error) => {
      this.logger.warn(`Observer ${id} socket error: ${error.message}`);
    });

    this.sockets.set(id, socket);
    this.broadcaster.subscribe(observer);
    this.logger.info(`Observer ${id} connected (${this.sockets.size} open)`);
    return id;
  }

  /** Start accepting connections. Resolves with the bound port. */
  listen(): Promise<number> {
    if (this.server) {
      return Promise.reject(new Error("Feed is already listening"));
    }
    const path = this.options.path ?? FEED_PATH;

    return new Promise((resolve, reject) => {
      const server = new WebSocketServer({ host: this.options.host, port: this.options.port, path });
      this.server = server;

      server.on("connection", (socket) => {
        this.attach(socket);
      });
      server.once("error", (error) => {
        this.server = null;
        reject(error);
      });
      server.once("listening", () => {
        const address = server.address();
        const port = typeof address === "string" ? this.options.port : address.port;
        this.logger.info(`Feed listening on ws://${this.options.host}:${port}${path}`);
        resolve(port);
      });
    });
  }

  /** Disconnect every observer and stop listening. */
  async close(): Promise<void> {
    for (const [id, socket] of this.sockets) {
      this.broadcaster.unsubscribe(id);
      closeSocket(socket, GOING_AWAY_CLOSE_CODE, "server shutting down");
    }
    this.sockets.clear();

    const server = this.server;
    if (!server) return;
    this.server = null;
    await new Promise<void>((resolve, reject) => {
      server.close((error) => (error ? reject(error) : resolve()));
    });
  }
}
