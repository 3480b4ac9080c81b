/**
 * Broadcaster - fan-out of relay events to every subscribed observer.
 *
 * Each observer gets its own FIFO queue drained by its own async loop, so
 * `publish()` only enqueues: a slow observer delays nobody but itself, and a
 * failing one is dropped without the publisher noticing.
 */

import { silentLogger, type Logger } from "@console-relay/core";
import { statusEvent, type EventSink, type RelayEvent, type StatusEvent } from "../model.js";
import type { Observer } from "../ports/Observer.js";

export interface BroadcasterOptions {
  /** Events an observer may have queued before it is dropped. Default: 1000 */
  maxPendingEvents?: number;
  /** Status delivered to observers before anything has been published */
  initialStatus?: StatusEvent;
  logger?: Logger;
}

export const DEFAULT_MAX_PENDING_EVENTS = 1000;

class ObserverChannel {
  private readonly queue: RelayEvent[] = [];
  private draining: Promise<void> | null = null;
  private closed = false;

  constructor(
    readonly observer: Observer,
    private readonly maxPending: number,
    private readonly onFailure: (channel: ObserverChannel, reason: string) => void
  ) {}

  get pending(): number {
    return this.queue.length;
  }

  /** Returns false once the channel is closed or its queue overflowed. */
  enqueue(event: RelayEvent): boolean {
    if (this.closed) return false;
    if (this.queue.length >= this.maxPending) {
      this.onFailure(this, `more than ${this.maxPending} undelivered events`);
      return false;
    }
    this.queue.push(event);
    if (!this.draining) this.startDrain();
    return true;
  }

  /** Resolves once the queue is empty (or the channel closed). */
  async settled(): Promise<void> {
    while (this.draining) {
      await this.draining;
    }
  }

  close(): void {
    this.closed = true;
    this.queue.length = 0;
  }

  // Only the loop that owns `draining` may clear it. Events queued while it
  // was finishing start the next one.
  private startDrain(): void {
    const loop: Promise<void> = this.drain().then(() => {
      if (this.draining !== loop) return;
      this.draining = null;
      if (this.queue.length > 0 && !this.closed) this.startDrain();
    });
    this.draining = loop;
  }

  private async drain(): Promise<void> {
    try {
      for (let event = this.queue.shift(); event && !this.closed; event = this.queue.shift()) {
        await this.observer.deliver(event);
      }
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      this.onFailure(this, `delivery failed: ${message}`);
    }
  }
}

export class Broadcaster implements EventSink {
  private readonly channels = new Map<string, ObserverChannel>();
  private readonly maxPending: number;
  private readonly logger: Logger;
  private current: StatusEvent;

  constructor(options: BroadcasterOptions = {}) {
    this.maxPending = options.maxPendingEvents ?? DEFAULT_MAX_PENDING_EVENTS;
    this.logger = options.logger ?? silentLogger;
    this.current = options.initialStatus ?? statusEvent(false, null);
  }

  /** The status every new observer receives first. */
  get snapshot(): StatusEvent {
    return this.current;
  }

  /**
   * Register `observer` and queue the current status snapshot for it.
   * Returns false if an observer with the same id is already subscribed.
   */
  subscribe(observer: Observer): boolean {
    if (this.channels.has(observer.id)) return false;

    const channel = new ObserverChannel(observer, this.maxPending, (failed, reason) =>
      this.drop(failed, reason)
    );
    this.channels.set(observer.id, channel);
    this.logger.debug(`Observer ${observer.id} subscribed (${this.channels.size} total)`);
    channel.enqueue(this.current);
    return true;
  }

  unsubscribe(id: string): boolean {
    const channel = this.channels.get(id);
    if (!channel) return false;

    channel.close();
    this.channels.delete(id);
    this.logger.debug(`Observer ${id} unsubscribed (${this.channels.size} total)`);
    return true;
  }

  publish(event: RelayEvent): void {
    if (event.type === "status") {
      this.current = event;
    }
    for (const channel of [...this.channels.values()]) {
      channel.enqueue(event);
    }
  }

  observerIds(): string[] {
    return [...this.channels.keys()];
  }

  get observerCount(): number {
    return this.channels.size;
  }

  /** Undelivered events per observer. */
  backlog(): Record<string, number> {
    const result: Record<string, number> = {};
    for (const [id, channel] of this.channels) {
      result[id] = channel.pending;
    }
    return result;
  }

  /** Resolves once every observer has been handed everything published so far. */
  async settled(): Promise<void> {
    await Promise.all([...this.channels.values()].map((channel) => channel.settled()));
  }

  /** Drop every observer. */
  close(reason = "feed closed"): void {
    for (const channel of [...this.channels.values()]) {
      this.drop(channel, reason);
    }
  }

  private drop(channel: ObserverChannel, reason: string): void {
    const { observer } = channel;
    if (this.channels.get(observer.id) !== channel) return;

    channel.close();
    this.channels.delete(observer.id);
    this.logger.warn(`Dropped observer ${observer.id}: ${reason}`);
    try {
      observer.close?.(reason);
    } catch (error) {
      this.logger.error(`Closing observer ${observer.id} failed`, error);
    }
  }
}
