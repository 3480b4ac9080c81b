/**
 * OutputRelay - turns a worker's raw output into sanitized LogEvents.
 *
 * One relay per worker run. `run()` reads until the worker exits, the abort
 * signal fires or the stream fails, then closes the stream and publishes
 * exactly one final StatusEvent{isRunning: false}. The end of the stream
 * alone does not finish a run while the worker is still alive.
 */

import { createInterface } from "node:readline";
import { silentLogger, type Logger } from "@console-relay/core";
import { statusEvent, type EventSink, type LogEvent, type WorkerExit } from "../model.js";
import type { WorkerHandle } from "../ports/WorkerLauncher.js";
import { sanitizeLine } from "../sanitizeLine.js";
import { withTimeout } from "../timing.js";

export type RelayHaltReason = "end" | "exit" | "stopped" | "error";

export interface RelayOutcome {
  reason: RelayHaltReason;
  /** Number of LogEvents published */
  lines: number;
  exit: WorkerExit | null;
  error?: Error;
}

export interface OutputRelayOptions {
  /** Run id stamped on every LogEvent. Default: 1 */
  runId?: number;
  /** After the worker exits, how long to wait for each further buffered line (ms). Default: 50 */
  drainGraceMs?: number;
  /** Explicit stop */
  signal?: AbortSignal;
  logger?: Logger;
  now?: () => Date;
}

export const DEFAULT_DRAIN_GRACE_MS = 50;

type Halt =
  | { halted: true; reason: "exit"; exit: WorkerExit }
  | { halted: true; reason: "stopped" }
  | { halted: true; reason: "error"; error: Error };

type LineIterator = AsyncIterator<string>;

function asError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}

export class OutputRelay {
  private readonly runId: number;
  private readonly drainGraceMs: number;
  private readonly signal: AbortSignal | undefined;
  private readonly logger: Logger;
  private readonly now: () => Date;
  private sequence = 0;
  private started = false;

  constructor(options: OutputRelayOptions = {}) {
    this.runId = options.runId ?? 1;
    this.drainGraceMs = options.drainGraceMs ?? DEFAULT_DRAIN_GRACE_MS;
    this.signal = options.signal;
    this.logger = options.logger ?? silentLogger;
    this.now = options.now ?? (() => new Date());
  }

  /**
   * Relay `handle.output` into `sink` until the run is over. Never rejects.
   */
  async run(handle: WorkerHandle, sink: EventSink): Promise<RelayOutcome> {
    if (this.started) {
      throw new Error("OutputRelay instances relay a single run");
    }
    this.started = true;

    const lines = createInterface({ input: handle.output, crlfDelay: Infinity });
    const iterator = lines[Symbol.asyncIterator]();
    const watcher = this.watchHalt(handle);

    let outcome: RelayOutcome;
    try {
      outcome = await this.pump(iterator, watcher.halted, sink);
    } catch (error) {
      outcome = { reason: "error", lines: this.sequence, exit: null, error: asError(error) };
    } finally {
      watcher.dispose();
      lines.close();
      handle.output.destroy();
    }

    if (outcome.reason === "error") {
      this.logger.error(`Output relay for PID ${handle.pid} failed`, outcome.error);
    } else {
      this.logger.debug(`Output relay for PID ${handle.pid} ended (${outcome.reason}, ${outcome.lines} lines)`);
    }

    sink.publish(statusEvent(false, null, this.now()));
    return outcome;
  }

  private async pump(
    iterator: LineIterator,
    halted: Promise<Halt>,
    sink: EventSink
  ): Promise<RelayOutcome> {
    let pending = this.next(iterator);

    for (;;) {
      const next = await Promise.race([pending, halted]);

      if ("halted" in next) {
        return this.halt(next, iterator, pending, sink);
      }

      if (next.done) {
        // Output closed; the worker may keep running without it
        const after = await halted;
        if (after.reason === "exit") {
          return { reason: "end", lines: this.sequence, exit: after.exit };
        }
        return this.halt(after, iterator, pending, sink);
      }

      this.emit(next.value, sink);
      pending = this.next(iterator);
    }
  }

  private async halt(
    halt: Halt,
    iterator: LineIterator,
    pending: Promise<IteratorResult<string>>,
    sink: EventSink
  ): Promise<RelayOutcome> {
    switch (halt.reason) {
      case "exit":
        await this.drain(iterator, pending, sink);
        return { reason: "exit", lines: this.sequence, exit: halt.exit };
      case "stopped":
        return { reason: "stopped", lines: this.sequence, exit: null };
      case "error":
        return { reason: "error", lines: this.sequence, exit: null, error: halt.error };
    }
  }

  /**
   * The worker is gone; pick up lines still buffered in the pipe.
   */
  private async drain(iterator: LineIterator, pending: Promise<IteratorResult<string>>, sink: EventSink): Promise<void> {
    let current = pending;
    for (;;) {
      const next = await withTimeout(current, this.drainGraceMs);
      if (next === null || next.done) return;
      this.emit(next.value, sink);
      current = this.next(iterator);
    }
  }

  private next(iterator: LineIterator): Promise<IteratorResult<string>> {
    const pending = iterator.next();
    // A rejection nobody awaits any more is already reported by the halt watcher.
    pending.catch(() => undefined);
    return pending;
  }

  private emit(line: string, sink: EventSink): void {
    const raw = line.trim();
    const text = sanitizeLine(raw).trim();
    if (!text) return;

    this.sequence += 1;
    const event: LogEvent = {
      type: "log",
      runId: this.runId,
      sequence: this.sequence,
      raw,
      text,
      timestamp: this.now().toISOString(),
    };
    this.logger.debug(`output: ${text}`);
    sink.publish(event);
  }

  private watchHalt(handle: WorkerHandle): { halted: Promise<Halt>; dispose: () => void } {
    const disposers: Array<() => void> = [];

    const halted = new Promise<Halt>((resolve) => {
      handle.exited.then(
        (exit) => resolve({ halted: true, reason: "exit", exit }),
        (error: unknown) => resolve({ halted: true, reason: "error", error: asError(error) })
      );

      // Stays attached after the run: a late stream error must not go unhandled.
      handle.output.on("error", (error: Error) => resolve({ halted: true, reason: "error", error }));

      const signal = this.signal;
      if (signal) {
        const onAbort = (): void => resolve({ halted: true, reason: "stopped" });
        if (signal.aborted) onAbort();
        signal.addEventListener("abort", onAbort, { once: true });
        disposers.push(() => signal.removeEventListener("abort", onAbort));
      }
    });

    return {
      halted,
      dispose: () => {
        for (const dispose of disposers) dispose();
      },
    };
  }
}
