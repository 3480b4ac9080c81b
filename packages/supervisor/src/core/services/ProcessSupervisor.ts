import { Ok, Err, silentLogger, type Logger, type Result } from "@console-relay/core";
import {
  canTransition,
  statusEvent,
  supervisorError,
  type EventSink,
  type StartResult,
  type StopResult,
  type SupervisorError,
  type SupervisorState,
  type SupervisorStatus,
  type WorkerConfig,
} from "../model.js";
import type { WorkerHandle, WorkerLauncher } from "../ports/WorkerLauncher.js";
import { OutputRelay, type RelayOutcome } from "./OutputRelay.js";
import { withTimeout } from "../timing.js";

export interface ProcessSupervisorOptions {
  /** How long stop() waits for the worker to go away (ms). Default: 5000 */
  stopTimeoutMs?: number;
  /** Send SIGKILL when SIGTERM did not work within stopTimeoutMs. Default: false */
  forceKillAfterTimeout?: boolean;
  /** Passed on to each run's OutputRelay */
  drainGraceMs?: number;
  logger?: Logger;
  now?: () => Date;
}

export const DEFAULT_STOP_TIMEOUT_MS = 5000;

interface Run {
  readonly id: number;
  readonly pid: number;
  readonly startedAt: string;
  readonly handle: WorkerHandle;
  readonly abort: AbortController;
  /** Settles when the run's relay has published its final status */
  finished: Promise<RelayOutcome>;
  settled: boolean;
}

/**
 * Owns the single worker: starts it, stops it, and reports on it.
 *
 * Every check and state change in start() and stop() happens before the
 * first await, so concurrent callers see each other's transitions.
 */
export class ProcessSupervisor {
  private state: SupervisorState = { kind: "idle" };
  private current: Run | null = null;
  private starting: Promise<Result<StartResult, SupervisorError>> | null = null;
  private runs = 0;
  private lastFailure: string | null = null;
  private readonly stopTimeoutMs: number;
  private readonly forceKill: boolean;
  private readonly drainGraceMs: number | undefined;
  private readonly logger: Logger;
  private readonly now: () => Date;

  constructor(
    private readonly launcher: WorkerLauncher,
    private readonly worker: WorkerConfig,
    private readonly events: EventSink,
    options: ProcessSupervisorOptions = {}
  ) {
    this.stopTimeoutMs = options.stopTimeoutMs ?? DEFAULT_STOP_TIMEOUT_MS;
    this.forceKill = options.forceKillAfterTimeout ?? false;
    this.drainGraceMs = options.drainGraceMs;
    this.logger = options.logger ?? silentLogger;
    this.now = options.now ?? (() => new Date());
  }

  async start(): Promise<Result<StartResult, SupervisorError>> {
    if (this.state.kind !== "idle") {
      return Err(supervisorError("Conflict", `Worker is already ${this.state.kind}`));
    }
    this.transition({ kind: "starting" });

    const attempt = this.launchRun();
    this.starting = attempt;
    try {
      return await attempt;
    } finally {
      this.starting = null;
    }
  }

  private async launchRun(): Promise<Result<StartResult, SupervisorError>> {
    let handle: WorkerHandle;
    try {
      const spec = await this.launcher.resolve(this.worker);
      if (!spec.ok) return this.fail(spec.error);

      const launched = this.launcher.launch(spec.value);
      if (!launched.ok) return this.fail(launched.error);
      handle = launched.value;
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      return this.fail(supervisorError("SpawnFailed", `Failed to start worker: ${message}`));
    }

    const startedAt = this.now().toISOString();
    this.runs += 1;
    const run: Run = {
      id: this.runs,
      pid: handle.pid,
      startedAt,
      handle,
      abort: new AbortController(),
      finished: Promise.resolve({ reason: "end", lines: 0, exit: null }),
      settled: false,
    };
    this.current = run;
    this.lastFailure = null;
    this.transition({ kind: "running", pid: run.pid, startedAt });
    this.logger.info(`Worker started (PID ${run.pid}, run ${run.id})`);
    this.events.publish(statusEvent(true, run.pid, this.now()));

    const relay = new OutputRelay({
      runId: run.id,
      drainGraceMs: this.drainGraceMs,
      signal: run.abort.signal,
      logger: this.logger.child("relay"),
      now: this.now,
    });
    run.finished = relay.run(handle, this.sinkFor(run));

    return Ok({ pid: run.pid, startedAt, runId: run.id });
  }

  async stop(): Promise<Result<StopResult, SupervisorError>> {
    const run = this.current;
    if (this.state.kind !== "running" || !run) {
      return Err(supervisorError("NotRunning", "No worker is running"));
    }
    this.transition({ kind: "stopping", pid: run.pid, startedAt: run.startedAt });
    this.logger.info(`Stopping worker (PID ${run.pid})`);
    run.handle.terminate("SIGTERM");

    let outcome = await withTimeout(run.finished, this.stopTimeoutMs);
    let forced = false;
    if (!outcome && this.forceKill) {
      this.logger.warn(`Worker (PID ${run.pid}) ignored SIGTERM for ${this.stopTimeoutMs}ms, sending SIGKILL`);
      run.handle.terminate("SIGKILL");
      forced = true;
      outcome = await withTimeout(run.finished, this.stopTimeoutMs);
    }

    if (!outcome) {
      this.logger.warn(`Worker (PID ${run.pid}) still alive after stop`);
      return Err(
        supervisorError("StopTimeout", `Worker (PID ${run.pid}) did not exit within ${this.stopTimeoutMs}ms`)
      );
    }
    return Ok({ pid: run.pid, exit: outcome.exit, forced });
  }

  status(): SupervisorStatus {
    const state = this.state;
    switch (state.kind) {
      case "running":
      case "stopping":
        return {
          isRunning: true,
          pid: state.pid,
          state: state.kind,
          startedAt: state.startedAt,
          runId: this.current?.id ?? null,
          lastFailure: this.lastFailure,
        };
      default:
        return {
          isRunning: false,
          pid: null,
          state: state.kind,
          startedAt: null,
          runId: null,
          lastFailure: this.lastFailure,
        };
    }
  }

  /**
   * Shut down: let an in-flight start finish, stop the running worker, then
   * make sure nothing is left behind.
   */
  async dispose(): Promise<void> {
    if (this.starting) {
      await this.starting;
    }
    if (this.state.kind === "running") {
      const stopped = await this.stop();
      if (!stopped.ok) {
        this.logger.warn(`Stop during shutdown failed: ${stopped.error.message}`);
      }
    }

    const run = this.current;
    if (!run) return;
    if (!run.handle.hasExited()) {
      run.handle.terminate("SIGKILL");
    }
    run.abort.abort();
    await run.finished;
  }

  private sinkFor(run: Run): EventSink {
    return {
      publish: (event) => {
        if (event.type === "status" && !event.isRunning) {
          if (!this.settle(run)) return;
        }
        this.events.publish(event);
      },
    };
  }

  /** Returns false if the run was already settled or is not the current one. */
  private settle(run: Run): boolean {
    if (run.settled || this.current !== run) return false;
    run.settled = true;
    this.current = null;
    this.transition({ kind: "idle" });
    this.logger.info(`Worker exited (PID ${run.pid}, run ${run.id})`);
    return true;
  }

  private fail(error: SupervisorError): Result<never, SupervisorError> {
    this.transition({ kind: "failed", reason: error.message });
    this.lastFailure = error.message;
    this.logger.warn(`Start failed (${error.code}): ${error.message}`);
    this.transition({ kind: "idle" });
    return Err(error);
  }

  private transition(next: SupervisorState): void {
    if (!canTransition(this.state.kind, next.kind)) {
      throw new Error(`Illegal supervisor transition ${this.state.kind} -> ${next.kind}`);
    }
    this.state = next;
  }
}
