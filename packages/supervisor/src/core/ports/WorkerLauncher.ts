import type { Readable } from "node:stream";
import type { Result } from "@console-relay/core";
import type { Signal, SupervisorError, WorkerConfig, WorkerExit } from "../model.js";

/**
 * A spawned worker. Owned by the supervisor for the lifetime of one run.
 */
export interface WorkerHandle {
  readonly pid: number;
  /** stdout and stderr, merged */
  readonly output: Readable;
  /** Settles once when the process exits */
  readonly exited: Promise<WorkerExit>;
  hasExited(): boolean;
  /** Send a signal. Returns false if the process is already gone. */
  terminate(signal?: Signal): boolean;
  /** Resolves with the exit, or null if it did not happen within `timeoutMs`. */
  waitForExit(timeoutMs: number): Promise<WorkerExit | null>;
}

/** Fully resolved launch parameters. */
export interface WorkerSpec {
  command: string;
  args: string[];
  cwd: string;
  env: Record<string, string>;
}

export interface WorkerLauncher {
  /** Check that the entry and its runtime exist and build the launch parameters. */
  resolve(config: WorkerConfig): Promise<Result<WorkerSpec, SupervisorError>>;
  launch(spec: WorkerSpec): Result<WorkerHandle, SupervisorError>;
}
