export type Signal = "SIGTERM" | "SIGKILL";

/**
 * Lifecycle of the supervised worker.
 *
 * - idle: no worker
 * - starting: validating and spawning
 * - running: worker alive, relay attached
 * - stopping: SIGTERM sent, waiting for the relay to observe the exit
 * - failed: start failed; always followed by idle
 */
export type SupervisorState =
  | { kind: "idle" }
  | { kind: "starting" }
  | { kind: "running"; pid: number; startedAt: string }
  | { kind: "stopping"; pid: number; startedAt: string }
  | { kind: "failed"; reason: string };

export type SupervisorStateKind = SupervisorState["kind"];

/** Legal edges of the state machine. */
export const TRANSITIONS: Record<SupervisorStateKind, readonly SupervisorStateKind[]> = {
  idle: ["starting"],
  starting: ["running", "failed"],
  running: ["stopping", "idle"],
  stopping: ["idle"],
  failed: ["idle"],
};

export function canTransition(from: SupervisorStateKind, to: SupervisorStateKind): boolean {
  return TRANSITIONS[from].includes(to);
}

/** One sanitized line of worker output. */
export interface LogEvent {
  readonly type: "log";
  /** Worker run this line belongs to */
  readonly runId: number;
  /** 1-based, strictly increasing within a run */
  readonly sequence: number;
  /** Line as read, surrounding whitespace trimmed */
  readonly raw: string;
  /** Line with escape sequences removed */
  readonly text: string;
  readonly timestamp: string;
}

export interface StatusEvent {
  readonly type: "status";
  readonly isRunning: boolean;
  readonly pid: number | null;
  readonly timestamp: string;
}

export type RelayEvent = LogEvent | StatusEvent;

/** Anything events can be pushed into. */
export interface EventSink {
  publish(event: RelayEvent): void;
}

/** Projection of the supervisor state returned by `status()`. */
export interface SupervisorStatus {
  isRunning: boolean;
  pid: number | null;
  state: SupervisorStateKind;
  startedAt: string | null;
  runId: number | null;
  /** Reason of the most recent failed start, cleared by the next successful one */
  lastFailure: string | null;
}

export type SupervisorErrorCode =
  | "Conflict"
  | "NotFound"
  | "EnvironmentMissing"
  | "SpawnFailed"
  | "NotRunning"
  | "StopTimeout";

export interface SupervisorError {
  code: SupervisorErrorCode;
  message: string;
}

export function supervisorError(code: SupervisorErrorCode, message: string): SupervisorError {
  return { code, message };
}

export interface WorkerExit {
  code: number | null;
  signal: string | null;
}

export interface StartResult {
  pid: number;
  startedAt: string;
  runId: number;
}

export interface StopResult {
  pid: number;
  exit: WorkerExit | null;
  /** True when the worker only went away after SIGKILL */
  forced: boolean;
}

/** How to launch the worker. */
export interface WorkerConfig {
  /** Script run by the runtime, or the executable itself when no runtime is set */
  entry: string;
  /** Interpreter that runs the entry (path or PATH name) */
  runtime?: string;
  runtimeArgs: string[];
  args: string[];
  cwd: string;
  env: Record<string, string>;
}

export function statusEvent(isRunning: boolean, pid: number | null, at: Date = new Date()): StatusEvent {
  return { type: "status", isRunning, pid, timestamp: at.toISOString() };
}
