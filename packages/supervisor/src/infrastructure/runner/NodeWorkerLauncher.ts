import { spawn, type ChildProcess } from "node:child_process";
import { constants } from "node:fs";
import { access, stat } from "node:fs/promises";
import path from "node:path";
import { PassThrough, type Readable } from "node:stream";
import { Ok, Err, silentLogger, type Logger, type Result } from "@console-relay/core";
import {
  supervisorError,
  type Signal,
  type SupervisorError,
  type WorkerConfig,
  type WorkerExit,
} from "../../core/model.js";
import type { WorkerHandle, WorkerLauncher, WorkerSpec } from "../../core/ports/WorkerLauncher.js";
import { withTimeout } from "../../core/timing.js";

class NodeWorkerHandle implements WorkerHandle {
  readonly output = new PassThrough();
  readonly exited: Promise<WorkerExit>;
  private exit: WorkerExit | null = null;

  constructor(
    private readonly proc: ChildProcess,
    readonly pid: number
  ) {
    this.exited = new Promise((resolve) => {
      proc.once("exit", (code, signal) => {
        this.exit = { code, signal };
        resolve(this.exit);
      });
    });

    // stderr is interleaved into the same stream as stdout
    const sources = [proc.stdout, proc.stderr].filter((s): s is Readable => s !== null);
    let open = sources.length;
    for (const source of sources) {
      source.pipe(this.output, { end: false });
      source.once("close", () => {
        open -= 1;
        if (open === 0) this.output.end();
      });
    }
    if (open === 0) this.output.end();
  }

  hasExited(): boolean {
    return this.exit !== null;
  }

  terminate(signal: Signal = "SIGTERM"): boolean {
    if (this.exit) return false;
    return this.proc.kill(signal);
  }

  waitForExit(timeoutMs: number): Promise<WorkerExit | null> {
    return withTimeout(this.exited, timeoutMs);
  }
}

async function isDirectory(dir: string): Promise<boolean> {
  try {
    return (await stat(dir)).isDirectory();
  } catch {
    return false;
  }
}

async function isFile(file: string, mode: number = constants.F_OK): Promise<boolean> {
  try {
    await access(file, mode);
    return (await stat(file)).isFile();
  } catch {
    return false;
  }
}

/**
 * Find an executable: a name containing a path separator is taken relative
 * to `cwd`, anything else is looked up on `searchPath`.
 */
export async function findExecutable(
  name: string,
  cwd: string,
  searchPath: string | undefined
): Promise<string | null> {
  if (name.includes("/") || name.includes(path.sep)) {
    const candidate = path.resolve(cwd, name);
    return (await isFile(candidate, constants.X_OK)) ? candidate : null;
  }
  for (const dir of (searchPath ?? "").split(path.delimiter)) {
    if (!dir) continue;
    const candidate = path.join(dir, name);
    if (await isFile(candidate, constants.X_OK)) return candidate;
  }
  return null;
}

function inheritedEnv(): Record<string, string> {
  const env: Record<string, string> = {};
  for (const [key, value] of Object.entries(process.env)) {
    if (value !== undefined) env[key] = value;
  }
  return env;
}

export class NodeWorkerLauncher implements WorkerLauncher {
  constructor(private readonly logger: Logger = silentLogger) {}

  async resolve(config: WorkerConfig): Promise<Result<WorkerSpec, SupervisorError>> {
    const cwd = path.resolve(config.cwd);
    if (!(await isDirectory(cwd))) {
      return Err(supervisorError("EnvironmentMissing", `Working directory not found: ${cwd}`));
    }

    const env = { ...inheritedEnv(), ...config.env };

    if (!config.runtime) {
      const command = await findExecutable(config.entry, cwd, env.PATH);
      if (!command) {
        return Err(supervisorError("NotFound", `Worker executable not found: ${config.entry}`));
      }
      return Ok({ command, args: [...config.args], cwd, env });
    }

    const entry = path.resolve(cwd, config.entry);
    if (!(await isFile(entry))) {
      return Err(supervisorError("NotFound", `Worker entry not found: ${entry}`));
    }

    const runtime = await findExecutable(config.runtime, cwd, env.PATH);
    if (!runtime) {
      return Err(supervisorError("EnvironmentMissing", `Runtime not found: ${config.runtime}`));
    }

    // Programs the worker runs resolve against the runtime's directory first
    const runtimeDir = path.dirname(runtime);
    env.PATH = env.PATH ? `${runtimeDir}${path.delimiter}${env.PATH}` : runtimeDir;

    return Ok({ command: runtime, args: [...config.runtimeArgs, entry, ...config.args], cwd, env });
  }

  launch(spec: WorkerSpec): Result<WorkerHandle, SupervisorError> {
    let proc: ChildProcess;
    try {
      proc = spawn(spec.command, spec.args, {
        cwd: spec.cwd,
        env: spec.env,
        stdio: ["ignore", "pipe", "pipe"],
      });
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      return Err(supervisorError("SpawnFailed", `Failed to spawn ${spec.command}: ${message}`));
    }

    proc.on("error", (error) => {
      this.logger.error(`Worker process error (${spec.command})`, error);
    });

    if (proc.pid === undefined) {
      return Err(supervisorError("SpawnFailed", `Failed to spawn ${spec.command}: no process id`));
    }

    this.logger.debug(`Spawned ${spec.command} ${spec.args.join(" ")} (PID ${proc.pid})`);
    return Ok(new NodeWorkerHandle(proc, proc.pid));
  }
}
