import path from "node:path";
import * as z from "zod/v4";
import { Ok, Err, type LogLevel, type Result } from "@console-relay/core";
import type { WorkerConfig } from "./core/model.js";

export interface RelayConfig {
  worker: WorkerConfig;
  supervisor: {
    stopTimeoutMs: number;
    forceKillAfterTimeout: boolean;
    drainGraceMs: number;
  };
  feed: {
    host: string;
    port: number;
    maxPendingEvents: number;
  };
  logLevel: LogLevel;
}

const EnvSchema = z.object({
  RELAY_WORKER_ENTRY: z.string({ error: "required" }),
  RELAY_WORKER_RUNTIME: z.string().optional(),
  RELAY_WORKER_RUNTIME_ARGS: z.string().optional(),
  RELAY_WORKER_ARGS: z.string().optional(),
  RELAY_WORKER_CWD: z.string().optional(),
  RELAY_WORKER_ENV: z.string().optional(),
  RELAY_STOP_TIMEOUT_MS: z.coerce.number().int().positive().default(5000),
  RELAY_FORCE_KILL: z.stringbool().default(false),
  RELAY_DRAIN_GRACE_MS: z.coerce.number().int().nonnegative().default(50),
  RELAY_MAX_PENDING_EVENTS: z.coerce.number().int().positive().default(1000),
  RELAY_FEED_HOST: z.string().default("0.0.0.0"),
  RELAY_FEED_PORT: z.coerce.number().int().min(0).max(65535).default(5678),
  RELAY_LOG_LEVEL: z.enum(["debug", "info", "warn", "error"]).default("info"),
});

const StringListSchema = z.array(z.string());
const EnvMapSchema = z.record(z.string(), z.string());

/**
 * Parse a list variable: a JSON array of strings, or whitespace-separated words.
 */
export function parseList(name: string, value: string | undefined): Result<string[], string> {
  if (value === undefined) return Ok([]);
  if (!value.startsWith("[")) return Ok(value.split(/\s+/));

  const parsed = parseJson(name, value);
  if (!parsed.ok) return parsed;
  const list = StringListSchema.safeParse(parsed.value);
  return list.success ? Ok(list.data) : Err(`${name}: expected a JSON array of strings`);
}

function parseEnvMap(name: string, value: string | undefined): Result<Record<string, string>, string> {
  if (value === undefined) return Ok({});

  const parsed = parseJson(name, value);
  if (!parsed.ok) return parsed;
  const map = EnvMapSchema.safeParse(parsed.value);
  return map.success ? Ok(map.data) : Err(`${name}: expected a JSON object of strings`);
}

function parseJson(name: string, value: string): Result<unknown, string> {
  try {
    return Ok(JSON.parse(value));
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    return Err(`${name}: invalid JSON (${message})`);
  }
}

/** RELAY_* variables with blank values treated as unset. */
function relayVariables(env: NodeJS.ProcessEnv): Record<string, string> {
  const picked: Record<string, string> = {};
  for (const [key, value] of Object.entries(env)) {
    if (!key.startsWith("RELAY_") || value === undefined) continue;
    const trimmed = value.trim();
    if (trimmed) picked[key] = trimmed;
  }
  return picked;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env, cwd: string = process.cwd()): Result<RelayConfig, string> {
  const parsed = EnvSchema.safeParse(relayVariables(env));
  if (!parsed.success) {
    return Err(parsed.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`).join("; "));
  }
  const vars = parsed.data;

  const runtimeArgs = parseList("RELAY_WORKER_RUNTIME_ARGS", vars.RELAY_WORKER_RUNTIME_ARGS);
  if (!runtimeArgs.ok) return runtimeArgs;
  const args = parseList("RELAY_WORKER_ARGS", vars.RELAY_WORKER_ARGS);
  if (!args.ok) return args;
  const workerEnv = parseEnvMap("RELAY_WORKER_ENV", vars.RELAY_WORKER_ENV);
  if (!workerEnv.ok) return workerEnv;

  return Ok({
    worker: {
      entry: vars.RELAY_WORKER_ENTRY,
      runtime: vars.RELAY_WORKER_RUNTIME,
      runtimeArgs: runtimeArgs.value,
      args: args.value,
      cwd: path.resolve(cwd, vars.RELAY_WORKER_CWD ?? "."),
      env: workerEnv.value,
    },
    supervisor: {
      stopTimeoutMs: vars.RELAY_STOP_TIMEOUT_MS,
      forceKillAfterTimeout: vars.RELAY_FORCE_KILL,
      drainGraceMs: vars.RELAY_DRAIN_GRACE_MS,
    },
    feed: {
      host: vars.RELAY_FEED_HOST,
      port: vars.RELAY_FEED_PORT,
      maxPendingEvents: vars.RELAY_MAX_PENDING_EVENTS,
    },
    logLevel: vars.RELAY_LOG_LEVEL,
  });
}
