import * as z from "zod/v4";

export const SupervisorStateSchema = z.enum(["idle", "starting", "running", "stopping", "failed"]);

export const SupervisorErrorCodeSchema = z.enum([
  "Conflict",
  "NotFound",
  "EnvironmentMissing",
  "SpawnFailed",
  "NotRunning",
  "StopTimeout",
]);

/** Fields every tool reports on failure. */
export const FailureShape = {
  success: z.boolean(),
  error: z.string().optional(),
  code: SupervisorErrorCodeSchema.optional(),
};

export const StartOutputShape = {
  ...FailureShape,
  pid: z.number().optional(),
  startedAt: z.string().optional(),
  runId: z.number().optional(),
};

export const StopOutputShape = {
  ...FailureShape,
  pid: z.number().optional(),
  exitCode: z.number().nullable().optional(),
  signal: z.string().nullable().optional(),
  forced: z.boolean().optional(),
};

export const StatusOutputShape = {
  success: z.boolean(),
  isRunning: z.boolean(),
  pid: z.number().nullable(),
  state: SupervisorStateSchema,
  startedAt: z.string().nullable(),
  runId: z.number().nullable(),
  lastFailure: z.string().nullable(),
};

export const ObserversOutputShape = {
  success: z.boolean(),
  count: z.number(),
  observers: z.array(
    z.object({
      id: z.string(),
      pending: z.number(),
    })
  ),
};
