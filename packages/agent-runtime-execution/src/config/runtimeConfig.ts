/**
 * Session configuration.
 *
 * Validates a plain config object with zod, fills defaults and applies
 * STEWARD_* environment overrides on top.
 */

import { InvalidConfigError } from "@steward/agent-runtime-core";
import { z } from "zod";
import { findModel } from "../routing/modelCatalog";

const positiveInt = z.number().int().positive();

export const sessionConfigSchema = z.object({
  projectRoot: z.string().min(1).default(() => process.cwd()),
  sessionId: z.string().min(1).optional(),
  approvalMode: z.enum(["review", "smart", "auto", "read_only"]).default("review"),
  agentMode: z.enum(["plan", "build"]).default("plan"),
  maxTurns: positiveInt.default(10),
  maxTurnDurationMs: positiveInt.default(300_000),
  maxTokens: positiveInt.optional(),
  temperature: z.number().min(0).max(2).optional(),
  /** Route every request to this catalog model */
  singleModel: z
    .string()
    .min(1)
    .refine((name) => findModel(name) !== undefined, { message: "Unknown model" })
    .optional(),
  commandTimeoutMs: positiveInt.default(30_000),
  permission: z
    .object({
      timeoutMs: positiveInt.default(60_000),
      capacity: positiveInt.default(10),
    })
    .default({}),
  research: z
    .object({
      maxConcurrent: positiveInt.default(3),
      cancelGraceMs: z.number().int().nonnegative().default(5_000),
      maxSteps: positiveInt.default(20),
    })
    .default({}),
  eventBufferSize: positiveInt.default(1_000),
});

export type SessionConfig = z.infer<typeof sessionConfigSchema>;
export type SessionConfigInput = z.input<typeof sessionConfigSchema>;

type Env = Record<string, string | undefined>;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function readEnv(env: Env, key: string): string | undefined {
  const raw = env[key]?.trim();
  return raw ? raw : undefined;
}

/** Invalid numbers come through as NaN, which zod reports. */
function readEnvNumber(env: Env, key: string): number | undefined {
  const raw = readEnv(env, key);
  return raw === undefined ? undefined : Number(raw);
}

function withoutUndefined(values: Record<string, unknown>): Record<string, unknown> {
  return Object.fromEntries(Object.entries(values).filter(([, value]) => value !== undefined));
}

function applyEnvOverrides(input: Record<string, unknown>, env: Env): Record<string, unknown> {
  const merged: Record<string, unknown> = {
    ...input,
    ...withoutUndefined({
      approvalMode: readEnv(env, "STEWARD_APPROVAL_MODE"),
      agentMode: readEnv(env, "STEWARD_AGENT_MODE"),
      maxTurns: readEnvNumber(env, "STEWARD_MAX_TURNS"),
      maxTurnDurationMs: readEnvNumber(env, "STEWARD_TURN_TIMEOUT_MS"),
      singleModel: readEnv(env, "STEWARD_SINGLE_MODEL"),
    }),
  };

  const permissionTimeoutMs = readEnvNumber(env, "STEWARD_PERMISSION_TIMEOUT_MS");
  if (permissionTimeoutMs !== undefined) {
    merged.permission = {
      ...(isRecord(input.permission) ? input.permission : {}),
      timeoutMs: permissionTimeoutMs,
    };
  }

  const researchConcurrency = readEnvNumber(env, "STEWARD_RESEARCH_CONCURRENCY");
  if (researchConcurrency !== undefined) {
    merged.research = {
      ...(isRecord(input.research) ? input.research : {}),
      maxConcurrent: researchConcurrency,
    };
  }
  return merged;
}

/**
 * Resolve a session config. Environment values win over `input`; anything
 * invalid throws InvalidConfigError listing every issue.
 */
export function resolveSessionConfig(
  input: unknown = {},
  env: Env = process.env
): SessionConfig {
  const raw = isRecord(input) ? applyEnvOverrides(input, env) : input;
  const parsed = sessionConfigSchema.safeParse(raw);
  if (!parsed.success) {
    throw new InvalidConfigError(
      parsed.error.issues.map((issue) =>
        issue.path.length > 0 ? `${issue.path.join(".")}: ${issue.message}` : issue.message
      )
    );
  }
  return parsed.data;
}
