import { existsSync } from "node:fs";
import { dirname, resolve } from "node:path";
import { fileURLToPath } from "node:url";
import { ValidationError } from "@cml-bootstrap/utils";
import { z } from "zod";
import { type BootstrapPlan, identifierSchema, issueDetails, parsePlan } from "./plan.js";

export interface BootstrapConfig {
  databaseUrl: string | null;
  plan: BootstrapPlan;
}

const planEnvSchema = z.object({
  BOOTSTRAP_EXTENSION: identifierSchema.optional(),
  BOOTSTRAP_DATABASE: identifierSchema.optional(),
  BOOTSTRAP_ROLE: identifierSchema.optional(),
});

const envSchema = planEnvSchema.extend({
  DATABASE_URL: z
    .string()
    .regex(/^postgres(ql)?:\/\//, "Must be a postgres:// or postgresql:// URL")
    .optional(),
});

function parseEnv<T extends z.ZodTypeAny>(schema: T, env: NodeJS.ProcessEnv): z.infer<T> {
  // Blank variables count as unset
  const present = Object.fromEntries(
    Object.entries(env).filter(([, value]) => value !== undefined && value.trim() !== ""),
  );
  const result = schema.safeParse(present);
  if (!result.success) {
    throw new ValidationError("Invalid bootstrap configuration", issueDetails(result.error.issues));
  }
  return result.data;
}

function planFrom(vars: z.infer<typeof planEnvSchema>): BootstrapPlan {
  return parsePlan({
    extension: vars.BOOTSTRAP_EXTENSION,
    database: vars.BOOTSTRAP_DATABASE,
    role: vars.BOOTSTRAP_ROLE,
  });
}

/** Reads only the BOOTSTRAP_* variables; the connection settings are not touched. */
export function loadPlan(env: NodeJS.ProcessEnv = process.env): BootstrapPlan {
  return planFrom(parseEnv(planEnvSchema, env));
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): BootstrapConfig {
  const vars = parseEnv(envSchema, env);
  return {
    databaseUrl: vars.DATABASE_URL ?? null,
    plan: planFrom(vars),
  };
}

export function requireDatabaseUrl(config: BootstrapConfig): string {
  if (!config.databaseUrl) {
    throw new ValidationError("DATABASE_URL is required", { DATABASE_URL: ["Required"] });
  }
  return config.databaseUrl;
}

// Load root .env when DATABASE_URL is not already set (e.g. running the CLI by hand)
export function loadRootEnv() {
  if (process.env.DATABASE_URL) return;
  const envPath = resolve(dirname(fileURLToPath(import.meta.url)), "../../../.env");
  if (existsSync(envPath)) {
    process.loadEnvFile(envPath);
  }
}
