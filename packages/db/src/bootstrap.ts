import {
  type BootstrapStep,
  BootstrapStepError,
  ExtensionUnavailableError,
  GrantTargetNotFoundError,
  PermissionDeniedError,
  SQLSTATE,
} from "@cml-bootstrap/utils";
import type { SQL } from "drizzle-orm";
import { z } from "zod";
import type { Database } from "./client.js";
import { type BootstrapPlan, DEFAULT_PLAN, parsePlan } from "./plan.js";
import type { CatalogRepository } from "./repositories/catalog.js";
import { createRepositories } from "./repositories/index.js";
import { ensureExtensionStatement, grantPrivilegesStatement, toSqlText } from "./statements.js";

export interface StepReport {
  step: BootstrapStep;
  statement: string;
  /** False when the end state already held before the statement ran. */
  changed: boolean;
}

export interface BootstrapReport {
  plan: BootstrapPlan;
  steps: StepReport[];
}

interface StepDefinition {
  step: BootstrapStep;
  statement: (plan: BootstrapPlan) => SQL;
  isSatisfied: (catalog: CatalogRepository, plan: BootstrapPlan) => Promise<boolean>;
  apply: (catalog: CatalogRepository, plan: BootstrapPlan) => Promise<void>;
}

const STEPS: StepDefinition[] = [
  {
    step: "extension",
    statement: ensureExtensionStatement,
    isSatisfied: async (catalog, plan) => (await catalog.extensionVersion(plan.extension)) !== null,
    apply: (catalog, plan) => catalog.createExtension(plan),
  },
  {
    step: "grant",
    statement: grantPrivilegesStatement,
    isSatisfied: async (catalog, plan) => {
      // A missing target is left for the GRANT itself to report.
      if (!(await catalog.roleExists(plan.role))) return false;
      if (!(await catalog.databaseExists(plan.database))) return false;
      const held = await catalog.databasePrivileges(plan.role, plan.database);
      return held.connect && held.create && held.temporary;
    },
    apply: (catalog, plan) => catalog.grantAllOnDatabase(plan),
  },
];

const postgresErrorShape = z.object({
  code: z.string().regex(/^[0-9A-Z]{5}$/),
  severity: z.string(),
});

export function sqlStateOf(err: unknown): string | null {
  const result = postgresErrorShape.safeParse(err);
  return result.success ? result.data.code : null;
}

/**
 * `phase` says whether the catalog pre-check or the step's own statement threw.
 * Only the statement's failures are read as a missing extension or grant target.
 */
export function toStepError(
  step: BootstrapStep,
  err: unknown,
  phase: "check" | "apply" = "apply",
): BootstrapStepError {
  if (err instanceof BootstrapStepError) return err;
  const sqlState = sqlStateOf(err);
  const message = err instanceof Error ? err.message : String(err);

  if (sqlState === SQLSTATE.insufficientPrivilege) {
    return new PermissionDeniedError(step, sqlState, message, err);
  }
  if (phase === "check") {
    return new BootstrapStepError(step, sqlState, message, { cause: err });
  }
  if (step === "extension" && sqlState !== null) {
    return new ExtensionUnavailableError(sqlState, message, err);
  }
  if (
    step === "grant" &&
    (sqlState === SQLSTATE.undefinedObject || sqlState === SQLSTATE.invalidCatalogName)
  ) {
    return new GrantTargetNotFoundError(sqlState, message, err);
  }
  return new BootstrapStepError(step, sqlState, message, { cause: err });
}

/**
 * Ensures the extension, then grants the role full privileges on the database.
 * Stops at the first failing step, so a failed extension leaves no grant behind.
 */
export async function bootstrap(
  db: Database,
  input: Partial<BootstrapPlan> = DEFAULT_PLAN,
): Promise<BootstrapReport> {
  const plan = parsePlan(input);
  const { catalog } = createRepositories(db);
  const steps: StepReport[] = [];

  for (const definition of STEPS) {
    let satisfied: boolean;
    try {
      satisfied = await definition.isSatisfied(catalog, plan);
    } catch (err) {
      throw toStepError(definition.step, err, "check");
    }
    try {
      await definition.apply(catalog, plan);
    } catch (err) {
      throw toStepError(definition.step, err, "apply");
    }
    steps.push({
      step: definition.step,
      statement: toSqlText(definition.statement(plan)),
      changed: !satisfied,
    });
  }

  return { plan, steps };
}
