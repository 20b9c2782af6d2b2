import { DEFAULT_EXTENSION } from "@cml-bootstrap/utils";
import type { Database } from "./client.js";
import { type BootstrapPlan, DEFAULT_PLAN, parsePlan } from "./plan.js";
import type { CatalogRepository, DatabasePrivileges } from "./repositories/catalog.js";
import { createRepositories } from "./repositories/index.js";

export interface ExtensionCheck {
  installed: boolean;
  version: string | null;
  /** Null when the extension has no known function to call. */
  callable: boolean | null;
  sampleUuid: string | null;
  error: string | null;
}

export interface PrivilegeCheck extends DatabasePrivileges {
  roleExists: boolean;
  databaseExists: boolean;
}

export interface VerificationReport {
  plan: BootstrapPlan;
  extension: ExtensionCheck;
  privileges: PrivilegeCheck;
  ok: boolean;
}

async function checkExtension(catalog: CatalogRepository, plan: BootstrapPlan): Promise<ExtensionCheck> {
  const version = await catalog.extensionVersion(plan.extension);
  if (version === null) {
    return { installed: false, version, callable: false, sampleUuid: null, error: null };
  }
  if (plan.extension !== DEFAULT_EXTENSION) {
    return { installed: true, version, callable: null, sampleUuid: null, error: null };
  }
  try {
    const sampleUuid = await catalog.generateUuid();
    return { installed: true, version, callable: true, sampleUuid, error: null };
  } catch (err) {
    const error = err instanceof Error ? err.message : String(err);
    return { installed: true, version, callable: false, sampleUuid: null, error };
  }
}

async function checkPrivileges(catalog: CatalogRepository, plan: BootstrapPlan): Promise<PrivilegeCheck> {
  const roleExists = await catalog.roleExists(plan.role);
  const databaseExists = await catalog.databaseExists(plan.database);
  if (!roleExists || !databaseExists) {
    return { roleExists, databaseExists, connect: false, create: false, temporary: false };
  }
  const held = await catalog.databasePrivileges(plan.role, plan.database);
  return { roleExists, databaseExists, ...held };
}

/** Reads back the end state a bootstrap run should leave. */
export async function verify(
  db: Database,
  input: Partial<BootstrapPlan> = DEFAULT_PLAN,
): Promise<VerificationReport> {
  const plan = parsePlan(input);
  const { catalog } = createRepositories(db);
  const extension = await checkExtension(catalog, plan);
  const privileges = await checkPrivileges(catalog, plan);
  const ok =
    extension.installed &&
    extension.callable !== false &&
    privileges.connect &&
    privileges.create &&
    privileges.temporary;
  return { plan, extension, privileges, ok };
}
