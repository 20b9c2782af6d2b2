import { INIT_SCRIPT_DIR } from "@cml-bootstrap/utils";
import { type SQL, sql } from "drizzle-orm";
import { PgDialect } from "drizzle-orm/pg-core";
import { type BootstrapPlan, DEFAULT_PLAN, parsePlan } from "./plan.js";

// The builders trust their plan; entry points run it through parsePlan first.

export function ensureExtensionStatement(plan: BootstrapPlan): SQL {
  return sql`CREATE EXTENSION IF NOT EXISTS ${sql.identifier(plan.extension)}`;
}

export function grantPrivilegesStatement(plan: BootstrapPlan): SQL {
  return sql`GRANT ALL PRIVILEGES ON DATABASE ${sql.identifier(plan.database)} TO ${sql.identifier(plan.role)}`;
}

const dialect = new PgDialect();

export function toSqlText(query: SQL): string {
  const { sql: text, params } = dialect.sqlToQuery(query);
  if (params.length > 0) {
    throw new Error(`Statement has ${params.length} bound parameter(s) and cannot be inlined`);
  }
  return text;
}

/** Text of the SQL file the postgres image runs from its init directory. */
export function renderInitScript(input: Partial<BootstrapPlan> = DEFAULT_PLAN): string {
  const plan = parsePlan(input);
  const lines = [
    `-- Initialize ${plan.database} database`,
    `-- Run once from ${INIT_SCRIPT_DIR} when the PostgreSQL container first starts`,
    "",
    "-- Ensure extensions",
    `${toSqlText(ensureExtensionStatement(plan))};`,
    "",
    "-- Grant privileges",
    `${toSqlText(grantPrivilegesStatement(plan))};`,
    "",
    "-- Tables and indexes are created by the application's ORM layer, not here",
  ];
  return `${lines.join("\n")}\n`;
}
