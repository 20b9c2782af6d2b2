import { readFileSync } from "node:fs";
import { ValidationError } from "@cml-bootstrap/utils";
import { sql } from "drizzle-orm";
import { describe, expect, it } from "vitest";
import { DEFAULT_PLAN } from "../src/plan.js";
import {
  ensureExtensionStatement,
  grantPrivilegesStatement,
  renderInitScript,
  toSqlText,
} from "../src/statements.js";

const initScriptUrl = new URL("../../../docker/initdb/01-init-db.sql", import.meta.url);

describe("statements", () => {
  it("quotes the extension name", () => {
    expect(toSqlText(ensureExtensionStatement(DEFAULT_PLAN))).toBe(
      'CREATE EXTENSION IF NOT EXISTS "uuid-ossp"',
    );
  });

  it("grants on the database to the role", () => {
    expect(toSqlText(grantPrivilegesStatement(DEFAULT_PLAN))).toBe(
      'GRANT ALL PRIVILEGES ON DATABASE "cml_optimization" TO "cml_user"',
    );
  });

  it("refuses to inline a statement with bound parameters", () => {
    expect(() => toSqlText(sql`SELECT ${1}`)).toThrow(
      "Statement has 1 bound parameter(s) and cannot be inlined",
    );
  });
});

describe("renderInitScript", () => {
  it("matches the checked-in container init script", () => {
    expect(renderInitScript()).toBe(readFileSync(initScriptUrl, "utf8"));
  });

  it("renders a custom plan", () => {
    const script = renderInitScript({ extension: "pgcrypto", database: "forecasts", role: "app" });
    expect(script.split("\n")).toEqual([
      "-- Initialize forecasts database",
      "-- Run once from /docker-entrypoint-initdb.d when the PostgreSQL container first starts",
      "",
      "-- Ensure extensions",
      'CREATE EXTENSION IF NOT EXISTS "pgcrypto";',
      "",
      "-- Grant privileges",
      'GRANT ALL PRIVILEGES ON DATABASE "forecasts" TO "app";',
      "",
      "-- Tables and indexes are created by the application's ORM layer, not here",
      "",
    ]);
  });

  it("rejects names that would break out of a quoted identifier", () => {
    expect(() => renderInitScript({ role: 'app" WITH GRANT OPTION --' })).toThrow(ValidationError);
  });
});
