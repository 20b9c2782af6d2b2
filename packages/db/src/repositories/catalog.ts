import { sql } from "drizzle-orm";
import { z } from "zod";
import type { Database } from "../client.js";
import type { BootstrapPlan } from "../plan.js";
import { ensureExtensionStatement, grantPrivilegesStatement } from "../statements.js";

const versionRow = z.object({ extversion: z.string() });
const existsRow = z.object({ exists: z.boolean() });
const privilegesRow = z.object({
  connect: z.boolean(),
  create: z.boolean(),
  temporary: z.boolean(),
});
const uuidRow = z.object({ id: z.string().uuid() });

export type DatabasePrivileges = z.infer<typeof privilegesRow>;

export class CatalogRepository {
  constructor(private db: Database) {}

  async extensionVersion(name: string): Promise<string | null> {
    const rows = await this.db.execute(
      sql`SELECT extversion FROM pg_extension WHERE extname = ${name}::name`,
    );
    if (!rows[0]) return null;
    return versionRow.parse(rows[0]).extversion;
  }

  async roleExists(role: string): Promise<boolean> {
    const rows = await this.db.execute(
      sql`SELECT EXISTS (SELECT 1 FROM pg_roles WHERE rolname = ${role}::name) AS "exists"`,
    );
    return existsRow.parse(rows[0]).exists;
  }

  async databaseExists(database: string): Promise<boolean> {
    const rows = await this.db.execute(
      sql`SELECT EXISTS (SELECT 1 FROM pg_database WHERE datname = ${database}::name) AS "exists"`,
    );
    return existsRow.parse(rows[0]).exists;
  }

  // Errors if the role or database is missing; check with the lookups above first.
  async databasePrivileges(role: string, database: string): Promise<DatabasePrivileges> {
    const rows = await this.db.execute(sql`
      SELECT
        has_database_privilege(${role}::name, ${database}::text, 'CONNECT') AS "connect",
        has_database_privilege(${role}::name, ${database}::text, 'CREATE') AS "create",
        has_database_privilege(${role}::name, ${database}::text, 'TEMPORARY') AS "temporary"
    `);
    return privilegesRow.parse(rows[0]);
  }

  async createExtension(plan: BootstrapPlan) {
    await this.db.execute(ensureExtensionStatement(plan));
  }

  async grantAllOnDatabase(plan: BootstrapPlan) {
    await this.db.execute(grantPrivilegesStatement(plan));
  }

  async generateUuid(): Promise<string> {
    const rows = await this.db.execute(sql`SELECT uuid_generate_v4()::text AS id`);
    return uuidRow.parse(rows[0]).id;
  }
}
