import { PGlite } from "@electric-sql/pglite";
import { uuid_ossp } from "@electric-sql/pglite/contrib/uuid_ossp";
import { type SQL, sql } from "drizzle-orm";
import { drizzle } from "drizzle-orm/pglite";
import { z } from "zod";
import type { Database, Row } from "../../src/client.js";

export interface TestDatabase extends Database {
  /** Name of the database the in-process server is connected to. */
  name: string;
}

/**
 * In-process Postgres for tests. Leave out uuid-ossp to stand in for an engine
 * build that lacks the extension.
 */
export async function createTestDb(options: { withUuidOssp?: boolean } = {}): Promise<TestDatabase> {
  const client = new PGlite({
    extensions: options.withUuidOssp === false ? {} : { uuid_ossp },
  });
  const db = drizzle(client);
  const execute = async (query: SQL) => (await db.execute<Row>(query)).rows;
  const rows = await execute(sql`SELECT current_database() AS name`);
  const { name } = z.object({ name: z.string() }).parse(rows[0]);
  return { name, execute, close: () => client.close() };
}

export async function createRole(db: Database, role: string) {
  await db.execute(sql`CREATE ROLE ${sql.identifier(role)}`);
}
