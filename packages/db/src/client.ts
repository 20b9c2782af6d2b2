import { ValidationError } from "@cml-bootstrap/utils";
import type { SQL } from "drizzle-orm";
import { drizzle } from "drizzle-orm/postgres-js";
import postgres from "postgres";

export type Row = Record<string, unknown>;

/**
 * The slice of a drizzle database the bootstrap needs. Drivers differ in how
 * they shape raw results, so each adapter flattens them to plain rows.
 */
export interface Database {
  execute(query: SQL): Promise<Row[]>;
  close(): Promise<void>;
}

export function createDb(url?: string): Database {
  const connectionString = url ?? process.env.DATABASE_URL;
  if (!connectionString) {
    throw new ValidationError("DATABASE_URL is required", { DATABASE_URL: ["Required"] });
  }
  // One session is enough: the steps run strictly in order.
  const client = postgres(connectionString, { max: 1 });
  const db = drizzle(client);
  return {
    execute: async (query) => Array.from(await db.execute<Row>(query)),
    close: () => client.end(),
  };
}
