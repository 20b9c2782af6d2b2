import type { Database } from "../client.js";
import { CatalogRepository } from "./catalog.js";

export { CatalogRepository };
export type { DatabasePrivileges } from "./catalog.js";

export interface Repositories {
  catalog: CatalogRepository;
}

export function createRepositories(db: Database): Repositories {
  return {
    catalog: new CatalogRepository(db),
  };
}
