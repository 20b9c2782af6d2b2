export const DEFAULT_EXTENSION = "uuid-ossp";
export const DEFAULT_DATABASE = "cml_optimization";
export const DEFAULT_ROLE = "cml_user";

export const MAX_IDENTIFIER_LENGTH = 63;
export const IDENTIFIER_PATTERN = /^[A-Za-z_][A-Za-z0-9_$-]*$/;

export const BOOTSTRAP_STEPS = ["extension", "grant"] as const;
export type BootstrapStep = (typeof BOOTSTRAP_STEPS)[number];

// PostgreSQL SQLSTATE codes the bootstrap distinguishes
export const SQLSTATE = {
  undefinedObject: "42704",
  invalidCatalogName: "3D000",
  insufficientPrivilege: "42501",
} as const;

export const INIT_SCRIPT_DIR = "/docker-entrypoint-initdb.d";
