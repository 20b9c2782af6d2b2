export { type Database, type Row, createDb } from "./client.js";
export { type BootstrapPlan, DEFAULT_PLAN, identifierSchema, parsePlan } from "./plan.js";
export { ensureExtensionStatement, grantPrivilegesStatement, renderInitScript, toSqlText } from "./statements.js";
export { type BootstrapReport, type StepReport, bootstrap, sqlStateOf, toStepError } from "./bootstrap.js";
export { type ExtensionCheck, type PrivilegeCheck, type VerificationReport, verify } from "./verify.js";
export { type BootstrapConfig, loadConfig, loadPlan, loadRootEnv, requireDatabaseUrl } from "./config.js";
export { runCli, USAGE } from "./cli.js";
export * from "./repositories/index.js";
