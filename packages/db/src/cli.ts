import { writeFile } from "node:fs/promises";
import { bootstrap } from "./bootstrap.js";
import { type Database, createDb } from "./client.js";
import { type BootstrapConfig, loadConfig, loadPlan, requireDatabaseUrl } from "./config.js";
import { renderInitScript } from "./statements.js";
import { type VerificationReport, verify } from "./verify.js";

export const USAGE = "Usage: init-db [apply|verify|render] [outFile]";

export interface CliOptions {
  env?: NodeJS.ProcessEnv;
  connect?: (url: string) => Database;
  logger?: Pick<Console, "log" | "error">;
}

function yesNo(value: boolean) {
  return value ? "yes" : "no";
}

function describeVerification(report: VerificationReport): string[] {
  const { plan, extension, privileges } = report;
  let extensionLine = `Extension ${plan.extension}: not installed`;
  if (extension.installed) {
    extensionLine = `Extension ${plan.extension}: installed (version ${extension.version})`;
    if (extension.callable !== null) {
      extensionLine += `, uuid_generate_v4() ${extension.callable ? "ok" : `failed: ${extension.error}`}`;
    }
  }

  let privilegeLine: string;
  if (!privileges.roleExists) {
    privilegeLine = `Role ${plan.role} does not exist`;
  } else if (!privileges.databaseExists) {
    privilegeLine = `Database ${plan.database} does not exist`;
  } else {
    privilegeLine = `Role ${plan.role} on database ${plan.database}: CONNECT ${yesNo(privileges.connect)}, CREATE ${yesNo(privileges.create)}, TEMPORARY ${yesNo(privileges.temporary)}`;
  }

  return [extensionLine, privilegeLine, report.ok ? "Verification passed." : "Verification failed."];
}

async function withDatabase<T>(
  config: BootstrapConfig,
  connect: (url: string) => Database,
  logger: Pick<Console, "error">,
  fn: (db: Database) => Promise<T>,
): Promise<T> {
  const db = connect(requireDatabaseUrl(config));
  try {
    return await fn(db);
  } finally {
    // A failed close must not replace the result or error of fn.
    await db.close().catch((err: unknown) => {
      logger.error("Failed to close database connection:", err instanceof Error ? err.message : err);
    });
  }
}

/** Runs one command and resolves to the process exit code. Errors propagate. */
export async function runCli(argv: string[], options: CliOptions = {}): Promise<number> {
  const { env = process.env, connect = createDb, logger = console } = options;
  const [command = "apply", outFile] = argv;

  switch (command) {
    case "apply": {
      const config = loadConfig(env);
      logger.log(`Bootstrapping database ${config.plan.database}...`);
      const report = await withDatabase(config, connect, logger, (db) => bootstrap(db, config.plan));
      for (const step of report.steps) {
        logger.log(`${step.statement}: ${step.changed ? "applied" : "already in place"}`);
      }
      logger.log("Bootstrap complete.");
      return 0;
    }
    case "verify": {
      const config = loadConfig(env);
      const report = await withDatabase(config, connect, logger, (db) => verify(db, config.plan));
      for (const line of describeVerification(report)) {
        logger.log(line);
      }
      return report.ok ? 0 : 1;
    }
    case "render": {
      const plan = loadPlan(env);
      const script = renderInitScript(plan);
      if (outFile) {
        await writeFile(outFile, script, "utf8");
        logger.log(`Init script written to ${outFile}`);
      } else {
        logger.log(script.trimEnd());
      }
      return 0;
    }
    default:
      logger.error(`Unknown command: ${command}`);
      logger.error(USAGE);
      return 2;
  }
}
