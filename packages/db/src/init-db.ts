import { AppError, ValidationError } from "@cml-bootstrap/utils";
import { runCli } from "./cli.js";
import { loadRootEnv } from "./config.js";

loadRootEnv();

runCli(process.argv.slice(2))
  .then((code) => {
    process.exit(code);
  })
  .catch((err) => {
    console.error("Bootstrap failed:", err instanceof Error ? err.message : err);
    if (err instanceof ValidationError && err.details) {
      for (const [field, messages] of Object.entries(err.details)) {
        console.error(`  ${field}: ${messages.join(", ")}`);
      }
    }
    process.exit(err instanceof AppError ? err.exitCode : 1);
  });
