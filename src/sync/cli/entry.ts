import { config } from "dotenv";
import { getSyncServices, getSyncStatus } from "@/sync";
import { getEnv } from "@/sync/config/env";
import { closeDatabase } from "@/sync/ledger/db";
import { describeError } from "@/sync/errors";
import { logger } from "@/sync/logger";
import { runInteractiveAuth, runInteractiveSync, showExports } from "./interactive";

config({ path: ".env.local" });

const args = process.argv.slice(2);
const command = args.find((arg) => !arg.startsWith("--")) ?? "sync";
const isAuto = args.includes("--auto") || args.includes("--once");
const full = args.includes("--full");

async function main() {
  const env = getEnv();
  logger.level = env.SYNC_LOG_LEVEL;
  const dryRun = args.includes("--dry-run") || env.SYNC_DRY_RUN;

  switch (command) {
    case "auth":
      await runInteractiveAuth();
      break;
    case "exports":
      await showExports();
      break;
    case "status": {
      const status = await getSyncStatus(getSyncServices());
      console.log(JSON.stringify(status, null, 2));
      break;
    }
    case "sync":
      if (isAuto) {
        // Headless: no prompts, JSON summary on stdout
        const summary = await getSyncServices().engine.run(full ? "full" : "incremental", {
          dryRun,
          timeoutMs: env.SYNC_RUN_TIMEOUT_SECONDS ? env.SYNC_RUN_TIMEOUT_SECONDS * 1000 : undefined,
        });
        console.log(JSON.stringify(summary, null, 2));
      } else {
        await runInteractiveSync({ dryRun, full });
      }
      break;
    default:
      throw new Error(`Unknown command "${command}". Use one of: auth, sync, exports, status.`);
  }
  closeDatabase();
}

main().catch((err) => {
  const described = describeError(err);
  console.error(`Sync failed [${described.code}]:`, described.message);
  closeDatabase();
  process.exit(1);
});
