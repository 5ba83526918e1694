/**
 * Quick check: verify the Trakt app credentials and the stored login work
 * Run: npm run check:trakt
 */

import { config } from "dotenv";
import { getSyncServices } from "@/sync";
import { closeDatabase } from "@/sync/ledger/db";
import { describeError } from "@/sync/errors";

config({ path: ".env.local" });

async function main() {
  const { tokens, source, state } = getSyncServices();

  console.log("🔑 Checking Trakt connection\n");

  const auth = tokens.status();
  if (!auth.authenticated) {
    console.error("❌ Not logged in. Run `npm run sync -- auth` first.");
    return;
  }
  console.log(`✅ Logged in (token valid until ${auth.expiresAt}, refresh ${auth.canRefresh ? "available" : "missing"})`);

  const ok = await source.testConnection();
  console.log(ok ? "✅ Trakt API reachable" : "❌ Trakt API request failed (see log above)");

  const watermark = state.readWatermark();
  console.log(`\nLast synced: ${watermark?.lastSyncedAt ?? "never"}`);
}

main()
  .catch((err) => {
    const described = describeError(err);
    console.error(`❌ ${described.code}: ${described.message}`);
    process.exitCode = 1;
  })
  .finally(() => closeDatabase());
