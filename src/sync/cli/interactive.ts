import * as p from "@clack/prompts";
import { getSyncServices } from "@/sync";
import type { SyncMode, SyncRunSummary } from "@/sync/types";
import { getEnv } from "@/sync/config/env";
import { EXPORT_SIZE_LIMIT_BYTES } from "@/sync/export/writer";
import { describeError } from "@/sync/errors";

function formatBytes(bytes: number): string {
  if (bytes < 1024) return `${bytes} B`;
  if (bytes < 1024 * 1024) return `${(bytes / 1024).toFixed(1)} KB`;
  return `${(bytes / (1024 * 1024)).toFixed(2)} MB`;
}

export function formatSummaryLines(summary: SyncRunSummary): string[] {
  const lines = [
    `Scope: ${summary.scope}${summary.mode !== summary.scope ? ` (requested ${summary.mode})` : ""}`,
    `Fetched: ${summary.counts.fetched} watch events`,
    `New: ${summary.counts.new}, changed: ${summary.counts.changed}, already exported: ${summary.counts.unchanged}`,
  ];
  if (summary.outputPath) {
    lines.push(`File: ${summary.outputPath} (${formatBytes(summary.bytes)})`);
  }
  if (summary.watermark) {
    lines.push(`Synced up to: ${summary.watermark}`);
  }
  return lines;
}

export async function runInteractiveAuth(): Promise<void> {
  p.intro("Trakt login");

  const { authFlow, tokens } = getSyncServices();
  const current = tokens.status();
  if (current.authenticated) {
    const again = await p.confirm({
      message: `Already logged in (token valid until ${current.expiresAt}). Log in again?`,
      initialValue: false,
    });
    if (p.isCancel(again) || !again) {
      p.outro("Keeping the current login.");
      return;
    }
  }

  const handle = await authFlow.start();
  p.note(`Open ${handle.verificationUrl}\nand enter the code: ${handle.userCode}`, "Authorize this app");

  const spinner = p.spinner();
  spinner.start("Waiting for you to approve the code on Trakt...");
  try {
    const credential = await authFlow.complete(handle, { timeoutMs: getEnv().SYNC_AUTH_TIMEOUT_SECONDS * 1000 });
    spinner.stop("Authorized.");
    p.outro(`Logged in. Token valid until ${credential.expiresAt}.`);
  } catch (error) {
    spinner.stop("Login failed.");
    process.exitCode = 1;
    p.log.error(describeError(error).message);
    p.outro("Run the login again to get a new code.");
  }
}

export async function runInteractiveSync(options: { dryRun: boolean; full: boolean }): Promise<void> {
  p.intro("Trakt → Letterboxd");

  const { engine, state, tokens, writer } = getSyncServices();

  if (!tokens.status().authenticated) {
    p.log.error("Not logged in to Trakt.");
    p.outro("Run `npm run sync -- auth` first.");
    return;
  }

  let mode: SyncMode = options.full ? "full" : "incremental";
  if (!options.full) {
    const watermark = state.readWatermark();
    const selected = await p.select({
      message: "What would you like to export?",
      options: [
        {
          value: "incremental" as const,
          label: "New watches only",
          hint: watermark ? `since ${watermark.lastSyncedAt}` : "first run exports everything",
        },
        { value: "full" as const, label: "Full history" },
      ],
      initialValue: "incremental" as const,
    });
    if (p.isCancel(selected)) {
      p.outro("Sync cancelled.");
      return;
    }
    mode = selected;
  }

  if (options.dryRun) {
    p.log.warn("Dry run — no file will be written and nothing will be marked as synced.");
  }

  const spinner = p.spinner();
  spinner.start("Reading your Trakt history...");

  try {
    const summary = await engine.run(mode, { dryRun: options.dryRun });
    spinner.stop("Sync finished.");

    if (summary.count === 0) {
      p.log.success("Everything is up to date!");
    } else if (summary.outputPath) {
      p.log.success(`${summary.count} movies ready to import.`);
    } else {
      p.log.info(`${summary.count} movies would be exported.`);
    }
    for (const line of formatSummaryLines(summary)) {
      p.log.message(`  ${line}`);
    }
    if (summary.outputPath) {
      const validation = await writer.validateExport(summary.outputPath);
      for (const warning of validation.warnings) p.log.warn(warning);
      for (const error of validation.errors) p.log.error(error);
    }
    if (summary.exceedsSizeLimit) {
      p.log.warn(
        `The file is over ${formatBytes(EXPORT_SIZE_LIMIT_BYTES)} — Letterboxd may reject it. Split it before importing.`,
      );
    }
  } catch (error) {
    spinner.stop("Sync failed.");
    process.exitCode = 1;
    const described = describeError(error);
    p.log.error(described.message);
    if (described.category === "auth") {
      p.log.info("Run `npm run sync -- auth` to log in again.");
    } else if (described.category === "transient") {
      p.log.info("This is usually temporary. Try again in a few minutes.");
    }
  }

  p.outro("Done!");
}

export async function showExports(): Promise<void> {
  const exports = await getSyncServices().writer.listExports(10);
  if (exports.length === 0) {
    p.log.info("No exports yet.");
    return;
  }
  for (const file of exports) {
    p.log.message(`${file.filename}  ${formatBytes(file.size)}  ${file.modifiedAt}`);
  }
}
