import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import type { SyncRunSummary } from "@/sync/types";
import { SourceUnavailableError } from "@/sync/errors";
import { runInteractiveSync } from "../interactive";

const services = vi.hoisted(() => ({
  engine: { run: vi.fn() },
  state: { readWatermark: vi.fn(() => null) },
  tokens: { status: vi.fn(() => ({ authenticated: true, expiresAt: "2030-01-01T00:00:00.000Z", canRefresh: true })) },
  writer: { validateExport: vi.fn() },
}));

vi.mock("@/sync", () => ({ getSyncServices: () => services }));

vi.mock("@clack/prompts", () => ({
  intro: vi.fn(),
  outro: vi.fn(),
  note: vi.fn(),
  select: vi.fn(),
  confirm: vi.fn(),
  isCancel: vi.fn(() => false),
  spinner: vi.fn(() => ({ start: vi.fn(), stop: vi.fn() })),
  log: { error: vi.fn(), info: vi.fn(), warn: vi.fn(), success: vi.fn(), message: vi.fn() },
}));

const upToDate: SyncRunSummary = {
  runId: "run-1",
  mode: "full",
  scope: "full",
  dryRun: false,
  count: 0,
  outputPath: null,
  bytes: 0,
  exceedsSizeLimit: false,
  watermark: "2024-01-06T20:55:00.000Z",
  counts: { fetched: 0, new: 0, changed: 0, unchanged: 0 },
  startedAt: "2024-06-01T12:00:00.000Z",
  completedAt: "2024-06-01T12:00:01.000Z",
};

describe("runInteractiveSync", () => {
  beforeEach(() => {
    process.exitCode = undefined;
    services.engine.run.mockReset();
  });

  afterEach(() => {
    process.exitCode = undefined;
  });

  it("sets a failing exit code when the sync fails", async () => {
    services.engine.run.mockRejectedValueOnce(new SourceUnavailableError("Trakt unavailable after 4 attempts (503)"));

    await runInteractiveSync({ dryRun: false, full: true });

    expect(services.engine.run).toHaveBeenCalledWith("full", { dryRun: false });
    expect(process.exitCode).toBe(1);
  });

  it("leaves the exit code alone when the sync succeeds", async () => {
    services.engine.run.mockResolvedValueOnce(upToDate);

    await runInteractiveSync({ dryRun: false, full: true });

    expect(process.exitCode).toBeUndefined();
  });
});
