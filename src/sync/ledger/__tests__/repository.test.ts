import { afterEach, beforeEach, describe, expect, it } from "vitest";
import type Database from "better-sqlite3";
import { openDatabase } from "../db";
import { CredentialRepository, RunRepository } from "../repository";

describe("ledger repositories", () => {
  let db: Database.Database;

  beforeEach(() => {
    db = openDatabase(":memory:");
  });

  afterEach(() => {
    db.close();
  });

  describe("CredentialRepository", () => {
    it("keeps a single credential and replaces it on save", () => {
      const repo = new CredentialRepository(db);
      expect(repo.load()).toBeNull();

      repo.save({ accessToken: "test-access-1", refreshToken: "test-refresh-1", expiresAt: "2024-06-01T00:00:00.000Z" });
      repo.save({ accessToken: "test-access-2", refreshToken: null, expiresAt: "2024-09-01T00:00:00.000Z" });

      expect(repo.load()).toEqual({
        accessToken: "test-access-2",
        refreshToken: null,
        expiresAt: "2024-09-01T00:00:00.000Z",
      });
      expect(db.prepare("SELECT COUNT(*) AS total FROM credentials").get()).toEqual({ total: 1 });
    });

    it("clears the credential", () => {
      const repo = new CredentialRepository(db);
      repo.save({ accessToken: "test-access-1", refreshToken: null, expiresAt: "2024-06-01T00:00:00.000Z" });

      repo.clear();

      expect(repo.load()).toBeNull();
    });
  });

  describe("RunRepository", () => {
    it("records a run from start to completion", () => {
      const runs = new RunRepository(db);
      runs.createRun("run-1", "incremental", false, "2024-01-05T20:00:00.000Z");

      expect(runs.listRecentRuns()[0]).toMatchObject({ runId: "run-1", status: "running", completedAt: null });

      runs.completeRun("run-1", {
        status: "completed",
        scope: "full",
        recordCount: 12,
        outputPath: "/exports/a.csv",
        completedAt: "2024-01-05T20:01:00.000Z",
      });

      expect(runs.listRecentRuns()).toEqual([
        {
          id: 1,
          runId: "run-1",
          startedAt: "2024-01-05T20:00:00.000Z",
          completedAt: "2024-01-05T20:01:00.000Z",
          mode: "incremental",
          scope: "full",
          dryRun: false,
          recordCount: 12,
          outputPath: "/exports/a.csv",
          status: "completed",
          errorCode: null,
          errorMessage: null,
        },
      ]);
    });

    it("lists the newest runs first", () => {
      const runs = new RunRepository(db);
      runs.createRun("run-1", "full", true, "2024-01-05T20:00:00.000Z");
      runs.createRun("run-2", "incremental", false, "2024-01-06T20:00:00.000Z");
      runs.createRun("run-3", "incremental", false, "2024-01-07T20:00:00.000Z");

      expect(runs.listRecentRuns(2).map((r) => r.runId)).toEqual(["run-3", "run-2"]);
    });
  });
});
