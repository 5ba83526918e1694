import fs from "fs/promises";
import os from "os";
import path from "path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import type { CanonicalRecord } from "@/sync/types";
import { ExportWriteFailedError } from "@/sync/errors";
import { ExportWriter, exportFileName, renderCsv, type ExportFileSystem } from "../writer";

const HEADER = "Title,Year,imdbID,tmdbID,WatchedDate,Rating";

const arrival: CanonicalRecord = {
  title: "Arrival",
  year: 2016,
  imdbId: "tt2543164",
  watchedDate: "2024-01-05",
  watchedAt: "2024-01-05T20:00:00.000Z",
  rating: 4.0,
};

const unrated: CanonicalRecord = {
  title: "Crouching Tiger, Hidden Dragon",
  year: null,
  tmdbId: "146",
  watchedDate: "2024-01-06",
  watchedAt: "2024-01-06T20:00:00.000Z",
};

describe("renderCsv", () => {
  it("writes the header and one row per record", () => {
    expect(renderCsv([arrival])).toBe(`${HEADER}\nArrival,2016,tt2543164,,2024-01-05,4.0\n`);
  });

  it("leaves unknown columns empty and quotes titles containing commas", () => {
    expect(renderCsv([unrated])).toBe(`${HEADER}\n"Crouching Tiger, Hidden Dragon",,,146,2024-01-06,\n`);
  });

  it("writes only the header for no records", () => {
    expect(renderCsv([])).toBe(`${HEADER}\n`);
  });
});

describe("exportFileName", () => {
  it("stamps the file with the UTC generation time", () => {
    expect(exportFileName("2024-01-05T20:03:09.123Z")).toBe("letterboxd_import_20240105_200309.csv");
    expect(exportFileName("2024-01-05T20:03:09.123Z", 2)).toBe("letterboxd_import_20240105_200309_2.csv");
  });
});

describe("ExportWriter", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), "export-writer-"));
  });

  afterEach(async () => {
    await fs.rm(dir, { recursive: true, force: true });
  });

  it("writes the batch to a timestamped file", async () => {
    const writer = new ExportWriter(path.join(dir, "exports"));
    const result = await writer.write({
      records: [arrival],
      generatedAt: "2024-01-05T20:03:09.000Z",
      scope: "full",
    });

    const expected = `${HEADER}\nArrival,2016,tt2543164,,2024-01-05,4.0\n`;
    expect(result).toEqual({
      outputPath: path.join(dir, "exports", "letterboxd_import_20240105_200309.csv"),
      bytes: Buffer.byteLength(expected, "utf-8"),
      rowCount: 1,
    });
    expect(await fs.readFile(result.outputPath, "utf-8")).toBe(expected);
  });

  it("never overwrites an earlier export from the same second", async () => {
    const writer = new ExportWriter(dir);
    const batch = { records: [arrival], generatedAt: "2024-01-05T20:03:09.000Z", scope: "full" as const };

    const first = await writer.write(batch);
    const second = await writer.write(batch);

    expect(path.basename(first.outputPath)).toBe("letterboxd_import_20240105_200309.csv");
    expect(path.basename(second.outputPath)).toBe("letterboxd_import_20240105_200309_1.csv");
    expect((await fs.readdir(dir)).sort()).toEqual([
      "letterboxd_import_20240105_200309.csv",
      "letterboxd_import_20240105_200309_1.csv",
    ]);
  });

  function failingFileSystem(overrides: Partial<ExportFileSystem>): ExportFileSystem {
    return {
      mkdir: (d, options) => fs.mkdir(d, options),
      writeFile: (file, data, encoding) => fs.writeFile(file, data, encoding),
      rename: (from, to) => fs.rename(from, to),
      rm: (file, options) => fs.rm(file, options),
      access: (file) => fs.access(file),
      readdir: (d) => fs.readdir(d),
      stat: (file) => fs.stat(file),
      readFile: (file, encoding) => fs.readFile(file, encoding),
      ...overrides,
    };
  }

  it("leaves no file behind when the final rename fails", async () => {
    const writer = new ExportWriter(
      dir,
      failingFileSystem({
        rename: async () => {
          throw new Error("disk full");
        },
      }),
    );

    const attempt = writer.write({ records: [arrival], generatedAt: "2024-01-05T20:03:09.000Z", scope: "full" });

    await expect(attempt).rejects.toBeInstanceOf(ExportWriteFailedError);
    await expect(attempt).rejects.toThrow("Failed to write export: disk full");
    expect(await fs.readdir(dir)).toEqual([]);
  });

  it("leaves an earlier export untouched when a later write fails", async () => {
    const batch = { records: [arrival], generatedAt: "2024-01-05T20:03:09.000Z", scope: "full" as const };
    const earlier = await new ExportWriter(dir).write(batch);
    const before = await fs.readFile(earlier.outputPath, "utf-8");

    const renameFails = new ExportWriter(
      dir,
      failingFileSystem({
        rename: async () => {
          throw new Error("disk full");
        },
      }),
    );
    await expect(renameFails.write({ ...batch, records: [arrival, unrated] })).rejects.toBeInstanceOf(
      ExportWriteFailedError,
    );

    const writeFails = new ExportWriter(
      dir,
      failingFileSystem({
        writeFile: async () => {
          throw new Error("no space left on device");
        },
      }),
    );
    await expect(writeFails.write(batch)).rejects.toThrow("Failed to write export: no space left on device");

    expect(await fs.readdir(dir)).toEqual(["letterboxd_import_20240105_200309.csv"]);
    expect(await fs.readFile(earlier.outputPath, "utf-8")).toBe(before);
    expect(before).toBe(`${HEADER}\nArrival,2016,tt2543164,,2024-01-05,4.0\n`);
  });

  it("lists only export files", async () => {
    const writer = new ExportWriter(dir);
    await writer.write({ records: [arrival], generatedAt: "2024-01-05T20:03:09.000Z", scope: "full" });
    await fs.writeFile(path.join(dir, "notes.txt"), "ignore me", "utf-8");

    const exports = await writer.listExports();

    expect(exports.map((e) => e.filename)).toEqual(["letterboxd_import_20240105_200309.csv"]);
  });

  it("lists nothing when the export directory does not exist yet", async () => {
    const writer = new ExportWriter(path.join(dir, "missing"));
    expect(await writer.listExports()).toEqual([]);
  });

  it("validates a written export", async () => {
    const writer = new ExportWriter(dir);
    const { outputPath } = await writer.write({
      records: [arrival, unrated],
      generatedAt: "2024-01-06T21:00:00.000Z",
      scope: "incremental",
    });

    expect(await writer.validateExport(outputPath)).toEqual({
      valid: true,
      rowCount: 2,
      errors: [],
      warnings: [],
    });
  });

  it("rejects a file without identifier columns", async () => {
    const file = path.join(dir, "other.csv");
    await fs.writeFile(file, "Name,Score\nArrival,8\n", "utf-8");

    const validation = await new ExportWriter(dir).validateExport(file);

    expect(validation.valid).toBe(false);
    expect(validation.errors).toEqual(["Missing required identifier columns"]);
  });
});
