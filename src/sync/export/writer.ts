import { randomUUID } from "crypto";
import fsPromises from "fs/promises";
import path from "path";
import Papa from "papaparse";
import type { CanonicalRecord, ExportBatch, ExportInfo, ExportResult, ExportValidation } from "@/sync/types";
import { ExportWriteFailedError } from "@/sync/errors";
import { createChildLogger } from "@/sync/logger";

const log = createChildLogger("export-writer");

// Column names the Letterboxd importer recognises
export const EXPORT_COLUMNS = ["Title", "Year", "imdbID", "tmdbID", "WatchedDate", "Rating"] as const;

/** Letterboxd's importer refuses files above roughly 1 MB. */
export const EXPORT_SIZE_LIMIT_BYTES = 1_000_000;

const EXPORT_PREFIX = "letterboxd_import_";
const EXPORT_PATTERN = /^letterboxd_import_\d{8}_\d{6}(_\d+)?\.csv$/;

/** The file operations the writer needs, so tests can fail one of them. */
export interface ExportFileSystem {
  mkdir(dir: string, options: { recursive: true }): Promise<unknown>;
  writeFile(file: string, data: string, encoding: "utf-8"): Promise<void>;
  rename(from: string, to: string): Promise<void>;
  rm(file: string, options: { force: true }): Promise<void>;
  access(file: string): Promise<void>;
  readdir(dir: string): Promise<string[]>;
  stat(file: string): Promise<{ size: number; mtime: Date }>;
  readFile(file: string, encoding: "utf-8"): Promise<string>;
}

const nodeFileSystem: ExportFileSystem = {
  mkdir: (dir, options) => fsPromises.mkdir(dir, options),
  writeFile: (file, data, encoding) => fsPromises.writeFile(file, data, encoding),
  rename: (from, to) => fsPromises.rename(from, to),
  rm: (file, options) => fsPromises.rm(file, options),
  access: (file) => fsPromises.access(file),
  readdir: (dir) => fsPromises.readdir(dir),
  stat: (file) => fsPromises.stat(file),
  readFile: (file, encoding) => fsPromises.readFile(file, encoding),
};

export function formatRating(rating: number | undefined): string {
  return rating === undefined ? "" : rating.toFixed(1);
}

export function toRow(record: CanonicalRecord): string[] {
  return [
    record.title,
    record.year === null ? "" : String(record.year),
    record.imdbId ?? "",
    record.tmdbId ?? "",
    record.watchedDate,
    formatRating(record.rating),
  ];
}

/** Header plus one line per record, `\n` line endings, trailing newline. */
export function renderCsv(records: readonly CanonicalRecord[]): string {
  const csv = Papa.unparse(
    { fields: [...EXPORT_COLUMNS], data: records.map(toRow) },
    { newline: "\n" },
  );
  return `${csv}\n`;
}

/** `letterboxd_import_YYYYMMDD_HHMMSS.csv` in UTC. */
export function exportFileName(generatedAt: string, suffix = 0): string {
  const iso = new Date(generatedAt).toISOString();
  const stamp = `${iso.slice(0, 10).replace(/-/g, "")}_${iso.slice(11, 19).replace(/:/g, "")}`;
  return `${EXPORT_PREFIX}${stamp}${suffix > 0 ? `_${suffix}` : ""}.csv`;
}

export class ExportWriter {
  private readonly exportDir: string;
  private readonly fs: ExportFileSystem;

  constructor(exportDir: string, fileSystem: ExportFileSystem = nodeFileSystem) {
    this.exportDir = path.resolve(exportDir);
    this.fs = fileSystem;
  }

  /**
   * Write the batch next to its final name and rename it into place.
   * Readers either see the finished file or nothing.
   */
  async write(batch: ExportBatch): Promise<ExportResult> {
    const content = renderCsv(batch.records);
    const bytes = Buffer.byteLength(content, "utf-8");
    let tempPath: string | null = null;

    try {
      await this.fs.mkdir(this.exportDir, { recursive: true });
      const outputPath = await this.nextFreePath(batch.generatedAt);
      tempPath = path.join(this.exportDir, `.${path.basename(outputPath)}.${randomUUID()}.tmp`);

      await this.fs.writeFile(tempPath, content, "utf-8");
      await this.fs.rename(tempPath, outputPath);
      tempPath = null;

      if (bytes > EXPORT_SIZE_LIMIT_BYTES) {
        log.warn("Export is larger than the Letterboxd import limit", {
          outputPath,
          bytes,
          limit: EXPORT_SIZE_LIMIT_BYTES,
        });
      }
      log.info("Export written", { outputPath, rows: batch.records.length, bytes, scope: batch.scope });
      return { outputPath, bytes, rowCount: batch.records.length };
    } catch (error) {
      if (tempPath) await this.removeTemp(tempPath);
      const message = error instanceof Error ? error.message : String(error);
      throw new ExportWriteFailedError(`Failed to write export: ${message}`, { path: this.exportDir }, error);
    }
  }

  private async removeTemp(tempPath: string): Promise<void> {
    try {
      await this.fs.rm(tempPath, { force: true });
    } catch (error) {
      log.warn("Could not remove temporary export file", {
        tempPath,
        error: error instanceof Error ? error.message : String(error),
      });
    }
  }

  private async nextFreePath(generatedAt: string): Promise<string> {
    for (let suffix = 0; ; suffix++) {
      const candidate = path.join(this.exportDir, exportFileName(generatedAt, suffix));
      if (!(await this.exists(candidate))) return candidate;
    }
  }

  private async exists(file: string): Promise<boolean> {
    try {
      await this.fs.access(file);
      return true;
    } catch {
      return false;
    }
  }

  /** Most recently modified exports first. */
  async listExports(limit = 10): Promise<ExportInfo[]> {
    let names: string[];
    try {
      names = await this.fs.readdir(this.exportDir);
    } catch (error) {
      if (isNotFound(error)) return [];
      throw error;
    }

    const exports: ExportInfo[] = [];
    for (const filename of names.filter((name) => EXPORT_PATTERN.test(name))) {
      const file = path.join(this.exportDir, filename);
      const stat = await this.fs.stat(file);
      exports.push({ filename, path: file, size: stat.size, modifiedAt: stat.mtime.toISOString() });
    }

    exports.sort((a, b) => b.modifiedAt.localeCompare(a.modifiedAt) || b.filename.localeCompare(a.filename));
    return exports.slice(0, limit);
  }

  /** Check a file against what the Letterboxd importer needs. */
  async validateExport(file: string): Promise<ExportValidation> {
    const result: ExportValidation = { valid: false, rowCount: 0, errors: [], warnings: [] };

    let content: string;
    try {
      content = await this.fs.readFile(file, "utf-8");
    } catch (error) {
      result.errors.push(`Error reading CSV: ${error instanceof Error ? error.message : String(error)}`);
      return result;
    }

    const parsed = Papa.parse<Record<string, string>>(content, { header: true, skipEmptyLines: true });
    const fields = parsed.meta.fields ?? [];
    if (!["Title", "imdbID", "tmdbID"].some((column) => fields.includes(column))) {
      result.errors.push("Missing required identifier columns");
      return result;
    }

    for (const error of parsed.errors) {
      result.errors.push(`Row ${error.row ?? "?"}: ${error.message}`);
    }

    parsed.data.forEach((row, index) => {
      result.rowCount++;
      if (!row.Title && !row.imdbID && !row.tmdbID) {
        // +2: header line, 1-based numbering
        result.warnings.push(`Row ${index + 2}: No identifier found`);
      }
    });

    if (Buffer.byteLength(content, "utf-8") > EXPORT_SIZE_LIMIT_BYTES) {
      result.warnings.push(`File is larger than ${EXPORT_SIZE_LIMIT_BYTES} bytes`);
    }

    result.valid = result.errors.length === 0;
    return result;
  }
}

function isNotFound(error: unknown): boolean {
  return error instanceof Error && "code" in error && error.code === "ENOENT";
}
