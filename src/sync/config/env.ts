import { z } from "zod";

const envSchema = z.object({
  TRAKT_CLIENT_ID: z.string().min(1, "TRAKT_CLIENT_ID is required"),
  TRAKT_CLIENT_SECRET: z.string().min(1, "TRAKT_CLIENT_SECRET is required"),
  TRAKT_API_URL: z.string().url().default("https://api.trakt.tv"),

  SYNC_LOG_LEVEL: z
    .enum(["debug", "info", "warn", "error"])
    .default("info"),

  SYNC_STATE_PATH: z.string().default("./data/sync_state.db"),
  SYNC_EXPORT_PATH: z.string().default("./data/exports"),

  SYNC_PAGE_LIMIT: z.coerce.number().int().min(1).max(1000).default(100),
  SYNC_MAX_RETRIES: z.coerce.number().int().min(0).max(10).default(3),
  // Subtracted from the newest exported watch time before it becomes the watermark
  SYNC_CLOCK_SKEW_SECONDS: z.coerce.number().int().min(0).default(300),
  SYNC_AUTH_TIMEOUT_SECONDS: z.coerce.number().int().min(1).default(600),
  SYNC_RUN_TIMEOUT_SECONDS: z.coerce.number().int().min(1).optional(),
  SYNC_DRY_RUN: z
    .string()
    .default("false")
    .transform((v) => v === "true"),
});

export type SyncEnv = z.infer<typeof envSchema>;

export function parseEnv(source: Record<string, string | undefined>): SyncEnv {
  const result = envSchema.safeParse(source);
  if (!result.success) {
    const missing = result.error.issues
      .map((i) => `  - ${i.path.join(".")}: ${i.message}`)
      .join("\n");
    throw new Error(
      `Sync environment validation failed:\n${missing}\n\nCopy .env.example to .env.local and fill in the values.`
    );
  }
  return result.data;
}

let _env: SyncEnv | null = null;

export function getEnv(): SyncEnv {
  if (!_env) {
    _env = parseEnv(process.env);
  }
  return _env;
}
