import { z } from "zod";

export const traktCredentialsSchema = z.object({
  clientId: z.string().min(1, "Trakt client ID is required"),
  clientSecret: z.string().min(1, "Trakt client secret is required"),
  apiUrl: z.string().url().optional(),
});

export const syncRunRequestSchema = z.object({
  mode: z.enum(["incremental", "full"]).default("incremental"),
  dryRun: z.boolean().default(false),
});

export type TraktCredentials = z.infer<typeof traktCredentialsSchema>;
export type SyncRunRequest = z.infer<typeof syncRunRequestSchema>;
