import { NextRequest, NextResponse } from "next/server";
import { syncRunRequestSchema } from "@/sync/types/api";
import { getSyncServices } from "@/sync";
import { getEnv } from "@/sync/config/env";
import { describeError } from "@/sync/errors";
import { createChildLogger } from "@/sync/logger";

const log = createChildLogger("api-run");

export const runtime = "nodejs";
// Full history exports page through Trakt and can take a while
export const maxDuration = 300;

/**
 * POST /api/sync/run — Run one Trakt → Letterboxd export.
 *
 * Body (optional):
 *   mode?: "incremental" | "full"
 *   dryRun?: boolean
 */
export async function POST(request: NextRequest) {
  const text = await request.text();
  let body: unknown = {};
  if (text.trim() !== "") {
    try {
      body = JSON.parse(text);
    } catch {
      return NextResponse.json(
        { error: "InvalidRequest", message: "Invalid JSON in request body" },
        { status: 400 },
      );
    }
  }

  const parsed = syncRunRequestSchema.safeParse(body);
  if (!parsed.success) {
    return NextResponse.json(
      { error: "InvalidRequest", message: "Invalid request", details: parsed.error.issues },
      { status: 400 },
    );
  }

  const { mode, dryRun } = parsed.data;
  log.info("Sync triggered via API", { mode, dryRun });

  try {
    const env = getEnv();
    const summary = await getSyncServices().engine.run(mode, {
      dryRun: dryRun || env.SYNC_DRY_RUN,
      timeoutMs: env.SYNC_RUN_TIMEOUT_SECONDS ? env.SYNC_RUN_TIMEOUT_SECONDS * 1000 : undefined,
    });
    return NextResponse.json({ status: "completed", summary });
  } catch (error) {
    const described = describeError(error);
    log.error("Sync failed via API", { code: described.code, error: described.message });
    return NextResponse.json(
      { error: described.code, message: described.message },
      { status: described.httpStatus },
    );
  }
}
