import { NextResponse } from "next/server";
import { getSyncServices, getSyncStatus } from "@/sync";
import { describeError } from "@/sync/errors";
import { createChildLogger } from "@/sync/logger";

const log = createChildLogger("api-status");

export const runtime = "nodejs";
export const dynamic = "force-dynamic";

/** GET /api/sync/status — engine phase, login state, watermark, recent runs and exports. */
export async function GET() {
  try {
    return NextResponse.json(await getSyncStatus(getSyncServices()));
  } catch (error) {
    const described = describeError(error);
    log.error("Status lookup failed", { code: described.code, error: described.message });
    return NextResponse.json(
      { error: described.code, message: described.message },
      { status: described.httpStatus },
    );
  }
}
