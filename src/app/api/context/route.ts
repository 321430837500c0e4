import { NextResponse } from "next/server";
import { getContext } from "@/lib/annotation-service";
import { errorResponse } from "@/lib/http";
import { getStore } from "@/lib/store";

export const dynamic = "force-dynamic";

/**
 * GET /api/context?run_id=...
 * Ordered email hashes for the requested run (or the latest one) plus the
 * labeler roster.
 */
export async function GET(request: Request) {
  try {
    const { searchParams } = new URL(request.url);
    const store = await getStore();
    const context = await getContext(store, searchParams.get("run_id"));
    return NextResponse.json(context);
  } catch (error) {
    return errorResponse(error, "GET /api/context");
  }
}
