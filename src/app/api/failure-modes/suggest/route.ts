import { NextResponse } from "next/server";
import { suggestForEmail } from "@/lib/annotation-service";
import { HttpError } from "@/lib/errors";
import { errorResponse } from "@/lib/http";
import { getStore } from "@/lib/store";

export const dynamic = "force-dynamic";

/**
 * GET /api/failure-modes/suggest?email_hash=...
 * Candidate failure modes mined from the email's open codes.
 */
export async function GET(request: Request) {
  try {
    const { searchParams } = new URL(request.url);
    const emailHash = searchParams.get("email_hash");
    if (!emailHash) {
      throw new HttpError(400, "email_hash required");
    }
    const store = await getStore();
    const suggestions = await suggestForEmail(store, emailHash);
    return NextResponse.json({ suggestions });
  } catch (error) {
    return errorResponse(error, "GET /api/failure-modes/suggest");
  }
}
