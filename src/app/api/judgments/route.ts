import { NextResponse } from "next/server";
import { deleteJudgment, upsertJudgment } from "@/lib/annotation-service";
import { HttpError } from "@/lib/errors";
import { errorResponse, readJsonBody, requireValid } from "@/lib/http";
import { getStore } from "@/lib/store";
import { validateJudgmentInput } from "@/lib/validation";

/**
 * POST /api/judgments
 * Create or replace the labeler's pass/fail verdict on an email.
 */
export async function POST(request: Request) {
  try {
    const input = requireValid(validateJudgmentInput(await readJsonBody(request)));
    const store = await getStore();
    return NextResponse.json(await upsertJudgment(store, input));
  } catch (error) {
    return errorResponse(error, "POST /api/judgments");
  }
}

/**
 * DELETE /api/judgments?email_hash=...&labeler_id=...
 */
export async function DELETE(request: Request) {
  try {
    const { searchParams } = new URL(request.url);
    const emailHash = searchParams.get("email_hash");
    const labelerId = searchParams.get("labeler_id");
    if (!emailHash || !labelerId) {
      throw new HttpError(400, "email_hash and labeler_id required");
    }
    const store = await getStore();
    return NextResponse.json(await deleteJudgment(store, emailHash, labelerId));
  } catch (error) {
    return errorResponse(error, "DELETE /api/judgments");
  }
}
