import { NextResponse } from "next/server";
import { createFailureMode } from "@/lib/annotation-service";
import { errorResponse, readJsonBody, requireValid } from "@/lib/http";
import { getStore } from "@/lib/store";
import { validateFailureModeInput } from "@/lib/validation";

export async function POST(request: Request) {
  try {
    const input = requireValid(validateFailureModeInput(await readJsonBody(request)));
    const store = await getStore();
    return NextResponse.json(await createFailureMode(store, input));
  } catch (error) {
    return errorResponse(error, "POST /api/failure-modes");
  }
}
