import { NextResponse } from "next/server";
import { createLabeler } from "@/lib/annotation-service";
import { errorResponse, readJsonBody, requireValid } from "@/lib/http";
import { getStore } from "@/lib/store";
import { validateLabelerInput } from "@/lib/validation";

export async function POST(request: Request) {
  try {
    const input = requireValid(validateLabelerInput(await readJsonBody(request)));
    const store = await getStore();
    return NextResponse.json(await createLabeler(store, input));
  } catch (error) {
    return errorResponse(error, "POST /api/labelers");
  }
}
