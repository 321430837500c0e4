import { NextResponse } from "next/server";
import { createAnnotation } from "@/lib/annotation-service";
import { errorResponse, readJsonBody, requireValid } from "@/lib/http";
import { getStore } from "@/lib/store";
import { validateAnnotationInput } from "@/lib/validation";

export async function POST(request: Request) {
  try {
    const input = requireValid(validateAnnotationInput(await readJsonBody(request)));
    const store = await getStore();
    return NextResponse.json(await createAnnotation(store, input));
  } catch (error) {
    return errorResponse(error, "POST /api/annotations");
  }
}
