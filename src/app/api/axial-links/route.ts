import { NextResponse } from "next/server";
import { createAxialLink, deleteAxialLink } from "@/lib/annotation-service";
import { HttpError } from "@/lib/errors";
import { errorResponse, readJsonBody, requireValid } from "@/lib/http";
import { getStore } from "@/lib/store";
import { validateAxialLinkInput } from "@/lib/validation";

export async function POST(request: Request) {
  try {
    const input = requireValid(validateAxialLinkInput(await readJsonBody(request)));
    const store = await getStore();
    return NextResponse.json(await createAxialLink(store, input));
  } catch (error) {
    return errorResponse(error, "POST /api/axial-links");
  }
}

export async function DELETE(request: Request) {
  try {
    const { searchParams } = new URL(request.url);
    const annotationId = searchParams.get("annotation_id");
    const failureModeId = searchParams.get("failure_mode_id");
    if (!annotationId || !failureModeId) {
      throw new HttpError(400, "annotation_id and failure_mode_id required");
    }
    const store = await getStore();
    return NextResponse.json(
      await deleteAxialLink(store, annotationId, failureModeId)
    );
  } catch (error) {
    return errorResponse(error, "DELETE /api/axial-links");
  }
}
