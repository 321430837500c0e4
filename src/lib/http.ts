import { NextResponse } from "next/server";
import { HttpError } from "@/lib/errors";

export async function readJsonBody(request: Request): Promise<unknown> {
  try {
    return (await request.json()) as unknown;
  } catch {
    throw new HttpError(400, "Invalid JSON body.");
  }
}

export function requireValid<T>(result: { value?: T; error?: string }): T {
  if (result.error !== undefined || result.value === undefined) {
    throw new HttpError(400, result.error ?? "Invalid request.");
  }
  return result.value;
}

export function errorResponse(error: unknown, context: string) {
  if (error instanceof HttpError) {
    return NextResponse.json({ error: error.message }, { status: error.status });
  }

  console.error(`Error in ${context}:`, error);
  return NextResponse.json({ error: "Internal server error." }, { status: 500 });
}
