import { NextResponse } from "next/server";
import type { ZodType, ZodTypeDef } from "zod";
import { supabaseServer } from "@/lib/supabase-server";
import { supabaseAdmin } from "@/lib/supabase-admin";
import { createStudyEngine, type StudyEngine } from "@/lib/study-engine";
import { InvalidRequestError, UnauthenticatedError, errorStatus } from "@/lib/http-errors";

// Shared plumbing for the study route handlers.

export async function requireUserId(): Promise<string> {
  const sb = await supabaseServer();
  const { data, error } = await sb.auth.getUser();
  if (error || !data.user) throw new UnauthenticatedError();
  return data.user.id;
}

let engine: StudyEngine | null = null;

export function studyEngine(): StudyEngine {
  if (!engine) engine = createStudyEngine(supabaseAdmin());
  return engine;
}

export async function parseJsonBody<T>(req: Request, schema: ZodType<T, ZodTypeDef, unknown>): Promise<T> {
  let raw: unknown;
  try {
    raw = await req.json();
  } catch {
    throw new InvalidRequestError("Body must be valid JSON");
  }
  const parsed = schema.safeParse(raw);
  if (!parsed.success) {
    throw new InvalidRequestError(
      "Invalid request body",
      parsed.error.issues.map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`)
    );
  }
  return parsed.data;
}

export function errorResponse(err: unknown, route: string): NextResponse {
  const { status, body, retryAfter } = errorStatus(err);
  if (status >= 500) console.error(`[${route}] request failed`, err);
  else if (status !== 401) console.warn(`[${route}] request rejected`, { status, error: body.error });
  const headers = retryAfter !== undefined ? { "Retry-After": String(retryAfter) } : undefined;
  return NextResponse.json(body, { status, headers });
}
