import { NextRequest, NextResponse } from "next/server";
import { CreateSessionBodySchema } from "@/lib/schema";
import { errorResponse, parseJsonBody, requireUserId, studyEngine } from "@/lib/study-api";

export const runtime = "nodejs";
export const dynamic = "force-dynamic";

export async function GET(req: NextRequest) {
  try {
    const userId = await requireUserId();
    const includeArchived = req.nextUrl.searchParams.get("includeArchived") === "true";
    const sessions = await studyEngine().listSessions(userId, includeArchived);
    return NextResponse.json({ sessions });
  } catch (err) {
    return errorResponse(err, "study-sessions");
  }
}

export async function POST(req: Request) {
  const t0 = Date.now();
  try {
    const userId = await requireUserId();
    const body = await parseJsonBody(req, CreateSessionBodySchema);
    const result = await studyEngine().generation.createSession({ userId, ...body });
    console.log("[study-sessions] created", { sessionId: result.sessionId, fromCache: result.fromCache, dt: Date.now() - t0 });
    return NextResponse.json(result, { status: 201 });
  } catch (err) {
    return errorResponse(err, "study-sessions");
  }
}
