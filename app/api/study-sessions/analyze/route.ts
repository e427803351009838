import { NextResponse } from "next/server";
import { AnalyzeContentBodySchema } from "@/lib/schema";
import { analyzeContent, assertUsableContent } from "@/lib/content-analysis";
import { errorResponse, parseJsonBody, requireUserId } from "@/lib/study-api";

export const runtime = "nodejs";
export const dynamic = "force-dynamic";

export async function POST(req: Request) {
  try {
    await requireUserId();
    const { content } = await parseJsonBody(req, AnalyzeContentBodySchema);
    return NextResponse.json(analyzeContent(assertUsableContent(content)));
  } catch (err) {
    return errorResponse(err, "study-sessions/analyze");
  }
}
