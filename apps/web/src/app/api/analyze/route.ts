/**
 * Idea Analysis API Endpoint
 *
 * POST /api/analyze  { "idea": string }  ->  AnalysisResult
 */

import { NextResponse } from "next/server";
import { analyzeProjectIdea } from "@/lib/analyzer/idea-analyzer";
import { classifyAnalysisError } from "@/lib/error-classification";

export const runtime = "nodejs";
export const dynamic = "force-dynamic";

const EMPTY_IDEA_MESSAGE = "Please enter a project idea.";

async function readIdea(req: Request): Promise<string> {
  let payload: unknown;
  try {
    payload = await req.json();
  } catch {
    return "";
  }
  if (typeof payload !== "object" || payload === null || !("idea" in payload)) return "";
  const idea: unknown = payload.idea;
  return typeof idea === "string" ? idea.trim() : "";
}

export async function POST(req: Request) {
  const idea = await readIdea(req);
  if (!idea) {
    return NextResponse.json({ error: EMPTY_IDEA_MESSAGE }, { status: 400 });
  }

  try {
    const result = await analyzeProjectIdea(idea);
    return NextResponse.json(result);
  } catch (error) {
    const classified = classifyAnalysisError(error);
    console.error(`[API] analyze failed (${classified.category}):`, classified.message);

    if (classified.category === "upstream_transport" || classified.category === "timeout") {
      return NextResponse.json(
        {
          error: classified.userMessage,
          upstreamStatus: classified.upstreamStatus,
          upstreamBody: classified.upstreamBody ?? "",
        },
        { status: classified.httpStatus },
      );
    }
    return NextResponse.json({ error: classified.userMessage }, { status: classified.httpStatus });
  }
}
