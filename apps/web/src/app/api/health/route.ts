import { NextResponse } from "next/server";
import { getBuildId } from "@/lib/version";

export const runtime = "nodejs";
export const dynamic = "force-dynamic";

export async function GET() {
  return NextResponse.json({ ok: true, build: getBuildId() });
}
