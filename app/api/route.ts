import { INFO } from "@/lib/api/info";

export async function GET() {
  return Response.json(INFO);
}
