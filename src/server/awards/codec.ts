import { awardSchema } from "@/server/awards/schema";
import type { Award } from "@/server/awards/types";

export type DecodeAwardResult =
  | { ok: true; award: Award }
  | { ok: false; error: string };

export function encodeAward(award: Award): string {
  return JSON.stringify(award);
}

export function decodeAward(raw: unknown): DecodeAwardResult {
  let payload: unknown = raw;
  if (typeof raw === "string") {
    try {
      payload = JSON.parse(raw);
    } catch (error) {
      return {
        ok: false,
        error: error instanceof Error ? error.message : "Invalid JSON",
      };
    }
  }

  const parsed = awardSchema.safeParse(payload);
  if (!parsed.success) {
    return { ok: false, error: formatIssues(parsed.error.issues) };
  }
  return { ok: true, award: parsed.data };
}

export function formatIssues(
  issues: ReadonlyArray<{ path: ReadonlyArray<string | number>; message: string }>,
): string {
  return issues
    .map((issue) =>
      issue.path.length > 0 ? `${issue.path.join(".")}: ${issue.message}` : issue.message,
    )
    .join("; ");
}
