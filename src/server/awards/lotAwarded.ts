import type { Award } from "@/server/awards/types";

type LotAwardState = Pick<Award, "status" | "statusDetails" | "relatedLots">;

/**
 * Returns `false` when every award on the lot is settled without a pending
 * active or empty award, and `null` when the flag should be left out.
 */
export function deriveLotAwarded(
  awards: readonly LotAwardState[],
  lotId: string,
): boolean | null {
  const awardsForLot = awards.filter((award) => award.relatedLots.includes(lotId));
  if (awardsForLot.length === 0) {
    return null;
  }

  const hasActiveAward = awardsForLot.some(
    (award) => award.status === "pending" && award.statusDetails === "active",
  );
  if (hasActiveAward) {
    return null;
  }

  const hasUndecidedAward = awardsForLot.some(
    (award) => award.status === "pending" && award.statusDetails === "empty",
  );
  return hasUndecidedAward ? null : false;
}
