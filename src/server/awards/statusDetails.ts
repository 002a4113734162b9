import type { AwardStatusDetails } from "@/server/awards/types";

export type RequestedStatusDetails = Extract<
  AwardStatusDetails,
  "active" | "unsuccessful"
>;

// stored -> requested -> result. Stored values missing here never came out of
// the evaluation workflow.
const STATUS_DETAILS_TRANSITIONS: Partial<
  Record<AwardStatusDetails, Record<RequestedStatusDetails, RequestedStatusDetails>>
> = {
  empty: { active: "active", unsuccessful: "unsuccessful" },
  active: { active: "active", unsuccessful: "unsuccessful" },
  unsuccessful: { active: "active", unsuccessful: "unsuccessful" },
};

export type StatusDetailsTransition =
  | { ok: true; statusDetails: RequestedStatusDetails }
  | { ok: false; reason: "status_details_saved_award"; stored: AwardStatusDetails };

export function isRequestableStatusDetails(
  value: AwardStatusDetails,
): value is RequestedStatusDetails {
  return value === "active" || value === "unsuccessful";
}

export function resolveStatusDetailsTransition(
  stored: AwardStatusDetails,
  requested: RequestedStatusDetails,
): StatusDetailsTransition {
  const row = STATUS_DETAILS_TRANSITIONS[stored];
  if (!row) {
    return { ok: false, reason: "status_details_saved_award", stored };
  }
  return { ok: true, statusDetails: row[requested] };
}
