import type {
  AwardFailure,
  AwardFailureKind,
  AwardFailureReason,
} from "@/server/types/results";

const FAILURES: Record<
  AwardFailureReason,
  { kind: AwardFailureKind; message: string }
> = {
  invalid_input: { kind: "validation", message: "Invalid request data." },
  unknown_scheme_identifier: {
    kind: "validation",
    message: "Undefined identifier scheme.",
  },
  unknown_scale_supplier: {
    kind: "validation",
    message: "Undefined supplier scale.",
  },
  supplier_not_unique_in_award: {
    kind: "validation",
    message: "Supplier identifiers should be unique in award.",
  },
  supplier_not_unique_in_lot: {
    kind: "validation",
    message: "One supplier can not submit more than one offer per lot.",
  },
  award_not_found: { kind: "not_found", message: "Award not found." },
  token: { kind: "credentials", message: "Invalid token." },
  owner: { kind: "credentials", message: "Invalid owner." },
  status_details: { kind: "validation", message: "Invalid status value." },
  already_have_active_awards: {
    kind: "validation",
    message: "Lot has already received successful award.",
  },
  related_lots: {
    kind: "validation",
    message: "Documents must cover every lot of the award.",
  },
  unknown_tenderer: {
    kind: "validation",
    message: "Related tenderer is not a supplier of the award.",
  },
  requirement_response_duplicate: {
    kind: "validation",
    message: "Requirement response already exists on the award.",
  },
  status_details_saved_award: {
    kind: "integrity",
    message: "Saved award has an unexpected statusDetails value.",
  },
  award_body_invalid: {
    kind: "integrity",
    message: "Saved award could not be decoded.",
  },
  write_failed: { kind: "storage", message: "Unable to store the award right now." },
};

export function awardFailure(
  reason: AwardFailureReason,
  message?: string,
): AwardFailure {
  const entry = FAILURES[reason];
  return {
    ok: false,
    kind: entry.kind,
    reason,
    error: message ?? entry.message,
  };
}

/**
 * Thrown by stores when a persisted award body cannot be decoded.
 */
export class AwardIntegrityError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "AwardIntegrityError";
  }
}

export function storageFailure(error: unknown): AwardFailure {
  if (error instanceof AwardIntegrityError) {
    return awardFailure("award_body_invalid", error.message);
  }
  return awardFailure("write_failed");
}
