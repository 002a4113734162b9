export type AwardFailureReason =
  | "invalid_input"
  | "unknown_scheme_identifier"
  | "unknown_scale_supplier"
  | "supplier_not_unique_in_award"
  | "supplier_not_unique_in_lot"
  | "award_not_found"
  | "token"
  | "owner"
  | "status_details"
  | "already_have_active_awards"
  | "related_lots"
  | "unknown_tenderer"
  | "requirement_response_duplicate"
  | "status_details_saved_award"
  | "award_body_invalid"
  | "write_failed";

// "integrity" marks stored data that breaks an award invariant; callers should
// treat it as fatal rather than as bad input.
export type AwardFailureKind =
  | "validation"
  | "not_found"
  | "credentials"
  | "integrity"
  | "storage";

export type AwardFailure = {
  ok: false;
  kind: AwardFailureKind;
  reason: AwardFailureReason;
  error: string;
};

export type AwardResult<TData> = { ok: true; data: TData } | AwardFailure;
