import type { z } from "zod";
import type {
  AWARD_STATUS_DETAILS,
  AWARD_STATUSES,
  addRequirementResponseRequestSchema,
  awardSchema,
  createAwardRequestSchema,
  createUnsuccessfulAwardsRequestSchema,
  documentSchema,
  evaluateAwardRequestSchema,
  requirementResponseSchema,
  supplierInputSchema,
  supplierSchema,
  valueSchema,
} from "@/server/awards/schema";

export type AwardStatus = (typeof AWARD_STATUSES)[number];
export type AwardStatusDetails = (typeof AWARD_STATUS_DETAILS)[number];

export type Award = z.infer<typeof awardSchema>;
export type AwardSupplier = z.infer<typeof supplierSchema>;
export type AwardSupplierInput = z.infer<typeof supplierInputSchema>;
export type AwardValue = z.infer<typeof valueSchema>;
export type AwardDocument = z.infer<typeof documentSchema>;
export type RequirementResponse = z.infer<typeof requirementResponseSchema>;

export type CreateAwardData = z.infer<typeof createAwardRequestSchema>;
export type EvaluateAwardData = z.infer<typeof evaluateAwardRequestSchema>;
export type EvaluateAwardDocument = NonNullable<
  EvaluateAwardData["award"]["documents"]
>[number];

export type AddRequirementResponseInput = z.input<
  typeof addRequirementResponseRequestSchema
>;
export type CreateUnsuccessfulAwardsInput = z.input<
  typeof createUnsuccessfulAwardsRequestSchema
>;

export type CreateAwardContext = {
  cpid: string;
  stage: string;
  lotId: string;
  owner: string;
  startDate: string;
};

export type EvaluateAwardContext = {
  cpid: string;
  stage: string;
  awardId: string;
  token: string;
  owner: string;
  startDate: string;
};

/**
 * A stored award together with the columns it is keyed and authorized by.
 */
export type AwardRecord = {
  cpid: string;
  stage: string;
  owner: string;
  token: string;
  award: Award;
};

export type CreatedAward = {
  token: string;
  lotAwarded: boolean | null;
  awardPeriod: { startDate: string };
  award: {
    id: string;
    date: string;
    status: AwardStatus;
    statusDetails: AwardStatusDetails;
    relatedLots: string[];
    description: string | null;
    value: AwardValue;
    suppliers: AwardSupplier[];
  };
};

export type EvaluatedAward = {
  award: {
    id: string;
    date: string;
    description: string | null;
    status: AwardStatus;
    statusDetails: AwardStatusDetails;
    relatedLots: string[];
    value: AwardValue | null;
    suppliers: Array<{ id: string; name: string }>;
    documents: AwardDocument[];
  };
};

export type AddedRequirementResponse = {
  awardId: string;
  requirementResponse: RequirementResponse;
};

export type UnsuccessfulAward = {
  id: string;
  title: string | null;
  description: string | null;
  date: string;
  status: AwardStatus;
  statusDetails: AwardStatusDetails;
  relatedLots: string[];
};
