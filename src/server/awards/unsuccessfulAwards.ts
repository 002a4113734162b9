import { formatIssues } from "@/server/awards/codec";
import { awardFailure, storageFailure } from "@/server/awards/failures";
import {
  logAwardError,
  logAwardInfo,
  logAwardWarn,
  serializeActionError,
} from "@/server/awards/logging";
import { stageFromOcid } from "@/server/awards/ocid";
import type { AwardServiceDeps } from "@/server/awards/repository";
import {
  createUnsuccessfulAwardsRequestSchema,
  type UNSUCCESSFUL_OPERATION_TYPES,
} from "@/server/awards/schema";
import type {
  Award,
  AwardStatusDetails,
  CreateUnsuccessfulAwardsInput,
  UnsuccessfulAward,
} from "@/server/awards/types";
import type { AwardResult } from "@/server/types/results";

type UnsuccessfulOperationType = (typeof UNSUCCESSFUL_OPERATION_TYPES)[number];

export const UNSUCCESSFUL_AWARD_TITLE = "The contract/lot is not awarded";
export const UNSUCCESSFUL_AWARD_DESCRIPTION =
  "Other reasons (discontinuation of procedure)";

const STATUS_DETAILS_BY_OPERATION: Record<
  UnsuccessfulOperationType,
  AwardStatusDetails
> = {
  tenderOrLotAmendmentConfirmation: "lotCancelled",
  submissionPeriodEnd: "noOffersReceived",
};

/**
 * Closes lots that will not be awarded by storing one unsuccessful award per
 * lot. These awards have no owner and no suppliers.
 */
export async function createUnsuccessfulAwards(
  input: CreateUnsuccessfulAwardsInput,
  deps: Pick<AwardServiceDeps, "awards" | "ids">,
): Promise<AwardResult<UnsuccessfulAward[]>> {
  const parsed = createUnsuccessfulAwardsRequestSchema.safeParse(input);
  if (!parsed.success) {
    const message = formatIssues(parsed.error.issues);
    logAwardWarn("unsuccessful", "validation failed", {
      reason: "invalid_input",
      issues: message,
    });
    return awardFailure("invalid_input", message);
  }

  const { cpid, ocid, lotIds, date, operationType } = parsed.data;
  const logContext = { cpid, ocid, operationType, lots: lotIds.length };
  const stage = stageFromOcid(cpid, ocid);
  if (!stage) {
    logAwardWarn("unsuccessful", "validation failed", {
      ...logContext,
      reason: "invalid_input",
    });
    return awardFailure("invalid_input", `ocid '${ocid}' does not belong to cpid '${cpid}'.`);
  }

  const statusDetails = STATUS_DETAILS_BY_OPERATION[operationType];
  const awards: Award[] = lotIds.map((lotId) => ({
    id: deps.ids.newAwardId(),
    token: deps.ids.newToken(),
    title: UNSUCCESSFUL_AWARD_TITLE,
    description: UNSUCCESSFUL_AWARD_DESCRIPTION,
    date,
    status: "unsuccessful",
    statusDetails,
    relatedLots: [lotId],
    value: null,
    suppliers: [],
    documents: [],
    requirementResponses: [],
  }));

  try {
    await deps.awards.insertMany(
      awards.map((award) => ({ cpid, stage, owner: "", token: award.token, award })),
    );
  } catch (error) {
    logAwardError("unsuccessful", "unsuccessful awards crashed", {
      ...logContext,
      error: serializeActionError(error),
    });
    return storageFailure(error);
  }

  logAwardInfo("unsuccessful", "unsuccessful awards created", logContext);
  return {
    ok: true,
    data: awards.map((award) => ({
      id: award.id,
      title: award.title,
      description: award.description,
      date: award.date,
      status: award.status,
      statusDetails: award.statusDetails,
      relatedLots: award.relatedLots,
    })),
  };
}
