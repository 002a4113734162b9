import { documentsCoverLots, mergeAwardDocuments } from "@/server/awards/documents";
import { awardFailure, storageFailure } from "@/server/awards/failures";
import {
  logAwardError,
  logAwardInfo,
  logAwardWarn,
  serializeActionError,
  type LogContext,
} from "@/server/awards/logging";
import type { AwardServiceDeps } from "@/server/awards/repository";
import {
  isRequestableStatusDetails,
  resolveStatusDetailsTransition,
} from "@/server/awards/statusDetails";
import type {
  Award,
  AwardRecord,
  EvaluateAwardContext,
  EvaluateAwardData,
  EvaluatedAward,
} from "@/server/awards/types";
import type { AwardFailure, AwardResult } from "@/server/types/results";

export async function evaluateAward(
  context: EvaluateAwardContext,
  data: EvaluateAwardData,
  deps: AwardServiceDeps,
): Promise<AwardResult<EvaluatedAward>> {
  const { cpid, stage, awardId } = context;
  const logContext: LogContext = { cpid, stage, awardId };
  const requestedDocuments = data.award.documents ?? [];

  try {
    const record = await deps.awards.findOne(cpid, stage, context.token);
    if (!record) {
      return reject(awardFailure("award_not_found"), logContext);
    }
    if (record.token !== context.token) {
      return reject(awardFailure("token"), logContext);
    }
    if (record.owner !== context.owner) {
      return reject(awardFailure("owner"), logContext);
    }

    const award = record.award;
    if (award.id !== awardId) {
      return reject(awardFailure("award_not_found"), logContext);
    }

    const requested = data.award.statusDetails;
    if (!isRequestableStatusDetails(requested)) {
      return reject(
        awardFailure("status_details", `Invalid status value '${requested}'.`),
        logContext,
      );
    }

    if (requested === "active") {
      const siblings = await deps.awards.findByStage(cpid, stage);
      if (hasActiveSibling(award, siblings)) {
        return reject(awardFailure("already_have_active_awards"), logContext);
      }
    }

    if (!documentsCoverLots(requestedDocuments, award.relatedLots)) {
      return reject(awardFailure("related_lots"), logContext);
    }

    const documents = mergeAwardDocuments(award.documents, requestedDocuments);

    const transition = resolveStatusDetailsTransition(award.statusDetails, requested);
    if (!transition.ok) {
      logAwardError("evaluate", "saved award has unexpected statusDetails", {
        ...logContext,
        statusDetails: transition.stored,
      });
      return awardFailure(
        "status_details_saved_award",
        `Saved award has unexpected statusDetails '${transition.stored}'.`,
      );
    }

    const updatedAward: Award = {
      ...award,
      description: data.award.description,
      documents,
      statusDetails: transition.statusDetails,
      date: context.startDate,
    };
    const updatedRecord: AwardRecord = { ...record, award: updatedAward };
    await deps.awards.update(updatedRecord);

    logAwardInfo("evaluate", "award evaluated", {
      ...logContext,
      fromStatusDetails: award.statusDetails,
      toStatusDetails: updatedAward.statusDetails,
      documents: documents.length,
    });

    return { ok: true, data: toEvaluatedAward(updatedAward) };
  } catch (error) {
    logAwardError("evaluate", "award evaluation crashed", {
      ...logContext,
      error: serializeActionError(error),
    });
    return storageFailure(error);
  }
}

// A lot may have only one active award. Siblings count when they cover every
// lot of the evaluated award.
function hasActiveSibling(award: Award, siblings: readonly AwardRecord[]): boolean {
  return siblings.some(({ award: sibling }) => {
    if (sibling.id === award.id) {
      return false;
    }
    const siblingLots = new Set(sibling.relatedLots);
    const covers = award.relatedLots.every((lotId) => siblingLots.has(lotId));
    return covers && sibling.statusDetails === "active";
  });
}

function reject(failure: AwardFailure, logContext: LogContext): AwardFailure {
  logAwardWarn("evaluate", "validation failed", {
    ...logContext,
    reason: failure.reason,
  });
  return failure;
}

function toEvaluatedAward(award: Award): EvaluatedAward {
  return {
    award: {
      id: award.id,
      date: award.date,
      description: award.description,
      status: award.status,
      statusDetails: award.statusDetails,
      relatedLots: [...award.relatedLots],
      value: award.value,
      suppliers: award.suppliers.map((supplier) => ({
        id: supplier.id,
        name: supplier.name,
      })),
      documents: award.documents,
    },
  };
}
