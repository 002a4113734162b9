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
import { addRequirementResponseRequestSchema } from "@/server/awards/schema";
import type {
  AddRequirementResponseInput,
  AddedRequirementResponse,
} from "@/server/awards/types";
import type { AwardResult } from "@/server/types/results";

/**
 * Records a responder's answer to a requirement for one of the award's
 * suppliers.
 */
export async function addRequirementResponse(
  input: AddRequirementResponseInput,
  deps: Pick<AwardServiceDeps, "awards">,
): Promise<AwardResult<AddedRequirementResponse>> {
  const parsed = addRequirementResponseRequestSchema.safeParse(input);
  if (!parsed.success) {
    const message = formatIssues(parsed.error.issues);
    logAwardWarn("requirement", "validation failed", {
      reason: "invalid_input",
      issues: message,
    });
    return awardFailure("invalid_input", message);
  }

  const { cpid, ocid, award: request } = parsed.data;
  const stage = stageFromOcid(cpid, ocid);
  const logContext = {
    cpid,
    ocid,
    awardId: request.id,
    requirementResponseId: request.requirementResponse.id,
  };
  if (!stage) {
    logAwardWarn("requirement", "validation failed", {
      ...logContext,
      reason: "invalid_input",
    });
    return awardFailure("invalid_input", `ocid '${ocid}' does not belong to cpid '${cpid}'.`);
  }

  try {
    const record = await deps.awards.findById(cpid, stage, request.id);
    if (!record) {
      logAwardWarn("requirement", "validation failed", {
        ...logContext,
        reason: "award_not_found",
      });
      return awardFailure("award_not_found");
    }

    const response = request.requirementResponse;
    const isSupplier = record.award.suppliers.some(
      (supplier) => supplier.id === response.relatedTenderer.id,
    );
    if (!isSupplier) {
      logAwardWarn("requirement", "validation failed", {
        ...logContext,
        reason: "unknown_tenderer",
      });
      return awardFailure(
        "unknown_tenderer",
        `Tenderer '${response.relatedTenderer.id}' is not a supplier of award '${request.id}'.`,
      );
    }

    const duplicate = record.award.requirementResponses.some(
      (existing) => existing.id === response.id,
    );
    if (duplicate) {
      logAwardWarn("requirement", "validation failed", {
        ...logContext,
        reason: "requirement_response_duplicate",
      });
      return awardFailure("requirement_response_duplicate");
    }

    await deps.awards.update({
      ...record,
      award: {
        ...record.award,
        requirementResponses: [...record.award.requirementResponses, response],
      },
    });

    logAwardInfo("requirement", "requirement response added", logContext);
    return {
      ok: true,
      data: { awardId: record.award.id, requirementResponse: response },
    };
  } catch (error) {
    logAwardError("requirement", "requirement response crashed", {
      ...logContext,
      error: serializeActionError(error),
    });
    return storageFailure(error);
  }
}
