import type { SupabaseClient } from "@supabase/supabase-js";
import { supabaseServer } from "@/lib/supabaseServer";
import { createAward } from "@/server/awards/createAward";
import { evaluateAward } from "@/server/awards/evaluateAward";
import { createIdGenerator } from "@/server/awards/ids";
import type { AwardServiceDeps } from "@/server/awards/repository";
import { addRequirementResponse } from "@/server/awards/requirementResponses";
import {
  createSupabaseAwardPeriodRepository,
  createSupabaseAwardRepository,
} from "@/server/awards/supabaseAwardStore";
import type {
  AddRequirementResponseInput,
  CreateAwardContext,
  CreateAwardData,
  CreateUnsuccessfulAwardsInput,
  EvaluateAwardContext,
  EvaluateAwardData,
} from "@/server/awards/types";
import { createUnsuccessfulAwards } from "@/server/awards/unsuccessfulAwards";

export type AwardService = ReturnType<typeof createAwardService>;

export function createAwardService(deps: AwardServiceDeps) {
  return {
    create: (context: CreateAwardContext, data: CreateAwardData) =>
      createAward(context, data, deps),
    evaluate: (context: EvaluateAwardContext, data: EvaluateAwardData) =>
      evaluateAward(context, data, deps),
    addRequirementResponse: (input: AddRequirementResponseInput) =>
      addRequirementResponse(input, deps),
    createUnsuccessfulAwards: (input: CreateUnsuccessfulAwardsInput) =>
      createUnsuccessfulAwards(input, deps),
  };
}

export function createSupabaseAwardService(
  client: SupabaseClient = supabaseServer(),
): AwardService {
  return createAwardService({
    awards: createSupabaseAwardRepository(client),
    awardPeriods: createSupabaseAwardPeriodRepository(client),
    ids: createIdGenerator(),
  });
}

export { createAward } from "@/server/awards/createAward";
export { evaluateAward } from "@/server/awards/evaluateAward";
export { addRequirementResponse } from "@/server/awards/requirementResponses";
export { createUnsuccessfulAwards } from "@/server/awards/unsuccessfulAwards";
export { deriveLotAwarded } from "@/server/awards/lotAwarded";
export { mergeAwardDocuments } from "@/server/awards/documents";
export { supplierId } from "@/server/awards/supplierId";
export { resolveStatusDetailsTransition } from "@/server/awards/statusDetails";
export { decodeAward, encodeAward } from "@/server/awards/codec";
export {
  addRequirementResponseRequestSchema,
  createAwardRequestSchema,
  createUnsuccessfulAwardsRequestSchema,
  evaluateAwardRequestSchema,
} from "@/server/awards/schema";
export type { AwardRepository, AwardPeriodRepository, AwardServiceDeps } from "@/server/awards/repository";
export type { IdGenerator } from "@/server/awards/ids";
export type * from "@/server/awards/types";
export type { AwardFailure, AwardResult } from "@/server/types/results";
