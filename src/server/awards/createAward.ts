import { awardFailure, storageFailure } from "@/server/awards/failures";
import { deriveLotAwarded } from "@/server/awards/lotAwarded";
import {
  logAwardError,
  logAwardInfo,
  logAwardWarn,
  serializeActionError,
} from "@/server/awards/logging";
import type { AwardServiceDeps } from "@/server/awards/repository";
import { supplierIdOf } from "@/server/awards/supplierId";
import type {
  Award,
  AwardRecord,
  AwardSupplierInput,
  CreateAwardContext,
  CreateAwardData,
  CreatedAward,
} from "@/server/awards/types";
import type { AwardFailure, AwardResult } from "@/server/types/results";

export async function createAward(
  context: CreateAwardContext,
  data: CreateAwardData,
  deps: AwardServiceDeps,
): Promise<AwardResult<CreatedAward>> {
  const { cpid, stage, lotId, owner } = context;
  const suppliers = data.award.suppliers;
  const logContext = { cpid, stage, lotId, owner };

  const inputFailure =
    checkSupplierSchemes(suppliers, data.referenceVocabulary.validSchemes) ??
    checkSupplierScales(suppliers, data.referenceVocabulary.validScales) ??
    checkSuppliersUniqueInAward(suppliers);
  if (inputFailure) {
    logAwardWarn("create", "validation failed", {
      ...logContext,
      reason: inputFailure.reason,
    });
    return inputFailure;
  }

  try {
    const stored = await deps.awards.findByContract(cpid);
    const awards = stored.map((record) => record.award);

    const lotFailure = checkSuppliersUniqueInLot(lotId, suppliers, awards);
    if (lotFailure) {
      logAwardWarn("create", "validation failed", {
        ...logContext,
        reason: lotFailure.reason,
      });
      return lotFailure;
    }

    const lotAwarded = deriveLotAwarded(awards, lotId);

    const award: Award = {
      id: deps.ids.newAwardId(),
      token: deps.ids.newToken(),
      title: null,
      description: data.award.description,
      date: context.startDate,
      status: "pending",
      statusDetails: "empty",
      relatedLots: [lotId],
      value: {
        amount: data.award.value.amount,
        currency: data.award.value.currency,
      },
      suppliers: suppliers.map((supplier) => ({
        ...supplier,
        id: supplierIdOf(supplier),
      })),
      documents: [],
      requirementResponses: [],
    };

    // Insert-if-absent; concurrent creations converge on the stored value.
    const previousStart = await deps.awardPeriods.findStart(cpid, stage);
    const awardPeriodStart =
      previousStart ??
      (await deps.awardPeriods.saveStart(cpid, stage, context.startDate));

    const record: AwardRecord = {
      cpid,
      stage,
      owner,
      token: award.token,
      award,
    };
    await deps.awards.insert(record);

    logAwardInfo("create", "award created", {
      ...logContext,
      awardId: award.id,
      lotAwarded,
    });

    return {
      ok: true,
      data: {
        token: award.token,
        lotAwarded,
        awardPeriod: { startDate: awardPeriodStart },
        award: {
          id: award.id,
          date: award.date,
          status: award.status,
          statusDetails: award.statusDetails,
          relatedLots: [...award.relatedLots],
          description: award.description,
          value: data.award.value,
          suppliers: award.suppliers,
        },
      },
    };
  } catch (error) {
    logAwardError("create", "award creation crashed", {
      ...logContext,
      error: serializeActionError(error),
    });
    return storageFailure(error);
  }
}

function normalizeVocabulary(values: readonly string[]): Set<string> {
  return new Set(values.map((value) => value.toUpperCase()));
}

function checkSupplierSchemes(
  suppliers: readonly AwardSupplierInput[],
  validSchemes: readonly string[],
): AwardFailure | null {
  const schemes = normalizeVocabulary(validSchemes);
  const unknown = suppliers.find(
    (supplier) => !schemes.has(supplier.identifier.scheme.toUpperCase()),
  );
  return unknown
    ? awardFailure(
        "unknown_scheme_identifier",
        `Undefined identifier scheme '${unknown.identifier.scheme}'.`,
      )
    : null;
}

function checkSupplierScales(
  suppliers: readonly AwardSupplierInput[],
  validScales: readonly string[],
): AwardFailure | null {
  const scales = normalizeVocabulary(validScales);
  const unknown = suppliers.find(
    (supplier) => !scales.has(supplier.details.scale.toUpperCase()),
  );
  return unknown
    ? awardFailure(
        "unknown_scale_supplier",
        `Undefined supplier scale '${unknown.details.scale}'.`,
      )
    : null;
}

function checkSuppliersUniqueInAward(
  suppliers: readonly AwardSupplierInput[],
): AwardFailure | null {
  const seen = new Set<string>();
  for (const supplier of suppliers) {
    const id = supplierIdOf(supplier);
    if (seen.has(id)) {
      return awardFailure(
        "supplier_not_unique_in_award",
        `Supplier '${id}' appears more than once in the award.`,
      );
    }
    seen.add(id);
  }
  return null;
}

function checkSuppliersUniqueInLot(
  lotId: string,
  suppliers: readonly AwardSupplierInput[],
  awards: readonly Award[],
): AwardFailure | null {
  const pendingSupplierIds = new Set<string>();
  for (const award of awards) {
    if (award.status !== "pending" || !award.relatedLots.includes(lotId)) {
      continue;
    }
    for (const supplier of award.suppliers) {
      pendingSupplierIds.add(supplierIdOf(supplier));
    }
  }
  if (pendingSupplierIds.size === 0) {
    return null;
  }

  const taken = suppliers.find((supplier) =>
    pendingSupplierIds.has(supplierIdOf(supplier)),
  );
  return taken
    ? awardFailure(
        "supplier_not_unique_in_lot",
        `Supplier '${supplierIdOf(taken)}' already has a pending award on lot '${lotId}'.`,
      )
    : null;
}
