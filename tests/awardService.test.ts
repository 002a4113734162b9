import test from "node:test";
import assert from "node:assert/strict";

import { createAwardService, createSupabaseAwardService } from "@/server/awards";
import {
  CPID,
  LOT_B,
  OCID,
  buildCreateContext,
  buildCreateData,
  buildEvaluateContext,
  buildEvaluateData,
} from "./helpers/awardFixtures";
import { FakeSupabase } from "./helpers/fakeSupabase";
import { createMemoryAwardStore } from "./helpers/memoryAwardStore";

test("award service runs create, evaluate and requirement responses together", async () => {
  const fake = new FakeSupabase({ awards: [["token"]], award_periods: [["cpid", "stage"]] });
  const service = createSupabaseAwardService(fake.asClient());

  const created = await service.create(buildCreateContext(), buildCreateData());
  assert.ok(created.ok);
  const { token } = created.data;
  const awardId = created.data.award.id;

  const evaluated = await service.evaluate(
    buildEvaluateContext(awardId, token),
    buildEvaluateData({ statusDetails: "active" }),
  );
  assert.ok(evaluated.ok);
  assert.equal(evaluated.data.award.statusDetails, "active");

  const response = await service.addRequirementResponse({
    cpid: CPID,
    ocid: OCID,
    award: {
      id: awardId,
      requirementResponse: {
        id: "rr-1",
        value: true,
        relatedTenderer: { id: "MD-IDNO-1001" },
        requirement: { id: "req-1" },
        responder: { id: "responder-1", name: "Evaluation Committee" },
      },
    },
  });
  assert.ok(response.ok);
  assert.equal(response.data.awardId, awardId);
  assert.deepEqual(
    fake.rows("awards").map((row) => row.status_details),
    ["active"],
  );
});

test("award service closes lots through the injected repositories", async () => {
  const store = createMemoryAwardStore();
  const service = createAwardService(store.deps);

  const result = await service.createUnsuccessfulAwards({
    cpid: CPID,
    ocid: OCID,
    lotIds: [LOT_B],
    date: "2026-04-01T00:00:00Z",
    operationType: "submissionPeriodEnd",
  });

  assert.ok(result.ok);
  assert.deepEqual(store.writes, ["insert:award-1"]);
  assert.equal(store.records[0].award.statusDetails, "noOffersReceived");
});
