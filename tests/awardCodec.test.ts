import test from "node:test";
import assert from "node:assert/strict";

import { decodeAward, encodeAward } from "@/server/awards/codec";
import {
  createAwardRequestSchema,
  evaluateAwardRequestSchema,
} from "@/server/awards/schema";
import { LOT_A, buildStoredAward, buildSupplier } from "./helpers/awardFixtures";

test("decodeAward reads an encoded award back", () => {
  const award = buildStoredAward({
    suppliers: [{ ...buildSupplier(), id: "MD-IDNO-1001" }],
  });

  const decoded = decodeAward(encodeAward(award));

  assert.deepEqual(decoded, { ok: true, award });
});

test("decodeAward fills defaults for bodies written without optional lists", () => {
  const decoded = decodeAward({
    id: "award-1",
    token: "token-1",
    date: "2026-03-01T10:00:00Z",
    status: "pending",
    statusDetails: "empty",
    relatedLots: [LOT_A],
  });

  assert.ok(decoded.ok);
  assert.equal(decoded.award.title, null);
  assert.equal(decoded.award.value, null);
  assert.deepEqual(decoded.award.suppliers, []);
  assert.deepEqual(decoded.award.documents, []);
  assert.deepEqual(decoded.award.requirementResponses, []);
});

test("decodeAward rejects malformed JSON", () => {
  const decoded = decodeAward("{not json");
  assert.equal(decoded.ok, false);
});

test("decodeAward reports the failing path", () => {
  const decoded = decodeAward({
    id: "award-1",
    token: "token-1",
    date: "2026-03-01T10:00:00Z",
    status: "pending",
    statusDetails: "empty",
    relatedLots: [],
  });

  assert.deepEqual(decoded, {
    ok: false,
    error: "relatedLots: Array must contain at least 1 element(s)",
  });
});

test("evaluateAwardRequestSchema rejects an empty documents list", () => {
  const parsed = evaluateAwardRequestSchema.safeParse({
    award: { statusDetails: "active", description: null, documents: [] },
  });

  assert.equal(parsed.success, false);
});

test("evaluateAwardRequestSchema rejects documents with empty relatedLots", () => {
  const parsed = evaluateAwardRequestSchema.safeParse({
    award: {
      statusDetails: "active",
      documents: [{ id: "doc-1", documentType: "awardNotice", relatedLots: [] }],
    },
  });

  assert.equal(parsed.success, false);
});

test("evaluateAwardRequestSchema accepts a request without documents", () => {
  const parsed = evaluateAwardRequestSchema.safeParse({
    award: { statusDetails: "unsuccessful" },
  });

  assert.ok(parsed.success);
  assert.deepEqual(parsed.data, {
    award: { statusDetails: "unsuccessful", description: null },
  });
});

test("createAwardRequestSchema requires at least one supplier", () => {
  const parsed = createAwardRequestSchema.safeParse({
    award: { value: { amount: 10, currency: "MDL" }, suppliers: [] },
    referenceVocabulary: { validSchemes: [], validScales: [] },
  });

  assert.equal(parsed.success, false);
});
