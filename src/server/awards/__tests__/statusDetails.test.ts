import test from "node:test";
import assert from "node:assert/strict";

import {
  isRequestableStatusDetails,
  resolveStatusDetailsTransition,
} from "@/server/awards/statusDetails";

test("resolveStatusDetailsTransition follows the transition table", () => {
  const cases = [
    ["empty", "active", "active"],
    ["empty", "unsuccessful", "unsuccessful"],
    ["active", "active", "active"],
    ["active", "unsuccessful", "unsuccessful"],
    ["unsuccessful", "active", "active"],
    ["unsuccessful", "unsuccessful", "unsuccessful"],
  ] as const;

  for (const [stored, requested, expected] of cases) {
    assert.deepEqual(resolveStatusDetailsTransition(stored, requested), {
      ok: true,
      statusDetails: expected,
    });
  }
});

test("resolveStatusDetailsTransition rejects unexpected stored values", () => {
  assert.deepEqual(resolveStatusDetailsTransition("consideration", "active"), {
    ok: false,
    reason: "status_details_saved_award",
    stored: "consideration",
  });
  assert.deepEqual(resolveStatusDetailsTransition("lotCancelled", "unsuccessful"), {
    ok: false,
    reason: "status_details_saved_award",
    stored: "lotCancelled",
  });
});

test("isRequestableStatusDetails accepts only active and unsuccessful", () => {
  assert.equal(isRequestableStatusDetails("active"), true);
  assert.equal(isRequestableStatusDetails("unsuccessful"), true);
  assert.equal(isRequestableStatusDetails("empty"), false);
  assert.equal(isRequestableStatusDetails("noOffersReceived"), false);
});
