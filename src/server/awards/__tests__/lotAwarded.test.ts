import test from "node:test";
import assert from "node:assert/strict";

import { deriveLotAwarded } from "@/server/awards/lotAwarded";
import type { Award } from "@/server/awards/types";

const LOT = "lot-1";

function award(
  status: Award["status"],
  statusDetails: Award["statusDetails"],
  relatedLots: string[] = [LOT],
) {
  return { status, statusDetails, relatedLots };
}

test("deriveLotAwarded returns null when no awards exist", () => {
  assert.equal(deriveLotAwarded([], LOT), null);
});

test("deriveLotAwarded returns null when no award references the lot", () => {
  assert.equal(deriveLotAwarded([award("pending", "unsuccessful", ["lot-2"])], LOT), null);
});

test("deriveLotAwarded returns null for a pending empty award", () => {
  assert.equal(deriveLotAwarded([award("pending", "empty")], LOT), null);
});

test("deriveLotAwarded returns null for a pending active award", () => {
  assert.equal(
    deriveLotAwarded([award("pending", "unsuccessful"), award("pending", "active")], LOT),
    null,
  );
});

test("deriveLotAwarded returns false when only unsuccessful awards cover the lot", () => {
  assert.equal(
    deriveLotAwarded([award("pending", "unsuccessful"), award("pending", "unsuccessful")], LOT),
    false,
  );
});

test("deriveLotAwarded ignores awards that are not pending", () => {
  assert.equal(deriveLotAwarded([award("unsuccessful", "noOffersReceived")], LOT), false);
  assert.equal(deriveLotAwarded([award("active", "active")], LOT), false);
});
