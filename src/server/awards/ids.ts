import { randomBytes } from "node:crypto";

export interface IdGenerator {
  newAwardId(): string;
  newToken(): string;
}

/**
 * UUID (version 7 layout): 48 bits of unix milliseconds followed by random
 * bits, so ids sort by creation time.
 */
export function timeOrderedId(now: number = Date.now()): string {
  const bytes = randomBytes(16);
  let remaining = Math.max(0, Math.floor(now));
  for (let index = 5; index >= 0; index -= 1) {
    bytes[index] = remaining % 256;
    remaining = Math.floor(remaining / 256);
  }
  bytes[6] = (bytes[6] & 0x0f) | 0x70;
  bytes[8] = (bytes[8] & 0x3f) | 0x80;

  const hex = bytes.toString("hex");
  return [
    hex.slice(0, 8),
    hex.slice(8, 12),
    hex.slice(12, 16),
    hex.slice(16, 20),
    hex.slice(20),
  ].join("-");
}

export function createIdGenerator(clock: () => number = Date.now): IdGenerator {
  return {
    newAwardId: () => timeOrderedId(clock()),
    newToken: () => timeOrderedId(clock()),
  };
}
