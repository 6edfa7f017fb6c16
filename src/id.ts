import { createHash } from "node:crypto";
import type { IssueId } from "./adt.ts";

const ALPH = "abcdefghijklmnopqrstuvwxyz234567";
function toBase32(bytes: Uint8Array): string {
  let bits = 0, value = 0, out = "";
  for (const b of bytes) {
    value = (value << 8) | b;
    bits += 8;
    while (bits >= 5) {
      out += ALPH[(value >>> (bits - 5)) & 31];
      bits -= 5;
    }
  }
  if (bits > 0) out += ALPH[(value << (5 - bits)) & 31];
  return out;
}

/**
 * Derives a short identifier from `seed`, lengthening the hash prefix until
 * it is absent from `existing`.
 */
export function newId<P extends string>(
  prefix: P,
  seed: string,
  existing: ReadonlySet<string>,
): `${P}-${string}` {
  const base = toBase32(createHash("sha1").update(seed).digest());
  for (let len = 6; len <= base.length; len++) {
    const id = `${prefix}-${base.slice(0, len)}` as const;
    if (!existing.has(id)) return id;
  }
  // Full digest taken: disambiguate with a counter.
  for (let n = 2;; n++) {
    const id = `${prefix}-${base}${n.toString(36)}` as const;
    if (!existing.has(id)) return id;
  }
}

export function newIssueId(
  seed: string,
  existing: ReadonlySet<string>,
): IssueId {
  return newId("iss", seed, existing);
}

export function isIssueId(id: unknown): id is IssueId {
  return typeof id === "string" && id.startsWith("iss-") && id.length > 4;
}
