import crypto from "crypto";

export function hashStringToSeed(seed: string): number {
  // First 8 hex chars of the SHA-256 digest
  const hash = crypto.createHash("sha256").update(seed).digest("hex");
  return parseInt(hash.slice(0, 8), 16);
}

export function toNumericSeed(seed: string | number): number {
  return typeof seed === "string" ? hashStringToSeed(seed) : seed;
}

