import { createHash } from "node:crypto";

export const START_CODE_LENGTH = 12;
export const START_CODE_ALPHABET = "abcdefghijklmnopqrstuvwxyzABCDEFGHIJKLMNOPQRSTUVWXYZ0123456789-_";

/**
 * Deterministic pairing code for this machine: the sha256 digest of
 * `<machineId>:<salt>` read as a big-endian integer, emitted least significant
 * digit first in base 64.
 */
export function deriveStartCode(machineId: string, salt: string): string {
  const digest = createHash("sha256").update(`${machineId}:${salt}`, "utf8").digest("hex");
  const base = BigInt(START_CODE_ALPHABET.length);
  let remaining = BigInt(`0x${digest}`);
  let code = "";
  for (let index = 0; index < START_CODE_LENGTH; index += 1) {
    code += START_CODE_ALPHABET.charAt(Number(remaining % base));
    remaining /= base;
  }
  return code;
}

export function extractStartCode(text: string): string | undefined {
  const [, ...rest] = text.trim().split(/\s+/);
  const code = rest.join(" ").trim();
  return code.length > 0 ? code : undefined;
}
