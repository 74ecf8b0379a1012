export type ByteSizeResult =
  | { ok: true; bytes: number }
  | { ok: false; error: string };

const UNIT_MULTIPLIERS: Record<string, number> = {
  "": 1,
  b: 1,
  k: 1024,
  kb: 1024,
  kib: 1024,
  m: 1024 ** 2,
  mb: 1024 ** 2,
  mib: 1024 ** 2,
  g: 1024 ** 3,
  gb: 1024 ** 3,
  gib: 1024 ** 3,
};

const BYTE_SIZE_PATTERN = /^(\d+(?:\.\d+)?)\s*([a-z]*)$/;

/**
 * Parses "100MB", "2GB", "750k" or a plain byte count. Units are binary
 * (K = 1024) and case-insensitive.
 */
export function parseByteSize(input: string): ByteSizeResult {
  const match = BYTE_SIZE_PATTERN.exec(input.trim().toLowerCase());
  if (!match) {
    return { ok: false, error: `"${input}" is not a size such as 100MB, 2GB or 750k` };
  }

  const [, amount, unit] = match;
  const multiplier = UNIT_MULTIPLIERS[unit];
  if (multiplier === undefined) {
    return { ok: false, error: `unknown size unit "${unit}" in "${input}"` };
  }

  const bytes = Math.floor(Number(amount) * multiplier);
  if (!Number.isSafeInteger(bytes)) {
    return { ok: false, error: `"${input}" is too large` };
  }
  return { ok: true, bytes };
}
