/**
 * Argument payloads arrive as one JSON object on the command line
 * (`bulwark exec write '{"path":"a.md","content":"hi"}'`). Field-level
 * validation belongs to each command's schema; this only checks the shape.
 */

export type ArgsParseResult =
  | { readonly ok: true; readonly value: Record<string, unknown> }
  | { readonly ok: false; readonly message: string };

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/** A missing or blank payload is `{}`. */
export function parseArgsJson(raw: string | undefined): ArgsParseResult {
  if (raw === undefined || raw.trim() === '') return { ok: true, value: {} };

  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (err: unknown) {
    if (err instanceof SyntaxError) return { ok: false, message: `arguments are not valid JSON: ${err.message}` };
    throw err;
  }
  if (!isRecord(parsed)) return { ok: false, message: 'arguments must be a JSON object' };
  return { ok: true, value: parsed };
}

/** Parses a positive integer flag value such as `--limit 20`. */
export function parsePositiveInt(raw: string, flag: string): number {
  const value = Number(raw);
  if (!Number.isInteger(value) || value <= 0) {
    throw new RangeError(`${flag} must be a positive integer, got '${raw}'`);
  }
  return value;
}
