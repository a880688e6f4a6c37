/**
 * Narrowing helpers for provider response bodies, which arrive as `unknown`
 * and are read field by field.
 */

export type JsonRecord = Record<string, unknown>;

export function asRecord(value: unknown): JsonRecord | null {
  if (typeof value === 'object' && value !== null && !Array.isArray(value)) {
    return Object.fromEntries(Object.entries(value));
  }
  return null;
}

export function asRecordArray(value: unknown): ReadonlyArray<JsonRecord> {
  if (!Array.isArray(value)) {
    return [];
  }
  const records: Array<JsonRecord> = [];
  for (const item of value) {
    const record = asRecord(item);
    if (record) {
      records.push(record);
    }
  }
  return records;
}

export function readString(record: JsonRecord | null | undefined, key: string): string | null {
  const value = record?.[key];
  return typeof value === 'string' ? value : null;
}

export function readNumber(record: JsonRecord | null | undefined, key: string): number {
  const value = record?.[key];
  return typeof value === 'number' && Number.isFinite(value) ? value : 0;
}

/**
 * Parses a JSON-encoded arguments string. Anything that is not a JSON object
 * comes back as an empty object.
 */
export function parseArguments(raw: string | null): JsonRecord {
  if (!raw) {
    return {};
  }
  try {
    return asRecord(JSON.parse(raw)) ?? {};
  } catch {
    return {};
  }
}
