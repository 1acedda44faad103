// CHANGE: Narrow parsed API payloads without casts.
// WHY: Remote JSON is untrusted; fields are read through guards and validated where used.

export type JsonRecord = { readonly [key: string]: unknown };

export function isRecord(value: unknown): value is JsonRecord {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

export function readString(value: unknown, key: string): string | undefined {
  if (!isRecord(value)) {
    return undefined;
  }
  const field = value[key];
  return typeof field === "string" ? field : undefined;
}

export function readNumber(value: unknown, key: string): number | undefined {
  if (!isRecord(value)) {
    return undefined;
  }
  const field = value[key];
  return typeof field === "number" && Number.isFinite(field) ? field : undefined;
}

export function readRecord(value: unknown, key: string): JsonRecord | undefined {
  if (!isRecord(value)) {
    return undefined;
  }
  const field = value[key];
  return isRecord(field) ? field : undefined;
}

/**
 * Render a response body for diagnostics, truncated to `limit` characters.
 */
export function describeBody(data: unknown, limit = 500): string | undefined {
  if (data === undefined || data === null || data === "") {
    return undefined;
  }
  let text: string;
  if (typeof data === "string") {
    text = data;
  } else if (Buffer.isBuffer(data)) {
    text = data.toString("utf8");
  } else if (data instanceof ArrayBuffer) {
    text = Buffer.from(data).toString("utf8");
  } else {
    text = JSON.stringify(data);
  }
  return text.length > limit ? `${text.slice(0, limit)}...` : text;
}
