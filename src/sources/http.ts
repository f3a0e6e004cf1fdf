import fetch from 'node-fetch';

export interface JsonRequestOptions {
  params?: Record<string, string | number>;
  headers?: Record<string, string>;
  timeoutMs: number;
}

export function buildUrl(base: string, params: Record<string, string | number> = {}): string {
  const url = new URL(base);
  for (const [key, value] of Object.entries(params)) {
    url.searchParams.set(key, String(value));
  }
  return url.toString();
}

/**
 * GET a JSON document. Rejects on non-2xx status, timeout or invalid JSON.
 */
export async function getJson(base: string, options: JsonRequestOptions): Promise<unknown> {
  const url = buildUrl(base, options.params);
  const response = await fetch(url, {
    headers: { Accept: 'application/json', ...options.headers },
    timeout: options.timeoutMs,
  });

  if (!response.ok) {
    throw new Error(`GET ${new URL(url).host} returned ${response.status}`);
  }

  const data: unknown = await response.json();
  return data;
}

// ─── Response narrowing ──────────────────────────────────────────────────────

export type JsonObject = Record<string, unknown>;

export function isJsonObject(value: unknown): value is JsonObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function objectArray(value: unknown): JsonObject[] {
  return Array.isArray(value) ? value.filter(isJsonObject) : [];
}

export function readString(obj: JsonObject, key: string, fallback: string = ''): string {
  const value = obj[key];
  if (typeof value === 'string') return value;
  if (typeof value === 'number') return String(value);
  return fallback;
}

export function readNumber(obj: JsonObject, key: string): number | undefined {
  const value = obj[key];
  if (typeof value === 'number' && Number.isFinite(value)) return value;
  if (typeof value === 'string' && value.trim() !== '') {
    const parsed = Number(value);
    return Number.isFinite(parsed) ? parsed : undefined;
  }
  return undefined;
}

export function readObject(obj: JsonObject, key: string): JsonObject {
  const value = obj[key];
  return isJsonObject(value) ? value : {};
}
