import type { JsonObject } from '../types/scan.js';

/**
 * Permissive accessors for loosely-typed scan documents.
 * A missing or mistyped field reads as null (scalars) or [] (collections).
 */

export function isJsonObject(value: unknown): value is JsonObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function readString(node: JsonObject | null | undefined, key: string): string | null {
  const value = node?.[key];
  if (typeof value === 'string') return value;
  if (typeof value === 'number' || typeof value === 'boolean') return String(value);
  return null;
}

export function readBoolean(node: JsonObject | null | undefined, key: string): boolean | null {
  const value = node?.[key];
  if (typeof value === 'boolean') return value;
  if (typeof value === 'string') {
    const lower = value.toLowerCase();
    if (lower === 'true') return true;
    if (lower === 'false') return false;
  }
  return null;
}

export function readObject(node: JsonObject | null | undefined, key: string): JsonObject | null {
  const value = node?.[key];
  return isJsonObject(value) ? value : null;
}

/** Object entries of a nested collection; non-object entries are dropped */
export function readNodes(node: JsonObject | null | undefined, key: string): JsonObject[] {
  const value = node?.[key];
  if (!Array.isArray(value)) return [];
  return value.filter(isJsonObject);
}

/** Serializes a nested value for a flat cell; null when absent */
export function readJson(node: JsonObject | null | undefined, key: string): string | null {
  const value = node?.[key];
  if (value === undefined || value === null) return null;
  if (typeof value === 'string') return value;
  return JSON.stringify(value);
}

/** Parses text into a JSON object, or null when it is not one */
export function parseJsonObject(text: string): JsonObject | null {
  try {
    const parsed: unknown = JSON.parse(text);
    return isJsonObject(parsed) ? parsed : null;
  } catch {
    return null;
  }
}
