/**
 * Provider metadata is semi-structured: real documents differ by minting
 * pipeline, so they are modelled as a plain JSON tree and read defensively.
 */

export type JsonPrimitive = string | number | boolean | null;

export type JsonValue = JsonPrimitive | JsonValue[] | JsonObject;

export interface JsonObject {
  [key: string]: JsonValue;
}

/** Raw getNFTMetadata response, mapping at the root */
export type MetadataDocument = JsonObject;

export function isJsonObject(value: JsonValue | undefined): value is JsonObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Read a nested object, absent when any step is missing or not a mapping
 */
export function getObject(
  source: JsonObject | undefined,
  key: string,
): JsonObject | undefined {
  const value = source?.[key];
  return isJsonObject(value) ? value : undefined;
}

/**
 * Read a non-empty string field
 */
export function getString(
  source: JsonObject | undefined,
  key: string,
): string | undefined {
  const value = source?.[key];
  return typeof value === 'string' && value.length > 0 ? value : undefined;
}

export function getArray(
  source: JsonObject | undefined,
  key: string,
): JsonValue[] | undefined {
  const value = source?.[key];
  return Array.isArray(value) ? value : undefined;
}

/** Normalized subset written next to the media, itself plain JSON */
export type SimplifiedMetadata = JsonObject & {
  name?: string;
  description?: string;
  tags?: string[];
  createdBy?: string;
  yearCreated?: string | number;
};
