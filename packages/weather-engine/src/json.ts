export type JsonPrimitive = string | number | boolean | null;
export type JsonValue = JsonPrimitive | JsonValue[] | JsonObject;
export interface JsonObject {
  [key: string]: JsonValue;
}

export const isRecord = (value: unknown): value is JsonObject =>
  typeof value === "object" && value !== null && !Array.isArray(value);

/**
 * Child object of `value`, or an empty object when either side is not a container.
 */
export const recordAt = (value: unknown, key: string): JsonObject => {
  if (!isRecord(value)) return {};
  const child = value[key];
  return isRecord(child) ? child : {};
};

export const asArray = (value: unknown): JsonValue[] => (Array.isArray(value) ? value : []);

export const asNumber = (value: unknown): number | null =>
  typeof value === "number" && Number.isFinite(value) ? value : null;

export const asString = (value: unknown): string | null => (typeof value === "string" ? value : null);

/** Non-empty string, otherwise null. */
export const asText = (value: unknown): string | null => (typeof value === "string" && value !== "" ? value : null);
