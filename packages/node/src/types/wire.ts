/**
 * JSON wire encoding.
 *
 * Amounts live as bigint in the domain and travel as decimal strings.
 * Maps become plain objects; undefined fields are dropped.
 */

export type WireValue =
  | string
  | number
  | boolean
  | null
  | WireValue[]
  | { [key: string]: WireValue };

export function toWire(value: unknown): WireValue {
  if (typeof value === "bigint") return value.toString();
  if (typeof value === "string" || typeof value === "boolean") return value;
  if (typeof value === "number") return Number.isFinite(value) ? value : null;
  if (typeof value !== "object" || value === null) return null;

  if (Array.isArray(value)) {
    return value.map((item: unknown) => toWire(item));
  }
  if (value instanceof Map) {
    const out: { [key: string]: WireValue } = {};
    for (const [key, entry] of value) {
      out[String(key)] = toWire(entry);
    }
    return out;
  }
  if (value instanceof Uint8Array) {
    return Buffer.from(value).toString("hex");
  }

  const out: { [key: string]: WireValue } = {};
  for (const [key, entry] of Object.entries(value)) {
    if (entry !== undefined) {
      out[key] = toWire(entry);
    }
  }
  return out;
}
