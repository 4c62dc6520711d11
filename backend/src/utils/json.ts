export type Json = string | number | boolean | null | { [key: string]: Json } | Json[];

/** Wire form of engine values: bigints become decimal strings, maps objects, sets arrays. */
export const toJson = (value: unknown): Json => {
  if (value === null || value === undefined) {
    return null;
  }
  if (typeof value === 'bigint') {
    return value.toString();
  }
  if (typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean') {
    return value;
  }
  if (Array.isArray(value)) {
    return value.map(toJson);
  }
  if (value instanceof Set) {
    return [...value].map(toJson);
  }
  if (value instanceof Map) {
    return Object.fromEntries([...value.entries()].map(([key, item]) => [String(key), toJson(item)]));
  }
  if (typeof value === 'object') {
    const result: { [key: string]: Json } = {};
    for (const [key, item] of Object.entries(value)) {
      if (item !== undefined) {
        result[key] = toJson(item);
      }
    }
    return result;
  }
  return String(value);
};
