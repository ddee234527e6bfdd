/**
 * Field-type inference for sampled MongoDB documents.
 *
 * A document's description mirrors its shape: nested documents become
 * nested objects, arrays become a one-element list holding the type of
 * their first element, and leaves become type names. Descriptions of many
 * documents are merged; a field seen with several types ends up as a
 * sorted list of those types.
 */

export type FieldType = string | FieldType[] | { [field: string]: FieldType };

type FieldObject = { [field: string]: FieldType };

function isFieldObject(value: FieldType | undefined): value is FieldObject {
  return typeof value === "object" && !Array.isArray(value);
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  if (typeof value !== "object" || value === null) return false;
  const proto: unknown = Object.getPrototypeOf(value);
  return proto === Object.prototype || proto === null;
}

/** BSON values (ObjectId, Decimal128, Binary, …) carry their type name */
function bsonTypeOf(value: object): string | null {
  if ("_bsontype" in value && typeof value._bsontype === "string") return value._bsontype;
  return null;
}

export function fieldType(value: unknown): FieldType {
  if (value === null || value === undefined) return "null";
  if (Array.isArray(value)) return value.length > 0 ? [fieldType(value[0])] : [];
  if (value instanceof Date) return "datetime";
  if (typeof value === "object") {
    const bson = bsonTypeOf(value);
    if (bson) return bson;
    if (isPlainObject(value)) {
      const out: FieldObject = {};
      for (const [k, v] of Object.entries(value)) out[k] = fieldType(v);
      return out;
    }
    return value.constructor.name;
  }
  return typeof value;
}

export function mergeSchemas(a: FieldType | undefined, b: FieldType | undefined): FieldType | undefined {
  if (a === undefined) return b;
  if (b === undefined) return a;

  if (isFieldObject(a) && isFieldObject(b)) {
    const merged: FieldObject = {};
    for (const key of new Set([...Object.keys(a), ...Object.keys(b)])) {
      const value = mergeSchemas(a[key], b[key]);
      if (value !== undefined) merged[key] = value;
    }
    return merged;
  }
  if (isFieldObject(a) || isFieldObject(b)) return [a, b];

  if (Array.isArray(a) && Array.isArray(b)) {
    if (a.length > 0 && b.length > 0) return wrap(mergeSchemas(a[0], b[0]));
    return a.length > 0 ? a : b;
  }
  if (Array.isArray(a)) return a.length > 0 ? wrap(mergeSchemas(a[0], b)) : [b];
  if (Array.isArray(b)) return b.length > 0 ? wrap(mergeSchemas(a, b[0])) : [a];

  return a === b ? a : [a, b];
}

function wrap(value: FieldType | undefined): FieldType[] {
  return value === undefined ? [] : [value];
}

function flattenList(list: FieldType[]): FieldType[] {
  const out: FieldType[] = [];
  for (const item of list) {
    if (Array.isArray(item)) out.push(...flattenList(item));
    else out.push(item);
  }
  return out;
}

/**
 * Collapse nested lists: every list is flattened, de-duplicated and
 * sorted, and a list left with a single entry is replaced by that entry.
 */
export function flattenSchema(schema: FieldType): FieldType {
  if (Array.isArray(schema)) {
    const unique = new Map<string, FieldType>();
    for (const item of flattenList(schema)) {
      const flat = flattenSchema(item);
      unique.set(JSON.stringify(flat), flat);
    }
    const sorted = [...unique.entries()]
      .sort(([x], [y]) => (x < y ? -1 : x > y ? 1 : 0))
      .map(([, v]) => v);
    return sorted.length === 1 ? sorted[0] : sorted;
  }
  if (isFieldObject(schema)) {
    const out: FieldObject = {};
    for (const [k, v] of Object.entries(schema)) out[k] = flattenSchema(v);
    return out;
  }
  return schema;
}

/** Infer one description for a sample of documents */
export function inferSchema(documents: Iterable<Record<string, unknown>>): FieldType {
  let schema: FieldType = {};
  for (const doc of documents) {
    schema = mergeSchemas(schema, fieldType(doc)) ?? schema;
  }
  return flattenSchema(schema);
}
