// Field type checks for plain message objects.
//
// protobufjs' fromObject coerces whatever it is given ("ten" becomes 0), so
// values are checked against their proto3 JSON form before conversion.

import protobuf from "protobufjs";
import type { Field, Type } from "protobufjs";

const INT32_TYPES = new Set(["int32", "uint32", "sint32", "fixed32", "sfixed32"]);
const INT64_TYPES = new Set(["int64", "uint64", "sint64", "fixed64", "sfixed64"]);
const FLOAT_TYPES = new Set(["double", "float"]);
const SPECIAL_FLOATS = new Set(["NaN", "Infinity", "-Infinity"]);

const INTEGER_STRING = /^-?\d+$/;
const NUMBER_STRING = /^-?(\d+(\.\d*)?|\.\d+)([eE][-+]?\d+)?$/;
const BASE64 = /^[A-Za-z0-9+/_-]*={0,2}$/;

/**
 * Check the fields of a plain object against a message type.
 *
 * Absent and null fields are accepted, unknown fields are ignored.
 *
 * @param path - prefix for the reported field, e.g. "example.Size"
 * @returns null when every present field has an acceptable value, a reason otherwise
 */
export function checkMessage(type: Type, value: Record<string, unknown>, path: string): string | null {
  for (const field of type.fieldsArray) {
    const fieldValue = value[field.name];
    if (fieldValue === undefined || fieldValue === null) continue;

    const problem = checkField(field, fieldValue, `${path}.${field.name}`);
    if (problem !== null) {
      return problem;
    }
  }
  return null;
}

function checkField(field: Field, value: unknown, path: string): string | null {
  if (field.map) {
    if (!isPlainObject(value)) {
      return `${path}: object expected`;
    }
    for (const [key, entry] of Object.entries(value)) {
      const problem = checkValue(field, entry, `${path}[${JSON.stringify(key)}]`);
      if (problem !== null) return problem;
    }
    return null;
  }

  if (field.repeated) {
    if (!Array.isArray(value)) {
      return `${path}: array expected`;
    }
    for (const [index, entry] of value.entries()) {
      const problem = checkValue(field, entry, `${path}[${index}]`);
      if (problem !== null) return problem;
    }
    return null;
  }

  return checkValue(field, value, path);
}

function checkValue(field: Field, value: unknown, path: string): string | null {
  const resolved = field.resolvedType;

  if (resolved instanceof protobuf.Type) {
    if (!isPlainObject(value)) {
      return `${path}: object expected`;
    }
    return checkMessage(resolved, value, path);
  }

  if (resolved instanceof protobuf.Enum) {
    if (typeof value === "string" && Object.hasOwn(resolved.values, value)) return null;
    if (typeof value === "number" && Number.isInteger(value)) return null;
    return `${path}: enum value of ${resolved.name} expected`;
  }

  if (INT32_TYPES.has(field.type)) {
    if (typeof value === "number" && Number.isInteger(value)) return null;
    if (typeof value === "string" && INTEGER_STRING.test(value)) return null;
    return `${path}: integer expected`;
  }

  if (INT64_TYPES.has(field.type)) {
    if (typeof value === "number" && Number.isInteger(value)) return null;
    if (typeof value === "string" && INTEGER_STRING.test(value)) return null;
    if (isLongLike(value)) return null;
    return `${path}: integer or decimal string expected`;
  }

  if (FLOAT_TYPES.has(field.type)) {
    if (typeof value === "number") return null;
    if (typeof value === "string" && (NUMBER_STRING.test(value) || SPECIAL_FLOATS.has(value))) return null;
    return `${path}: number expected`;
  }

  switch (field.type) {
    case "bool":
      return typeof value === "boolean" ? null : `${path}: boolean expected`;
    case "string":
      return typeof value === "string" ? null : `${path}: string expected`;
    case "bytes":
      if (value instanceof Uint8Array) return null;
      return typeof value === "string" && BASE64.test(value) ? null : `${path}: base64 string expected`;
    default:
      return null;
  }
}

// 64-bit values built in code may be Long instances.
function isLongLike(value: unknown): boolean {
  return isPlainObject(value) && typeof value.low === "number" && typeof value.high === "number";
}

export function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}
