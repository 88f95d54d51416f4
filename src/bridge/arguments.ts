import { ArgumentTypeError } from "../core/errors.js";
import type { ColumnValue } from "../core/types.js";

export const describeValue = (value: unknown): string => {
  if (value === null) {
    return "null";
  }
  if (Array.isArray(value)) {
    return "array";
  }
  if (typeof value === "number" && !Number.isFinite(value)) {
    return String(value);
  }
  return typeof value;
};

export const expectInteger = (method: string, position: number, value: unknown): number => {
  if (typeof value !== "number" || !Number.isInteger(value)) {
    throw new ArgumentTypeError(method, position, "integer", describeValue(value));
  }
  return value;
};

export const expectNonNegativeInteger = (method: string, position: number, value: unknown): number => {
  const integer = expectInteger(method, position, value);
  if (integer < 0) {
    throw new ArgumentTypeError(method, position, "non-negative integer", String(integer));
  }
  return integer;
};

export const expectString = (method: string, position: number, value: unknown): string => {
  if (typeof value !== "string" || value.length === 0) {
    throw new ArgumentTypeError(method, position, "non-empty string", describeValue(value));
  }
  return value;
};

export const expectColumnValue = (method: string, position: number, value: unknown): ColumnValue => {
  if (value === null || typeof value === "string" || typeof value === "boolean") {
    return value;
  }
  if (typeof value === "number" && Number.isFinite(value)) {
    return value;
  }
  throw new ArgumentTypeError(method, position, "string, number, boolean or null", describeValue(value));
};

export const expectFunction = (
  method: string,
  position: number,
  value: unknown
): ((...args: unknown[]) => unknown) => {
  if (typeof value !== "function") {
    throw new ArgumentTypeError(method, position, "function", describeValue(value));
  }
  return (...args: unknown[]): unknown => Reflect.apply(value, undefined, args);
};
