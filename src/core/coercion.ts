/**
 * Type coercion table.
 *
 * Maps each declared type tag to a string → value converter. A registry is a
 * plain immutable value: build one at startup and hand it to the binder.
 */

import { TYPE_TAGS, type ParameterType, type ScalarValue, type TypeTag } from "../types.js";
import { CoercionError } from "./errors.js";

export type Converter = (raw: string) => ScalarValue;

export interface CoercionRegistry {
  coerce(typeTag: TypeTag, raw: string): ScalarValue;
  has(typeTag: TypeTag): boolean;
  /** Returns a new registry with `converter` installed for `typeTag`. */
  register(typeTag: TypeTag, converter: Converter): CoercionRegistry;
}

// === Limits ===

const INT32_MIN = -(2n ** 31n);
const INT32_MAX = 2n ** 31n - 1n;
const INT64_MIN = -(2n ** 63n);
const INT64_MAX = 2n ** 63n - 1n;
const UINT16_MAX = 2n ** 16n - 1n;
const UINT32_MAX = 2n ** 32n - 1n;
const UINT64_MAX = 2n ** 64n - 1n;
const DECIMAL_MAX_INTEGER_DIGITS = 28;

const INTEGER_PATTERN = /^[+-]?\d+$/;
const REAL_PATTERN = /^[+-]?(\d+(\.\d*)?|\.\d+)([eE][+-]?\d+)?$/;
const DECIMAL_PATTERN = /^([+-]?)(\d*)(?:\.(\d*))?$/;

// === Converters ===

function parseInteger(typeTag: TypeTag, raw: string, min: bigint, max: bigint): bigint {
  const text = raw.trim();
  if (!INTEGER_PATTERN.test(text)) {
    throw new CoercionError(typeTag, raw, "not an integer");
  }
  const value = BigInt(text);
  if (value < min || value > max) {
    throw new CoercionError(typeTag, raw, `outside ${min}..${max}`);
  }
  return value;
}

/** `narrow` rounds to the target width; anything that overflows it to infinity is out of range. */
function parseReal(typeTag: TypeTag, raw: string, narrow: (value: number) => number): number {
  const text = raw.trim();
  if (!REAL_PATTERN.test(text)) {
    throw new CoercionError(typeTag, raw, "not a number");
  }
  const value = Number(text);
  if (!Number.isFinite(narrow(value))) {
    throw new CoercionError(typeTag, raw, "out of range");
  }
  return value;
}

function parseDecimal(raw: string): string {
  const match = DECIMAL_PATTERN.exec(raw.trim());
  const sign = match?.[1] ?? "";
  const integerDigits = match?.[2] ?? "";
  const fractionDigits = match?.[3];

  if (!match || (integerDigits === "" && !fractionDigits)) {
    throw new CoercionError("decimal", raw, "not a decimal number");
  }

  const integerPart = integerDigits.replace(/^0+(?=\d)/, "") || "0";
  if (integerPart.length > DECIMAL_MAX_INTEGER_DIGITS) {
    throw new CoercionError("decimal", raw, "out of range");
  }

  const isZero = /^0*$/.test(integerPart + (fractionDigits ?? ""));
  const prefix = sign === "-" && !isZero ? "-" : "";
  return fractionDigits ? `${prefix}${integerPart}.${fractionDigits}` : `${prefix}${integerPart}`;
}

function parseBoolean(raw: string): boolean {
  const text = raw.trim().toLowerCase();
  if (text === "true") return true;
  if (text === "false") return false;
  throw new CoercionError("bool", raw, 'expected "true" or "false"');
}

function parseDateTime(raw: string): Date {
  const millis = Date.parse(raw.trim());
  if (Number.isNaN(millis)) {
    throw new CoercionError("datetime", raw, "not a recognizable date");
  }
  return new Date(millis);
}

const BUILT_IN_CONVERTERS: Record<TypeTag, Converter> = {
  none: (raw) => raw,
  string: (raw) => raw,
  bool: parseBoolean,
  int32: (raw) => Number(parseInteger("int32", raw, INT32_MIN, INT32_MAX)),
  int64: (raw) => parseInteger("int64", raw, INT64_MIN, INT64_MAX),
  uint16: (raw) => Number(parseInteger("uint16", raw, 0n, UINT16_MAX)),
  uint32: (raw) => Number(parseInteger("uint32", raw, 0n, UINT32_MAX)),
  uint64: (raw) => parseInteger("uint64", raw, 0n, UINT64_MAX),
  float: (raw) => parseReal("float", raw, Math.fround),
  double: (raw) => parseReal("double", raw, (value) => value),
  decimal: parseDecimal,
  datetime: parseDateTime,
};

// === Registry ===

function buildRegistry(converters: ReadonlyMap<TypeTag, Converter>): CoercionRegistry {
  return {
    coerce(typeTag: TypeTag, raw: string): ScalarValue {
      const converter = converters.get(typeTag);
      if (!converter) {
        throw new CoercionError(typeTag, raw, "no converter registered");
      }
      try {
        return converter(raw);
      } catch (error) {
        if (error instanceof CoercionError) throw error;
        throw new CoercionError(
          typeTag,
          raw,
          error instanceof Error ? error.message : String(error)
        );
      }
    },

    has(typeTag: TypeTag): boolean {
      return converters.has(typeTag);
    },

    register(typeTag: TypeTag, converter: Converter): CoercionRegistry {
      const next = new Map(converters);
      next.set(typeTag, converter);
      return buildRegistry(next);
    },
  };
}

export function createCoercionRegistry(): CoercionRegistry {
  return buildRegistry(
    new Map(TYPE_TAGS.map((tag): [TypeTag, Converter] => [tag, BUILT_IN_CONVERTERS[tag]]))
  );
}

/** Signature name a bound value of `typeTag` reports to overload resolution. */
export function signatureOf(typeTag: TypeTag, isCollection: boolean): ParameterType {
  const scalar = typeTag === "none" ? "string" : typeTag;
  return isCollection ? `${scalar}[]` : scalar;
}
