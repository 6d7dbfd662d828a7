import { FormatError } from './errors';

/**
 * Primitive wire types a schema can declare
 * String values are the names used in schema documents
 */
export enum PrimitiveType {
  Char = 'char',
  Int8 = 'int8',
  Int16 = 'int16',
  Int32 = 'int32',
  Int64 = 'int64',
  UInt8 = 'uint8',
  UInt16 = 'uint16',
  UInt32 = 'uint32',
  UInt64 = 'uint64',
  Float = 'float',
  Double = 'double',
}

/**
 * Storage forms of a PrimitiveValue
 */
export enum Representation {
  Integral = 'integral',
  Floating = 'floating',
  RawBytes = 'rawBytes',
}

export interface IntegralTypeInfo {
  readonly representation: Representation.Integral;
  readonly size: number;
  readonly signed: boolean;
  readonly nullValue: bigint;
  readonly minValue: bigint;
  readonly maxValue: bigint;
}

export interface FloatingTypeInfo {
  readonly representation: Representation.Floating;
  readonly size: number;
  readonly signed: true;
  readonly nullValue: number;
  readonly minValue: number;
  readonly maxValue: number;
}

export type PrimitiveTypeInfo = IntegralTypeInfo | FloatingTypeInfo;

// Smallest positive subnormal and largest finite single precision values
const MIN_VALUE_FLOAT = 1.401298464324817e-45;
const MAX_VALUE_FLOAT = 3.4028234663852886e38;

function integral(size: number, signed: boolean, nullValue: bigint, minValue: bigint, maxValue: bigint): IntegralTypeInfo {
  const info: IntegralTypeInfo = { representation: Representation.Integral, size, signed, nullValue, minValue, maxValue };
  return Object.freeze(info);
}

function floating(size: number, minValue: number, maxValue: number): FloatingTypeInfo {
  const info: FloatingTypeInfo = { representation: Representation.Floating, size, signed: true, nullValue: NaN, minValue, maxValue };
  return Object.freeze(info);
}

/**
 * Sentinel table: the only place null/min/max values are defined
 */
const CATALOG: Readonly<Record<PrimitiveType, PrimitiveTypeInfo>> = Object.freeze({
  [PrimitiveType.Char]: integral(1, false, 0n, 0x20n, 0x7en),
  [PrimitiveType.Int8]: integral(1, true, -128n, -127n, 127n),
  [PrimitiveType.UInt8]: integral(1, false, 255n, 0n, 254n),
  [PrimitiveType.Int16]: integral(2, true, -32768n, -32767n, 32767n),
  [PrimitiveType.UInt16]: integral(2, false, 65535n, 0n, 65534n),
  [PrimitiveType.Int32]: integral(4, true, -(2n ** 31n), -(2n ** 31n) + 1n, 2n ** 31n - 1n),
  [PrimitiveType.UInt32]: integral(4, false, 2n ** 32n - 1n, 0n, 2n ** 32n - 2n),
  [PrimitiveType.Int64]: integral(8, true, -(2n ** 63n), -(2n ** 63n) + 1n, 2n ** 63n - 1n),
  [PrimitiveType.UInt64]: integral(8, false, 2n ** 64n - 1n, 0n, 2n ** 64n - 2n),
  [PrimitiveType.Float]: floating(4, MIN_VALUE_FLOAT, MAX_VALUE_FLOAT),
  [PrimitiveType.Double]: floating(8, Number.MIN_VALUE, Number.MAX_VALUE),
});

const TYPES_BY_NAME: ReadonlyMap<string, PrimitiveType> = new Map(
  Object.values(PrimitiveType).map(type => [type, type]),
);

export function primitiveTypeInfo(type: PrimitiveType): PrimitiveTypeInfo {
  return CATALOG[type];
}

export function primitiveSize(type: PrimitiveType): number {
  return CATALOG[type].size;
}

export function isPrimitiveTypeName(name: string): boolean {
  return TYPES_BY_NAME.has(name);
}

/**
 * Look up a primitive type by the name used in schema documents
 */
export function primitiveTypeFromName(name: string): PrimitiveType {
  const type = TYPES_BY_NAME.get(name);
  if (type === undefined) {
    throw new FormatError(
      `Unknown primitive type: ${name}. Valid types are: ${Object.values(PrimitiveType).join(', ')}`,
    );
  }
  return type;
}

export function isIntegral(type: PrimitiveType): boolean {
  return CATALOG[type].representation === Representation.Integral;
}

export function isFloating(type: PrimitiveType): boolean {
  return CATALOG[type].representation === Representation.Floating;
}

/**
 * Unsigned integer types, excluding char
 */
export function isUnsignedInteger(type: PrimitiveType): boolean {
  return type === PrimitiveType.UInt8
    || type === PrimitiveType.UInt16
    || type === PrimitiveType.UInt32
    || type === PrimitiveType.UInt64;
}

/**
 * Every value that fits the type's wire width, sentinels included
 * e.g. int8 spans [-128, 127] while its operating range is [-127, 127]
 */
export function widthRange(type: PrimitiveType): { min: bigint; max: bigint } {
  const info = CATALOG[type];
  const bits = BigInt(info.size * 8);
  if (info.signed) {
    return { min: -(2n ** (bits - 1n)), max: 2n ** (bits - 1n) - 1n };
  }
  return { min: 0n, max: 2n ** bits - 1n };
}
