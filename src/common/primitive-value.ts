import { FormatError, RepresentationMismatchError } from './errors';
import { decodeText, encodeText } from './character-encoding';
import {
  PrimitiveType,
  Representation,
  primitiveTypeInfo,
  widthRange,
} from './primitive-type';

/**
 * The active storage of a PrimitiveValue; exactly one variant is ever set
 */
export type PrimitiveValueData =
  | { readonly representation: Representation.Integral; readonly value: bigint }
  | { readonly representation: Representation.Floating; readonly value: number }
  | {
      readonly representation: Representation.RawBytes;
      readonly value: Uint8Array;
      readonly characterEncoding?: string;
    };

/**
 * Exhaustive dispatch over the three representations
 */
export interface RepresentationHandlers<T> {
  integral(value: bigint): T;
  floating(value: number): T;
  rawBytes(value: Uint8Array, characterEncoding: string | undefined): T;
}

const INTEGER_LITERAL = /^[+-]?\d+$/;
const REAL_LITERAL = /^[+-]?(?:NaN|Infinity|(?:\d+\.?\d*|\.\d+)(?:[eE][+-]?\d+)?)$/;

// Every NaN compares and hashes as this bit pattern
const CANONICAL_NAN_BITS = 0x7ff8000000000000n;

/**
 * Immutable literal, constant or sentinel value of a schema
 *
 * Carries its serialization width independently of its storage form:
 * a `char` constant is stored as an integral value of size 1.
 */
export class PrimitiveValue {
  private constructor(
    private readonly data: PrimitiveValueData,
    private readonly sizeInBytes: number,
  ) {
    Object.freeze(this);
  }

  static fromIntegral(value: bigint | number, size: number): PrimitiveValue {
    return new PrimitiveValue({ representation: Representation.Integral, value: BigInt(value) }, size);
  }

  static fromFloating(value: number, size: number): PrimitiveValue {
    return new PrimitiveValue({ representation: Representation.Floating, value }, size);
  }

  static fromRawBytes(bytes: Uint8Array, characterEncoding: string | undefined, size: number): PrimitiveValue {
    return new PrimitiveValue(
      { representation: Representation.RawBytes, value: bytes.slice(), characterEncoding },
      size,
    );
  }

  /**
   * Parse a literal as written in a schema document
   *
   * With a length and character encoding the text becomes a raw byte
   * sequence, as used for fixed-length character array constants.
   */
  static parse(text: string, primitiveType: PrimitiveType): PrimitiveValue;
  static parse(text: string, primitiveType: PrimitiveType, length: number, characterEncoding: string): PrimitiveValue;
  static parse(text: string, primitiveType: PrimitiveType, length?: number, characterEncoding?: string): PrimitiveValue {
    if (length !== undefined && characterEncoding !== undefined) {
      return parseRawBytes(text, primitiveType, length, characterEncoding);
    }

    switch (primitiveType) {
      case PrimitiveType.Char:
        return parseChar(text);
      case PrimitiveType.Int8:
      case PrimitiveType.Int16:
      case PrimitiveType.Int32:
      case PrimitiveType.Int64:
      case PrimitiveType.UInt8:
      case PrimitiveType.UInt16:
      case PrimitiveType.UInt32:
      case PrimitiveType.UInt64:
        return parseInteger(text, primitiveType);
      case PrimitiveType.Float:
      case PrimitiveType.Double:
        return parseReal(text, primitiveType);
      default:
        throw new FormatError(`Unknown PrimitiveType: ${String(primitiveType)}`);
    }
  }

  get representation(): Representation {
    return this.data.representation;
  }

  match<T>(handlers: RepresentationHandlers<T>): T {
    const data = this.data;
    switch (data.representation) {
      case Representation.Integral:
        return handlers.integral(data.value);
      case Representation.Floating:
        return handlers.floating(data.value);
      case Representation.RawBytes:
        return handlers.rawBytes(data.value.slice(), data.characterEncoding);
    }
  }

  asIntegral(): bigint {
    if (this.data.representation !== Representation.Integral) {
      throw new RepresentationMismatchError(Representation.Integral, this.data.representation);
    }
    return this.data.value;
  }

  asFloating(): number {
    if (this.data.representation !== Representation.Floating) {
      throw new RepresentationMismatchError(Representation.Floating, this.data.representation);
    }
    return this.data.value;
  }

  /**
   * Raw bytes of the value; given `char`, a single-byte integral value
   * is also returned as a one-byte sequence
   */
  asRawBytes(primitiveType?: PrimitiveType): Uint8Array {
    const data = this.data;
    if (data.representation === Representation.RawBytes) {
      return data.value.slice();
    }
    if (
      primitiveType === PrimitiveType.Char &&
      data.representation === Representation.Integral &&
      this.sizeInBytes === 1
    ) {
      return Uint8Array.of(Number(BigInt.asUintN(8, data.value)));
    }
    throw new RepresentationMismatchError(Representation.RawBytes, data.representation);
  }

  size(): number {
    return this.sizeInBytes;
  }

  textEncoding(): string | undefined {
    return this.data.representation === Representation.RawBytes ? this.data.characterEncoding : undefined;
  }

  equals(other: PrimitiveValue): boolean {
    const lhs = this.data;
    const rhs = other.data;
    switch (lhs.representation) {
      case Representation.Integral:
        return rhs.representation === Representation.Integral && lhs.value === rhs.value;
      case Representation.Floating:
        return rhs.representation === Representation.Floating && floatingBits(lhs.value) === floatingBits(rhs.value);
      case Representation.RawBytes:
        return rhs.representation === Representation.RawBytes && bytesEqual(lhs.value, rhs.value);
    }
  }

  hashCode(): number {
    const data = this.data;
    switch (data.representation) {
      case Representation.Integral:
        return foldBits(data.value);
      case Representation.Floating:
        return foldBits(floatingBits(data.value));
      case Representation.RawBytes:
        return hashBytes(data.value);
    }
  }

  toString(): string {
    const data = this.data;
    switch (data.representation) {
      case Representation.Integral:
        return data.value.toString();
      case Representation.Floating:
        return String(data.value);
      case Representation.RawBytes:
        return decodeText(data.value, data.characterEncoding);
    }
  }

  // bigint cannot pass through JSON.stringify
  toJSON(): string {
    return this.toString();
  }
}

/**
 * Catalog sentinels as values of the type's natural representation and width
 */
export function nullValueOf(type: PrimitiveType): PrimitiveValue {
  return sentinel(type, 'nullValue');
}

export function minValueOf(type: PrimitiveType): PrimitiveValue {
  return sentinel(type, 'minValue');
}

export function maxValueOf(type: PrimitiveType): PrimitiveValue {
  return sentinel(type, 'maxValue');
}

function sentinel(type: PrimitiveType, key: 'nullValue' | 'minValue' | 'maxValue'): PrimitiveValue {
  const info = primitiveTypeInfo(type);
  return info.representation === Representation.Integral
    ? PrimitiveValue.fromIntegral(info[key], info.size)
    : PrimitiveValue.fromFloating(info[key], info.size);
}

function parseChar(text: string): PrimitiveValue {
  const codePoint = text.codePointAt(0);
  if (Array.from(text).length !== 1 || codePoint === undefined) {
    throw new FormatError(`Constant char value malformed: "${text}" must be exactly one character`);
  }
  if (codePoint > 0xff) {
    throw new FormatError(`Constant char value malformed: "${text}" does not fit in one byte`);
  }
  return PrimitiveValue.fromIntegral(codePoint, 1);
}

function parseInteger(text: string, primitiveType: PrimitiveType): PrimitiveValue {
  if (!INTEGER_LITERAL.test(text)) {
    throw new FormatError(`Invalid ${primitiveType} literal: "${text}"`);
  }
  const value = BigInt(text);
  const range = widthRange(primitiveType);
  if (value < range.min || value > range.max) {
    throw new FormatError(
      `${primitiveType} literal ${text} does not fit in ${primitiveTypeInfo(primitiveType).size} byte(s) [${range.min}, ${range.max}]`,
    );
  }
  return PrimitiveValue.fromIntegral(value, primitiveTypeInfo(primitiveType).size);
}

function parseReal(text: string, primitiveType: PrimitiveType): PrimitiveValue {
  if (!REAL_LITERAL.test(text)) {
    throw new FormatError(`Invalid ${primitiveType} literal: "${text}"`);
  }
  return PrimitiveValue.fromFloating(Number(text), primitiveTypeInfo(primitiveType).size);
}

function parseRawBytes(text: string, primitiveType: PrimitiveType, length: number, characterEncoding: string): PrimitiveValue {
  if (primitiveType !== PrimitiveType.Char && primitiveType !== PrimitiveType.UInt8) {
    throw new FormatError(`Fixed-length text constants require char or uint8, got ${primitiveType}`);
  }
  const bytes = encodeText(text, characterEncoding);
  if (bytes.length > length) {
    throw new FormatError(
      `Constant "${text}" encodes to ${bytes.length} bytes in ${characterEncoding}, exceeding length ${length}`,
    );
  }
  return PrimitiveValue.fromRawBytes(bytes, characterEncoding, length);
}

function floatingBits(value: number): bigint {
  if (Number.isNaN(value)) {
    return CANONICAL_NAN_BITS;
  }
  const view = new DataView(new ArrayBuffer(8));
  view.setFloat64(0, value);
  return view.getBigUint64(0);
}

function foldBits(bits: bigint): number {
  const unsigned = BigInt.asUintN(64, bits);
  return Number(BigInt.asIntN(32, unsigned ^ (unsigned >> 32n)));
}

function hashBytes(bytes: Uint8Array): number {
  let hash = 1;
  for (const byte of bytes) {
    hash = (Math.imul(31, hash) + ((byte << 24) >> 24)) | 0;
  }
  return hash;
}

function bytesEqual(a: Uint8Array, b: Uint8Array): boolean {
  if (a.length !== b.length) {
    return false;
  }
  return a.every((byte, i) => byte === b[i]);
}
