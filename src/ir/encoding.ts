import { maxValueOf, minValueOf, nullValueOf } from '../common/primitive-value';
import type { PrimitiveValue } from '../common/primitive-value';
import type { PrimitiveType } from '../common/primitive-type';
import { encodedLength } from './layout';
import { Presence, TypeKind } from './types';
import type { ByteOrder, SchemaType } from './types';

/**
 * Everything a generator or decoder needs to read one primitive slot
 * Sentinels are the type's overrides, falling back to the catalog
 */
export interface PrimitiveEncoding {
  readonly primitiveType: PrimitiveType;
  readonly length: number;
  readonly presence: Presence;
  readonly byteOrder: ByteOrder;
  readonly nullValue: PrimitiveValue;
  readonly minValue: PrimitiveValue;
  readonly maxValue: PrimitiveValue;
  readonly constValue?: PrimitiveValue;
  readonly characterEncoding?: string;
  readonly semanticType?: string;
}

export interface LaidOutEncoding {
  readonly path: readonly string[];
  readonly offset: number;
  readonly encoding: PrimitiveEncoding;
}

/**
 * Encoding of a non-composite type; composites have no single encoding
 */
export function resolveEncoding(
  type: SchemaType,
  byteOrder: ByteOrder,
  presence?: Presence,
  constValue?: PrimitiveValue,
): PrimitiveEncoding | undefined {
  switch (type.kind) {
    case TypeKind.Simple:
      return {
        primitiveType: type.primitiveType,
        length: type.length,
        presence: presence ?? type.presence,
        byteOrder,
        nullValue: type.nullValue ?? nullValueOf(type.primitiveType),
        minValue: type.minValue ?? minValueOf(type.primitiveType),
        maxValue: type.maxValue ?? maxValueOf(type.primitiveType),
        constValue: constValue ?? type.constValue,
        characterEncoding: type.characterEncoding,
        semanticType: type.semanticType,
      };
    case TypeKind.Enum:
    case TypeKind.Set:
      return {
        primitiveType: type.encodingType,
        length: 1,
        presence: presence ?? (type.kind === TypeKind.Enum ? type.presence : Presence.Required),
        byteOrder,
        nullValue: nullValueOf(type.encodingType),
        minValue: minValueOf(type.encodingType),
        maxValue: maxValueOf(type.encodingType),
        constValue,
        semanticType: type.semanticType,
      };
    case TypeKind.Composite:
      return undefined;
  }
}

/**
 * Every primitive slot of a type with its offset, in member order
 */
export function* flattenEncodings(
  type: SchemaType,
  byteOrder: ByteOrder,
  path: readonly string[] = [type.name],
  offset: number = 0,
): Generator<LaidOutEncoding> {
  if (type.kind !== TypeKind.Composite) {
    const encoding = resolveEncoding(type, byteOrder);
    if (encoding) {
      yield { path, offset, encoding };
    }
    return;
  }

  let memberOffset = offset;
  for (const member of type.members) {
    yield* flattenEncodings(member.type, byteOrder, [...path, member.name], memberOffset);
    memberOffset += encodedLength(member.type);
  }
}
