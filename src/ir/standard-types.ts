import { PrimitiveType } from '../common/primitive-type';
import { PrimitiveValue } from '../common/primitive-value';
import { TypeKind } from './types';
import type { CompositeTypeDeclaration, SimpleTypeDeclaration } from './declarations';

function uint(name: string, primitiveType: PrimitiveType): SimpleTypeDeclaration {
  return { kind: TypeKind.Simple, name, primitiveType };
}

/**
 * The customary message header: four uint16 members, 8 bytes
 */
export function messageHeaderType(name: string = 'messageHeader'): CompositeTypeDeclaration {
  return {
    kind: TypeKind.Composite,
    name,
    description: 'Message identifiers and length of message root',
    members: [
      uint('blockLength', PrimitiveType.UInt16),
      uint('templateId', PrimitiveType.UInt16),
      uint('schemaId', PrimitiveType.UInt16),
      uint('version', PrimitiveType.UInt16),
    ],
  };
}

/**
 * Repeating group dimensions: uint16 block length and uint16 count
 */
export function groupSizeEncodingType(name: string = 'groupSizeEncoding'): CompositeTypeDeclaration {
  return {
    kind: TypeKind.Composite,
    name,
    description: 'Repeating group dimensions',
    members: [
      uint('blockLength', PrimitiveType.UInt16),
      uint('numInGroup', PrimitiveType.UInt16),
    ],
  };
}

/**
 * Length-prefixed payload; text when `characterEncoding` is given
 */
export function varDataEncodingType(
  name: string,
  lengthType: PrimitiveType = PrimitiveType.UInt32,
  characterEncoding?: string,
): CompositeTypeDeclaration {
  const length: SimpleTypeDeclaration = uint('length', lengthType);
  if (lengthType === PrimitiveType.UInt32) {
    length.maxValue = PrimitiveValue.fromIntegral(1073741824, 4);
  }

  return {
    kind: TypeKind.Composite,
    name,
    description: 'Variable length data',
    members: [
      length,
      {
        kind: TypeKind.Simple,
        name: 'varData',
        primitiveType: PrimitiveType.UInt8,
        length: 0,
        characterEncoding,
      },
    ],
  };
}

export function standardTypes(): CompositeTypeDeclaration[] {
  return [
    messageHeaderType(),
    groupSizeEncodingType(),
    varDataEncodingType('varStringEncoding', PrimitiveType.UInt32, 'UTF-8'),
    varDataEncodingType('varDataEncoding'),
  ];
}
