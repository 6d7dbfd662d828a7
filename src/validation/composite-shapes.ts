import { PrimitiveType, Representation, isUnsignedInteger, primitiveTypeInfo } from '../common/primitive-type';
import { encodedLength } from '../ir/layout';
import { Presence, TypeKind, VarDataRole } from '../ir/types';
import type { CompositeType, GroupDimension, MessageHeader, SimpleType, VarDataEncoding } from '../ir/types';

/**
 * Result of recognising a privileged composite by its member shape
 */
export type ShapeMatch<T> =
  | { matched: true; value: T }
  | { matched: false; problem: string };

function lengthField(composite: CompositeType, name: string): SimpleType | string {
  const member = composite.members.find(m => m.name === name);
  if (!member) {
    return `missing member "${name}"`;
  }
  const type = member.type;
  if (type.kind !== TypeKind.Simple || type.length !== 1 || !isUnsignedInteger(type.primitiveType)) {
    return `member "${name}" must be a single unsigned integer`;
  }
  if (type.presence === Presence.Constant) {
    return `member "${name}" cannot be constant`;
  }
  return type;
}

/**
 * Message header: blockLength, templateId, schemaId and version, padding allowed
 */
export function matchMessageHeader(composite: CompositeType): ShapeMatch<MessageHeader> {
  const fields: SimpleType[] = [];
  for (const name of ['blockLength', 'templateId', 'schemaId', 'version']) {
    const found = lengthField(composite, name);
    if (typeof found === 'string') {
      return { matched: false, problem: `message header "${composite.name}" ${found}` };
    }
    fields.push(found);
  }
  const [blockLength, templateId, schemaId, version] = fields;

  return {
    matched: true,
    value: {
      type: composite,
      blockLengthType: blockLength.primitiveType,
      templateIdType: templateId.primitiveType,
      schemaIdType: schemaId.primitiveType,
      versionType: version.primitiveType,
      encodedLength: encodedLength(composite),
    },
  };
}

/**
 * Group dimension: blockLength and numInGroup
 */
export function matchGroupDimension(composite: CompositeType): ShapeMatch<GroupDimension> {
  const blockLength = lengthField(composite, 'blockLength');
  if (typeof blockLength === 'string') {
    return { matched: false, problem: `group dimension "${composite.name}" ${blockLength}` };
  }
  const numInGroup = lengthField(composite, 'numInGroup');
  if (typeof numInGroup === 'string') {
    return { matched: false, problem: `group dimension "${composite.name}" ${numInGroup}` };
  }

  return {
    matched: true,
    value: {
      type: composite,
      blockLengthType: blockLength.primitiveType,
      numInGroupType: numInGroup.primitiveType,
      encodedLength: encodedLength(composite),
    },
  };
}

/**
 * Variable data: exactly a `length` prefix and a zero-length `varData` payload
 */
export function matchVarDataEncoding(composite: CompositeType): ShapeMatch<VarDataEncoding> {
  const names = composite.members.map(m => m.name);
  if (names.length !== 2 || names[0] !== 'length' || names[1] !== 'varData') {
    return {
      matched: false,
      problem: `var data "${composite.name}" must have exactly members [length, varData], found [${names.join(', ')}]`,
    };
  }

  const length = lengthField(composite, 'length');
  if (typeof length === 'string') {
    return { matched: false, problem: `var data "${composite.name}" ${length}` };
  }

  const payload = composite.members[1].type;
  if (
    payload.kind !== TypeKind.Simple ||
    payload.length !== 0 ||
    (payload.primitiveType !== PrimitiveType.Char && payload.primitiveType !== PrimitiveType.UInt8)
  ) {
    return {
      matched: false,
      problem: `var data "${composite.name}" member "varData" must be char or uint8 with length 0`,
    };
  }

  const isText = payload.primitiveType === PrimitiveType.Char || payload.characterEncoding !== undefined;

  return {
    matched: true,
    value: {
      type: composite,
      length: {
        name: 'length',
        role: VarDataRole.Length,
        primitiveType: length.primitiveType,
        maxLength: maxLengthOf(length),
      },
      payload: {
        name: 'varData',
        role: isText ? VarDataRole.Text : VarDataRole.Bytes,
        primitiveType: payload.primitiveType,
        characterEncoding: payload.characterEncoding,
      },
    },
  };
}

function maxLengthOf(length: SimpleType): bigint {
  if (length.maxValue?.representation === Representation.Integral) {
    return length.maxValue.asIntegral();
  }
  const info = primitiveTypeInfo(length.primitiveType);
  return info.representation === Representation.Integral ? info.maxValue : 0n;
}
