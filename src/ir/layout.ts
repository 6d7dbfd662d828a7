import { primitiveSize } from '../common/primitive-type';
import { MemberKind, Presence, TypeKind } from './types';
import type { Member, SchemaType } from './types';

/**
 * Bytes a type occupies in a fixed block; constants occupy none
 */
export function encodedLength(type: SchemaType): number {
  switch (type.kind) {
    case TypeKind.Simple:
      return type.presence === Presence.Constant ? 0 : primitiveSize(type.primitiveType) * type.length;
    case TypeKind.Composite:
      return type.members.reduce((total, member) => total + encodedLength(member.type), 0);
    case TypeKind.Enum:
      return type.presence === Presence.Constant ? 0 : primitiveSize(type.encodingType);
    case TypeKind.Set:
      return primitiveSize(type.encodingType);
  }
}

/**
 * Length of a field in its block, honouring a field-level constant presence
 */
export function fieldLength(type: SchemaType, presence: Presence): number {
  return presence === Presence.Constant ? 0 : encodedLength(type);
}

/**
 * Sum of the fixed fields of a scope, walked in declaration order
 * Groups and data follow the block and never count towards it
 */
export function computeBlockLength(children: readonly number[], members: readonly Member[]): number {
  let length = 0;
  for (const index of children) {
    const member = members[index];
    if (member?.kind === MemberKind.Field) {
      length += member.encodedLength;
    }
  }
  return length;
}
