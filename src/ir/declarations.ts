// Declarations accepted by SchemaBuilder, in document order.
// Literals are already parsed into PrimitiveValues; type references are names.

import type { PrimitiveType } from '../common/primitive-type';
import type { PrimitiveValue } from '../common/primitive-value';
import type { ByteOrder, MemberKind, Presence, TypeKind } from './types';

interface DeclarationBase {
  name: string;
  description?: string;
  semanticType?: string;
  sinceVersion?: number;
  deprecated?: number;
}

export interface SimpleTypeDeclaration extends DeclarationBase {
  kind: TypeKind.Simple;
  primitiveType: PrimitiveType;
  length?: number;
  presence?: Presence;
  characterEncoding?: string;
  nullValue?: PrimitiveValue;
  minValue?: PrimitiveValue;
  maxValue?: PrimitiveValue;
  constValue?: PrimitiveValue;
}

/**
 * Composite member naming another declared type
 */
export interface TypeRefDeclaration extends DeclarationBase {
  kind: 'ref';
  type: string;
}

export type CompositeMemberDeclaration =
  | SimpleTypeDeclaration
  | CompositeTypeDeclaration
  | EnumTypeDeclaration
  | SetTypeDeclaration
  | TypeRefDeclaration;

export interface CompositeTypeDeclaration extends DeclarationBase {
  kind: TypeKind.Composite;
  members: CompositeMemberDeclaration[];
}

export interface EnumValueDeclaration {
  name: string;
  value: PrimitiveValue;
  description?: string;
  sinceVersion?: number;
}

export interface EnumTypeDeclaration extends DeclarationBase {
  kind: TypeKind.Enum;
  encodingType: PrimitiveType;
  presence?: Presence;
  values: EnumValueDeclaration[];
}

export interface SetChoiceDeclaration {
  name: string;
  bitPosition: number;
  description?: string;
  sinceVersion?: number;
}

export interface SetTypeDeclaration extends DeclarationBase {
  kind: TypeKind.Set;
  encodingType: PrimitiveType;
  choices: SetChoiceDeclaration[];
}

export type TypeDeclaration =
  | SimpleTypeDeclaration
  | CompositeTypeDeclaration
  | EnumTypeDeclaration
  | SetTypeDeclaration;

interface MemberDeclarationBase extends DeclarationBase {
  id: number;
}

export interface FieldDeclaration extends MemberDeclarationBase {
  kind: MemberKind.Field;
  type: string;
  presence?: Presence;
  constValue?: PrimitiveValue;
}

export interface GroupDeclaration extends MemberDeclarationBase {
  kind: MemberKind.Group;
  /** Dimension composite; the schema default when omitted */
  dimensionType?: string;
  blockLength?: number;
  members: MemberDeclaration[];
}

export interface DataDeclaration extends MemberDeclarationBase {
  kind: MemberKind.Data;
  type: string;
}

export type MemberDeclaration = FieldDeclaration | GroupDeclaration | DataDeclaration;

export interface MessageDeclaration {
  id: number;
  name: string;
  description?: string;
  semanticType?: string;
  sinceVersion?: number;
  deprecated?: number;
  blockLength?: number;
  members: MemberDeclaration[];
}

export interface SchemaAttributesDeclaration {
  packageName: string;
  id?: number;
  version?: number;
  semanticVersion?: string;
  description?: string;
  byteOrder?: ByteOrder;
  /** Composite prefixing every message; defaults to `messageHeader` */
  headerType?: string;
}
