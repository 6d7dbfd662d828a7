/**
 * Intermediate representation of a message schema
 * These are the sealed, read-only shapes handed to generators and decoders
 */
import type { PrimitiveType } from '../common/primitive-type';
import type { PrimitiveValue } from '../common/primitive-value';

export enum ByteOrder {
  LittleEndian = 'littleEndian',
  BigEndian = 'bigEndian',
}

/**
 * How a value is carried on the wire
 * Optional values use the type's null sentinel for absence; constants take no space
 */
export enum Presence {
  Required = 'required',
  Optional = 'optional',
  Constant = 'constant',
}

export enum TypeKind {
  Simple = 'simple',
  Composite = 'composite',
  Enum = 'enum',
  Set = 'set',
}

export enum MemberKind {
  Field = 'field',
  Group = 'group',
  Data = 'data',
}

/**
 * Roles of the two members of a variable-data composite
 */
export enum VarDataRole {
  Length = 'length',
  Text = 'text',
  Bytes = 'bytes',
}

interface TypeBase {
  readonly name: string;
  readonly description?: string;
  readonly semanticType?: string;
  readonly sinceVersion: number;
  readonly deprecated?: number;
}

/**
 * Alias for a primitive, optionally a fixed-length array
 * A length of 0 marks the variable-length payload of a var-data composite
 */
export interface SimpleType extends TypeBase {
  readonly kind: TypeKind.Simple;
  readonly primitiveType: PrimitiveType;
  readonly length: number;
  readonly presence: Presence;
  readonly characterEncoding?: string;
  readonly nullValue?: PrimitiveValue;
  readonly minValue?: PrimitiveValue;
  readonly maxValue?: PrimitiveValue;
  readonly constValue?: PrimitiveValue;
}

export interface CompositeMember {
  readonly name: string;
  readonly type: SchemaType;
}

export interface CompositeType extends TypeBase {
  readonly kind: TypeKind.Composite;
  readonly members: readonly CompositeMember[];
}

export interface EnumValue {
  readonly name: string;
  readonly value: PrimitiveValue;
  readonly description?: string;
  readonly sinceVersion: number;
}

export interface EnumType extends TypeBase {
  readonly kind: TypeKind.Enum;
  readonly encodingType: PrimitiveType;
  readonly presence: Presence;
  readonly values: readonly EnumValue[];
}

export interface SetChoice {
  readonly name: string;
  readonly bitPosition: number;
  readonly description?: string;
  readonly sinceVersion: number;
}

export interface SetType extends TypeBase {
  readonly kind: TypeKind.Set;
  readonly encodingType: PrimitiveType;
  readonly choices: readonly SetChoice[];
}

export type SchemaType = SimpleType | CompositeType | EnumType | SetType;

/**
 * Fixed block prefixing every message
 */
export interface MessageHeader {
  readonly type: CompositeType;
  readonly blockLengthType: PrimitiveType;
  readonly templateIdType: PrimitiveType;
  readonly schemaIdType: PrimitiveType;
  readonly versionType: PrimitiveType;
  readonly encodedLength: number;
}

/**
 * Block length and repeat count prefixing a repeating group
 */
export interface GroupDimension {
  readonly type: CompositeType;
  readonly blockLengthType: PrimitiveType;
  readonly numInGroupType: PrimitiveType;
  readonly encodedLength: number;
}

export interface VarDataLength {
  readonly name: string;
  readonly role: VarDataRole.Length;
  readonly primitiveType: PrimitiveType;
  /** Largest payload the length field can describe */
  readonly maxLength: bigint;
}

export interface VarDataPayload {
  readonly name: string;
  readonly role: VarDataRole.Text | VarDataRole.Bytes;
  readonly primitiveType: PrimitiveType;
  readonly characterEncoding?: string;
}

export interface VarDataEncoding {
  readonly type: CompositeType;
  readonly length: VarDataLength;
  readonly payload: VarDataPayload;
}

interface MemberBase {
  /** Position in the schema's member arena */
  readonly index: number;
  readonly id: number;
  readonly name: string;
  readonly description?: string;
  readonly semanticType?: string;
  readonly sinceVersion: number;
  readonly deprecated?: number;
}

export interface FieldMember extends MemberBase {
  readonly kind: MemberKind.Field;
  readonly type: SchemaType;
  readonly presence: Presence;
  readonly constValue?: PrimitiveValue;
  /** Byte offset within the enclosing message or group block */
  readonly offset: number;
  readonly encodedLength: number;
}

/**
 * Repeating group; its id and its dimension belong to this single entity
 */
export interface GroupMember extends MemberBase {
  readonly kind: MemberKind.Group;
  readonly dimension: GroupDimension;
  readonly blockLength: number;
  readonly children: readonly number[];
}

export interface DataMember extends MemberBase {
  readonly kind: MemberKind.Data;
  readonly encoding: VarDataEncoding;
}

export type Member = FieldMember | GroupMember | DataMember;

export interface Message {
  readonly templateId: number;
  readonly name: string;
  readonly description?: string;
  readonly semanticType?: string;
  readonly sinceVersion: number;
  readonly deprecated?: number;
  readonly blockLength: number;
  readonly children: readonly number[];
}

/**
 * A message or group: anything that owns an ordered member list
 */
export type Scope = Message | GroupMember;

export interface SchemaAttributes {
  readonly packageName: string;
  readonly id: number;
  readonly version: number;
  readonly semanticVersion?: string;
  readonly description?: string;
  readonly byteOrder: ByteOrder;
}

/**
 * Resolved but not yet sealed schema, as checked by the validator
 */
export interface SchemaGraph {
  readonly attributes: SchemaAttributes;
  readonly header: MessageHeader;
  readonly types: ReadonlyMap<string, SchemaType>;
  readonly messages: readonly Message[];
  readonly members: readonly Member[];
}

export function isGroup(member: Member): member is GroupMember {
  return member.kind === MemberKind.Group;
}

export function isMessage(scope: Scope): scope is Message {
  return !('kind' in scope);
}
