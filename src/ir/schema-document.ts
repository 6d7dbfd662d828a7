// Output contract of the schema document front end.
// Attribute values arrive exactly as authored, as text; loadSchemaDocument
// parses every literal into a PrimitiveValue and feeds a SchemaBuilder.

import { FormatError, SchemaValidationError } from '../common/errors';
import { PrimitiveType, isPrimitiveTypeName, primitiveTypeFromName } from '../common/primitive-type';
import { PrimitiveValue } from '../common/primitive-value';
import type { SchemaValidator } from '../validation/schema-validator';
import { DEFAULT_BUILDER_OPTIONS, SchemaBuilder } from './schema-builder';
import type { SchemaBuilderOptions } from './schema-builder';
import type { MessageSchema } from './message-schema';
import { ByteOrder, MemberKind, Presence, TypeKind } from './types';
import type {
  CompositeMemberDeclaration,
  EnumTypeDeclaration,
  MemberDeclaration,
  SetTypeDeclaration,
  SimpleTypeDeclaration,
  TypeDeclaration,
} from './declarations';

interface ElementBase {
  name: string;
  description?: string;
  semanticType?: string;
  sinceVersion?: string;
  deprecated?: string;
}

export interface TypeElement extends ElementBase {
  element: 'type';
  primitiveType: string;
  length?: string;
  presence?: string;
  characterEncoding?: string;
  nullValue?: string;
  minValue?: string;
  maxValue?: string;
  /** Element text, the value of a constant type */
  constValue?: string;
}

export interface RefElement extends ElementBase {
  element: 'ref';
  type: string;
}

export interface CompositeElement extends ElementBase {
  element: 'composite';
  members: Array<TypeElement | CompositeElement | EnumElement | SetElement | RefElement>;
}

export interface ValidValueElement {
  name: string;
  /** Element text */
  value: string;
  description?: string;
  sinceVersion?: string;
}

export interface EnumElement extends ElementBase {
  element: 'enum';
  encodingType: string;
  presence?: string;
  validValues: ValidValueElement[];
}

export interface ChoiceElement {
  name: string;
  /** Element text: the bit position */
  value: string;
  description?: string;
  sinceVersion?: string;
}

export interface SetElement extends ElementBase {
  element: 'set';
  encodingType: string;
  choices: ChoiceElement[];
}

export type TypesElement = TypeElement | CompositeElement | EnumElement | SetElement;

interface MemberElementBase extends ElementBase {
  id: string;
}

export interface FieldElement extends MemberElementBase {
  element: 'field';
  type: string;
  presence?: string;
  /** Constant taken from an enum value, as `EnumName.ValueName` */
  valueRef?: string;
  /** Element text of a constant field */
  constValue?: string;
}

export interface GroupElement extends MemberElementBase {
  element: 'group';
  dimensionType?: string;
  blockLength?: string;
  members: MemberElement[];
}

export interface DataElement extends MemberElementBase {
  element: 'data';
  type: string;
}

export type MemberElement = FieldElement | GroupElement | DataElement;

export interface MessageElement extends ElementBase {
  id: string;
  blockLength?: string;
  members: MemberElement[];
}

export interface SchemaDocument {
  package: string;
  id?: string;
  version?: string;
  semanticVersion?: string;
  description?: string;
  byteOrder?: string;
  headerType?: string;
  types: TypesElement[];
  messages: MessageElement[];
}

const UNSIGNED = /^\d+$/;

function parseCount(text: string | undefined, attribute: string, entity: string): number | undefined {
  if (text === undefined) {
    return undefined;
  }
  if (!UNSIGNED.test(text)) {
    throw new FormatError(`Invalid ${attribute} "${text}" on ${entity}: expected a non-negative integer`);
  }
  return Number(text);
}

function requireCount(text: string, attribute: string, entity: string): number {
  const value = parseCount(text, attribute, entity);
  if (value === undefined) {
    throw new FormatError(`Missing ${attribute} on ${entity}`);
  }
  return value;
}

function parsePresence(text: string | undefined, entity: string): Presence | undefined {
  if (text === undefined) {
    return undefined;
  }
  const presence = Object.values(Presence).find(p => p === text);
  if (presence === undefined) {
    throw new FormatError(`Invalid presence "${text}" on ${entity}: expected required, optional or constant`);
  }
  return presence;
}

function parseByteOrder(text: string | undefined): ByteOrder | undefined {
  if (text === undefined) {
    return undefined;
  }
  const byteOrder = Object.values(ByteOrder).find(b => b === text);
  if (byteOrder === undefined) {
    throw new FormatError(`Invalid byteOrder "${text}": expected littleEndian or bigEndian`);
  }
  return byteOrder;
}

/**
 * Converts document elements into builder declarations
 */
class DocumentReader {
  private readonly typeElements = new Map<string, TypesElement>();

  constructor(
    document: SchemaDocument,
    private readonly options: SchemaBuilderOptions,
  ) {
    for (const element of document.types) {
      this.typeElements.set(element.name, element);
    }
  }

  type(element: TypesElement): TypeDeclaration {
    switch (element.element) {
      case 'type':
        return this.simple(element);
      case 'composite':
        return {
          kind: TypeKind.Composite,
          ...this.common(element, `composite "${element.name}"`),
          members: element.members.map(member => this.compositeMember(member)),
        };
      case 'enum':
        return this.enumeration(element);
      case 'set':
        return this.set(element);
    }
  }

  members(elements: readonly MemberElement[]): MemberDeclaration[] {
    return elements.map((element): MemberDeclaration => {
      const entity = `${element.element} "${element.name}"`;
      const base = {
        ...this.common(element, entity),
        id: requireCount(element.id, 'id', entity),
      };
      switch (element.element) {
        case 'field':
          return {
            kind: MemberKind.Field,
            ...base,
            type: element.type,
            presence: parsePresence(element.presence, entity),
            constValue: this.fieldConstant(element, entity),
          };
        case 'group':
          return {
            kind: MemberKind.Group,
            ...base,
            dimensionType: element.dimensionType,
            blockLength: parseCount(element.blockLength, 'blockLength', entity),
            members: this.members(element.members),
          };
        case 'data':
          return { kind: MemberKind.Data, ...base, type: element.type };
      }
    });
  }

  common(element: ElementBase, entity: string) {
    return {
      name: element.name,
      description: element.description,
      semanticType: element.semanticType,
      sinceVersion: parseCount(element.sinceVersion, 'sinceVersion', entity),
      deprecated: parseCount(element.deprecated, 'deprecated', entity),
    };
  }

  private compositeMember(member: TypesElement | RefElement): CompositeMemberDeclaration {
    if (member.element === 'ref') {
      return { kind: 'ref', ...this.common(member, `ref "${member.name}"`), type: member.type };
    }
    return this.type(member);
  }

  private simple(element: TypeElement): SimpleTypeDeclaration {
    const entity = `type "${element.name}"`;
    const primitiveType = primitiveTypeFromName(element.primitiveType);
    const length = parseCount(element.length, 'length', entity);
    const characterEncoding = element.characterEncoding;
    const parse = (text: string | undefined) =>
      text === undefined ? undefined : PrimitiveValue.parse(text, primitiveType);

    return {
      kind: TypeKind.Simple,
      ...this.common(element, entity),
      primitiveType,
      length,
      presence: parsePresence(element.presence, entity),
      characterEncoding,
      nullValue: parse(element.nullValue),
      minValue: parse(element.minValue),
      maxValue: parse(element.maxValue),
      constValue: element.constValue === undefined
        ? undefined
        : this.literal(element.constValue, primitiveType, length ?? 1, characterEncoding),
    };
  }

  private enumeration(element: EnumElement): EnumTypeDeclaration {
    const entity = `enum "${element.name}"`;
    const encodingType = this.encodingType(element.encodingType, entity);
    return {
      kind: TypeKind.Enum,
      ...this.common(element, entity),
      encodingType,
      presence: parsePresence(element.presence, entity),
      values: element.validValues.map(value => ({
        name: value.name,
        value: PrimitiveValue.parse(value.value, encodingType),
        description: value.description,
        sinceVersion: parseCount(value.sinceVersion, 'sinceVersion', `${entity} value "${value.name}"`),
      })),
    };
  }

  private set(element: SetElement): SetTypeDeclaration {
    const entity = `set "${element.name}"`;
    return {
      kind: TypeKind.Set,
      ...this.common(element, entity),
      encodingType: this.encodingType(element.encodingType, entity),
      choices: element.choices.map(choice => ({
        name: choice.name,
        bitPosition: requireCount(choice.value, 'bit position', `${entity} choice "${choice.name}"`),
        description: choice.description,
        sinceVersion: parseCount(choice.sinceVersion, 'sinceVersion', `${entity} choice "${choice.name}"`),
      })),
    };
  }

  /**
   * Enum and set encodings name a primitive or a simple type declared in the document
   */
  private encodingType(name: string, entity: string): PrimitiveType {
    const element = this.typeElements.get(name);
    if (element === undefined) {
      this.requireDeclared(name, entity);
      return primitiveTypeFromName(name);
    }
    if (element.element !== 'type') {
      throw new SchemaValidationError('invalid encoding type', entity, `"${name}" is a ${element.element}, not a simple type`);
    }
    return primitiveTypeFromName(element.primitiveType);
  }

  private requireDeclared(name: string, entity: string): void {
    if (!isPrimitiveTypeName(name)) {
      throw new SchemaValidationError('unresolved type', entity, `type "${name}" is not declared`);
    }
  }

  private fieldConstant(element: FieldElement, entity: string): PrimitiveValue | undefined {
    if (element.valueRef !== undefined) {
      return this.enumValue(element.valueRef, entity);
    }
    if (element.constValue === undefined) {
      return undefined;
    }

    const typeElement = this.typeElements.get(element.type);
    if (typeElement === undefined) {
      this.requireDeclared(element.type, entity);
      return PrimitiveValue.parse(element.constValue, primitiveTypeFromName(element.type));
    }
    switch (typeElement.element) {
      case 'type':
        return this.literal(
          element.constValue,
          primitiveTypeFromName(typeElement.primitiveType),
          parseCount(typeElement.length, 'length', entity) ?? 1,
          typeElement.characterEncoding,
        );
      case 'enum':
        return this.enumValue(`${typeElement.name}.${element.constValue}`, entity);
      default:
        throw new FormatError(`Constant on ${entity} requires a simple or enum type, "${element.type}" is a ${typeElement.element}`);
    }
  }

  private enumValue(valueRef: string, entity: string): PrimitiveValue {
    const dot = valueRef.indexOf('.');
    const enumName = valueRef.slice(0, dot);
    const valueName = valueRef.slice(dot + 1);
    const enumElement = this.typeElements.get(enumName);
    if (dot <= 0 || enumElement?.element !== 'enum') {
      throw new FormatError(`Invalid valueRef "${valueRef}" on ${entity}: expected EnumName.ValueName`);
    }
    const value = enumElement.validValues.find(v => v.name === valueName);
    if (value === undefined) {
      throw new FormatError(`Invalid valueRef "${valueRef}" on ${entity}: enum "${enumName}" has no value "${valueName}"`);
    }
    return PrimitiveValue.parse(value.value, this.encodingType(enumElement.encodingType, `enum "${enumName}"`));
  }

  /**
   * Character arrays longer than one hold their constant as encoded text
   */
  private literal(text: string, primitiveType: PrimitiveType, length: number, characterEncoding: string | undefined): PrimitiveValue {
    if (primitiveType === PrimitiveType.Char && length > 1) {
      return PrimitiveValue.parse(text, primitiveType, length, characterEncoding ?? this.options.characterEncoding);
    }
    return PrimitiveValue.parse(text, primitiveType);
  }
}

/**
 * Feed a parsed schema document into a new builder, in document order
 */
export function loadSchemaDocument(
  document: SchemaDocument,
  validator: SchemaValidator,
  options: Partial<SchemaBuilderOptions> = {},
): SchemaBuilder {
  const resolvedOptions = { ...DEFAULT_BUILDER_OPTIONS, ...options };
  const reader = new DocumentReader(document, resolvedOptions);
  const builder = new SchemaBuilder(
    {
      packageName: document.package,
      id: parseCount(document.id, 'id', 'schema'),
      version: parseCount(document.version, 'version', 'schema'),
      semanticVersion: document.semanticVersion,
      description: document.description,
      byteOrder: parseByteOrder(document.byteOrder),
      headerType: document.headerType,
    },
    validator,
    resolvedOptions,
  );

  for (const element of document.types) {
    builder.addType(reader.type(element));
  }
  for (const message of document.messages) {
    const entity = `message "${message.name}"`;
    builder.addMessage({
      ...reader.common(message, entity),
      id: requireCount(message.id, 'id', entity),
      blockLength: parseCount(message.blockLength, 'blockLength', entity),
      members: reader.members(message.members),
    });
  }
  return builder;
}

export function buildSchemaFromDocument(
  document: SchemaDocument,
  validator: SchemaValidator,
  options: Partial<SchemaBuilderOptions> = {},
): MessageSchema {
  return loadSchemaDocument(document, validator, options).seal();
}
