import { DEFAULT_CHARACTER_ENCODING } from '../common/character-encoding';
import { SchemaValidationError, WireSchemaError } from '../common/errors';
import { matchGroupDimension, matchMessageHeader, matchVarDataEncoding } from '../validation/composite-shapes';
import type { ShapeMatch } from '../validation/composite-shapes';
import type { SchemaValidator } from '../validation/schema-validator';
import { computeBlockLength, fieldLength } from './layout';
import { MessageSchema } from './message-schema';
import { TypeResolver } from './type-resolver';
import { ByteOrder, MemberKind, Presence, TypeKind } from './types';
import type {
  CompositeType,
  DataMember,
  FieldMember,
  GroupMember,
  Member,
  Message,
  SchemaAttributes,
  SchemaType,
} from './types';
import type {
  DataDeclaration,
  FieldDeclaration,
  GroupDeclaration,
  MemberDeclaration,
  MessageDeclaration,
  SchemaAttributesDeclaration,
  TypeDeclaration,
} from './declarations';

export interface SchemaBuilderOptions {
  /** Encoding of char types that do not declare one */
  characterEncoding: string;
  /** Byte order when the schema does not declare one */
  byteOrder: ByteOrder;
  /** Message header composite when the schema does not name one */
  headerType: string;
  /** Dimension composite of groups that do not name one */
  groupDimensionType: string;
}

export const DEFAULT_BUILDER_OPTIONS: SchemaBuilderOptions = {
  characterEncoding: DEFAULT_CHARACTER_ENCODING,
  byteOrder: ByteOrder.LittleEndian,
  headerType: 'messageHeader',
  groupDimensionType: 'groupSizeEncoding',
};

/**
 * Collects declarations in document order and seals them into a MessageSchema
 *
 * Nothing is resolved until `seal()`, so types may be added in any order
 * relative to the messages and types that use them.
 */
export class SchemaBuilder {
  private readonly options: SchemaBuilderOptions;
  private readonly typeDeclarations: TypeDeclaration[] = [];
  private readonly messageDeclarations: MessageDeclaration[] = [];
  private sealed = false;

  constructor(
    private readonly attributes: SchemaAttributesDeclaration,
    private readonly validator: SchemaValidator,
    options: Partial<SchemaBuilderOptions> = {},
  ) {
    this.options = { ...DEFAULT_BUILDER_OPTIONS, ...options };
  }

  addType(declaration: TypeDeclaration): this {
    this.assertOpen();
    this.typeDeclarations.push(declaration);
    return this;
  }

  addTypes(declarations: readonly TypeDeclaration[]): this {
    for (const declaration of declarations) {
      this.addType(declaration);
    }
    return this;
  }

  addMessage(declaration: MessageDeclaration): this {
    this.assertOpen();
    this.messageDeclarations.push(declaration);
    return this;
  }

  /**
   * Resolve, validate and freeze; no schema is returned if any check fails
   */
  seal(): MessageSchema {
    this.assertOpen();

    const resolver = new TypeResolver(this.typeDeclarations, {
      characterEncoding: this.options.characterEncoding,
    });
    const attributes: SchemaAttributes = {
      packageName: this.attributes.packageName,
      id: this.attributes.id ?? 0,
      version: this.attributes.version ?? 0,
      semanticVersion: this.attributes.semanticVersion,
      description: this.attributes.description,
      byteOrder: this.attributes.byteOrder ?? this.options.byteOrder,
    };

    const headerName = this.attributes.headerType ?? this.options.headerType;
    const header = shaped(
      matchMessageHeader,
      resolver.resolve(headerName, 'message header'),
      'message header',
    );

    const arena = new MemberArena(resolver, this.options.groupDimensionType);
    const messages: Message[] = this.messageDeclarations.map(declaration => {
      const children = arena.addScope(declaration.members);
      return {
        templateId: declaration.id,
        name: declaration.name,
        description: declaration.description,
        semanticType: declaration.semanticType,
        sinceVersion: declaration.sinceVersion ?? 0,
        deprecated: declaration.deprecated,
        blockLength: declaration.blockLength ?? computeBlockLength(children, arena.members),
        children,
      };
    });

    const graph = {
      attributes,
      header,
      types: resolver.resolveAll(),
      messages,
      members: arena.members,
    };

    this.validator.validate(graph);
    this.sealed = true;
    return new MessageSchema(graph);
  }

  private assertOpen(): void {
    if (this.sealed) {
      throw new WireSchemaError(`Schema "${this.attributes.packageName}" is already sealed`);
    }
  }
}

/**
 * Flat member storage; a group's slot is reserved before its children,
 * so indices follow document order
 */
class MemberArena {
  readonly members: Member[] = [];
  private nextIndex = 0;

  constructor(
    private readonly resolver: TypeResolver,
    private readonly groupDimensionType: string,
  ) {}

  addScope(declarations: readonly MemberDeclaration[]): number[] {
    let offset = 0;
    return declarations.map(declaration => {
      switch (declaration.kind) {
        case MemberKind.Field: {
          const field = this.field(declaration, offset);
          offset += field.encodedLength;
          return field.index;
        }
        case MemberKind.Group:
          return this.group(declaration).index;
        case MemberKind.Data:
          return this.data(declaration).index;
      }
    });
  }

  private field(declaration: FieldDeclaration, offset: number): FieldMember {
    const index = this.nextIndex++;
    const entity = `field "${declaration.name}" (id ${declaration.id})`;
    const type = this.resolver.resolve(declaration.type, entity);
    const presence = declaration.presence ?? presenceOf(type);

    const field: FieldMember = {
      kind: MemberKind.Field,
      index,
      id: declaration.id,
      name: declaration.name,
      description: declaration.description,
      semanticType: declaration.semanticType ?? type.semanticType,
      sinceVersion: declaration.sinceVersion ?? 0,
      deprecated: declaration.deprecated,
      type,
      presence,
      constValue: declaration.constValue,
      offset,
      encodedLength: fieldLength(type, presence),
    };
    this.members[index] = field;
    return field;
  }

  private group(declaration: GroupDeclaration): GroupMember {
    const index = this.nextIndex++;
    const entity = `group "${declaration.name}" (id ${declaration.id})`;
    const dimension = shaped(
      matchGroupDimension,
      this.resolver.resolve(declaration.dimensionType ?? this.groupDimensionType, entity),
      entity,
    );
    const children = this.addScope(declaration.members);

    const group: GroupMember = {
      kind: MemberKind.Group,
      index,
      id: declaration.id,
      name: declaration.name,
      description: declaration.description,
      semanticType: declaration.semanticType,
      sinceVersion: declaration.sinceVersion ?? 0,
      deprecated: declaration.deprecated,
      dimension,
      blockLength: declaration.blockLength ?? computeBlockLength(children, this.members),
      children,
    };
    this.members[index] = group;
    return group;
  }

  private data(declaration: DataDeclaration): DataMember {
    const index = this.nextIndex++;
    const entity = `data "${declaration.name}" (id ${declaration.id})`;
    const encoding = shaped(
      matchVarDataEncoding,
      this.resolver.resolve(declaration.type, entity),
      entity,
    );

    const data: DataMember = {
      kind: MemberKind.Data,
      index,
      id: declaration.id,
      name: declaration.name,
      description: declaration.description,
      semanticType: declaration.semanticType,
      sinceVersion: declaration.sinceVersion ?? 0,
      deprecated: declaration.deprecated,
      encoding,
    };
    this.members[index] = data;
    return data;
  }
}

function presenceOf(type: SchemaType): Presence {
  return type.kind === TypeKind.Simple || type.kind === TypeKind.Enum ? type.presence : Presence.Required;
}

/**
 * Recognise a privileged composite or fail with the shape problem
 */
function shaped<T>(match: (composite: CompositeType) => ShapeMatch<T>, type: SchemaType, entity: string): T {
  if (type.kind !== TypeKind.Composite) {
    throw new SchemaValidationError('invalid composite shape', entity, `type "${type.name}" is a ${type.kind}, not a composite`);
  }
  const result = match(type);
  if (!result.matched) {
    throw new SchemaValidationError('invalid composite shape', entity, result.problem);
  }
  return result.value;
}
