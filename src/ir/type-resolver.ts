import { PrimitiveType, primitiveTypeFromName } from '../common/primitive-type';
import { SchemaValidationError } from '../common/errors';
import { Presence, TypeKind } from './types';
import type { CompositeMember, CompositeType, EnumType, SchemaType, SetType, SimpleType } from './types';
import type {
  CompositeMemberDeclaration,
  CompositeTypeDeclaration,
  EnumTypeDeclaration,
  SetTypeDeclaration,
  SimpleTypeDeclaration,
  TypeDeclaration,
} from './declarations';

export interface TypeResolverOptions {
  /** Applied to char types that do not name their own encoding */
  characterEncoding: string;
}

/**
 * Resolves type declarations into IR types
 *
 * Types may reference any type of the same schema regardless of order.
 * Primitive names resolve to implicit single-value simple types.
 */
export class TypeResolver {
  private readonly declarations = new Map<string, TypeDeclaration>();
  private readonly resolved = new Map<string, SchemaType>();
  private readonly implicit = new Map<string, SimpleType>();
  private readonly resolving: string[] = [];

  constructor(
    declarations: readonly TypeDeclaration[],
    private readonly options: TypeResolverOptions,
  ) {
    for (const declaration of declarations) {
      if (this.declarations.has(declaration.name)) {
        throw new SchemaValidationError(
          'duplicate type name',
          `type "${declaration.name}"`,
          'a type with this name is already declared',
        );
      }
      this.declarations.set(declaration.name, declaration);
    }
  }

  /**
   * Resolve every declared type; declared types come first, in document order
   */
  resolveAll(): Map<string, SchemaType> {
    const types = new Map<string, SchemaType>();
    for (const name of this.declarations.keys()) {
      types.set(name, this.resolve(name, `type "${name}"`));
    }
    for (const [name, type] of this.implicit) {
      types.set(name, type);
    }
    return types;
  }

  /**
   * @param referrer describes who holds the reference, for error messages
   */
  resolve(name: string, referrer: string): SchemaType {
    const cached = this.resolved.get(name) ?? this.implicit.get(name);
    if (cached) {
      return cached;
    }

    const declaration = this.declarations.get(name);
    if (!declaration) {
      return this.resolveImplicit(name, referrer);
    }

    if (this.resolving.includes(name)) {
      const cycle = [...this.resolving.slice(this.resolving.indexOf(name)), name].join(' -> ');
      throw new SchemaValidationError('cyclic type reference', `type "${name}"`, `references itself: ${cycle}`);
    }

    this.resolving.push(name);
    try {
      const type = this.build(declaration);
      this.resolved.set(name, type);
      return type;
    } finally {
      this.resolving.pop();
    }
  }

  private resolveImplicit(name: string, referrer: string): SimpleType {
    if (!Object.values<string>(PrimitiveType).includes(name)) {
      throw new SchemaValidationError('unresolved type', referrer, `type "${name}" is not declared`);
    }
    const type = this.simple({ kind: TypeKind.Simple, name, primitiveType: primitiveTypeFromName(name) });
    this.implicit.set(name, type);
    return type;
  }

  private build(declaration: CompositeMemberDeclaration): SchemaType {
    switch (declaration.kind) {
      case TypeKind.Simple:
        return this.simple(declaration);
      case TypeKind.Composite:
        return this.composite(declaration);
      case TypeKind.Enum:
        return this.enumeration(declaration);
      case TypeKind.Set:
        return this.set(declaration);
      case 'ref':
        return this.resolve(declaration.type, `composite member "${declaration.name}"`);
    }
  }

  private simple(declaration: SimpleTypeDeclaration): SimpleType {
    const characterEncoding = declaration.characterEncoding
      ?? (declaration.primitiveType === PrimitiveType.Char ? this.options.characterEncoding : undefined);

    return {
      kind: TypeKind.Simple,
      name: declaration.name,
      description: declaration.description,
      semanticType: declaration.semanticType,
      sinceVersion: declaration.sinceVersion ?? 0,
      deprecated: declaration.deprecated,
      primitiveType: declaration.primitiveType,
      length: declaration.length ?? 1,
      presence: declaration.presence ?? Presence.Required,
      characterEncoding,
      nullValue: declaration.nullValue,
      minValue: declaration.minValue,
      maxValue: declaration.maxValue,
      constValue: declaration.constValue,
    };
  }

  private composite(declaration: CompositeTypeDeclaration): CompositeType {
    const members: CompositeMember[] = declaration.members.map(member => ({
      name: member.name,
      type: this.build(member),
    }));

    return {
      kind: TypeKind.Composite,
      name: declaration.name,
      description: declaration.description,
      semanticType: declaration.semanticType,
      sinceVersion: declaration.sinceVersion ?? 0,
      deprecated: declaration.deprecated,
      members,
    };
  }

  private enumeration(declaration: EnumTypeDeclaration): EnumType {
    return {
      kind: TypeKind.Enum,
      name: declaration.name,
      description: declaration.description,
      semanticType: declaration.semanticType,
      sinceVersion: declaration.sinceVersion ?? 0,
      deprecated: declaration.deprecated,
      encodingType: declaration.encodingType,
      presence: declaration.presence ?? Presence.Required,
      values: declaration.values.map(value => ({
        name: value.name,
        value: value.value,
        description: value.description,
        sinceVersion: value.sinceVersion ?? 0,
      })),
    };
  }

  private set(declaration: SetTypeDeclaration): SetType {
    return {
      kind: TypeKind.Set,
      name: declaration.name,
      description: declaration.description,
      semanticType: declaration.semanticType,
      sinceVersion: declaration.sinceVersion ?? 0,
      deprecated: declaration.deprecated,
      encodingType: declaration.encodingType,
      choices: declaration.choices.map(choice => ({
        name: choice.name,
        bitPosition: choice.bitPosition,
        description: choice.description,
        sinceVersion: choice.sinceVersion ?? 0,
      })),
    };
  }
}
