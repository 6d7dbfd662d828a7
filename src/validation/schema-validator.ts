import { Injectable, Logger } from '@nestjs/common';
import { SchemaValidationError } from '../common/errors';
import { PrimitiveType, Representation, isFloating, isIntegral, isUnsignedInteger, primitiveSize } from '../common/primitive-type';
import type { PrimitiveValue } from '../common/primitive-value';
import { computeBlockLength } from '../ir/layout';
import { MemberKind, Presence, TypeKind, isMessage } from '../ir/types';
import type { FieldMember, Member, Message, SchemaGraph, SchemaType, Scope } from '../ir/types';

/**
 * Whether a constant's representation can be carried by a primitive of the given array length
 */
export function isRepresentationCompatible(value: PrimitiveValue, primitiveType: PrimitiveType, length: number = 1): boolean {
  switch (value.representation) {
    case Representation.Integral:
      return isIntegral(primitiveType) && length <= 1;
    case Representation.Floating:
      return isFloating(primitiveType) && length <= 1;
    case Representation.RawBytes:
      return primitiveType === PrimitiveType.Char || primitiveType === PrimitiveType.UInt8;
  }
}

function describeScope(scope: Scope): string {
  return isMessage(scope)
    ? `message "${scope.name}" (id ${scope.templateId})`
    : `group "${scope.name}" (id ${scope.id})`;
}

function describeMember(member: Member): string {
  return `${member.kind} "${member.name}" (id ${member.id})`;
}

const MEMBER_ORDER: Record<MemberKind, number> = {
  [MemberKind.Field]: 0,
  [MemberKind.Group]: 1,
  [MemberKind.Data]: 2,
};

/**
 * Cross-checks a resolved schema graph before it is sealed
 * The first violation aborts with a SchemaValidationError
 */
@Injectable()
export class SchemaValidator {
  private readonly logger = new Logger(SchemaValidator.name);

  validate(graph: SchemaGraph): void {
    this.checkReferences(graph);
    this.checkTemplateIds(graph.messages);

    for (const type of graph.types.values()) {
      this.checkType(type, graph.attributes.version);
    }

    for (const message of graph.messages) {
      this.checkVersion(message.sinceVersion, describeScope(message), graph.attributes.version);
      this.checkScope(message, graph);
    }

    this.logger.debug(
      `Schema "${graph.attributes.packageName}" passed validation: ${graph.messages.length} messages, ${graph.types.size} types`,
    );
  }

  /**
   * Every type a member, header or dimension points at must be the schema's registered type
   */
  private checkReferences(graph: SchemaGraph): void {
    const registered = (type: SchemaType): boolean => graph.types.get(type.name) === type;

    if (!registered(graph.header.type)) {
      throw new SchemaValidationError('unresolved type', 'message header', `type "${graph.header.type.name}" is not declared`);
    }

    for (const member of graph.members) {
      const type = member.kind === MemberKind.Field
        ? member.type
        : member.kind === MemberKind.Group
          ? member.dimension.type
          : member.encoding.type;
      if (!registered(type)) {
        throw new SchemaValidationError('unresolved type', describeMember(member), `type "${type.name}" is not declared`);
      }
    }
  }

  private checkTemplateIds(messages: readonly Message[]): void {
    const seen = new Map<number, Message>();
    for (const message of messages) {
      const existing = seen.get(message.templateId);
      if (existing) {
        throw new SchemaValidationError(
          'duplicate template id',
          describeScope(message),
          `template id ${message.templateId} is already used by message "${existing.name}"`,
        );
      }
      seen.set(message.templateId, message);
    }
  }

  private checkScope(scope: Scope, graph: SchemaGraph): void {
    const ids = new Map<number, Member>();
    let lastOrder = MEMBER_ORDER[MemberKind.Field];

    for (const index of scope.children) {
      const member = graph.members[index];

      const existing = ids.get(member.id);
      if (existing) {
        throw new SchemaValidationError(
          'duplicate member id',
          `${describeMember(member)} in ${describeScope(scope)}`,
          `id ${member.id} is already used by ${existing.kind} "${existing.name}"`,
        );
      }
      ids.set(member.id, member);

      const order = MEMBER_ORDER[member.kind];
      if (order < lastOrder) {
        throw new SchemaValidationError(
          'invalid member order',
          `${describeMember(member)} in ${describeScope(scope)}`,
          'fields must precede groups, and groups must precede data',
        );
      }
      lastOrder = order;

      this.checkVersion(member.sinceVersion, describeMember(member), graph.attributes.version);

      if (member.kind === MemberKind.Field) {
        this.checkFieldConstant(member);
      } else if (member.kind === MemberKind.Group) {
        this.checkScope(member, graph);
      }
    }

    const computed = computeBlockLength(scope.children, graph.members);
    if (scope.blockLength < computed) {
      throw new SchemaValidationError(
        'invalid block length',
        describeScope(scope),
        `declared block length ${scope.blockLength} is smaller than the fields it holds (${computed})`,
      );
    }
  }

  private checkFieldConstant(field: FieldMember): void {
    const entity = describeMember(field);
    const type = field.type;

    if (field.presence === Presence.Constant && field.constValue === undefined && !hasConstant(type)) {
      throw new SchemaValidationError('constant/type mismatch', entity, 'constant presence requires a constant value');
    }
    const constValue = field.constValue;
    if (constValue === undefined) {
      return;
    }

    switch (type.kind) {
      case TypeKind.Simple:
        this.checkConstant(constValue, type.primitiveType, type.length, entity);
        return;
      case TypeKind.Enum:
        this.checkConstant(constValue, type.encodingType, 1, entity);
        if (!type.values.some(v => v.value.equals(constValue))) {
          throw new SchemaValidationError(
            'constant/type mismatch',
            entity,
            `constant ${constValue.toString()} is not a value of enum "${type.name}"`,
          );
        }
        return;
      default:
        throw new SchemaValidationError(
          'constant/type mismatch',
          entity,
          `constants require a simple or enum type, "${type.name}" is a ${type.kind}`,
        );
    }
  }

  private checkConstant(value: PrimitiveValue, primitiveType: PrimitiveType, length: number, entity: string): void {
    if (!isRepresentationCompatible(value, primitiveType, length)) {
      const shape = length > 1 ? `${primitiveType}[${length}]` : primitiveType;
      throw new SchemaValidationError(
        'constant/type mismatch',
        entity,
        `expected a value compatible with ${shape}, got ${value.representation} ${value.toString()}`,
      );
    }
  }

  private checkType(type: SchemaType, schemaVersion: number): void {
    const entity = `${type.kind} type "${type.name}"`;
    this.checkVersion(type.sinceVersion, entity, schemaVersion);

    switch (type.kind) {
      case TypeKind.Simple:
        for (const value of [type.nullValue, type.minValue, type.maxValue]) {
          if (value !== undefined) {
            this.checkConstant(value, type.primitiveType, 1, entity);
          }
        }
        if (type.presence === Presence.Constant && type.constValue === undefined) {
          throw new SchemaValidationError('constant/type mismatch', entity, 'constant presence requires a constant value');
        }
        if (type.constValue !== undefined) {
          this.checkConstant(type.constValue, type.primitiveType, type.length, entity);
        }
        return;
      case TypeKind.Composite:
        for (const member of type.members) {
          this.checkType(member.type, schemaVersion);
        }
        return;
      case TypeKind.Enum:
        if (type.encodingType !== PrimitiveType.Char && !isUnsignedInteger(type.encodingType)) {
          throw new SchemaValidationError(
            'invalid encoding type',
            entity,
            `encoding ${type.encodingType} is neither char nor an unsigned integer`,
          );
        }
        for (const value of type.values) {
          this.checkConstant(value.value, type.encodingType, 1, `${entity} value "${value.name}"`);
          this.checkVersion(value.sinceVersion, `${entity} value "${value.name}"`, schemaVersion);
        }
        return;
      case TypeKind.Set: {
        if (!isUnsignedInteger(type.encodingType)) {
          throw new SchemaValidationError('invalid encoding type', entity, `encoding ${type.encodingType} is not an unsigned integer`);
        }
        const bits = primitiveSize(type.encodingType) * 8;
        for (const choice of type.choices) {
          if (!Number.isInteger(choice.bitPosition) || choice.bitPosition < 0 || choice.bitPosition >= bits) {
            throw new SchemaValidationError(
              'invalid set choice',
              `${entity} choice "${choice.name}"`,
              `bit position ${choice.bitPosition} is outside [0, ${bits - 1}] of ${type.encodingType}`,
            );
          }
          this.checkVersion(choice.sinceVersion, `${entity} choice "${choice.name}"`, schemaVersion);
        }
        return;
      }
    }
  }

  private checkVersion(sinceVersion: number, entity: string, schemaVersion: number): void {
    if (sinceVersion > schemaVersion) {
      throw new SchemaValidationError(
        'invalid version',
        entity,
        `sinceVersion ${sinceVersion} exceeds schema version ${schemaVersion}`,
      );
    }
  }
}

function hasConstant(type: SchemaType): boolean {
  return type.kind === TypeKind.Simple && type.constValue !== undefined;
}
