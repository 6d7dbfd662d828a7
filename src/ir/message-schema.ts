import { PrimitiveValue } from '../common/primitive-value';
import { flattenEncodings, resolveEncoding } from './encoding';
import type { LaidOutEncoding, PrimitiveEncoding } from './encoding';
import { MemberKind } from './types';
import type {
  FieldMember,
  Member,
  Message,
  MessageHeader,
  SchemaAttributes,
  SchemaGraph,
  SchemaType,
  Scope,
} from './types';

/**
 * One step of a recursive walk over a message
 */
export interface WalkEntry {
  readonly member: Member;
  /** 0 for direct members of the message */
  readonly depth: number;
  /** Names from the message down to this member, inclusive */
  readonly path: readonly string[];
}

function deepFreeze<T>(value: T): T {
  if (typeof value !== 'object' || value === null || value instanceof PrimitiveValue || Object.isFrozen(value)) {
    return value;
  }
  if (value instanceof Map) {
    for (const entry of value.values()) {
      deepFreeze(entry);
    }
    return value;
  }
  Object.freeze(value);
  for (const entry of Object.values(value)) {
    deepFreeze(entry);
  }
  return value;
}

/**
 * Sealed intermediate representation of a validated schema
 *
 * Read-only once constructed. Members live in a flat arena and messages
 * and groups refer to them by index, so nesting depth is unbounded.
 */
export class MessageSchema {
  readonly attributes: SchemaAttributes;
  readonly header: MessageHeader;
  private readonly typesByName: ReadonlyMap<string, SchemaType>;
  private readonly messageList: readonly Message[];
  private readonly messagesById: ReadonlyMap<number, Message>;
  private readonly arena: readonly Member[];

  constructor(graph: SchemaGraph) {
    this.attributes = deepFreeze(graph.attributes);
    this.header = deepFreeze(graph.header);
    this.typesByName = deepFreeze(new Map(graph.types));
    this.messageList = deepFreeze([...graph.messages]);
    this.arena = deepFreeze([...graph.members]);
    this.messagesById = new Map(this.messageList.map(message => [message.templateId, message]));
    Object.freeze(this);
  }

  get packageName(): string {
    return this.attributes.packageName;
  }

  message(templateId: number): Message | undefined {
    return this.messagesById.get(templateId);
  }

  messageByName(name: string): Message | undefined {
    return this.messageList.find(message => message.name === name);
  }

  messages(): readonly Message[] {
    return this.messageList;
  }

  type(name: string): SchemaType | undefined {
    return this.typesByName.get(name);
  }

  types(): SchemaType[] {
    return Array.from(this.typesByName.values());
  }

  member(index: number): Member {
    const member = this.arena[index];
    if (member === undefined) {
      throw new RangeError(`No member at index ${index}`);
    }
    return member;
  }

  /**
   * Direct members of a message or group in declaration order
   * Each iteration starts again from the first member
   */
  entries(scope: Scope): Iterable<Member> {
    return {
      [Symbol.iterator]: () => this.iterateChildren(scope),
    };
  }

  /**
   * Field, group or data member by its numeric id within a scope
   */
  memberById(scope: Scope, id: number): Member | undefined {
    for (const member of this.entries(scope)) {
      if (member.id === id) {
        return member;
      }
    }
    return undefined;
  }

  memberByName(scope: Scope, name: string): Member | undefined {
    for (const member of this.entries(scope)) {
      if (member.name === name) {
        return member;
      }
    }
    return undefined;
  }

  /**
   * Depth-first walk over every member, descending into groups
   */
  walk(scope: Scope): Iterable<WalkEntry> {
    return {
      [Symbol.iterator]: () => this.iterateWalk(scope, 0, []),
    };
  }

  /**
   * Primitive encoding of a field; undefined for composite fields,
   * whose slots are listed by `fieldSlots`
   */
  encoding(field: FieldMember): PrimitiveEncoding | undefined {
    return resolveEncoding(field.type, this.attributes.byteOrder, field.presence, field.constValue);
  }

  /**
   * Primitive slots of a field with offsets relative to its block
   */
  fieldSlots(field: FieldMember): LaidOutEncoding[] {
    return Array.from(flattenEncodings(field.type, this.attributes.byteOrder, [field.name], field.offset));
  }

  private *iterateChildren(scope: Scope): Generator<Member> {
    for (const index of scope.children) {
      yield this.member(index);
    }
  }

  private *iterateWalk(scope: Scope, depth: number, path: readonly string[]): Generator<WalkEntry> {
    for (const member of this.iterateChildren(scope)) {
      const memberPath = [...path, member.name];
      yield { member, depth, path: memberPath };
      if (member.kind === MemberKind.Group) {
        yield* this.iterateWalk(member, depth + 1, memberPath);
      }
    }
  }
}
