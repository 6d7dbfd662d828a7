import { buildSchemaFromDocument, loadSchemaDocument } from './schema-document';
import type { CompositeElement, FieldElement, SchemaDocument } from './schema-document';
import { ByteOrder, MemberKind, TypeKind, VarDataRole } from './types';
import type { FieldMember } from './types';
import type { MessageSchema } from './message-schema';
import { SchemaValidator } from '../validation/schema-validator';
import { PrimitiveType, Representation } from '../common/primitive-type';
import { FormatError, SchemaValidationError } from '../common/errors';

function uint16(name: string) {
  return { element: 'type' as const, name, primitiveType: 'uint16' };
}

const HEADER: CompositeElement = {
  element: 'composite',
  name: 'messageHeader',
  members: [uint16('blockLength'), uint16('templateId'), uint16('schemaId'), uint16('version')],
};

const DIMENSION: CompositeElement = {
  element: 'composite',
  name: 'groupSizeEncoding',
  members: [uint16('blockLength'), uint16('numInGroup')],
};

function document(fields: FieldElement[] = []): SchemaDocument {
  return {
    package: 'exchange',
    id: '7',
    version: '1',
    semanticVersion: '5.2',
    byteOrder: 'littleEndian',
    types: [
      HEADER,
      DIMENSION,
      {
        element: 'composite',
        name: 'varAsciiEncoding',
        members: [
          { element: 'type', name: 'length', primitiveType: 'uint8' },
          { element: 'type', name: 'varData', primitiveType: 'char', length: '0' },
        ],
      },
      { element: 'type', name: 'Symbol', primitiveType: 'char', length: '6' },
      { element: 'type', name: 'Venue', primitiveType: 'char', length: '4', presence: 'constant', constValue: 'XNAS' },
      { element: 'type', name: 'Qty', primitiveType: 'uint32', presence: 'optional', nullValue: '0', maxValue: '1000000' },
      { element: 'type', name: 'Price', primitiveType: 'double' },
      {
        element: 'enum',
        name: 'Side',
        encodingType: 'char',
        validValues: [
          { name: 'Buy', value: 'B' },
          { name: 'Sell', value: 'S' },
        ],
      },
      {
        element: 'set',
        name: 'Flags',
        encodingType: 'uint8',
        choices: [
          { name: 'Hidden', value: '0' },
          { name: 'PostOnly', value: '3', sinceVersion: '1' },
        ],
      },
    ],
    messages: [
      {
        name: 'NewOrder',
        id: '1',
        members: [
          { element: 'field', name: 'orderId', id: '1', type: 'uint64' },
          { element: 'field', name: 'symbol', id: '2', type: 'Symbol' },
          { element: 'field', name: 'side', id: '3', type: 'Side' },
          { element: 'field', name: 'venue', id: '4', type: 'Venue' },
          { element: 'field', name: 'flags', id: '5', type: 'Flags' },
          { element: 'field', name: 'kind', id: '6', type: 'Side', presence: 'constant', valueRef: 'Side.Buy' },
          ...fields,
          {
            element: 'group',
            name: 'fills',
            id: '10',
            members: [
              { element: 'field', name: 'qty', id: '11', type: 'Qty' },
              { element: 'field', name: 'price', id: '12', type: 'Price', sinceVersion: '1' },
            ],
          },
          { element: 'data', name: 'note', id: '20', type: 'varAsciiEncoding' },
        ],
      },
    ],
  };
}

function field(schema: MessageSchema, name: string): FieldMember {
  const message = schema.message(1);
  const member = message && schema.memberByName(message, name);
  if (member?.kind !== MemberKind.Field) {
    throw new Error(`field ${name} missing`);
  }
  return member;
}

describe('schema-document', () => {
  let validator: SchemaValidator;

  beforeEach(() => {
    validator = new SchemaValidator();
  });

  describe('buildSchemaFromDocument', () => {
    it('should parse schema attributes', () => {
      const schema = buildSchemaFromDocument(document(), validator);

      expect(schema.attributes).toEqual({
        packageName: 'exchange',
        id: 7,
        version: 1,
        semanticVersion: '5.2',
        byteOrder: ByteOrder.LittleEndian,
      });
    });

    it('should lay out the message block', () => {
      const schema = buildSchemaFromDocument(document(), validator);
      const offsets = ['orderId', 'symbol', 'side', 'venue', 'flags', 'kind'].map(name => field(schema, name).offset);

      expect(offsets).toEqual([0, 8, 14, 15, 15, 16]);
      expect(schema.message(1)?.blockLength).toBe(16);
    });

    it('should parse type literals into primitive values', () => {
      const schema = buildSchemaFromDocument(document(), validator);
      const qty = schema.type('Qty');
      const venue = schema.type('Venue');

      expect(qty?.kind).toBe(TypeKind.Simple);
      if (qty?.kind === TypeKind.Simple) {
        expect(qty.nullValue?.asIntegral()).toBe(0n);
        expect(qty.maxValue?.asIntegral()).toBe(1000000n);
        expect(qty.maxValue?.size()).toBe(4);
      }
      if (venue?.kind === TypeKind.Simple) {
        expect(venue.constValue?.representation).toBe(Representation.RawBytes);
        expect(venue.constValue?.toString()).toBe('XNAS');
        expect(venue.constValue?.size()).toBe(4);
        expect(venue.constValue?.textEncoding()).toBe('US-ASCII');
      }
    });

    it('should parse enum values with the encoding type', () => {
      const schema = buildSchemaFromDocument(document(), validator);
      const side = schema.type('Side');

      expect(side?.kind).toBe(TypeKind.Enum);
      if (side?.kind === TypeKind.Enum) {
        expect(side.encodingType).toBe(PrimitiveType.Char);
        expect(side.values.map(v => [v.name, v.value.asIntegral()])).toEqual([['Buy', 66n], ['Sell', 83n]]);
      }
    });

    it('should parse set choices as bit positions', () => {
      const schema = buildSchemaFromDocument(document(), validator);
      const flags = schema.type('Flags');

      if (flags?.kind !== TypeKind.Set) {
        throw new Error('expected a set');
      }
      expect(flags.choices.map(c => [c.name, c.bitPosition, c.sinceVersion])).toEqual([
        ['Hidden', 0, 0],
        ['PostOnly', 3, 1],
      ]);
    });

    it('should resolve a valueRef to the enum value', () => {
      const schema = buildSchemaFromDocument(document(), validator);
      expect(field(schema, 'kind').constValue?.asIntegral()).toBe(66n);
    });

    it('should take a field constant by enum value name', () => {
      const schema = buildSchemaFromDocument(
        document([{ element: 'field', name: 'fixedSide', id: '7', type: 'Side', presence: 'constant', constValue: 'Sell' }]),
        validator,
      );
      expect(field(schema, 'fixedSide').constValue?.asIntegral()).toBe(83n);
    });

    it('should parse a field constant with a primitive type', () => {
      const schema = buildSchemaFromDocument(
        document([{ element: 'field', name: 'lot', id: '7', type: 'int32', presence: 'constant', constValue: '100' }]),
        validator,
      );
      expect(field(schema, 'lot').constValue?.asIntegral()).toBe(100n);
      expect(field(schema, 'lot').encodedLength).toBe(0);
    });

    it('should build groups and data', () => {
      const schema = buildSchemaFromDocument(document(), validator);
      const message = schema.message(1);
      if (!message) {
        throw new Error('message missing');
      }
      const fills = schema.memberById(message, 10);
      const note = schema.memberById(message, 20);

      expect(fills).toMatchObject({ kind: MemberKind.Group, blockLength: 12 });
      expect(note?.kind).toBe(MemberKind.Data);
      if (note?.kind === MemberKind.Data) {
        expect(note.encoding.length.primitiveType).toBe(PrimitiveType.UInt8);
        expect(note.encoding.payload.role).toBe(VarDataRole.Text);
      }
    });
  });

  describe('loadSchemaDocument', () => {
    it('should return an open builder', () => {
      const builder = loadSchemaDocument(document(), validator);
      const schema = builder
        .addMessage({ id: 2, name: 'Cancel', members: [{ kind: MemberKind.Field, id: 1, name: 'orderId', type: 'uint64' }] })
        .seal();

      expect(schema.messages().map(m => m.name)).toEqual(['NewOrder', 'Cancel']);
    });

    it('should apply the default character encoding from options', () => {
      const schema = buildSchemaFromDocument(document(), validator, { characterEncoding: 'ISO-8859-1' });
      const venue = schema.type('Venue');

      expect(venue?.kind === TypeKind.Simple && venue.constValue?.textEncoding()).toBe('ISO-8859-1');
    });
  });

  describe('format errors', () => {
    it('should reject a non-numeric id', () => {
      const doc = document();
      doc.messages[0].id = 'abc';

      expect(() => buildSchemaFromDocument(doc, validator)).toThrow(
        'Invalid id "abc" on message "NewOrder": expected a non-negative integer',
      );
    });

    it('should reject an unknown presence', () => {
      expect(() => buildSchemaFromDocument(
        document([{ element: 'field', name: 'x', id: '7', type: 'int8', presence: 'sometimes' }]),
        validator,
      )).toThrow('Invalid presence "sometimes" on field "x": expected required, optional or constant');
    });

    it('should reject an unknown byte order', () => {
      expect(() => buildSchemaFromDocument({ ...document(), byteOrder: 'middleEndian' }, validator)).toThrow(
        'Invalid byteOrder "middleEndian": expected littleEndian or bigEndian',
      );
    });

    it('should reject an unknown primitive type', () => {
      const doc = document();
      doc.types.push({ element: 'type', name: 'Huge', primitiveType: 'int128' });

      expect(() => buildSchemaFromDocument(doc, validator)).toThrow(FormatError);
    });

    it('should reject a literal that does not match its type', () => {
      const doc = document();
      doc.types.push({ element: 'type', name: 'Tiny', primitiveType: 'int8', maxValue: '200' });

      expect(() => buildSchemaFromDocument(doc, validator)).toThrow(FormatError);
    });

    it('should reject a malformed valueRef', () => {
      expect(() => buildSchemaFromDocument(
        document([{ element: 'field', name: 'x', id: '7', type: 'Side', presence: 'constant', valueRef: 'Buy' }]),
        validator,
      )).toThrow('Invalid valueRef "Buy" on field "x": expected EnumName.ValueName');
    });

    it('should reject a valueRef naming a missing value', () => {
      expect(() => buildSchemaFromDocument(
        document([{ element: 'field', name: 'x', id: '7', type: 'Side', presence: 'constant', valueRef: 'Side.Hold' }]),
        validator,
      )).toThrow('Invalid valueRef "Side.Hold" on field "x": enum "Side" has no value "Hold"');
    });

    it('should report an undeclared type on a constant field as unresolved', () => {
      const build = () => buildSchemaFromDocument(
        document([{ element: 'field', name: 'x', id: '7', type: 'Missing', presence: 'constant', constValue: '5' }]),
        validator,
      );

      expect(build).toThrow(SchemaValidationError);
      expect(build).toThrow('unresolved type: field "x": type "Missing" is not declared');
    });

    it('should report an undeclared enum encoding as unresolved', () => {
      const doc = document();
      doc.types.push({ element: 'enum', name: 'Tif', encodingType: 'tifCode', validValues: [{ name: 'Day', value: '0' }] });

      expect(() => buildSchemaFromDocument(doc, validator)).toThrow(
        'unresolved type: enum "Tif": type "tifCode" is not declared',
      );
    });

    it('should report an undeclared set encoding as unresolved', () => {
      const doc = document();
      doc.types.push({ element: 'set', name: 'Opts', encodingType: 'optBits', choices: [] });

      expect(() => buildSchemaFromDocument(doc, validator)).toThrow(SchemaValidationError);
    });

    it('should reject an enum encoded by a composite', () => {
      const doc = document();
      doc.types.push({ element: 'enum', name: 'Tif', encodingType: 'messageHeader', validValues: [] });

      expect(() => buildSchemaFromDocument(doc, validator)).toThrow(
        'invalid encoding type: enum "Tif": "messageHeader" is a composite, not a simple type',
      );
    });

    it('should reject a constant on a composite field', () => {
      expect(() => buildSchemaFromDocument(
        document([{ element: 'field', name: 'x', id: '7', type: 'messageHeader', constValue: '1' }]),
        validator,
      )).toThrow('Constant on field "x" requires a simple or enum type, "messageHeader" is a composite');
    });
  });
});
