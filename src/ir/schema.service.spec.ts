import { Test, TestingModule } from '@nestjs/testing';
import { ConfigService } from '@nestjs/config';
import { Logger } from '@nestjs/common';
import { SchemaService } from './schema.service';
import type { SchemaDocument } from './schema-document';
import { ByteOrder, MemberKind } from './types';
import { messageHeaderType } from './standard-types';
import { SchemaValidator } from '../validation/schema-validator';
import { SchemaValidationError } from '../common/errors';

function headerDocument(headerName: string): SchemaDocument {
  return {
    package: 'svc',
    types: [
      {
        element: 'composite',
        name: headerName,
        members: ['blockLength', 'templateId', 'schemaId', 'version'].map(name => ({
          element: 'type' as const,
          name,
          primitiveType: 'uint16',
        })),
      },
    ],
    messages: [
      {
        name: 'Ping',
        id: '1',
        members: [{ element: 'field', name: 'sentAt', id: '1', type: 'uint64' }],
      },
    ],
  };
}

const IR_CONFIG = {
  headerType: 'frameHeader',
  groupDimensionType: 'groupSizeEncoding',
  byteOrder: ByteOrder.BigEndian,
  characterEncoding: 'UTF-8',
};

async function createModule(irConfig: unknown): Promise<TestingModule> {
  return Test.createTestingModule({
    providers: [
      SchemaService,
      SchemaValidator,
      {
        provide: ConfigService,
        useValue: {
          get: jest.fn().mockReturnValue(irConfig),
        },
      },
    ],
  }).compile();
}

describe('SchemaService', () => {
  let service: SchemaService;
  let configService: ConfigService;

  beforeEach(async () => {
    jest.clearAllMocks();

    const module = await createModule(IR_CONFIG);
    service = module.get<SchemaService>(SchemaService);
    configService = module.get<ConfigService>(ConfigService);
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  it('should be defined', () => {
    expect(service).toBeDefined();
  });

  describe('options', () => {
    it('should read builder defaults from the ir config', () => {
      expect(service.options).toEqual(IR_CONFIG);
      expect(configService.get).toHaveBeenCalledWith('ir');
    });

    it('should fall back to built-in defaults without config', async () => {
      const module = await createModule(undefined);

      expect(module.get(SchemaService).options).toEqual({
        headerType: 'messageHeader',
        groupDimensionType: 'groupSizeEncoding',
        byteOrder: ByteOrder.LittleEndian,
        characterEncoding: 'US-ASCII',
      });
    });
  });

  describe('build', () => {
    it('should seal a document with the configured defaults', () => {
      const logSpy = jest.spyOn(Logger.prototype, 'log').mockImplementation();

      const schema = service.build(headerDocument('frameHeader'));

      expect(schema.header.type.name).toBe('frameHeader');
      expect(schema.attributes.byteOrder).toBe(ByteOrder.BigEndian);
      expect(logSpy).toHaveBeenCalledWith('Building schema "svc": 1 types, 1 messages');
      expect(logSpy).toHaveBeenCalledWith('Sealed schema "svc" v0: Ping(1)');
    });

    it('should log and rethrow failures', () => {
      jest.spyOn(Logger.prototype, 'log').mockImplementation();
      jest.spyOn(Logger.prototype, 'debug').mockImplementation();
      const errorSpy = jest.spyOn(Logger.prototype, 'error').mockImplementation();

      expect(() => service.build(headerDocument('messageHeader'))).toThrow(SchemaValidationError);
      expect(errorSpy).toHaveBeenCalledWith('Failed to build schema "svc"');
    });
  });

  describe('createBuilder', () => {
    it('should create a builder with the configured defaults', () => {
      const schema = service
        .createBuilder({ packageName: 'manual' })
        .addType(messageHeaderType('frameHeader'))
        .addMessage({ id: 3, name: 'Tick', members: [{ kind: MemberKind.Field, id: 1, name: 'px', type: 'double' }] })
        .seal();

      expect(schema.attributes.byteOrder).toBe(ByteOrder.BigEndian);
      expect(schema.message(3)?.blockLength).toBe(8);
    });
  });
});
