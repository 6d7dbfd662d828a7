export * from './common/errors';
export * from './common/primitive-type';
export * from './common/primitive-value';
export {
  DEFAULT_CHARACTER_ENCODING,
  SUPPORTED_CHARACTER_ENCODINGS,
  isSupportedCharacterEncoding,
} from './common/character-encoding';
export * from './ir/types';
export * from './ir/declarations';
export * from './ir/encoding';
export { encodedLength, fieldLength, computeBlockLength } from './ir/layout';
export { MessageSchema } from './ir/message-schema';
export type { WalkEntry } from './ir/message-schema';
export { SchemaBuilder, DEFAULT_BUILDER_OPTIONS } from './ir/schema-builder';
export type { SchemaBuilderOptions } from './ir/schema-builder';
export * from './ir/schema-document';
export * from './ir/standard-types';
export { SchemaService } from './ir/schema.service';
export { IrModule } from './ir/ir.module';
export { SchemaValidator, isRepresentationCompatible } from './validation/schema-validator';
export { matchGroupDimension, matchMessageHeader, matchVarDataEncoding } from './validation/composite-shapes';
export type { ShapeMatch } from './validation/composite-shapes';
export { AppModule } from './app.module';
export { createSchemaContext } from './bootstrap';
export type { SchemaContext } from './bootstrap';
