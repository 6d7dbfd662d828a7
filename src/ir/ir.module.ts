import { Module } from '@nestjs/common';
import { SchemaValidator } from '../validation/schema-validator';
import { SchemaService } from './schema.service';

/**
 * IR module builds and validates message schemas
 * Exports SchemaService; the validator is shared with it
 */
@Module({
  providers: [
    SchemaValidator,
    SchemaService,
  ],
  exports: [
    SchemaService,
    SchemaValidator,
  ],
})
export class IrModule {}
