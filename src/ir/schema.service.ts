import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import type { IrConfig } from '../config/ir.config';
import { truncateForLog } from '../common/logging.utils';
import { SchemaValidator } from '../validation/schema-validator';
import { DEFAULT_BUILDER_OPTIONS, SchemaBuilder } from './schema-builder';
import type { SchemaBuilderOptions } from './schema-builder';
import { loadSchemaDocument } from './schema-document';
import type { SchemaDocument } from './schema-document';
import type { SchemaAttributesDeclaration } from './declarations';
import type { MessageSchema } from './message-schema';

/**
 * Builds sealed schemas with the configured defaults
 */
@Injectable()
export class SchemaService {
  private readonly logger = new Logger(SchemaService.name);

  constructor(
    private readonly configService: ConfigService,
    private readonly validator: SchemaValidator,
  ) {}

  /**
   * Builder defaults from the `ir` config section
   */
  get options(): SchemaBuilderOptions {
    const config = this.configService.get<IrConfig>('ir');
    if (!config) {
      return DEFAULT_BUILDER_OPTIONS;
    }
    return {
      headerType: config.headerType,
      groupDimensionType: config.groupDimensionType,
      byteOrder: config.byteOrder,
      characterEncoding: config.characterEncoding,
    };
  }

  createBuilder(attributes: SchemaAttributesDeclaration): SchemaBuilder {
    return new SchemaBuilder(attributes, this.validator, this.options);
  }

  /**
   * Parse every literal of a document and seal the result
   * Failures are logged and rethrown unchanged
   */
  build(document: SchemaDocument): MessageSchema {
    this.logger.log(
      `Building schema "${document.package}": ${document.types.length} types, ${document.messages.length} messages`,
    );

    try {
      const schema = loadSchemaDocument(document, this.validator, this.options).seal();
      this.logger.log(
        `Sealed schema "${schema.packageName}" v${schema.attributes.version}: ${schema.messages().map(m => `${m.name}(${m.templateId})`).join(', ')}`,
      );
      return schema;
    } catch (error) {
      this.logger.error(`Failed to build schema "${document.package}"`);
      this.logger.debug(`Schema document: ${truncateForLog(document, 500)}`);
      throw error;
    }
  }
}
