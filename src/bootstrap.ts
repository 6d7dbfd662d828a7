import 'reflect-metadata';
import { NestFactory } from '@nestjs/core';
import type { INestApplicationContext } from '@nestjs/common';
import { AppModule } from './app.module';
import { getLogLevels } from './common/logging.utils';
import { SchemaService } from './ir/schema.service';

export interface SchemaContext {
  app: INestApplicationContext;
  schemas: SchemaService;
}

/**
 * Create a standalone application context (no HTTP server)
 * Log levels come from LOG_LEVEL; callers close `app` when done
 */
export async function createSchemaContext(logLevel: string | undefined = process.env.LOG_LEVEL): Promise<SchemaContext> {
  const app = await NestFactory.createApplicationContext(AppModule, {
    logger: getLogLevels(logLevel),
  });
  return { app, schemas: app.get(SchemaService) };
}
