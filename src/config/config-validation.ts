import { validateSync } from 'class-validator';
import type { ValidationError } from 'class-validator';
import { plainToInstance } from 'class-transformer';
import { Logger } from '@nestjs/common';
import { ConfigurationError } from '../common/errors';

const logger = new Logger('ConfigValidation');

function collectProblems(errors: readonly ValidationError[]): string[] {
  return errors.flatMap(error => [
    ...Object.values(error.constraints ?? {}),
    ...collectProblems(error.children ?? []),
  ]);
}

/**
 * Convert a raw config section into its class and run its decorators
 */
export function validateConfig<T extends object>(
  config: Record<string, unknown>,
  section: string,
  validationClass: new () => T,
): T {
  const validatedConfig = plainToInstance(validationClass, config, {
    enableImplicitConversion: true,
  });
  const problems = collectProblems(validateSync(validatedConfig, { skipMissingProperties: false }));

  if (problems.length > 0) {
    logger.error(`Configuration validation failed for ${section}`);
    throw new ConfigurationError(section, problems);
  }

  return validatedConfig;
}
