import { plainToInstance } from 'class-transformer';
import {
  IsEnum,
  IsInt,
  IsOptional,
  IsString,
  Matches,
  Max,
  Min,
  validateSync,
} from 'class-validator';
import { LogLevel } from '@nestjs/common';

export enum Environment {
  Development = 'development',
  Production = 'production',
  Test = 'test',
}

const LOG_LEVELS: LogLevel[] = [
  'fatal',
  'error',
  'warn',
  'log',
  'debug',
  'verbose',
];

const LOG_LEVEL_LIST = new RegExp(
  `^(${LOG_LEVELS.join('|')})(,(${LOG_LEVELS.join('|')}))*$`,
);

/**
 * Environment variables the catalog reads
 */
export class EnvironmentVariables {
  @IsEnum(Environment)
  NODE_ENV: Environment = Environment.Development;

  @IsInt()
  @Min(1)
  @Max(1000)
  SEATS_PER_ROOM: number = 20;

  // Comma separated Nest log levels, e.g. "error,warn,log"
  @IsOptional()
  @IsString()
  @Matches(LOG_LEVEL_LIST, {
    message: `LOG_LEVEL must be a comma separated list of: ${LOG_LEVELS.join(
      ', ',
    )}`,
  })
  LOG_LEVEL?: string;
}

/**
 * Validate process.env when ConfigModule loads
 * Throws on the first invalid or mistyped variable set
 */
export function validate(
  config: Record<string, unknown>,
): EnvironmentVariables {
  const validated = plainToInstance(EnvironmentVariables, config, {
    enableImplicitConversion: true,
  });

  const errors = validateSync(validated, { skipMissingProperties: false });

  if (errors.length > 0) {
    throw new Error(
      `Config validation error: ${errors
        .map((error) => Object.values(error.constraints ?? {}).join(', '))
        .join('; ')}`,
    );
  }

  return validated;
}

/**
 * Parse a LOG_LEVEL value into Nest log levels
 * Unknown entries are dropped; an empty or missing value gives the default
 */
export function parseLogLevels(
  value: string | undefined,
  fallback: LogLevel[] = ['error', 'warn', 'log'],
): LogLevel[] {
  if (!value) {
    return fallback;
  }

  const levels = value
    .split(',')
    .map((level) => level.trim())
    .filter((level): level is LogLevel =>
      LOG_LEVELS.some((known) => known === level),
    );

  return levels.length > 0 ? levels : fallback;
}
