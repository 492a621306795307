import {
  IsBooleanString,
  IsIn,
  IsNotEmpty,
  IsNumberString,
  IsOptional,
  IsString,
  IsUrl,
  validateSync,
} from 'class-validator';

export const LOG_LEVEL_NAMES = ['error', 'warn', 'log', 'debug', 'verbose'];

export class EnvironmentVariables {
  @IsOptional()
  @IsString()
  TELEGRAM_BOT_TOKEN?: string;

  @IsOptional()
  @IsUrl({ require_tld: false })
  SCHEDULE_URL?: string;

  @IsOptional()
  @IsNotEmpty()
  SCHEDULE_GROUP?: string;

  @IsOptional()
  @IsNotEmpty()
  SCHEDULE_TIMEZONE?: string;

  @IsOptional()
  @IsBooleanString()
  SCHEDULE_FETCH_DETAILS?: string;

  @IsOptional()
  @IsNumberString()
  SCHEDULE_REQUEST_TIMEOUT_MS?: string;

  @IsOptional()
  @IsNumberString()
  SCHEDULE_SUGGESTION_TIMEOUT_MS?: string;

  @IsOptional()
  @IsNumberString()
  SCHEDULE_DETAILS_TIMEOUT_MS?: string;

  @IsOptional()
  @IsNumberString()
  SCHEDULE_DETAILS_CONCURRENCY?: string;

  @IsOptional()
  @IsIn(LOG_LEVEL_NAMES)
  LOG_LEVEL?: string;

  @IsOptional()
  @IsNumberString()
  PORT?: string;
}

const ENV_KEYS = [
  'TELEGRAM_BOT_TOKEN',
  'SCHEDULE_URL',
  'SCHEDULE_GROUP',
  'SCHEDULE_TIMEZONE',
  'SCHEDULE_FETCH_DETAILS',
  'SCHEDULE_REQUEST_TIMEOUT_MS',
  'SCHEDULE_SUGGESTION_TIMEOUT_MS',
  'SCHEDULE_DETAILS_TIMEOUT_MS',
  'SCHEDULE_DETAILS_CONCURRENCY',
  'LOG_LEVEL',
  'PORT',
] as const satisfies readonly (keyof EnvironmentVariables)[];

export function validateEnv(
  config: Record<string, unknown>,
): Record<string, unknown> {
  const env = new EnvironmentVariables();
  for (const key of ENV_KEYS) {
    const value = config[key];
    if (typeof value === 'string' && value !== '') {
      env[key] = value;
    }
  }

  const errors = validateSync(env);
  if (errors.length > 0) {
    const details = errors
      .map((e) => Object.values(e.constraints ?? {}).join(', '))
      .join('; ');
    throw new Error(`Invalid environment configuration: ${details}`);
  }
  return config;
}
