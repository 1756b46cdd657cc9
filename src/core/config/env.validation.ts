import 'reflect-metadata';
import { Transform, plainToInstance } from 'class-transformer';
import {
  IsBoolean,
  IsIn,
  IsInt,
  IsOptional,
  IsString,
  IsUrl,
  Max,
  Min,
  validateSync,
} from 'class-validator';

const LOG_LEVELS = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'];

/**
 * Environment variables read through ConfigService.
 * Numeric and boolean values are converted before validation.
 */
export class EnvironmentVariables {
  @IsInt()
  @Min(0)
  @Max(65535)
  PORT: number = 3001;

  @IsIn(LOG_LEVELS)
  LOG_LEVEL: string = 'info';

  @IsUrl({ require_tld: false })
  MEMBERFUL_BASE_URL: string = 'https://api.memberful.com';

  @IsString()
  MEMBERFUL_API_KEY: string = '';

  @IsOptional()
  @IsString()
  MEMBERFUL_WEBHOOK_SECRET?: string;

  // read the raw value: implicit conversion turns 'false' into true
  @Transform(({ obj, key }) => [true, 'true', '1'].includes(obj[key]))
  @IsBoolean()
  MEMBERFUL_REQUIRE_SIGNATURE: boolean = false;

  @IsInt()
  @Min(0)
  MEMBERFUL_API_MAX_RETRIES: number = 3;

  @IsInt()
  @Min(0)
  MEMBERFUL_API_RETRY_BACKOFF_BASE_MS: number = 1000;

  @IsInt()
  @Min(1)
  MEMBERFUL_API_REQUESTS_PER_SECOND: number = 2;

  @IsInt()
  @Min(0)
  MEMBERFUL_API_PAGE_DELAY_MS: number = 100;

  @IsInt()
  @Min(1)
  API_CALL_TIMEOUT: number = 10000;

  @IsInt()
  @Min(1)
  MAX_PAGES: number = 1000;

  @IsInt()
  @Min(1)
  WEBHOOK_TIMEOUT_MS: number = 10000;

  @IsInt()
  @Min(1)
  CIRCUIT_BREAKER_TIMEOUT: number = 150000;

  @IsInt()
  @Min(1)
  @Max(100)
  CIRCUIT_BREAKER_ERROR_THRESHOLD: number = 50;

  @IsInt()
  @Min(1)
  CIRCUIT_BREAKER_RESET_TIMEOUT: number = 30000;
}

/**
 * `validate` hook for ConfigModule.forRoot
 */
export function validate(config: Record<string, unknown>): EnvironmentVariables {
  const validatedConfig = plainToInstance(EnvironmentVariables, config, {
    enableImplicitConversion: true,
    exposeDefaultValues: true,
  });

  const errors = validateSync(validatedConfig, { skipMissingProperties: false });

  if (errors.length > 0) {
    const messages = errors.flatMap((error) =>
      Object.values(error.constraints || {}),
    );
    throw new Error(`Invalid environment configuration: ${messages.join('; ')}`);
  }

  return validatedConfig;
}
