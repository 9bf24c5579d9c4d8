import { plainToInstance, Transform, TransformFnParams } from 'class-transformer';
import {
  IsBoolean,
  IsEnum,
  IsInt,
  IsNotEmpty,
  IsOptional,
  IsString,
  Max,
  MaxLength,
  Min,
  validateSync,
} from 'class-validator';

export enum Environment {
  Development = 'development',
  Production = 'production',
  Test = 'test',
}

export enum KafkaSaslMechanism {
  Plain = 'plain',
  ScramSha256 = 'scram-sha-256',
  ScramSha512 = 'scram-sha-512',
}

// Reads the raw value: implicit conversion has already turned "false" into true
const toBoolean = ({ obj, key }: TransformFnParams): unknown => {
  const value: unknown = obj[key];
  if (typeof value !== 'string') {
    return value;
  }
  const normalized = value.trim().toLowerCase();
  if (['true', '1', 'yes', 'on'].includes(normalized)) {
    return true;
  }
  if (['false', '0', 'no', 'off'].includes(normalized)) {
    return false;
  }
  return value;
};

/**
 * Environment schema
 *
 * Validated once by ConfigModule at startup. Empty strings count as unset,
 * so `.env` files may keep blank placeholders.
 */
export class EnvironmentVariables {
  @IsEnum(Environment)
  NODE_ENV: Environment = Environment.Development;

  @IsInt()
  @Min(1)
  @Max(65535)
  PORT: number = 2127;

  // Database
  @IsString()
  @IsNotEmpty()
  DB_HOST: string = 'localhost';

  @IsInt()
  @Min(1)
  @Max(65535)
  DB_PORT: number = 5432;

  @IsString()
  @IsNotEmpty()
  DB_USERNAME: string = 'postgres';

  @IsString()
  DB_PASSWORD: string = 'postgres';

  @IsString()
  @IsNotEmpty()
  DB_DATABASE: string = 'insurance';

  @IsInt()
  @Min(0)
  DB_MIN_CONNECTIONS: number = 1;

  @IsInt()
  @Min(1)
  DB_MAX_CONNECTIONS: number = 10;

  @IsInt()
  @Min(0)
  DB_IDLE_TIMEOUT_MS: number = 30000;

  @IsInt()
  @Min(0)
  DB_CONNECT_TIMEOUT_MS: number = 10000;

  @IsOptional()
  @Transform(toBoolean)
  @IsBoolean()
  DB_SYNCHRONIZE?: boolean;

  // Kafka audit log
  @IsString()
  @IsNotEmpty()
  KAFKA_BROKERS: string = 'localhost:19092';

  @IsString()
  @IsNotEmpty()
  KAFKA_CLIENT_ID: string = 'insurance-cost-api';

  @IsString()
  @IsNotEmpty()
  KAFKA_TOPIC: string = 'tariff-audit';

  @IsInt()
  @Min(0)
  KAFKA_PARTITION: number = 0;

  @Transform(toBoolean)
  @IsBoolean()
  KAFKA_SSL: boolean = false;

  @IsOptional()
  @IsEnum(KafkaSaslMechanism)
  KAFKA_SASL_MECHANISM?: KafkaSaslMechanism;

  @IsOptional()
  @IsString()
  KAFKA_USERNAME?: string;

  @IsOptional()
  @IsString()
  KAFKA_PASSWORD?: string;

  // Audit
  @IsOptional()
  @IsString()
  @IsNotEmpty()
  @MaxLength(255)
  AUDIT_USER?: string;

  @IsInt()
  @Min(1)
  AUDIT_BATCH_MAX_BYTES: number = 16384;

  @IsInt()
  @Min(1)
  AUDIT_BATCH_MAX_ENTRIES: number = 500;

  // Behaviour
  @Transform(toBoolean)
  @IsBoolean()
  CARGO_TYPES_REQUIRE_REGISTRATION: boolean = false;

  @IsInt()
  @Min(1)
  THROTTLE_TTL_MS: number = 60000;

  @IsInt()
  @Min(1)
  THROTTLE_LIMIT: number = 100;
}

/**
 * ConfigModule `validate` hook
 *
 * Returns the coerced configuration; ConfigService then serves typed values
 * (numbers, booleans) instead of raw strings.
 */
export function validateEnvironment(config: Record<string, unknown>): EnvironmentVariables {
  const present = Object.fromEntries(
    Object.entries(config).filter(([, value]) => value !== ''),
  );

  const validated = plainToInstance(EnvironmentVariables, present, {
    enableImplicitConversion: true,
  });

  const errors = validateSync(validated, { skipMissingProperties: false });
  if (errors.length > 0) {
    const messages = errors.flatMap(error => Object.values(error.constraints ?? {}));
    throw new Error(`Invalid environment configuration:\n  ${messages.join('\n  ')}`);
  }

  if (validated.KAFKA_SASL_MECHANISM && (!validated.KAFKA_USERNAME || !validated.KAFKA_PASSWORD)) {
    throw new Error(
      'Invalid environment configuration:\n  KAFKA_USERNAME and KAFKA_PASSWORD are required when KAFKA_SASL_MECHANISM is set',
    );
  }

  return validated;
}
