import * as dotenv from 'dotenv';
import * as crypto from 'crypto';
import * as path from 'path';
import { fileURLToPath } from 'url';
import { z } from 'zod';

// Configuration loading and validation for the gallery API.
// Ensures required environment variables are set with usable values.

export interface ConfigValidation {
  valid: boolean;
  errors: string[];
  warnings: string[];
}

const durationPattern = /^\d+(ms|s|m|h|d)?$/;

const envSchema = z.object({
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  PORT: z.coerce.number().int().min(0).max(65535).default(5000),
  HOST: z.string().default('0.0.0.0'),
  STORAGE_DRIVER: z.enum(['postgres', 'memory']).default('postgres'),
  DATABASE_URL: z.string().url().optional(),
  MEDIA_ROOT: z.string().min(1).default('media'),
  JWT_SECRET: z.string().optional(),
  ACCESS_TOKEN_TTL: z.string().regex(durationPattern, 'must be a duration such as 15m').default('15m'),
  REFRESH_TOKEN_TTL: z.string().regex(durationPattern, 'must be a duration such as 7d').default('7d'),
  BCRYPT_ROUNDS: z.coerce.number().int().min(4).max(15).default(10),
  LOG_LEVEL: z.enum(['error', 'warn', 'info', 'debug']).default('info'),
  LOG_DIR: z.string().default('logs'),
  LOG_TO_FILE: z.enum(['true', 'false']).default('true'),
  AUTH_RATE_LIMIT_MAX: z.coerce.number().int().positive().default(20),
  CORS_ORIGIN: z.string().default('http://localhost'),
});

export type Env = z.infer<typeof envSchema>;

export interface AppConfig {
  nodeEnv: Env['NODE_ENV'];
  port: number;
  host: string;
  storageDriver: Env['STORAGE_DRIVER'];
  databaseUrl?: string;
  mediaRoot: string;
  jwtSecret: string;
  accessTokenTtl: string;
  refreshTokenTtl: string;
  bcryptRounds: number;
  logLevel: Env['LOG_LEVEL'];
  logDir: string;
  logToFile: boolean;
  authRateLimitMax: number;
  corsOrigins: string[];
}

const MIN_SECRET_LENGTH = 32;

export class ConfigValidator {
  constructor(private readonly source: NodeJS.ProcessEnv = process.env) {}

  private parse(result: ConfigValidation): Env | null {
    const parsed = envSchema.safeParse(this.source);
    if (!parsed.success) {
      for (const issue of parsed.error.issues) {
        result.errors.push(`${issue.path.join('.')}: ${issue.message}`);
      }
      result.valid = false;
      return null;
    }
    return parsed.data;
  }

  validate(): ConfigValidation {
    const result: ConfigValidation = {
      valid: true,
      errors: [],
      warnings: [],
    };

    const env = this.parse(result);
    if (!env) return result;

    if (env.STORAGE_DRIVER === 'postgres' && !env.DATABASE_URL) {
      result.errors.push('DATABASE_URL is required when STORAGE_DRIVER is postgres');
      result.valid = false;
    }

    this.validateSecret('JWT_SECRET', env.JWT_SECRET, env.NODE_ENV, result);

    if (env.NODE_ENV === 'production') {
      if (env.STORAGE_DRIVER === 'memory') {
        result.errors.push('STORAGE_DRIVER=memory loses all data on restart and is not allowed in production');
        result.valid = false;
      }
      if (env.BCRYPT_ROUNDS < 10) {
        result.warnings.push('BCRYPT_ROUNDS should be at least 10 in production');
      }
    }

    if (env.DATABASE_URL && /postgres:postgres@/.test(env.DATABASE_URL)) {
      result.warnings.push('Default PostgreSQL credentials detected');
    }

    return result;
  }

  private validateSecret(
    keyName: string,
    value: string | undefined,
    nodeEnv: Env['NODE_ENV'],
    result: ConfigValidation
  ): void {
    if (!value) {
      if (nodeEnv === 'production') {
        result.errors.push(`${keyName} is not set`);
        result.valid = false;
      } else {
        result.warnings.push(`${keyName} is not set; a random secret is used and tokens will not survive a restart`);
      }
      return;
    }

    if (value.length < MIN_SECRET_LENGTH) {
      const message = `${keyName} is too short (minimum ${MIN_SECRET_LENGTH} characters)`;
      if (nodeEnv === 'production') {
        result.errors.push(message);
        result.valid = false;
      } else {
        result.warnings.push(message);
      }
    }

    if (value.includes('GENERATE') || value.includes('CHANGE_THIS') || value.startsWith('replace-with')) {
      result.errors.push(`${keyName} contains placeholder value - must be regenerated`);
      result.valid = false;
    }
  }

  /**
   * Build the typed configuration, throwing when validation fails.
   */
  load(): AppConfig {
    const validation = this.validate();
    if (!validation.valid) {
      throw new Error(`Invalid configuration:\n  - ${validation.errors.join('\n  - ')}`);
    }

    const env = envSchema.parse(this.source);
    return {
      nodeEnv: env.NODE_ENV,
      port: env.PORT,
      host: env.HOST,
      storageDriver: env.STORAGE_DRIVER,
      databaseUrl: env.DATABASE_URL,
      mediaRoot: path.resolve(env.MEDIA_ROOT),
      jwtSecret: env.JWT_SECRET || crypto.randomBytes(64).toString('hex'),
      accessTokenTtl: env.ACCESS_TOKEN_TTL,
      refreshTokenTtl: env.REFRESH_TOKEN_TTL,
      bcryptRounds: env.BCRYPT_ROUNDS,
      logLevel: env.LOG_LEVEL,
      logDir: path.resolve(env.LOG_DIR),
      logToFile: env.LOG_TO_FILE === 'true',
      authRateLimitMax: env.AUTH_RATE_LIMIT_MAX,
      corsOrigins: env.CORS_ORIGIN.split(',').map(origin => origin.trim()).filter(Boolean),
    };
  }

  generateSecureCredentials(): string {
    return `JWT_SECRET=${crypto.randomBytes(48).toString('base64')}`;
  }
}

export function loadConfig(source: NodeJS.ProcessEnv = process.env): AppConfig {
  return new ConfigValidator(source).load();
}

// Run validation if called directly
const isMainModule = process.argv[1] !== undefined
  && path.resolve(process.argv[1]) === fileURLToPath(import.meta.url);
if (isMainModule) {
  dotenv.config();
  const validator = new ConfigValidator();

  if (process.argv.includes('--generate')) {
    console.log(validator.generateSecureCredentials());
    process.exit(0);
  }

  const result = validator.validate();

  console.log('\n=== Gallery API Configuration Validation ===\n');

  if (result.errors.length > 0) {
    console.error('ERRORS:');
    result.errors.forEach(error => console.error(`  - ${error}`));
    console.log('');
  }

  if (result.warnings.length > 0) {
    console.warn('WARNINGS:');
    result.warnings.forEach(warning => console.warn(`  - ${warning}`));
    console.log('');
  }

  if (result.valid) {
    console.log('Configuration is valid!');
    process.exit(0);
  } else {
    console.error('Configuration validation failed!');
    console.log('\nRun with --generate to create a signing secret:');
    console.log('  npm run config:check -- --generate');
    process.exit(1);
  }
}
