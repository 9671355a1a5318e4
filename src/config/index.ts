import dotenv from 'dotenv';

// Load environment variables
dotenv.config();

type NodeEnv = 'development' | 'production' | 'test';

/**
 * Application configuration parsed and validated at startup
 */
export interface Config {
  // Server
  port: number;
  nodeEnv: NodeEnv;

  // Database
  databaseUrl: string;

  // API Configuration
  corsOrigin: string;

  // Logging
  logLevel: string;
  serviceName: string;

  // Admin Authentication
  ADMIN_PASSWORD: string;

  // Notification jobs
  notificationRetryLimit: number;
}

function isNodeEnv(value: string): value is NodeEnv {
  return value === 'development' || value === 'production' || value === 'test';
}

/**
 * Parse and validate environment variables
 * Throws an error if required variables are missing or invalid
 */
function parseConfig(): Config {
  const errors: string[] = [];

  const getRequired = (key: string): string => {
    const value = process.env[key];
    if (!value || value.trim() === '') {
      errors.push(`Missing required environment variable: ${key}`);
      return '';
    }
    return value;
  };

  const getRequiredNumber = (key: string): number => {
    const value = process.env[key];
    if (!value || value.trim() === '') {
      errors.push(`Missing required environment variable: ${key}`);
      return 0;
    }
    const parsed = parseInt(value, 10);
    if (isNaN(parsed)) {
      errors.push(`Invalid number for ${key}: ${value}`);
      return 0;
    }
    return parsed;
  };

  const rawNodeEnv = getRequired('NODE_ENV');
  let nodeEnv: NodeEnv = 'development';
  if (isNodeEnv(rawNodeEnv)) {
    nodeEnv = rawNodeEnv;
  } else if (rawNodeEnv) {
    errors.push(`Invalid NODE_ENV: ${rawNodeEnv}. Must be development, production, or test`);
  }

  const notificationRetryLimit = parseInt(process.env.NOTIFICATION_RETRY_LIMIT || '3', 10);
  if (isNaN(notificationRetryLimit) || notificationRetryLimit < 0) {
    errors.push(`Invalid NOTIFICATION_RETRY_LIMIT: ${process.env.NOTIFICATION_RETRY_LIMIT}`);
  }

  const config: Config = {
    port: getRequiredNumber('PORT'),
    nodeEnv,
    databaseUrl: getRequired('DATABASE_URL'),
    corsOrigin: getRequired('CORS_ORIGIN'),
    logLevel: process.env.LOG_LEVEL || 'debug',
    serviceName:
      process.env.SERVICE_NAME || (process.argv[1]?.includes('Worker') ? 'worker' : 'api'),
    ADMIN_PASSWORD: getRequired('ADMIN_PASSWORD'),
    notificationRetryLimit,
  };

  if (errors.length > 0) {
    throw new Error(`Configuration validation failed:\n${errors.join('\n')}`);
  }

  return config;
}

/**
 * Singleton config instance
 * Parsed and validated at module load time
 */
export const config: Config = parseConfig();
