/**
 * Environment Configuration
 *
 * Process settings for the data-access layer, read from environment
 * variables. Nothing else in the project reads process.env directly.
 */

export interface EnvironmentConfig {
  // Connection target
  dbHost: string;
  dbPort: number;
  dbName: string;
  dbSsl: boolean;

  // Credentials: a Secrets Manager ARN wins over user/password
  dbUser: string;
  dbPassword: string;
  dbSecretArn: string;
  awsRegion: string;

  // Pool sizing
  dbPoolMax: number;
  dbIdleTimeoutMs: number;
  dbConnectionTimeoutMs: number;

  logLevel: string;
  nodeEnv: string;
}

function readInteger(name: string, fallback: number): number {
  const parsed = parseInt(process.env[name] || '', 10);
  return Number.isNaN(parsed) ? fallback : parsed;
}

export function loadEnvironmentConfig(): EnvironmentConfig {
  return {
    dbHost: process.env.DB_HOST || '',
    dbPort: readInteger('DB_PORT', 5432),
    dbName: process.env.DB_NAME || '',
    dbSsl: process.env.DB_SSL === 'true',
    dbUser: process.env.DB_USER || '',
    dbPassword: process.env.DB_PASSWORD || '',
    dbSecretArn: process.env.DB_SECRET_ARN || '',
    awsRegion: process.env.AWS_REGION || 'us-east-1',
    dbPoolMax: readInteger('DB_POOL_MAX', 10),
    dbIdleTimeoutMs: readInteger('DB_IDLE_TIMEOUT_MS', 30000),
    dbConnectionTimeoutMs: readInteger('DB_CONNECTION_TIMEOUT_MS', 5000),
    logLevel: process.env.LOG_LEVEL || 'info',
    nodeEnv: process.env.NODE_ENV || 'development',
  };
}

/**
 * Fail fast when a setting the pool cannot start without is missing
 *
 * @throws Error naming every missing variable
 */
export function validateEnvironmentConfig(config: EnvironmentConfig): void {
  const missing: string[] = [];

  if (!config.dbHost) {
    missing.push('DB_HOST');
  }
  if (!config.dbName) {
    missing.push('DB_NAME');
  }

  if (!config.dbSecretArn && !config.dbUser) {
    missing.push('DB_SECRET_ARN or DB_USER');
  }

  if (missing.length > 0) {
    throw new Error(`Missing required environment variables: ${missing.join(', ')}`);
  }
}
