/**
 * Database Connection Module
 *
 * Provides the PostgreSQL connection source for the data-access layer.
 * Every public operation acquires one client, runs its statements inside
 * a single transaction and releases the client on every exit path.
 */

import { Pool, PoolClient, QueryResult, QueryResultRow } from 'pg';
import { SecretsManagerClient, GetSecretValueCommand } from '@aws-sdk/client-secrets-manager';
import { EnvironmentConfig, loadEnvironmentConfig } from './environment';
import { logDatabase } from '../utils/logger';
import { translateDatabaseError } from '../utils/database-errors';

let poolPromise: Promise<Pool> | null = null;
let cachedCredentials: DatabaseCredentials | null = null;

interface DatabaseCredentials {
  username: string;
  password: string;
}

/**
 * Fetch database credentials from AWS Secrets Manager
 */
async function getCredentialsFromSecretsManager(
  secretArn: string,
  region: string
): Promise<DatabaseCredentials> {
  if (cachedCredentials) {
    return cachedCredentials;
  }

  const client = new SecretsManagerClient({ region });

  try {
    const response = await client.send(new GetSecretValueCommand({ SecretId: secretArn }));

    if (!response.SecretString) {
      throw new Error('Secret value is empty');
    }

    const secret: unknown = JSON.parse(response.SecretString);
    if (
      typeof secret !== 'object' ||
      secret === null ||
      !('username' in secret) ||
      !('password' in secret) ||
      typeof secret.username !== 'string' ||
      typeof secret.password !== 'string'
    ) {
      throw new Error('Secret must contain string username and password');
    }

    cachedCredentials = {
      username: secret.username,
      password: secret.password,
    };

    return cachedCredentials;
  } catch (error) {
    throw new Error(
      `Failed to fetch database credentials: ${error instanceof Error ? error.message : 'Unknown error'}`
    );
  }
}

/**
 * Resolve credentials from Secrets Manager when an ARN is configured,
 * otherwise from DB_USER / DB_PASSWORD
 */
async function resolveCredentials(config: EnvironmentConfig): Promise<DatabaseCredentials> {
  if (config.dbSecretArn) {
    return getCredentialsFromSecretsManager(config.dbSecretArn, config.awsRegion);
  }
  return { username: config.dbUser, password: config.dbPassword };
}

async function createPool(): Promise<Pool> {
  const config = loadEnvironmentConfig();
  const credentials = await resolveCredentials(config);

  const pool = new Pool({
    host: config.dbHost,
    port: config.dbPort,
    database: config.dbName,
    user: credentials.username,
    password: credentials.password,
    max: config.dbPoolMax,
    idleTimeoutMillis: config.dbIdleTimeoutMs,
    connectionTimeoutMillis: config.dbConnectionTimeoutMs,
    ssl: config.dbSsl ? { rejectUnauthorized: false } : undefined,
  });

  // Idle clients can error when the server drops them
  pool.on('error', (err) => {
    logDatabase({
      errorMessage: err.message,
      query: 'Pool error',
      operation: 'POOL_ERROR',
    });
  });

  return pool;
}

/**
 * Get or create the database connection pool
 *
 * Concurrent first calls share one pending creation. A failed creation is
 * forgotten so the next call retries.
 */
export function getPool(): Promise<Pool> {
  if (!poolPromise) {
    poolPromise = createPool().catch((error: unknown) => {
      poolPromise = null;
      throw error;
    });
  }
  return poolPromise;
}

/**
 * Execute a single parameterized statement outside a transaction
 *
 * @param text - SQL query with $1, $2, etc. placeholders
 * @param params - Parameter values bound to the placeholders
 */
export async function query<T extends QueryResultRow>(
  text: string,
  params?: unknown[]
): Promise<QueryResult<T>> {
  const pool = await getPool();
  return pool.query<T>(text, params);
}

/**
 * Run `callback` on one client inside BEGIN / COMMIT
 *
 * Any failure rolls the transaction back and is rethrown after driver
 * errors have been translated into application errors. The client is
 * released on every path.
 *
 * @param operation - Name of the public operation, used in logs
 * @param callback - Statements to execute on the transaction's client
 */
export async function transaction<T>(
  operation: string,
  callback: (client: PoolClient) => Promise<T>
): Promise<T> {
  const pool = await getPool();
  const client = await pool.connect();

  try {
    await client.query('BEGIN');
    const result = await callback(client);
    await client.query('COMMIT');
    return result;
  } catch (error) {
    try {
      await client.query('ROLLBACK');
    } catch (rollbackError) {
      logDatabase({
        errorMessage: rollbackError instanceof Error ? rollbackError.message : String(rollbackError),
        query: 'ROLLBACK',
        operation,
      });
    }
    throw translateDatabaseError(error, operation);
  } finally {
    client.release();
  }
}

/**
 * Close the database pool
 * Should be called on process shutdown or testing cleanup
 */
export async function closePool(): Promise<void> {
  if (!poolPromise) {
    return;
  }
  const pending = poolPromise;
  poolPromise = null;

  // A creation that failed has already rejected its callers; nothing to end
  const pool = await pending.catch(() => null);
  if (pool) {
    await pool.end();
  }
}

/**
 * Reset pool instance and cached credentials (for testing only)
 * @internal
 */
export function resetPool(): void {
  poolPromise = null;
  cachedCredentials = null;
}

/**
 * Check if pool is healthy
 */
export async function isPoolHealthy(): Promise<boolean> {
  try {
    const result = await query<{ health_check: number }>('SELECT 1 as health_check');
    return result.rows.length === 1 && result.rows[0].health_check === 1;
  } catch (error) {
    logDatabase({
      errorMessage: error instanceof Error ? error.message : String(error),
      query: 'SELECT 1 as health_check',
      operation: 'HEALTH_CHECK',
    });
    return false;
  }
}
