/**
 * Database Initialization Runner
 *
 * Creates the schema and seeds reference data. Run from the compiled
 * output with `npm run db:init`.
 */

import { loadEnvironmentConfig, validateEnvironmentConfig } from '../config/environment';
import { SquadRepository } from '../squad-repository';
import { InitializationSummary } from '../services/schema-service';
import { LogLevel, log } from '../utils/logger';

interface InitializationResult {
  success: boolean;
  message: string;
  summary?: InitializationSummary;
  error?: string;
}

/**
 * Validate configuration, initialize the store and release the pool
 */
export async function initializeDatabase(
  repository: SquadRepository = new SquadRepository()
): Promise<InitializationResult> {
  try {
    validateEnvironmentConfig(loadEnvironmentConfig());
    const summary = await repository.initialize();
    return {
      success: true,
      message: 'Database initialized successfully',
      summary,
    };
  } catch (error) {
    log(LogLevel.ERROR, 'Database initialization failed', {
      operation: 'initialize',
      error: error instanceof Error ? error.message : 'Unknown error',
    });
    return {
      success: false,
      message: 'Database initialization failed',
      error: error instanceof Error ? error.message : 'Unknown error',
    };
  } finally {
    await repository.close();
  }
}

if (require.main === module) {
  initializeDatabase()
    .then((result) => {
      process.exitCode = result.success ? 0 : 1;
    })
    .catch((error: unknown) => {
      log(LogLevel.ERROR, 'Fatal error', {
        error: error instanceof Error ? error.message : String(error),
      });
      process.exitCode = 1;
    });
}
