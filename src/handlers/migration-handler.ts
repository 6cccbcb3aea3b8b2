import { runMigrations } from '../scripts/run-migrations';
import { log, LogLevel } from '../utils/logger';

export interface MigrationHandlerResult {
  statusCode: number;
  body: string;
}

export async function handler(): Promise<MigrationHandlerResult> {
  log(LogLevel.INFO, 'Migration handler invoked');
  const result = await runMigrations();
  return {
    statusCode: result.success ? 200 : 500,
    body: JSON.stringify(result),
  };
}
