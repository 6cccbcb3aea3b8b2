/**
 * Poll Status Repository
 * 
 * Single-row table holding the feed status of the most recent poll cycle,
 * written by the poller function and read by the API function.
 */

import { QueryExecutor, poolExecutor } from '../config/database';
import {
  INITIAL_POLL_STATUS,
  PollStatus,
  PollStatusRow,
  mapPollStatusRow,
} from '../models/poll-status';

export interface PollStatusStore {
  get(): Promise<PollStatus>;
  save(status: PollStatus): Promise<void>;
}

const POLL_STATUS_ROW_ID = 1;

export class PollStatusRepository implements PollStatusStore {
  constructor(private db: QueryExecutor = poolExecutor) {}

  /**
   * Latest status, or Unknown when the poller has never run
   */
  async get(): Promise<PollStatus> {
    const result = await this.db.query<PollStatusRow>(
      'SELECT status, last_check, error FROM poll_status WHERE id = $1',
      [POLL_STATUS_ROW_ID]
    );
    return result.rows.length > 0 ? mapPollStatusRow(result.rows[0]) : { ...INITIAL_POLL_STATUS };
  }

  async save(status: PollStatus): Promise<void> {
    await this.db.query(
      `
      INSERT INTO poll_status (id, status, last_check, error)
      VALUES ($1, $2, $3, $4)
      ON CONFLICT (id) DO UPDATE SET
        status = EXCLUDED.status,
        last_check = EXCLUDED.last_check,
        error = EXCLUDED.error
      `,
      [POLL_STATUS_ROW_ID, status.status, status.last_check, status.error]
    );
  }
}
