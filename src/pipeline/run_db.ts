import { Client } from 'pg';
import { ENV } from './env';
import { errorMessage } from './errors';
import { warn, debug } from './log';

export type RunStatus = 'completed' | 'catalog-failed';

export interface MonitorRunRecord {
  sourceId: string;
  status: RunStatus;
  listed: number;
  processed: number;
  skipped: number;
  failed: number;
  unparsed: number;
  startedAt: Date;
}

/** The part of pg's Client the ledger uses. */
export interface Queryable {
  query(text: string, values?: unknown[]): Promise<{ rows: Array<Record<string, unknown>> }>;
}

export interface RunLedger {
  record(run: MonitorRunRecord): Promise<void>;
}

export async function withPg<T>(fn: (c: Client) => Promise<T>): Promise<T> {
  const client = new Client({ connectionString: ENV.databaseUrl });
  try {
    await client.connect();
  } catch (e) {
    const redacted = ENV.databaseUrl.replace(/:[^:@/]+@/, ':***@');
    warn('db.connect.fail', { url: redacted, error: errorMessage(e) });
    throw e;
  }
  try {
    return await fn(client);
  } finally {
    try { await client.end(); } catch (e) { debug('db.end.fail', { error: errorMessage(e) }); }
  }
}

export async function insertMonitorRun(client: Queryable, run: MonitorRunRecord): Promise<string> {
  const res = await client.query(
    `INSERT INTO monitor_runs (source_id, status, listed, processed, skipped, failed, unparsed, started_at)
     VALUES ($1,$2,$3,$4,$5,$6,$7,$8) RETURNING id`,
    [run.sourceId, run.status, run.listed, run.processed, run.skipped, run.failed, run.unparsed, run.startedAt]
  );
  return String(res.rows[0]?.id ?? '');
}

/**
 * Ledger writes never fail a check: errors are logged and dropped.
 * `connect` defaults to a fresh pg connection per record.
 */
export function createRunLedger(
  connect: <T>(fn: (c: Queryable) => Promise<T>) => Promise<T> = withPg
): RunLedger {
  return {
    async record(run) {
      try {
        const id = await connect((c) => insertMonitorRun(c, run));
        debug('ledger.record', { sourceId: run.sourceId, id });
      } catch (e) {
        warn('ledger.record.fail', { sourceId: run.sourceId, error: errorMessage(e) });
      }
    },
  };
}

/** Undefined when no database is configured (or DISABLE_DB=true). */
export function ledgerFromEnv(): RunLedger | undefined {
  return ENV.disableDb ? undefined : createRunLedger();
}
