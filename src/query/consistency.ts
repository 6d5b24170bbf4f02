import { NOT_YET, failure, poll, success, type Clock, type ProbeResult } from "../core/retry.js";
import { QueryError, TransportError } from "../core/errors.js";
import type { QueryResponse, SqlQueryable } from "./client.js";

export type ConsistencyOptions = {
  timeoutMs: number;
  intervalMs?: number;
  /** Fail fast on query errors other than "table does not exist". */
  strict?: boolean;
  clock?: Clock;
};

export type AwaitTableOptions = {
  minRows?: number;
  timeoutMs?: number;
};

const TABLE_MISSING_RE = /table does not exist/i;

export function selectAllSql(tableName: string): string {
  return `select * from '${tableName.replace(/'/g, "''")}'`;
}

/**
 * Waits for ingested rows to become visible through the query endpoint.
 */
export class ConsistencyCheck {
  constructor(
    private readonly client: SqlQueryable,
    private readonly opts: ConsistencyOptions
  ) {}

  /**
   * Poll `select * from '<table>'` until it returns at least `minRows` rows.
   * A missing table, a short dataset and transport hiccups are all retried.
   */
  async awaitTable(tableName: string, opts: AwaitTableOptions = {}): Promise<QueryResponse> {
    const minRows = opts.minRows ?? 1;
    const sql = selectAllSql(tableName);

    const probe = async (): Promise<ProbeResult<QueryResponse>> => {
      try {
        const resp = await this.client.query(sql);
        return resp.dataset.length >= minRows ? success(resp) : NOT_YET;
      } catch (e) {
        if (e instanceof TransportError) return NOT_YET;
        if (e instanceof QueryError) {
          return this.opts.strict && !TABLE_MISSING_RE.test(e.message) ? failure(e) : NOT_YET;
        }
        return failure(e);
      }
    };

    return poll(probe, {
      timeoutMs: opts.timeoutMs ?? this.opts.timeoutMs,
      intervalMs: this.opts.intervalMs,
      clock: this.opts.clock,
      message: `Timed out waiting for table '${tableName}' to have ${minRows} row(s)`
    });
  }
}
