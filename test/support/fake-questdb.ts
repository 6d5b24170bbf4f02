import { QueryError } from "../../src/core/errors.js";
import type { Cell, QueryColumn, QueryResponse, SqlQueryable } from "../../src/query/client.js";
import type { LineSender, SenderFactory } from "../../src/suite/sender.js";
import { formatMicrosIso, nanosToMicros } from "../../src/suite/timestamps.js";

type Field = { name: string; type: string; value: Cell };

type PendingRow = { table: string; fields: Field[]; timestamp: string };

type Table = { columns: QueryColumn[]; rows: Cell[][] };

const SELECT_ALL_RE = /^select \* from '((?:[^']|'')*)'$/;

/**
 * In-memory stand-in for the database as the scenarios see it: ILP rows go
 * in through `senders`, and `select * from '<table>'` reads them back.
 *
 * Type rules: within one row the first field with a given name wins; a row
 * that writes a different type into an existing column is dropped; the
 * designated `timestamp` column is always last.
 */
export class FakeQuestDb implements SqlQueryable {
  readonly tables = new Map<string, Table>();
  readonly queries: string[] = [];
  /** Answer this many queries with "table does not exist" before serving data. */
  hiddenQueries = 0;
  openSenders = 0;
  nowMs = () => Date.now();

  readonly senders: SenderFactory = async () => {
    this.openSenders++;
    return new FakeSender(this);
  };

  async query(sql: string): Promise<QueryResponse> {
    this.queries.push(sql);
    const m = SELECT_ALL_RE.exec(sql);
    if (!m) throw new QueryError("unsupported query", sql, 0);

    const name = m[1].replace(/''/g, "'");
    const table = this.tables.get(name);
    if (!table || this.hiddenQueries > 0) {
      this.hiddenQueries = Math.max(0, this.hiddenQueries - 1);
      throw new QueryError(`table does not exist [table=${name}]`, sql, 14);
    }
    return {
      query: sql,
      columns: table.columns.map((c) => ({ ...c })),
      dataset: table.rows.map((r) => [...r]),
      count: table.rows.length
    };
  }

  ingest(rows: PendingRow[]): void {
    for (const row of rows) this.apply(row);
  }

  private apply(row: PendingRow): void {
    const fields: Field[] = [];
    for (const f of row.fields) {
      if (!fields.some((kept) => kept.name === f.name)) fields.push(f);
    }

    let table = this.tables.get(row.table);
    if (!table) {
      table = {
        columns: [...fields.map((f) => ({ name: f.name, type: f.type })), { name: "timestamp", type: "TIMESTAMP" }],
        rows: []
      };
      this.tables.set(row.table, table);
    }

    for (const f of fields) {
      const existing = table.columns.find((c) => c.name === f.name);
      if (existing && existing.type !== f.type) return;
    }
    for (const f of fields) {
      if (table.columns.some((c) => c.name === f.name)) continue;
      table.columns.splice(table.columns.length - 1, 0, { name: f.name, type: f.type });
      for (const r of table.rows) r.splice(r.length - 1, 0, null);
    }

    table.rows.push(
      table.columns.map((c) => (c.name === "timestamp" ? row.timestamp : fields.find((f) => f.name === c.name)?.value ?? null))
    );
  }
}

/** Buffers rows until `flush()`, like a TCP sender. */
class FakeSender implements LineSender {
  private current: { table: string; fields: Field[] } | null = null;
  private buffer: PendingRow[] = [];

  constructor(private readonly db: FakeQuestDb) {}

  table(name: string): LineSender {
    if (this.current) throw new Error("previous row was not finished");
    this.current = { table: name, fields: [] };
    return this;
  }

  symbol(name: string, value: string): LineSender {
    return this.field(name, "SYMBOL", value);
  }

  stringColumn(name: string, value: string): LineSender {
    return this.field(name, "STRING", value);
  }

  booleanColumn(name: string, value: boolean): LineSender {
    return this.field(name, "BOOLEAN", value);
  }

  intColumn(name: string, value: number): LineSender {
    return this.field(name, "LONG", value);
  }

  floatColumn(name: string, value: number): LineSender {
    return this.field(name, "DOUBLE", value);
  }

  async at(timestampNs: bigint): Promise<void> {
    this.finish(formatMicrosIso(nanosToMicros(timestampNs)));
  }

  async atNow(): Promise<void> {
    this.finish(formatMicrosIso(BigInt(this.db.nowMs()) * 1000n));
  }

  async flush(): Promise<void> {
    this.db.ingest(this.buffer);
    this.buffer = [];
  }

  async close(): Promise<void> {
    this.db.openSenders--;
  }

  private field(name: string, type: string, value: Cell): LineSender {
    if (!this.current) throw new Error("table() must be called first");
    this.current.fields.push({ name, type, value });
    return this;
  }

  private finish(timestamp: string): void {
    if (!this.current) throw new Error("table() must be called first");
    this.buffer.push({ ...this.current, timestamp });
    this.current = null;
  }
}
