import assert from "node:assert/strict";
import { PollTimeoutError } from "../core/errors.js";
import { parseVersion } from "../core/version.js";
import type { Cell, QueryColumn } from "../query/client.js";
import type { LineSender } from "./sender.js";
import type { Scenario, ScenarioContext, ScenarioGate } from "./scenario.js";
import { formatMicrosIso, nanosToMicros } from "./timestamps.js";

const TIMESTAMP_COLUMN: QueryColumn = { name: "timestamp", type: "TIMESTAMP" };

const NO_DUPLICATE_NAMES: ScenarioGate = {
  skipAtOrBelow: parseVersion("6.1.2"),
  reason: "No support for duplicate column names."
};

const NO_USER_TIMESTAMPS: ScenarioGate = {
  skipAtOrBelow: parseVersion("6.0.7.1"),
  reason: "No support for user-provided timestamps."
};

const NO_UNICODE: ScenarioGate = {
  skipAtOrBelow: parseVersion("6.0.7.1"),
  reason: "No unicode support."
};

/** Open a sender, write, flush, close. */
async function send(ctx: ScenarioContext, write: (sender: LineSender) => Promise<void>): Promise<void> {
  const sender = await ctx.openSender();
  try {
    await write(sender);
    await sender.flush();
  } finally {
    await sender.close();
  }
}

/** Drop the trailing designated timestamp from every row. */
function scrubTimestamps(dataset: Cell[][]): Cell[][] {
  return dataset.map((row) => row.slice(0, -1));
}

function columns(...cols: [string, string][]): QueryColumn[] {
  return [...cols.map(([name, type]) => ({ name, type })), TIMESTAMP_COLUMN];
}

/** Write rows, wait for them, compare schema and non-timestamp values. */
async function expectTable(ctx: ScenarioContext, table: string, expected: { columns: QueryColumn[]; dataset: Cell[][] }): Promise<void> {
  const resp = await ctx.check.awaitTable(table, { minRows: expected.dataset.length });
  assert.deepEqual(resp.columns, expected.columns);
  assert.deepEqual(scrubTimestamps(resp.dataset), expected.dataset);
}

export const EXPLICIT_TIMESTAMP_NS = 1647357688714369403n;

export const SCENARIOS: Scenario[] = [
  {
    name: "insert_three_rows",
    description: "Three rows covering every basic column type, read back in write order.",
    async run(ctx) {
      const table = ctx.uniqueTableName();
      await send(ctx, async (sender) => {
        for (let i = 0; i < 3; i++) {
          await sender
            .table(table)
            .symbol("name_a", "val_a")
            .booleanColumn("name_b", true)
            .intColumn("name_c", i)
            .floatColumn("name_d", 2.5)
            .stringColumn("name_e", "val_b")
            .atNow();
        }
      });
      const row = (i: number): Cell[] => ["val_a", true, i, 2.5, "val_b"];
      await expectTable(ctx, table, {
        columns: columns(["name_a", "SYMBOL"], ["name_b", "BOOLEAN"], ["name_c", "LONG"], ["name_d", "DOUBLE"], ["name_e", "STRING"]),
        dataset: [row(0), row(1), row(2)]
      });
    }
  },
  {
    name: "repeated_symbol_and_column_names",
    description: "A repeated name within one row keeps its first value and type.",
    gate: NO_DUPLICATE_NAMES,
    async run(ctx) {
      const table = ctx.uniqueTableName();
      await send(ctx, (sender) =>
        sender.table(table).symbol("a", "A").symbol("a", "B").booleanColumn("b", false).stringColumn("b", "C").atNow()
      );
      await expectTable(ctx, table, {
        columns: columns(["a", "SYMBOL"], ["b", "BOOLEAN"]),
        dataset: [["A", false]]
      });
    }
  },
  {
    name: "same_symbol_and_column_name",
    description: "A column reusing a symbol's name within one row is ignored.",
    gate: NO_DUPLICATE_NAMES,
    async run(ctx) {
      const table = ctx.uniqueTableName();
      await send(ctx, (sender) => sender.table(table).symbol("a", "A").stringColumn("a", "B").atNow());
      await expectTable(ctx, table, {
        columns: columns(["a", "SYMBOL"]),
        dataset: [["A"]]
      });
    }
  },
  {
    name: "single_symbol",
    description: "A row with a single symbol.",
    async run(ctx) {
      const table = ctx.uniqueTableName();
      await send(ctx, (sender) => sender.table(table).symbol("a", "A").atNow());
      await expectTable(ctx, table, {
        columns: columns(["a", "SYMBOL"]),
        dataset: [["A"]]
      });
    }
  },
  {
    name: "two_columns",
    description: "A row with two string columns.",
    async run(ctx) {
      const table = ctx.uniqueTableName();
      await send(ctx, (sender) => sender.table(table).stringColumn("a", "A").stringColumn("b", "B").atNow());
      await expectTable(ctx, table, {
        columns: columns(["a", "STRING"], ["b", "STRING"]),
        dataset: [["A", "B"]]
      });
    }
  },
  {
    name: "mismatched_types_across_rows",
    description: "A later row writing a different type to an existing column is dropped.",
    async run(ctx) {
      const table = ctx.uniqueTableName();
      await send(ctx, (sender) => sender.table(table).symbol("a", "A").atNow());
      await send(ctx, (sender) => sender.table(table).stringColumn("a", "B").atNow());

      await expectTable(ctx, table, {
        columns: columns(["a", "SYMBOL"]),
        dataset: [["A"]]
      });
      await assert.rejects(ctx.check.awaitTable(table, { minRows: 2, timeoutMs: 1000 }), PollTimeoutError);
    }
  },
  {
    name: "explicit_timestamp",
    description: "A user-supplied nanosecond timestamp is stored at microsecond resolution.",
    gate: NO_USER_TIMESTAMPS,
    async run(ctx) {
      const table = ctx.uniqueTableName();
      await send(ctx, (sender) => sender.table(table).symbol("a", "A").at(EXPLICIT_TIMESTAMP_NS));
      const resp = await ctx.check.awaitTable(table);
      assert.deepEqual(resp.dataset, [["A", formatMicrosIso(nanosToMicros(EXPLICIT_TIMESTAMP_NS))]]);
    }
  },
  {
    name: "underscores",
    description: "Names made of underscores and alphanumerics round-trip unchanged.",
    async run(ctx) {
      const table = ctx.uniqueTableName("_", "_");
      await send(ctx, (sender) => sender.table(table).symbol("_a_b_c_", "A").booleanColumn("_d_e_f_", true).atNow());
      await expectTable(ctx, table, {
        columns: columns(["_a_b_c_", "SYMBOL"], ["_d_e_f_", "BOOLEAN"]),
        dataset: [["A", true]]
      });
    }
  },
  {
    name: "multibyte_names",
    description: "Multi-byte UTF-8 names and values round-trip unchanged.",
    gate: NO_UNICODE,
    async run(ctx) {
      const table = ctx.uniqueTableName();
      const smilie = "\u{1F601}";
      await send(ctx, (sender) => sender.table(table).symbol(smilie, smilie).atNow());
      await expectTable(ctx, table, {
        columns: columns([smilie, "SYMBOL"]),
        dataset: [[smilie]]
      });
    }
  }
];
