import { parseVersion } from "../../src/core/version.js";
import { ConsistencyCheck } from "../../src/query/consistency.js";
import { randomTableName, type ScenarioContext } from "../../src/suite/scenario.js";
import type { FixtureHandle } from "../../src/fixture/fixture.js";
import { FakeQuestDb } from "./fake-questdb.js";

export function fakeHandle(version: string): FixtureHandle {
  return { version: parseVersion(version), host: "localhost", ilpPort: 9009, httpUrl: "http://localhost:9000" };
}

/** Scenario context wired to an in-memory database. */
export function fakeContext(version: string, db = new FakeQuestDb()): ScenarioContext & { db: FakeQuestDb } {
  const fixture = fakeHandle(version);
  return {
    db,
    fixture,
    openSender: () => db.senders(fixture),
    check: new ConsistencyCheck(db, { timeoutMs: 1000, intervalMs: 5 }),
    uniqueTableName: randomTableName
  };
}
