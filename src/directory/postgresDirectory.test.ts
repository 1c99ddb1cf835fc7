import test from "node:test";
import assert from "node:assert/strict";
import type { Queryable } from "../db/postgres";
import { PostgresDirectory } from "./postgresDirectory";

function fakeDb(rows: unknown[]): Queryable & { queries: Array<{ text: string; values: unknown[] }> } {
  const queries: Array<{ text: string; values: unknown[] }> = [];
  return {
    queries,
    query: async (text, values) => {
      queries.push({ text, values });
      return { rows };
    },
  };
}

test("teamsForUser maps team rows", async () => {
  const db = fakeDb([
    { id: "t1", display_name: "Team A" },
    { id: "t2", display_name: "Team B" },
  ]);
  const directory = new PostgresDirectory(db);

  const teams = await directory.teamsForUser("u1");

  assert.deepEqual(teams, [
    { id: "t1", displayName: "Team A" },
    { id: "t2", displayName: "Team B" },
  ]);
  assert.deepEqual(db.queries[0]?.values, ["u1"]);
  assert.match(db.queries[0]?.text ?? "", /FROM teams t/);
});

test("channelsForTeamAndUser maps channel type letters", async () => {
  const db = fakeDb([
    { id: "c1", display_name: "General", type: "O" },
    { id: "c2", display_name: "Leads", type: "P" },
    { id: "c3", display_name: "u1__u2", type: "D" },
    { id: "c4", display_name: "u1, u2, u3", type: "g" },
  ]);
  const directory = new PostgresDirectory(db);

  const channels = await directory.channelsForTeamAndUser("t1", "u1", false);

  assert.deepEqual(channels, [
    { id: "c1", displayName: "General", type: "open" },
    { id: "c2", displayName: "Leads", type: "private" },
    { id: "c3", displayName: "u1__u2", type: "direct" },
    { id: "c4", displayName: "u1, u2, u3", type: "group" },
  ]);
  assert.deepEqual(db.queries[0]?.values, ["u1", "t1", false]);
});

test("channelsForTeamAndUser rejects an unknown channel type", async () => {
  const directory = new PostgresDirectory(fakeDb([{ id: "c9", display_name: "Odd", type: "X" }]));
  await assert.rejects(() => directory.channelsForTeamAndUser("t1", "u1", false), /unknown channel type "X"/);
});

test("channelsForTeamAndUser rejects malformed rows", async () => {
  const directory = new PostgresDirectory(fakeDb([{ id: 7, display_name: "Broken", type: "O" }]));
  await assert.rejects(() => directory.channelsForTeamAndUser("t1", "u1", false));
});

test("getUser returns null when no row matches", async () => {
  const directory = new PostgresDirectory(fakeDb([]));
  assert.equal(await directory.getUser("missing"), null);
});

test("getUser returns the user row", async () => {
  const directory = new PostgresDirectory(fakeDb([{ id: "u1", email: "u1@example.com" }]));
  assert.deepEqual(await directory.getUser("u1"), { id: "u1", email: "u1@example.com" });
});

test("query failures propagate to the caller", async () => {
  const directory = new PostgresDirectory({
    query: async () => {
      throw new Error("connection refused");
    },
  });
  await assert.rejects(() => directory.teamsForUser("u1"), /connection refused/);
});
