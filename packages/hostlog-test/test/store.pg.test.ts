import { describe, it, expect, beforeEach } from "vitest";
import { newDb } from "pg-mem";
import { fileURLToPath } from "url";
import { dirname, join } from "path";
import { createPgStore, integrityViolation, loadMigrations, type Db, type Store } from "@hostlog/db";
import { at, seedHost } from "./fixtures.js";

const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);

const MIGRATIONS_DIR = join(__dirname, "../../hostlog-db/migrations");

// The SQL store over an in-process PostgreSQL emulation
async function createSqlStore(): Promise<Store> {
  const mem = newDb();
  for (const migration of await loadMigrations(MIGRATIONS_DIR)) {
    mem.public.none(migration.sql);
  }
  const db: Db = mem.adapters.createPgPromise();
  return createPgStore(db);
}

describe("SQL store", () => {
  let store: Store;

  beforeEach(async () => {
    store = await createSqlStore();
  });

  it("windows host events newest first, ties broken by id", async () => {
    const { host, reboot } = await seedHost(store);
    await store.records.createEvent({ hostId: host.id, eventTypeId: reboot.id, timestamp: at(30), user: "ops" });

    const all = await store.hosts.latestEventsOf(host.id, { offset: 0, limit: 10 });
    const second = await store.hosts.latestEventsOf(host.id, { offset: 1, limit: 2 });

    expect(all.map((e) => e.id)).toEqual([4, 2, 3, 1]);
    expect(second.map((e) => e.id)).toEqual([2, 3]);
  });

  it("finds the latest event outside any window", async () => {
    const { host } = await seedHost(store);

    const last = await store.hosts.lastEventOf(host.id);

    expect(last?.id).toBe(2);
    expect(last?.note).toBe("latest");
  });

  it("pairs each labor with its quest through the join", async () => {
    const { host } = await seedHost(store);

    const all = await store.hosts.laborsOf(host.id, { offset: 0, limit: 10 });
    const paged = await store.hosts.laborsOf(host.id, { offset: 1, limit: 2 });

    expect(all.map(({ labor, quest }) => [labor.id, quest.id])).toEqual([
      [1, 1],
      [2, 2],
      [3, 1]
    ]);
    expect(paged.map(({ labor, quest }) => [labor.id, quest.id, quest.description])).toEqual([
      [2, 2, "Patch kernel"],
      [3, 1, "Reboot fleet"]
    ]);
    expect(all[0]?.labor.host_id).toBe(host.id);
  });

  it("counts and filters hosts", async () => {
    for (const hostname of ["a", "b", "c"]) await store.hosts.create(hostname);

    const page = await store.hosts.list({}, { offset: 1, limit: 1 });
    const filtered = await store.hosts.list({ hostname: "c" }, { offset: 0, limit: 10 });

    expect(page).toEqual({ rows: [{ id: 2, hostname: "b" }], total: 3 });
    expect(filtered).toEqual({ rows: [{ id: 3, hostname: "c" }], total: 1 });
  });

  it("windows event type events and lists fates on either side", async () => {
    const { reboot } = await seedHost(store);
    const done = await store.eventTypes.create({ category: "system-reboot", state: "complete", description: "Rebooted." });
    const other = await store.eventTypes.create({ category: "disk", state: "required", description: "Disk." });
    await store.records.createFate({ creationTypeId: reboot.id, completionTypeId: done.id });
    await store.records.createFate({ creationTypeId: other.id, completionTypeId: other.id });
    await store.records.createFate({ creationTypeId: other.id, completionTypeId: reboot.id });

    const events = await store.eventTypes.latestEventsOf(reboot.id, { offset: 0, limit: 2 });
    const fates = await store.eventTypes.associatedFates(reboot.id);

    expect(events.map((e) => e.id)).toEqual([2, 3]);
    expect(fates.map((f) => f.id)).toEqual([1, 3]);
  });

  it("filters event types by state", async () => {
    await store.eventTypes.create({ category: "system-reboot", state: "required", description: "Reboot." });
    await store.eventTypes.create({ category: "system-reboot", state: "complete", description: "Rebooted." });

    const listed = await store.eventTypes.list({ state: "complete" }, { offset: 0, limit: 10 });

    expect(listed.total).toBe(1);
    expect(listed.rows.map((t) => t.id)).toEqual([2]);
  });

  it("changes only the description of an event type", async () => {
    const created = await store.eventTypes.create({ category: "disk", state: "required", description: "Disk." });

    const updated = await store.eventTypes.updateDescription(created.id, "Disk full.");

    expect(updated).toEqual({ id: created.id, category: "disk", state: "required", description: "Disk full." });
  });

  it("raises a unique violation for a duplicate hostname", async () => {
    await store.hosts.create("web-01");

    const err: unknown = await store.hosts.create("web-01").then(
      () => null,
      (e: unknown) => e
    );

    expect(integrityViolation(err)?.code).toBe("23505");
  });
});
