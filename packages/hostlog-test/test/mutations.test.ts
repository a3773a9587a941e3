import { describe, it, expect, beforeEach } from "vitest";
import { EVENT_TYPE_STATES, createMemoryStore, type MemoryStore } from "@hostlog/db";
import {
  ConflictError,
  NotFoundError,
  ValidationError,
  createEventType,
  createHost,
  deleteEventType,
  deleteHost,
  updateEventType,
  updateHost
} from "@hostlog/gateway";
import { seedHost } from "./fixtures.js";

describe("host mutations", () => {
  let store: MemoryStore;

  beforeEach(() => {
    store = createMemoryStore();
  });

  it("creates a host and assigns an id", async () => {
    const host = await createHost(store, { hostname: "h1" });
    expect(host).toEqual({ id: 1, hostname: "h1" });
    expect(await store.hosts.findByHostname("h1")).toEqual({ id: 1, hostname: "h1" });
  });

  it("reports a duplicate hostname as a conflict with the driver message", async () => {
    await createHost(store, { hostname: "h1" });

    const err = await createHost(store, { hostname: "h1" }).catch((e: unknown) => e);

    expect(err).toBeInstanceOf(ConflictError);
    expect(err).toMatchObject({
      message: 'duplicate key value violates unique constraint "hosts_hostname_key"',
      constraintCode: "23505",
      statusCode: 409
    });
  });

  it("treats hostnames as case-sensitive", async () => {
    await createHost(store, { hostname: "h1" });
    await expect(createHost(store, { hostname: "H1" })).resolves.toEqual({ id: 2, hostname: "H1" });
  });

  it("requires a hostname", async () => {
    await expect(createHost(store, {})).rejects.toThrow(ValidationError);
    await expect(createHost(store, {})).rejects.toThrow("Missing Required Argument: hostname");
    await expect(createHost(store, undefined)).rejects.toThrow("Missing Required Argument: hostname");
  });

  it("rejects an empty hostname", async () => {
    await expect(createHost(store, { hostname: "" })).rejects.toThrow("Invalid hostname: hostname must not be empty");
  });

  it("rejects a body that is not an object", async () => {
    await expect(createHost(store, ["h1"])).rejects.toThrow("Request body must be a JSON object");
  });

  it("renames a host", async () => {
    await createHost(store, { hostname: "h1" });

    expect(await updateHost(store, "h1", { hostname: "h2" })).toEqual({ id: 1, hostname: "h2" });
    expect(await store.hosts.findByHostname("h1")).toBeNull();
  });

  it("refuses to rename onto an existing hostname", async () => {
    await createHost(store, { hostname: "h1" });
    await createHost(store, { hostname: "h2" });

    await expect(updateHost(store, "h1", { hostname: "h2" })).rejects.toThrow(ConflictError);
  });

  it("raises NotFound before looking at the body", async () => {
    await expect(updateHost(store, "ghost", {})).rejects.toThrow(NotFoundError);
    await expect(deleteHost(store, "ghost")).rejects.toThrow("No such Host ghost found");
  });

  it("deletes a host without history", async () => {
    await createHost(store, { hostname: "h1" });

    expect(await deleteHost(store, "h1")).toEqual({ kind: "deleted", message: "Host h1 deleted." });
    expect(store._data.hosts.size).toBe(0);
  });

  it("refuses to delete a host that events still reference", async () => {
    await seedHost(store);

    const err = await deleteHost(store, "web-01").catch((e: unknown) => e);

    expect(err).toBeInstanceOf(ConflictError);
    expect(err).toMatchObject({ constraintCode: "23503" });
    expect(store._data.hosts.size).toBe(1);
  });

  it("lets other store failures through untouched", async () => {
    const failure = new Error("connection reset");
    store.hosts.create = async () => {
      throw failure;
    };

    await expect(createHost(store, { hostname: "h1" })).rejects.toBe(failure);
  });
});

describe("event type mutations", () => {
  let store: MemoryStore;

  beforeEach(() => {
    store = createMemoryStore();
  });

  const reboot = { category: "system-reboot", state: "required", description: "System requires a reboot." };

  it("creates an event type", async () => {
    expect(await createEventType(store, reboot)).toEqual({ id: 1, ...reboot });
  });

  it("accepts every known state", async () => {
    for (const state of EVENT_TYPE_STATES) {
      await createEventType(store, { ...reboot, state });
    }
    expect([...store._data.eventTypes.values()].map((t) => t.state)).toEqual(["required", "complete"]);
  });

  it("requires category, state and description", async () => {
    await expect(createEventType(store, { state: "required", description: "x" })).rejects.toThrow(
      "Missing Required Argument: category"
    );
    await expect(createEventType(store, { category: "c", description: "x" })).rejects.toThrow(
      "Missing Required Argument: state"
    );
    await expect(createEventType(store, { category: "c", state: "required" })).rejects.toThrow(
      "Missing Required Argument: description"
    );
  });

  it("rejects an unknown state", async () => {
    await expect(createEventType(store, { ...reboot, state: "bogus" })).rejects.toThrow(
      "Invalid state: expected one of required, complete"
    );
  });

  it("reports a duplicate category and state as a conflict", async () => {
    await createEventType(store, reboot);
    await expect(createEventType(store, { ...reboot, description: "again" })).rejects.toThrow(
      'duplicate key value violates unique constraint "event_types_category_state_key"'
    );
  });

  it("updates only the description", async () => {
    await createEventType(store, reboot);

    const updated = await updateEventType(store, 1, { description: "New", category: "other", state: "complete" });

    expect(updated).toEqual({ id: 1, category: "system-reboot", state: "required", description: "New" });
  });

  it("requires a description on update", async () => {
    await createEventType(store, reboot);
    await expect(updateEventType(store, 1, {})).rejects.toThrow("Missing Required Argument: description");
  });

  it("raises NotFound when updating an unknown event type", async () => {
    await expect(updateEventType(store, 42, { description: "x" })).rejects.toThrow("No such EventType 42 found");
  });

  it("declines deletion without failing", () => {
    expect(deleteEventType()).toEqual({ kind: "declined", message: "Not supported." });
  });
});
