import { describe, it, expect } from "vitest";
import { IntegrityError, databaseUrlFromEnv, integrityViolation, loadMigrations } from "@hostlog/db";
import { fileURLToPath } from "url";
import { dirname, join } from "path";

const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);

describe("integrityViolation", () => {
  it("recognizes pg driver errors in SQLSTATE class 23", () => {
    const err = Object.assign(new Error('duplicate key value violates unique constraint "hosts_hostname_key"'), {
      code: "23505"
    });

    expect(integrityViolation(err)).toEqual({
      code: "23505",
      message: 'duplicate key value violates unique constraint "hosts_hostname_key"'
    });
  });

  it("recognizes the memory store's errors", () => {
    const err = new IntegrityError("23503", "events_host_id_fkey", "blocked");
    expect(integrityViolation(err)).toEqual({ code: "23503", message: "blocked" });
  });

  it("ignores everything else", () => {
    expect(integrityViolation(Object.assign(new Error("no such table"), { code: "42P01" }))).toBeNull();
    expect(integrityViolation(new Error("connection reset"))).toBeNull();
    expect(integrityViolation({ code: "23505", message: "not an Error" })).toBeNull();
  });
});

describe("loadMigrations", () => {
  it("loads the schema migrations in order", async () => {
    const migrations = await loadMigrations(join(__dirname, "../../hostlog-db/migrations"));

    expect(migrations.map((m) => m.version)).toEqual(["0001_init"]);
    expect(migrations[0]?.sql).toContain("CONSTRAINT hosts_hostname_key UNIQUE (hostname)");
  });
});

describe("databaseUrlFromEnv", () => {
  it("returns a postgres connection string", () => {
    expect(databaseUrlFromEnv({ DATABASE_URL: "postgresql://hostlog@localhost:5432/hostlog" })).toBe(
      "postgresql://hostlog@localhost:5432/hostlog"
    );
  });

  it("rejects a missing or foreign URL", () => {
    expect(() => databaseUrlFromEnv({})).toThrow("Invalid environment:\nDATABASE_URL: Required");
    expect(() => databaseUrlFromEnv({ DATABASE_URL: "http://localhost" })).toThrow(
      "Invalid environment:\nDATABASE_URL: Expected a postgres:// connection string"
    );
  });
});
