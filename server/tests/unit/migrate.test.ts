import { describe, it, expect, vi, beforeEach } from "vitest";
import fs from "fs/promises";
import path from "path";
import { fileURLToPath } from "url";
import type { Pool } from "pg";
import { parseMigrationFilename, runMigrations } from "../../src/db/migrate.js";
import * as clientModule from "../../src/db/client.js";

vi.mock("../../src/db/client.js");

const MIGRATIONS_DIR = path.join(path.dirname(fileURLToPath(import.meta.url)), "../../src/db/migrations");

describe("Database Migrations", () => {
  const mockClient = {
    query: vi.fn(),
    release: vi.fn(),
  };
  const mockPool = {
    query: vi.fn(),
    connect: vi.fn(),
  };

  beforeEach(() => {
    vi.clearAllMocks();
    mockClient.query.mockReset();
    mockPool.query.mockReset();
    mockPool.connect.mockResolvedValue(mockClient);
    // Only the members runMigrations touches are provided
    vi.mocked(clientModule.getPool).mockReturnValue(mockPool as unknown as Pool);
  });

  describe("parseMigrationFilename", () => {
    it("parses NNN_description.sql", () => {
      expect(parseMigrationFilename("001_organization_registry.sql")).toEqual({
        version: 1,
        description: "organization_registry",
      });
      expect(parseMigrationFilename("organization_registry.sql")).toBeNull();
    });
  });

  describe("migration execution", () => {
    it("applies pending migrations in a transaction", async () => {
      const sql = await fs.readFile(path.join(MIGRATIONS_DIR, "001_organization_registry.sql"), "utf-8");
      mockPool.query
        .mockResolvedValueOnce({}) // CREATE migrations table
        .mockResolvedValueOnce({ rows: [] }); // No applied migrations
      mockClient.query.mockResolvedValue({});

      await expect(runMigrations()).resolves.toBe(1);

      expect(mockClient.query).toHaveBeenCalledWith("BEGIN");
      expect(mockClient.query).toHaveBeenCalledWith(sql);
      expect(mockClient.query).toHaveBeenCalledWith(
        "INSERT INTO schema_migrations (version, filename) VALUES ($1, $2)",
        [1, "001_organization_registry.sql"]
      );
      expect(mockClient.query).toHaveBeenCalledWith("COMMIT");
      expect(mockClient.release).toHaveBeenCalled();
    });

    it("skips already applied migrations", async () => {
      mockPool.query
        .mockResolvedValueOnce({})
        .mockResolvedValueOnce({ rows: [{ version: 1 }] });

      await expect(runMigrations()).resolves.toBe(0);
      expect(mockPool.connect).not.toHaveBeenCalled();
    });

    it("rolls back on migration failure", async () => {
      mockPool.query
        .mockResolvedValueOnce({})
        .mockResolvedValueOnce({ rows: [] });
      mockClient.query
        .mockResolvedValueOnce({}) // BEGIN
        .mockRejectedValueOnce(new Error("SQL error"))
        .mockResolvedValue({});

      await expect(runMigrations()).rejects.toThrow("SQL error");

      expect(mockClient.query).toHaveBeenCalledWith("ROLLBACK");
      expect(mockClient.release).toHaveBeenCalled();
    });
  });

  describe("migration tracking", () => {
    it("creates the migrations table and reads applied versions", async () => {
      mockPool.query
        .mockResolvedValueOnce({})
        .mockResolvedValueOnce({ rows: [{ version: 1 }] });

      await runMigrations();

      expect(mockPool.query).toHaveBeenCalledWith(
        expect.stringContaining("CREATE TABLE IF NOT EXISTS schema_migrations")
      );
      expect(mockPool.query).toHaveBeenCalledWith("SELECT version FROM schema_migrations ORDER BY version");
    });
  });
});
