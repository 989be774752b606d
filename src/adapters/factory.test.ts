/**
 * Tests for spreadsheet adapter factory and config resolution.
 */

import { createLogger } from "@/lib/logger";

import { parseSpreadsheetConfig, resolveSpreadsheetConfig } from "./config";
import { createSpreadsheetAdapter } from "./factory";

const mockAdapter = {
  listPartitionNames: vi.fn(),
  createPartition: vi.fn(),
  renamePartition: vi.fn(),
  readRows: vi.fn(),
  writeRow: vi.fn(),
  deleteRow: vi.fn(),
  appendRow: vi.fn(),
};

const mockClient = { listSheets: vi.fn() };

vi.mock("./google-sheets", () => ({
  createGoogleSheetsAdapter: vi.fn(() => mockAdapter),
  createGoogleSheetsClient: vi.fn(() => mockClient),
  loadServiceAccountKey: vi.fn(() => ({ client_email: "svc@example.test", private_key: "test-secret" })),
}));

import { createGoogleSheetsAdapter, createGoogleSheetsClient, loadServiceAccountKey } from "./google-sheets";

const logger = createLogger({ level: "error" });

describe("createSpreadsheetAdapter", () => {
  beforeEach(() => {
    vi.clearAllMocks();
  });

  it("should build the Google adapter from credentials", () => {
    const config = parseSpreadsheetConfig({
      backend: "google",
      spreadsheetId: "sheet-123",
      serviceAccountPath: "/keys/sa.json",
      timeZone: "Europe/Berlin",
    });

    const adapter = createSpreadsheetAdapter(config, { logger });

    expect(adapter).toBe(mockAdapter);
    expect(loadServiceAccountKey).toHaveBeenCalledWith({ json: undefined, path: "/keys/sa.json" });
    expect(createGoogleSheetsClient).toHaveBeenCalledWith(
      expect.objectContaining({
        spreadsheetId: "sheet-123",
        key: { client_email: "svc@example.test", private_key: "test-secret" },
      }),
    );
    expect(createGoogleSheetsAdapter).toHaveBeenCalledWith(
      expect.objectContaining({ client: mockClient, timeZone: "Europe/Berlin" }),
    );
  });

  it("should fall back to the in-memory spreadsheet", async () => {
    const adapter = createSpreadsheetAdapter(parseSpreadsheetConfig({ backend: "memory", timeZone: "UTC" }), {
      logger,
    });

    expect(createGoogleSheetsAdapter).not.toHaveBeenCalled();
    await expect(adapter.listPartitionNames()).resolves.toEqual([]);
  });
});

describe("resolveSpreadsheetConfig", () => {
  it("should choose Google when an id and a credential source are set", () => {
    expect(
      resolveSpreadsheetConfig({
        spreadsheetId: "sheet-123",
        serviceAccountJson: "{}",
        serviceAccountPath: undefined,
        timeZone: "UTC",
      }),
    ).toEqual({ backend: "google", spreadsheetId: "sheet-123", serviceAccountJson: "{}", timeZone: "UTC" });
  });

  it("should choose memory without credentials", () => {
    expect(
      resolveSpreadsheetConfig({
        spreadsheetId: "sheet-123",
        serviceAccountJson: undefined,
        serviceAccountPath: undefined,
        timeZone: "UTC",
      }),
    ).toEqual({ backend: "memory", timeZone: "UTC" });
  });

  it("should reject an unknown time zone", () => {
    expect(() => parseSpreadsheetConfig({ backend: "memory", timeZone: "Mars/Olympus" })).toThrow();
  });
});
