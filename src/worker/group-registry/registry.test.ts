import { createMemorySpreadsheet, type MemorySpreadsheet } from "@/adapters/memory";
import { SpreadsheetError } from "@/adapters/errors";
import { createMemoryGroupRepository, createMemoryLedgerStore } from "@/lib/db/adapters/memory";
import type { GroupRepository, LedgerStore } from "@/lib/db/ports";
import { createLogger } from "@/lib/logger";

import { type GroupRegistryDeps, createGroupRegistry } from "./registry";

const logger = createLogger({ level: "error" });

describe("createGroupRegistry", () => {
  let groups: GroupRepository;
  let ledger: LedgerStore;
  let sheet: MemorySpreadsheet;

  const registry = (overrides: Partial<GroupRegistryDeps> = {}) =>
    createGroupRegistry({ groups, ledger, spreadsheet: sheet, logger, ...overrides });

  const seedAccount = (id: string, groupId: string | null) =>
    ledger.createAccount(id, { fullName: id, role: "student", status: "active", groupId });

  beforeEach(() => {
    groups = createMemoryGroupRepository();
    ledger = createMemoryLedgerStore();
    sheet = createMemorySpreadsheet();
  });

  describe("listPartitions", () => {
    it("should register tabs as groups, skipping ignored tabs", async () => {
      sheet.setCells("10A", []);
      sheet.setCells("Config", []);
      sheet.setCells("10B", []);

      const partitions = await registry({ ignoredTabs: ["Config"] }).listPartitions();

      expect(partitions.map((group) => group.id)).toEqual(["10A", "10B"]);
      await expect(groups.get("Config")).resolves.toBeNull();
    });

    it("should serve cached names until refreshed", async () => {
      sheet.setCells("10A", []);
      const partitions = registry();
      await partitions.listPartitions();

      sheet.setCells("10B", []);

      expect((await partitions.listPartitions()).map((group) => group.id)).toEqual(["10A"]);
      expect((await partitions.listPartitions(true)).map((group) => group.id)).toEqual(["10A", "10B"]);
    });

    it("should expire the cache after the ttl", async () => {
      vi.useFakeTimers();
      try {
        sheet.setCells("10A", []);
        const partitions = registry({ cacheTtlMs: 1000 });
        await partitions.listPartitions();
        sheet.setCells("10B", []);

        await vi.advanceTimersByTimeAsync(1001);

        expect((await partitions.listPartitions()).map((group) => group.id)).toEqual(["10A", "10B"]);
      } finally {
        vi.useRealTimers();
      }
    });

    it("should read one removed and one added tab as a rename", async () => {
      await groups.create({ id: "10A", hidden: true });
      await groups.create({ id: "10B" });
      await seedAccount("u1", "10A");
      await seedAccount("u2", "10B");
      sheet.setCells("10B", []);
      sheet.setCells("10C", []);

      const partitions = await registry().listPartitions();

      expect(partitions.map((group) => group.id)).toEqual(["10B", "10C"]);
      await expect(groups.get("10A")).resolves.toBeNull();
      await expect(groups.get("10C")).resolves.toMatchObject({
        displayName: "10C",
        hidden: true,
        status: "active",
      });
      await expect(ledger.getAccount("u1")).resolves.toMatchObject({ groupId: "10C" });
      await expect(ledger.getAccount("u2")).resolves.toMatchObject({ groupId: "10B" });
    });

    it("should keep a custom display name across a rename", async () => {
      await groups.create({ id: "10A", displayName: "Physics" });
      sheet.setCells("10C", []);

      await registry().listPartitions();

      await expect(groups.get("10C")).resolves.toMatchObject({ displayName: "Physics" });
    });

    it("should treat the pair as delete plus create when detection is explicit", async () => {
      await groups.create({ id: "10A" });
      await seedAccount("u1", "10A");
      sheet.setCells("10C", []);

      await registry({ renameDetection: "explicit" }).listPartitions();

      await expect(groups.get("10A")).resolves.toMatchObject({ status: "deleted" });
      await expect(groups.get("10C")).resolves.toMatchObject({ status: "active" });
      await expect(ledger.getAccount("u1")).resolves.toMatchObject({ groupId: "10A" });
    });

    it("should mark removed tabs deleted and re-activate returning ones", async () => {
      await groups.create({ id: "10A" });
      await groups.create({ id: "10B" });
      await groups.create({ id: "10C" });
      sheet.setCells("10A", []);
      const partitions = registry();

      await partitions.listPartitions();
      await expect(groups.get("10B")).resolves.toMatchObject({ status: "deleted" });
      await expect(groups.get("10C")).resolves.toMatchObject({ status: "deleted" });

      sheet.setCells("10B", []);
      await partitions.listPartitions(true);
      await expect(groups.get("10B")).resolves.toMatchObject({ status: "active" });
    });
  });

  describe("renamePartition", () => {
    it("should rename the tab, the record and the accounts", async () => {
      sheet.setCells("10A", [["u1", "Ann"]]);
      const partitions = registry();
      await partitions.listPartitions();
      await seedAccount("u1", "10A");

      const renamed = await partitions.renamePartition("10A", "11A");

      expect(renamed.id).toBe("11A");
      await expect(sheet.listPartitionNames()).resolves.toEqual(["11A"]);
      await expect(ledger.getAccount("u1")).resolves.toMatchObject({ groupId: "11A" });
      expect((await partitions.listPartitions()).map((group) => group.id)).toEqual(["11A"]);
    });

    it("should refuse unknown sources and taken targets", async () => {
      sheet.setCells("10A", []);
      sheet.setCells("10B", []);
      const partitions = registry();
      await partitions.listPartitions();

      await expect(partitions.renamePartition("10Z", "11A")).rejects.toMatchObject({ code: "NOT_FOUND" });
      await expect(partitions.renamePartition("10A", "10B")).rejects.toMatchObject({
        code: "ALREADY_EXISTS",
      });
    });
  });

  describe("createPartition", () => {
    it("should create the record and the tab with a header", async () => {
      const partitions = registry();

      const group = await partitions.createPartition("10D");

      expect(group).toMatchObject({ id: "10D", status: "active" });
      await expect(sheet.readRows("10D")).resolves.toEqual({ rows: [], issues: [] });
      await expect(partitions.createPartition("10D")).rejects.toMatchObject({ code: "ALREADY_EXISTS" });
    });

    it("should roll the record back when the tab cannot be created", async () => {
      const failing: MemorySpreadsheet = {
        ...sheet,
        createPartition: async (name) => {
          throw new SpreadsheetError("quota", "RATE_LIMITED", name);
        },
      };

      await expect(registry({ spreadsheet: failing }).createPartition("10D")).rejects.toMatchObject({
        code: "RATE_LIMITED",
      });
      await expect(groups.get("10D")).resolves.toBeNull();
    });

    it("should restore a re-activated record's status on failure", async () => {
      await groups.create({ id: "10D" });
      await groups.update("10D", { status: "deleted" });
      const failing: MemorySpreadsheet = {
        ...sheet,
        createPartition: async (name) => {
          throw new SpreadsheetError("quota", "RATE_LIMITED", name);
        },
      };

      await expect(registry({ spreadsheet: failing }).createPartition("10D")).rejects.toThrow("quota");
      await expect(groups.get("10D")).resolves.toMatchObject({ status: "deleted" });
    });
  });

  describe("setPartitionHidden", () => {
    it("should toggle the hidden flag", async () => {
      await groups.create({ id: "10A" });

      await expect(registry().setPartitionHidden("10A", true)).resolves.toMatchObject({ hidden: true });
      await expect(registry().setPartitionHidden("10Z", true)).rejects.toMatchObject({ code: "NOT_FOUND" });
    });
  });

  describe("orphans", () => {
    it("should find and purge active accounts whose group has no tab", async () => {
      sheet.setCells("10A", []);
      await seedAccount("u1", "10A");
      await seedAccount("u9", "10Z");
      await seedAccount("t1", null);
      const partitions = registry();

      const orphans = await partitions.findOrphanedAccounts();
      expect(orphans.map((account) => account.id)).toEqual(["u9"]);

      await expect(partitions.purgeOrphanedAccounts()).resolves.toEqual(["u9"]);
      await expect(ledger.getAccount("u9")).resolves.toBeNull();
      await expect(ledger.getAccount("u1")).resolves.not.toBeNull();
    });
  });
});
