import { createMemoryGroupRepository, createMemoryLedgerStore } from "@/lib/db/adapters/memory";
import type { GroupRepository, LedgerStore } from "@/lib/db/ports";
import { createLogger } from "@/lib/logger";

import { type AccountService, createAccountService } from "./service";

const logger = createLogger({ level: "error" });

describe("createAccountService", () => {
  let ledger: LedgerStore;
  let groups: GroupRepository;
  let service: AccountService;

  beforeEach(async () => {
    ledger = createMemoryLedgerStore();
    groups = createMemoryGroupRepository();
    service = createAccountService({ ledger, groups, logger });
    await groups.create({ id: "10A" });
  });

  describe("lifecycle", () => {
    it("should register pending students with no points", async () => {
      const account = await service.register({ id: "u1", fullName: "Ann", groupId: "10A" });

      expect(account).toMatchObject({
        id: "u1",
        fullName: "Ann",
        role: "student",
        status: "pending",
        balance: 0,
        groupId: "10A",
      });
    });

    it("should refuse registration into an unknown group", async () => {
      await expect(service.register({ id: "u1", fullName: "Ann", groupId: "10Z" })).rejects.toMatchObject({
        code: "NOT_FOUND",
      });
    });

    it("should walk removal and restoration", async () => {
      await service.register({ id: "u1", fullName: "Ann" });

      await expect(service.approve("u1")).resolves.toMatchObject({ status: "active" });
      await expect(service.remove("u1")).resolves.toMatchObject({ status: "deleted" });
      await expect(service.requestRestore("u1")).resolves.toMatchObject({ status: "pending_restore" });
      await expect(service.approveRestore("u1")).resolves.toMatchObject({ status: "active", version: 4 });
    });

    it("should ban on a rejected restore", async () => {
      await service.register({ id: "u1", fullName: "Ann" });
      await service.reject("u1");
      await service.requestRestore("u1");

      await expect(service.rejectRestore("u1")).resolves.toMatchObject({ status: "banned" });
    });

    it("should refuse transitions the table does not allow", async () => {
      await service.register({ id: "u1", fullName: "Ann" });

      await expect(service.remove("u1")).rejects.toMatchObject({
        code: "INVALID_TRANSITION",
        message: "Cannot remove account u1 in status pending",
      });
      await expect(service.approve("nobody")).rejects.toMatchObject({ code: "NOT_FOUND" });
    });
  });

  describe("assignGroup", () => {
    it("should move the account without touching updatedAt", async () => {
      await groups.create({ id: "10B" });
      const created = await ledger.createAccount("u1", {
        fullName: "Ann",
        role: "student",
        status: "active",
        groupId: "10A",
        updatedAt: new Date("2025-03-01T08:00:00Z"),
      });

      const moved = await service.assignGroup("u1", "10B");

      expect(moved.groupId).toBe("10B");
      expect(moved.updatedAt).toEqual(created.updatedAt);
      await expect(service.assignGroup("u1", null)).resolves.toMatchObject({ groupId: null });
    });

    it("should refuse a deleted group", async () => {
      await service.register({ id: "u1", fullName: "Ann" });
      await groups.update("10A", { status: "deleted" });

      await expect(service.assignGroup("u1", "10A")).rejects.toMatchObject({ code: "NOT_FOUND" });
    });
  });

  describe("getHistory", () => {
    it("should return the account's entries newest first, up to the limit", async () => {
      await ledger.createAccount("u1", { fullName: "Ann", role: "student", status: "active", balance: 0 });
      await ledger.appendLogEntry({ type: "add", source: "bot", amount: 5, recipientId: "u1", actorId: "t1" });
      await ledger.appendLogEntry({ type: "add", source: "bot", amount: 9, recipientId: "u2", actorId: "t1" });
      await ledger.appendLogEntry({ type: "subtract", source: "bot", amount: 2, senderId: "u1", actorId: "t1" });

      const history = await service.getHistory("u1");
      const latest = await service.getHistory("u1", 1);

      expect(history.map((entry) => [entry.type, entry.amount])).toEqual([
        ["subtract", 2],
        ["add", 5],
      ]);
      expect(latest.map((entry) => entry.type)).toEqual(["subtract"]);
    });

    it("should refuse an unknown account", async () => {
      await expect(service.getHistory("ghost")).rejects.toMatchObject({ code: "NOT_FOUND" });
    });
  });

  describe("getRanking", () => {
    it("should rank active students by balance then name", async () => {
      const seed = (id: string, fullName: string, balance: number, groupId = "10A") =>
        ledger.createAccount(id, { fullName, role: "student", status: "active", balance, groupId });
      await seed("u1", "Cy", 30);
      await seed("u2", "Ann", 50);
      await seed("u3", "Bob", 30);
      await seed("u4", "Di", 90, "10B");
      await ledger.createAccount("t1", { fullName: "Teacher", role: "teacher", status: "active", balance: 999 });
      await ledger.createAccount("u5", { fullName: "Eve", role: "student", status: "pending", balance: 70 });

      const ranking = await service.getRanking("10A");

      expect(ranking.map(({ rank, id, balance }) => ({ rank, id, balance }))).toEqual([
        { rank: 1, id: "u2", balance: 50 },
        { rank: 2, id: "u3", balance: 30 },
        { rank: 3, id: "u1", balance: 30 },
      ]);
      expect((await service.getRanking()).map((entry) => entry.id)).toEqual(["u4", "u2", "u3", "u1"]);
    });
  });
});
