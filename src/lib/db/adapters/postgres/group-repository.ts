import { eq } from "drizzle-orm";

import { groupAlreadyExists, groupNotFound } from "@/domains/ledger";

import type { Database } from "../../client";
import type { GroupRepository } from "../../ports/group-repository";
import { groups } from "../../schema";
import { isUniqueViolation, mapGroup } from "./mappers";

export const createPostgresGroupRepository = (db: Database): GroupRepository => ({
  get: async (id) => {
    const [row] = await db.select().from(groups).where(eq(groups.id, id));
    return row ? mapGroup(row) : null;
  },

  list: async (filters = {}) => {
    const rows = await db
      .select()
      .from(groups)
      .where(filters.status === undefined ? undefined : eq(groups.status, filters.status))
      .orderBy(groups.id);
    return rows.map(mapGroup);
  },

  create: async ({ id, displayName = id, hidden = false }) => {
    try {
      const [inserted] = await db
        .insert(groups)
        .values({ id, displayName, hidden, status: "active" })
        .returning();
      if (!inserted) {
        throw new Error(`Failed to create group ${id}`);
      }
      return mapGroup(inserted);
    } catch (error) {
      if (isUniqueViolation(error)) {
        throw groupAlreadyExists(id);
      }
      throw error;
    }
  },

  update: async (id, patch) => {
    const [updated] = await db
      .update(groups)
      .set({ ...patch, updatedAt: new Date() })
      .where(eq(groups.id, id))
      .returning();
    if (!updated) {
      throw groupNotFound(id);
    }
    return mapGroup(updated);
  },

  changeId: async (oldId, newId, displayName) =>
    db.transaction(async (tx) => {
      const [current] = await tx.select().from(groups).where(eq(groups.id, oldId)).for("update");
      if (!current) {
        throw groupNotFound(oldId);
      }
      await tx.delete(groups).where(eq(groups.id, newId));
      const [moved] = await tx
        .update(groups)
        .set({ id: newId, displayName, status: "active", updatedAt: new Date() })
        .where(eq(groups.id, oldId))
        .returning();
      if (!moved) {
        throw groupNotFound(oldId);
      }
      return mapGroup(moved);
    }),

  delete: async (id) => {
    await db.delete(groups).where(eq(groups.id, id));
  },
});
