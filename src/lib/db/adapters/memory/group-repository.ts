import { groupAlreadyExists, groupNotFound } from "@/domains/ledger";
import type { Group } from "@/domains/partition";

import type { GroupRepository } from "../../ports/group-repository";

export const createMemoryGroupRepository = (now: () => Date = () => new Date()): GroupRepository => {
  const groups = new Map<string, Group>();

  const copy = (group: Group): Group => ({ ...group });

  return {
    get: async (id) => {
      const group = groups.get(id);
      return group ? copy(group) : null;
    },

    list: async (filters = {}) =>
      [...groups.values()]
        .filter((group) => filters.status === undefined || group.status === filters.status)
        .map(copy),

    create: async ({ id, displayName = id, hidden = false }) => {
      if (groups.has(id)) {
        throw groupAlreadyExists(id);
      }
      const timestamp = now();
      const group: Group = {
        id,
        displayName,
        hidden,
        status: "active",
        createdAt: timestamp,
        updatedAt: timestamp,
      };
      groups.set(id, group);
      return copy(group);
    },

    update: async (id, patch) => {
      const group = groups.get(id);
      if (!group) {
        throw groupNotFound(id);
      }
      const next: Group = { ...group, ...patch, updatedAt: now() };
      groups.set(id, next);
      return copy(next);
    },

    changeId: async (oldId, newId, displayName) => {
      const group = groups.get(oldId);
      if (!group) {
        throw groupNotFound(oldId);
      }
      const next: Group = { ...group, id: newId, displayName, status: "active", updatedAt: now() };
      groups.delete(oldId);
      groups.set(newId, next);
      return copy(next);
    },

    delete: async (id) => {
      groups.delete(id);
    },
  };
};
