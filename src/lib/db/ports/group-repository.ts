import type { CreateGroupInput, Group, GroupPatch, GroupStatus } from "@/domains/partition";

export interface GroupRepository {
  get(id: string): Promise<Group | null>;
  list(filters?: { status?: GroupStatus }): Promise<Group[]>;
  /** Fails with ALREADY_EXISTS when the id is taken */
  create(input: CreateGroupInput): Promise<Group>;
  /** Fails with NOT_FOUND */
  update(id: string, patch: GroupPatch): Promise<Group>;
  /**
   * Moves the record to a new id, keeping `hidden` and `createdAt`. A record
   * already stored under `newId` is replaced.
   */
  changeId(oldId: string, newId: string, displayName: string): Promise<Group>;
  /** Hard delete; no-op when missing */
  delete(id: string): Promise<void>;
}
