import * as v from "valibot";

export const groupStatusSchema = v.picklist(["active", "deleted"]);
export type GroupStatus = v.InferOutput<typeof groupStatusSchema>;

export const isGroupStatus = (value: unknown): value is GroupStatus =>
  v.is(groupStatusSchema, value);

/**
 * A partition of accounts. `id` equals the spreadsheet tab name.
 */
export interface Group {
  id: string;
  displayName: string;
  hidden: boolean;
  status: GroupStatus;
  createdAt: Date;
  updatedAt: Date;
}

export interface CreateGroupInput {
  id: string;
  displayName?: string;
  hidden?: boolean;
}

export type GroupPatch = Partial<Pick<Group, "displayName" | "hidden" | "status">>;

export interface PartitionRename {
  from: string;
  to: string;
}

export interface PartitionDiff {
  added: string[];
  removed: string[];
  renamed: PartitionRename | null;
}

export type RenameDetection = "heuristic" | "explicit";
