export type {
  CreateGroupInput,
  Group,
  GroupPatch,
  GroupStatus,
  PartitionDiff,
  PartitionRename,
  RenameDetection,
} from "./types";
export { groupStatusSchema, isGroupStatus } from "./types";

export { diffPartitions, filterPartitionNames, isEmptyDiff } from "./diff";
