import type { PartitionDiff, RenameDetection } from "./types";

/**
 * Compares two partition-name lists.
 *
 * Under `heuristic` detection exactly one removal paired with exactly one
 * addition is read as a rename and reported in `renamed` (not in `added` or
 * `removed`). Any other shape is plain additions and removals.
 */
export const diffPartitions = (
  previous: readonly string[],
  current: readonly string[],
  detection: RenameDetection = "heuristic",
): PartitionDiff => {
  const before = new Set(previous);
  const after = new Set(current);

  const added = [...after].filter((name) => !before.has(name));
  const removed = [...before].filter((name) => !after.has(name));

  const [from] = removed;
  const [to] = added;
  if (
    detection === "heuristic" &&
    removed.length === 1 &&
    added.length === 1 &&
    from !== undefined &&
    to !== undefined
  ) {
    return { added: [], removed: [], renamed: { from, to } };
  }

  return { added, removed, renamed: null };
};

export const isEmptyDiff = (diff: PartitionDiff): boolean =>
  diff.added.length === 0 && diff.removed.length === 0 && diff.renamed === null;

/**
 * Drops ignored tabs (exact, case-sensitive match) and duplicate names.
 */
export const filterPartitionNames = (
  names: readonly string[],
  ignored: readonly string[],
): string[] => {
  const skip = new Set(ignored);
  return [...new Set(names)].filter((name) => name.trim().length > 0 && !skip.has(name));
};
