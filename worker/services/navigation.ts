export type OutlineNode = {
  level: number;
};

export const getParentIndex = (ordered: readonly OutlineNode[], index: number): number => {
  const level = ordered[index].level;
  if (level === 0) return -1;
  for (let i = index - 1; i >= 0; i--) {
    if (ordered[i].level < level) return i;
  }
  return -1;
};

/** Direct children only; grandchildren are skipped. */
export const getChildren = <T extends OutlineNode>(ordered: readonly T[], parentIndex: number): T[] => {
  const parentLevel = ordered[parentIndex].level;
  const children: T[] = [];
  for (let i = parentIndex + 1; i < ordered.length && ordered[i].level > parentLevel; i++) {
    if (ordered[i].level === parentLevel + 1) children.push(ordered[i]);
  }
  return children;
};

/** Exclusive end of the contiguous run of descendants that follows `index`. */
export const getSubtreeEnd = (ordered: readonly OutlineNode[], index: number): number => {
  const level = ordered[index].level;
  let end = index + 1;
  while (end < ordered.length && ordered[end].level > level) end++;
  return end;
};

export const getLastSubtaskOrSelf = <T extends OutlineNode>(ordered: readonly T[], index: number): T =>
  ordered[getSubtreeEnd(ordered, index) - 1];
