import type { OutlineNode } from './navigation';

/**
 * Parent and child indexes for an ordered outline, addressed by position.
 * Stale as soon as any level in the source array changes.
 */
export type OutlineTree = {
  parents: number[];
  children: number[][];
};

export const buildOutlineTree = (ordered: readonly OutlineNode[]): OutlineTree => {
  const parents: number[] = [];
  const children: number[][] = ordered.map(() => []);
  // Open ancestors of the current position, levels strictly increasing.
  const open: number[] = [];

  ordered.forEach((node, index) => {
    while (open.length > 0 && ordered[open[open.length - 1]].level >= node.level) open.pop();
    const parent = node.level === 0 || open.length === 0 ? -1 : open[open.length - 1];
    parents.push(parent);
    if (parent !== -1 && ordered[parent].level + 1 === node.level) children[parent].push(index);
    open.push(index);
  });

  return { parents, children };
};
