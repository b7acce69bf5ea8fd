import type { Node } from './types.js';

/**
 * Point every node's parent link at the node that holds it.
 * Links are weak and informational; the tree must be finite.
 */
export function attachParents(root: Node): void {
  for (const child of root.children()) {
    child.setParent(root);
    attachParents(child);
  }
}

/** Clear the parent links of a whole tree */
export function detachParents(root: Node): void {
  root.setParent(null);
  for (const child of root.children()) {
    detachParents(child);
  }
}
