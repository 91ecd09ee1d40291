/**
 * Comment thread reconstruction.
 *
 * Turns the flat, display-ordered comment records produced by extraction into
 * a strict forest of CommentNodes. Input may be incomplete (parents deleted or
 * beyond a "load more" boundary) or malformed (parent cycles); every record
 * still ends up as exactly one node.
 */

import { normalizeId } from './identifiers.js';
import type { CommentNode, CommentRecord, CommentThread, NormalizedId } from '../types.js';

const ROOT = -1;

interface MutableNode {
  record: CommentRecord;
  children: MutableNode[];
  truncated: boolean;
}

interface Placement {
  parent: number;
  truncated: boolean;
}

/**
 * Build the reply tree for a post.
 *
 * - Siblings keep the relative order they have in `flat`.
 * - A comment whose parent is absent is marked `truncated`. If a placeholder
 *   lists the missing parent among the ids it hides, the comment goes where
 *   that placeholder is (under the placeholder's parent); otherwise it becomes
 *   a root.
 * - Placeholders are always leaves.
 * - A parent chain that loops back on itself is broken by detaching the
 *   earliest member of the loop to a truncated root.
 *
 * Throws InvalidIdentifierError only when a record carries an empty id.
 */
export function buildCommentTree(postId: string, flat: readonly CommentRecord[]): CommentThread {
  const threadPostId = normalizeId(postId);
  const records = flat.map(normalizeRecord);

  const realIndexById = new Map<NormalizedId, number>();
  const claimedBy = new Map<NormalizedId, number>();

  records.forEach((record, index) => {
    if (record.isMorePlaceholder) {
      for (const hidden of record.moreIds ?? []) {
        const id = normalizeId(hidden);
        if (!claimedBy.has(id)) claimedBy.set(id, index);
      }
    } else if (!realIndexById.has(record.commentId)) {
      realIndexById.set(record.commentId, index);
    }
  });

  const directParent = (record: CommentRecord): Placement | null => {
    if (record.parentId === null || record.parentId === threadPostId) {
      return { parent: ROOT, truncated: false };
    }
    const parent = realIndexById.get(record.parentId);
    return parent === undefined ? null : { parent, truncated: false };
  };

  // Placeholders first: a real comment may be placed relative to one.
  const placements = new Array<Placement>(records.length);
  records.forEach((record, index) => {
    if (record.isMorePlaceholder) {
      placements[index] = directParent(record) ?? { parent: ROOT, truncated: true };
    }
  });

  records.forEach((record, index) => {
    if (record.isMorePlaceholder) return;

    const direct = directParent(record);
    if (direct) {
      placements[index] = direct;
      return;
    }

    // record.parentId is non-null here: directParent only misses on an unknown id.
    const claimant = record.parentId === null ? undefined : claimedBy.get(record.parentId);
    placements[index] = {
      parent: claimant === undefined ? ROOT : placements[claimant].parent,
      truncated: true,
    };
  });

  breakCycles(placements);

  const nodes: MutableNode[] = records.map((record, index) => ({
    record,
    children: [],
    truncated: placements[index].truncated,
  }));

  const roots: MutableNode[] = [];
  placements.forEach(({ parent }, index) => {
    if (parent === ROOT) {
      roots.push(nodes[index]);
    } else {
      nodes[parent].children.push(nodes[index]);
    }
  });

  return { postId: threadPostId, roots };
}

/** Pre-order list of every record in the thread (placeholders included). */
export function flattenThread(thread: CommentThread): CommentRecord[] {
  const out: CommentRecord[] = [];
  const visit = (node: CommentNode): void => {
    out.push(node.record);
    node.children.forEach(visit);
  };
  thread.roots.forEach(visit);
  return out;
}

/** Total number of nodes in a forest, placeholders included. */
export function countNodes(roots: readonly CommentNode[]): number {
  let total = 0;
  const stack = [...roots];
  while (stack.length > 0) {
    const node = stack.pop();
    if (!node) break;
    total++;
    stack.push(...node.children);
  }
  return total;
}

/** Find the first real comment with the given id (any case). */
export function findComment(thread: CommentThread, commentId: string): CommentNode | null {
  const target = normalizeId(commentId);
  const stack = [...thread.roots].reverse();
  while (stack.length > 0) {
    const node = stack.pop();
    if (!node) break;
    if (!node.record.isMorePlaceholder && node.record.commentId === target) return node;
    for (let i = node.children.length - 1; i >= 0; i--) {
      stack.push(node.children[i]);
    }
  }
  return null;
}

// ---------------------------------------------------------------------------
// Internals
// ---------------------------------------------------------------------------

function normalizeRecord(record: CommentRecord): CommentRecord {
  return {
    ...record,
    commentId: normalizeId(record.commentId),
    parentId: record.parentId === null ? null : normalizeId(record.parentId),
    postId: normalizeId(record.postId),
  };
}

/**
 * Walk every parent chain once. When a walk reaches a node that is already on
 * the current path the chain loops; its earliest member becomes a truncated root.
 */
function breakCycles(placements: Placement[]): void {
  const UNVISITED = 0;
  const ON_PATH = 1;
  const DONE = 2;
  const state = new Array<number>(placements.length).fill(UNVISITED);

  for (let start = 0; start < placements.length; start++) {
    const path: number[] = [];
    let current = start;

    while (current !== ROOT && state[current] === UNVISITED) {
      state[current] = ON_PATH;
      path.push(current);
      current = placements[current].parent;
    }

    if (current !== ROOT && state[current] === ON_PATH) {
      const loop = path.slice(path.indexOf(current));
      const detached = Math.min(...loop);
      placements[detached] = { parent: ROOT, truncated: true };
    }

    for (const index of path) state[index] = DONE;
  }
}
