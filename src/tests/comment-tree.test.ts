/**
 * Tests for comment thread reconstruction
 */

import { describe, it, expect } from 'vitest';
import { buildCommentTree, countNodes, findComment, flattenThread } from '../core/comment-tree.js';
import { InvalidIdentifierError, type CommentNode, type CommentRecord, type CommentThread } from '../types.js';

const POST_ID = 'post01';

function comment(commentId: string, parentId: string | null, extra: Partial<CommentRecord> = {}): CommentRecord {
  return {
    commentId,
    parentId,
    postId: POST_ID,
    author: 'tester',
    body: `body of ${commentId}`,
    bodyHtml: null,
    bodyMarkdown: null,
    score: 1,
    createdAt: null,
    depthHint: null,
    permalink: null,
    isDeleted: false,
    isRemoved: false,
    isSubmitter: false,
    distinguished: null,
    stickied: false,
    isMorePlaceholder: false,
    ...extra,
  };
}

function more(commentId: string, parentId: string | null, moreIds: string[]): CommentRecord {
  return comment(commentId, parentId, { isMorePlaceholder: true, moreIds, moreCount: moreIds.length, author: null, body: null });
}

interface Shape {
  id: string;
  truncated: boolean;
  children: Shape[];
}

function shape(node: CommentNode): Shape {
  return { id: node.record.commentId, truncated: node.truncated, children: node.children.map(shape) };
}

function forest(thread: CommentThread): Shape[] {
  return thread.roots.map(shape);
}

describe('buildCommentTree', () => {
  it('nests replies under their parents', () => {
    const thread = buildCommentTree(POST_ID, [
      comment('aaa111', null),
      comment('bbb222', 'aaa111'),
      comment('ccc333', 'bbb222'),
      comment('ddd444', null),
    ]);

    expect(thread.postId).toBe('post01');
    expect(forest(thread)).toEqual([
      {
        id: 'aaa111',
        truncated: false,
        children: [{ id: 'bbb222', truncated: false, children: [{ id: 'ccc333', truncated: false, children: [] }] }],
      },
      { id: 'ddd444', truncated: false, children: [] },
    ]);
  });

  it('keeps siblings in input order', () => {
    const thread = buildCommentTree(POST_ID, [
      comment('root01', null),
      comment('kid003', 'root01'),
      comment('kid001', 'root01'),
      comment('kid002', 'root01'),
    ]);

    expect(thread.roots[0].children.map((n) => n.record.commentId)).toEqual(['kid003', 'kid001', 'kid002']);
  });

  it('attaches children that appear before their parent', () => {
    const thread = buildCommentTree(POST_ID, [comment('child1', 'parent'), comment('parent', null)]);

    expect(forest(thread)).toEqual([
      { id: 'parent', truncated: false, children: [{ id: 'child1', truncated: false, children: [] }] },
    ]);
  });

  it('treats a parent id equal to the post id as top level', () => {
    const thread = buildCommentTree('POST01', [comment('aaa111', 'Post01')]);

    expect(forest(thread)).toEqual([{ id: 'aaa111', truncated: false, children: [] }]);
  });

  it('links ids case-insensitively', () => {
    const thread = buildCommentTree(POST_ID, [comment('AbC123', null), comment('def456', 'ABC123')]);

    expect(thread.roots).toHaveLength(1);
    expect(thread.roots[0].record.commentId).toBe('abc123');
    expect(thread.roots[0].children[0].record.commentId).toBe('def456');
  });

  it('turns comments with a missing parent into truncated roots', () => {
    const thread = buildCommentTree(POST_ID, [
      comment('aaa111', null),
      comment('orphan', 'gone99'),
      comment('bbb222', 'orphan'),
    ]);

    expect(forest(thread)).toEqual([
      { id: 'aaa111', truncated: false, children: [] },
      { id: 'orphan', truncated: true, children: [{ id: 'bbb222', truncated: false, children: [] }] },
    ]);
  });

  it('places "load more" placeholders as leaves under their parent', () => {
    const thread = buildCommentTree(POST_ID, [
      comment('aaa111', null),
      comment('bbb222', 'aaa111'),
      more('more_1', 'aaa111', ['ccc333', 'ddd444']),
    ]);

    const [root] = thread.roots;
    expect(root.children.map((n) => n.record.commentId)).toEqual(['bbb222', 'more_1']);
    expect(root.children[1].children).toHaveLength(0);
    expect(root.children[1].truncated).toBe(false);
  });

  it('never hangs comments under a placeholder, even one sharing the parent id', () => {
    const thread = buildCommentTree(POST_ID, [more('xyz789', null, []), comment('reply1', 'xyz789')]);

    expect(forest(thread)).toEqual([
      { id: 'xyz789', truncated: false, children: [] },
      { id: 'reply1', truncated: true, children: [] },
    ]);
  });

  it('places a comment whose parent is hidden behind a placeholder where the placeholder is', () => {
    const thread = buildCommentTree(POST_ID, [
      comment('aaa111', null),
      more('more_1', 'aaa111', ['hidden']),
      comment('late01', 'hidden'),
    ]);

    expect(forest(thread)).toEqual([
      {
        id: 'aaa111',
        truncated: false,
        children: [
          { id: 'more_1', truncated: false, children: [] },
          { id: 'late01', truncated: true, children: [] },
        ],
      },
    ]);
  });

  it('makes a claimed comment a truncated root when the placeholder is top level', () => {
    const thread = buildCommentTree(POST_ID, [more('more_1', null, ['HIDDEN']), comment('late01', 'hidden')]);

    expect(forest(thread)).toEqual([
      { id: 'more_1', truncated: false, children: [] },
      { id: 'late01', truncated: true, children: [] },
    ]);
  });

  it('roots a placeholder whose parent is missing', () => {
    const thread = buildCommentTree(POST_ID, [more('more_1', 'gone99', [])]);

    expect(forest(thread)).toEqual([{ id: 'more_1', truncated: true, children: [] }]);
  });

  it('breaks a two-comment cycle at the earliest member', () => {
    const thread = buildCommentTree(POST_ID, [
      comment('aaa111', 'bbb222'),
      comment('bbb222', 'aaa111'),
      comment('ccc333', null),
    ]);

    expect(forest(thread)).toEqual([
      { id: 'aaa111', truncated: true, children: [{ id: 'bbb222', truncated: false, children: [] }] },
      { id: 'ccc333', truncated: false, children: [] },
    ]);
  });

  it('breaks a self-reference', () => {
    const thread = buildCommentTree(POST_ID, [comment('self01', 'self01')]);

    expect(forest(thread)).toEqual([{ id: 'self01', truncated: true, children: [] }]);
  });

  it('keeps the tail that feeds into a cycle attached', () => {
    const thread = buildCommentTree(POST_ID, [
      comment('tail01', 'loop02'),
      comment('loop01', 'loop02'),
      comment('loop02', 'loop01'),
    ]);

    // loop01 (index 1) is the earliest loop member
    expect(forest(thread)).toEqual([
      {
        id: 'loop01',
        truncated: true,
        children: [
          {
            id: 'loop02',
            truncated: false,
            children: [{ id: 'tail01', truncated: false, children: [] }],
          },
        ],
      },
    ]);
  });

  it('returns an empty forest for no comments', () => {
    const thread = buildCommentTree('ABCDE', []);
    expect(thread).toEqual({ postId: 'abcde', roots: [] });
  });

  it('rejects records with an empty id', () => {
    expect(() => buildCommentTree(POST_ID, [comment(' ', null)])).toThrow(InvalidIdentifierError);
  });

  it('does not modify the input records', () => {
    const input = [comment('UPPER1', null)];
    buildCommentTree(POST_ID, input);
    expect(input[0].commentId).toBe('UPPER1');
  });
});

describe('flattenThread / countNodes', () => {
  const flat = [
    comment('aaa111', null),
    comment('bbb222', 'aaa111'),
    more('more_1', 'aaa111', ['hidden']),
    comment('ccc333', null),
    comment('ddd444', 'bbb222'),
    comment('late01', 'hidden'),
  ];

  it('lists records in pre-order', () => {
    const thread = buildCommentTree(POST_ID, flat);
    expect(flattenThread(thread).map((r) => r.commentId)).toEqual([
      'aaa111',
      'bbb222',
      'ddd444',
      'more_1',
      'late01',
      'ccc333',
    ]);
  });

  it('counts every record exactly once', () => {
    const thread = buildCommentTree(POST_ID, flat);
    expect(countNodes(thread.roots)).toBe(flat.length);
  });

  it('rebuilds to the same forest from its own flattening', () => {
    const thread = buildCommentTree(POST_ID, flat);
    const rebuilt = buildCommentTree(POST_ID, flattenThread(thread));
    expect(forest(rebuilt)).toEqual(forest(thread));
  });
});

describe('findComment', () => {
  const thread = buildCommentTree(POST_ID, [
    comment('aaa111', null),
    comment('bbb222', 'aaa111'),
    more('ccc333', 'aaa111', []),
  ]);

  it('finds a nested comment by id, any case', () => {
    expect(findComment(thread, 'BBB222')?.record.commentId).toBe('bbb222');
  });

  it('skips placeholders', () => {
    expect(findComment(thread, 'ccc333')).toBeNull();
  });

  it('returns null for an unknown id', () => {
    expect(findComment(thread, 'zzz999')).toBeNull();
  });
});

describe('buildCommentTree: generated threads', () => {
  // Small deterministic PRNG so failures reproduce
  function mulberry32(seed: number): () => number {
    let a = seed;
    return () => {
      a = (a + 0x6d2b79f5) | 0;
      let t = Math.imul(a ^ (a >>> 15), 1 | a);
      t = (t + Math.imul(t ^ (t >>> 7), 61 | t)) ^ t;
      return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
    };
  }

  function generate(seed: number, size: number): CommentRecord[] {
    const random = mulberry32(seed);
    const ids = Array.from({ length: size }, (_, i) => `c${seed}x${i}`);
    const claimed = new Set<string>();
    const records: CommentRecord[] = [];

    for (let i = 0; i < size; i++) {
      const roll = random();
      let parentId: string | null;
      if (roll < 0.2) parentId = null;
      else if (roll < 0.3) parentId = `gone${Math.floor(random() * 5)}`;
      else parentId = ids[Math.floor(random() * size)];

      if (random() < 0.15) {
        const hidden = `gone${Math.floor(random() * 5)}`;
        const moreIds = claimed.has(hidden) ? [] : [hidden];
        moreIds.forEach((id) => claimed.add(id));
        records.push(more(ids[i], parentId, moreIds));
      } else {
        records.push(comment(ids[i], parentId));
      }
    }
    return records;
  }

  for (const seed of [1, 7, 42, 1234, 98765]) {
    it(`keeps every record and rebuilds identically (seed ${seed})`, () => {
      const flat = generate(seed, 60);
      const thread = buildCommentTree(POST_ID, flat);

      expect(countNodes(thread.roots)).toBe(flat.length);
      const flattened = flattenThread(thread);
      expect(new Set(flattened.map((r) => r.commentId)).size).toBe(flat.length);

      for (const node of thread.roots) {
        expect(findLoop(node, new Set())).toBe(false);
      }

      const rebuilt = buildCommentTree(POST_ID, flattened);
      expect(forest(rebuilt)).toEqual(forest(thread));
    });
  }

  function findLoop(node: CommentNode, seen: Set<CommentNode>): boolean {
    if (seen.has(node)) return true;
    seen.add(node);
    if (node.record.isMorePlaceholder && node.children.length > 0) return true;
    return node.children.some((child) => findLoop(child, seen));
  }
});
