/**
 * ContentExtractor for old.reddit.com markup.
 *
 * Page anatomy this relies on:
 *  - posts are `div.thing.link` with their metadata in data-* attributes
 *  - a thread's comments live in `div.commentarea > div.sitetable`, each
 *    `div.thing.comment` nesting its replies in `div.child > div.sitetable`
 *  - "load more comments" stubs are `div.thing.morechildren`; "continue this
 *    thread" links are `span.deepthread`
 *  - listing pages keep their posts in `#siteTable`
 */

import * as cheerio from 'cheerio';
import type { Element } from 'domhandler';
import type { ContentExtractor } from './extractor.js';
import { stripFullname } from './identifiers.js';
import { htmlToMarkdown } from './markdown.js';
import {
  ExtractionError,
  isThreadReference,
  type CommentRecord,
  type ContentReference,
  type Listing,
  type PostContent,
  type PostRecord,
} from '../types.js';

// ---------------------------------------------------------------------------
// Posts
// ---------------------------------------------------------------------------

export function extractPost(markup: string, reference: ContentReference): PostRecord {
  if (!isThreadReference(reference)) {
    throw new ExtractionError(`A ${reference.kind} page has no single post`);
  }

  const $ = cheerio.load(markup);
  const postNode = $('div.thing.link').first();
  if (postNode.length === 0) {
    if (process.env.DEBUG) console.debug('[threadscope]', 'no post element, HTML starts with:', markup.slice(0, 1000).replace(/\n/g, ' '));
    throw new ExtractionError('Could not find post element in HTML');
  }

  const post = parsePost(postNode);
  if (!post) {
    throw new ExtractionError('Post element has no ID');
  }
  return post;
}

function parsePost($post: cheerio.Cheerio<Element>): PostRecord | null {
  const postId = stripFullname($post.attr('data-fullname'));
  if (!postId) return null;

  const domain = $post.attr('data-domain') ?? null;
  const flair = $post.find('span.linkflairlabel').first().text().trim();

  return {
    postId,
    title: normalizeText($post.find('a.title').first().text()),
    author: $post.find('p.tagline a.author').first().text().trim() ||
      ($post.find('p.tagline').first().text().includes('[deleted]') ? '[deleted]' : null),
    subreddit: $post.attr('data-subreddit') ?? null,
    score: parseInteger($post.find('div.score.unvoted').first().attr('title')),
    createdAt: parseTimestamp($post.find('time.live-timestamp').first().attr('datetime')),
    bodyOrLink: parsePostContent($post, domain),
    numComments: parseInteger($post.attr('data-comments-count')),
    permalink: $post.attr('data-permalink') ?? null,
    domain,
    flair: flair || null,
    isNsfw: $post.attr('data-nsfw') === 'true',
    isSpoiler: $post.attr('data-spoiler') === 'true',
  };
}

function parsePostContent($post: cheerio.Cheerio<Element>, domain: string | null): PostContent | null {
  const url = $post.attr('data-url');
  const isSelf = domain?.startsWith('self.') || url?.startsWith('/r/');

  if (isSelf) {
    const md = $post.find('div.expando div.usertext-body div.md').first();
    const html = md.length > 0 ? (md.html() ?? '').trim() : '';
    return {
      type: 'text',
      text: md.length > 0 ? md.text().trim() : '',
      html,
      markdown: html ? htmlToMarkdown(html) : '',
    };
  }

  return url ? { type: 'link', url } : null;
}

// ---------------------------------------------------------------------------
// Comments
// ---------------------------------------------------------------------------

export function extractComments(markup: string, reference: ContentReference): CommentRecord[] {
  if (!isThreadReference(reference)) {
    throw new ExtractionError(`A ${reference.kind} page has no comment thread`);
  }

  const $ = cheerio.load(markup);
  const area = $('div.commentarea').first();
  if (area.length === 0) {
    throw new ExtractionError('Could not find comment area in HTML');
  }

  const postId = stripFullname($('div.thing.link').first().attr('data-fullname')) ?? reference.postId;
  const out: CommentRecord[] = [];
  const table = area.children('div.sitetable').first();
  if (table.length > 0) {
    walkSitetable($, table, { postId, parentId: null, depth: 0 }, out);
  }
  return out;
}

interface WalkState {
  postId: string;
  /** Id of the comment whose reply table is being walked */
  parentId: string | null;
  depth: number;
}

function walkSitetable(
  $: cheerio.CheerioAPI,
  table: cheerio.Cheerio<Element>,
  state: WalkState,
  out: CommentRecord[],
): void {
  for (const el of table.children('div.thing').toArray()) {
    const $thing = $(el);

    if ($thing.hasClass('morechildren') || $thing.attr('data-type') === 'morechildren') {
      out.push(parseMoreChildren($thing, state, out.length));
      continue;
    }
    if (!$thing.hasClass('comment')) continue;

    const comment = parseComment($thing, state);
    if (!comment) {
      if (process.env.DEBUG) console.debug('[threadscope]', 'skipped comment node without id or entry');
      continue;
    }
    out.push(comment);

    const childArea = $thing.children('div.child').first();
    const childTable = childArea.children('div.sitetable').first();
    const next: WalkState = { postId: state.postId, parentId: comment.commentId, depth: state.depth + 1 };
    if (childTable.length > 0) {
      walkSitetable($, childTable, next, out);
    }

    const deepthread = childArea.children('span.deepthread').add(childTable.children('span.deepthread')).first();
    if (deepthread.length > 0) {
      out.push(parseDeepthread(deepthread, next));
    }
  }
}

function parseComment($thing: cheerio.Cheerio<Element>, state: WalkState): CommentRecord | null {
  const commentId = stripFullname($thing.attr('data-fullname'));
  const entry = $thing.children('div.entry').first();
  if (!commentId || entry.length === 0) return null;

  const content = entry.find('div.usertext-body div.md').first();
  const bodyHtml = content.length > 0 ? (content.html() ?? '').trim() : null;
  const body = content.length > 0 ? content.text().trim() : null;

  const isRemoved = body === '[removed]';
  const isDeleted = $thing.hasClass('deleted') || body === '[deleted]';

  const authorLink = entry.find('a.author').first();
  const tagline = entry.find('p.tagline').first().text();
  const author = authorLink.text().trim() || (isDeleted || tagline.includes('[deleted]') ? '[deleted]' : null);

  const parentHref = entry.find("a[data-event-action='parent']").first().attr('href');

  return {
    commentId,
    parentId: parseParentId(parentHref) ?? state.parentId,
    postId: state.postId,
    author,
    body,
    bodyHtml,
    bodyMarkdown: bodyHtml ? htmlToMarkdown(bodyHtml) : null,
    score: parseInteger(entry.find('span.score.unvoted').first().attr('title')),
    createdAt: parseTimestamp(entry.find('time.live-timestamp').first().attr('datetime')),
    depthHint: state.depth,
    permalink: entry.find("a[data-event-action='permalink']").first().attr('href') ?? null,
    isDeleted,
    isRemoved,
    isSubmitter: $thing.hasClass('submitter') || authorLink.hasClass('submitter'),
    distinguished: parseDistinguished($thing, authorLink),
    stickied: $thing.hasClass('stickied'),
    isMorePlaceholder: false,
  };
}

/**
 * The parent link is `#<id>` on thread pages and a full comment permalink
 * (`/r/<sub>/comments/<post>/<slug>/<id>/`) on permalink pages.
 */
function parseParentId(href: string | undefined): string | null {
  if (!href) return null;
  if (href.trim().startsWith('#')) return stripFullname(href);

  let path: string;
  try {
    path = new URL(href, 'https://old.reddit.com').pathname;
  } catch {
    return null;
  }
  const segments = path.split('/').filter(Boolean);
  const at = segments.indexOf('comments');
  return at >= 0 && segments.length > at + 3 ? stripFullname(segments[at + 3]) : null;
}

function parseDistinguished(
  $thing: cheerio.Cheerio<Element>,
  authorLink: cheerio.Cheerio<Element>,
): CommentRecord['distinguished'] {
  if ($thing.hasClass('moderator') || authorLink.hasClass('moderator')) return 'moderator';
  if ($thing.hasClass('admin') || authorLink.hasClass('admin')) return 'admin';
  return null;
}

/**
 * `<a onclick="return morechildren(this, 't3_post', 'sort', 'id1,id2', ...)">`
 * carries the ids the stub would load; the label carries the reply count.
 */
function parseMoreChildren($thing: cheerio.Cheerio<Element>, state: WalkState, position: number): CommentRecord {
  const onclick = $thing.find('span.morecomments a').first().attr('onclick') ?? '';
  const idList = onclick.match(/morechildren\(\s*this\s*,\s*'[^']*'\s*,\s*'[^']*'\s*,\s*'([^']*)'/)?.[1] ?? '';
  const moreIds = idList
    .split(',')
    .map((id) => stripFullname(id))
    .filter((id): id is string => id !== null);

  const count = $thing.text().match(/(\d+)\s+repl/);

  return placeholder({
    commentId: stripFullname($thing.attr('data-fullname')) ?? `more_${state.parentId ?? state.postId}_${position}`,
    state,
    moreIds,
    moreCount: count ? parseInt(count[1], 10) : null,
  });
}

/** "continue this thread" links point at the first hidden reply. */
function parseDeepthread($span: cheerio.Cheerio<Element>, state: WalkState): CommentRecord {
  const href = $span.find('a').first().attr('href') ?? '';
  const segments = href.split(/[?#]/)[0].split('/').filter(Boolean);
  const hiddenId = segments.length >= 6 && segments[2] === 'comments' ? segments[5] : null;

  return placeholder({
    commentId: `continue_${state.parentId ?? state.postId}`,
    state,
    moreIds: hiddenId ? [hiddenId] : [],
    moreCount: null,
    permalink: href || null,
  });
}

function placeholder(args: {
  commentId: string;
  state: WalkState;
  moreIds: string[];
  moreCount: number | null;
  permalink?: string | null;
}): CommentRecord {
  return {
    commentId: args.commentId,
    parentId: args.state.parentId,
    postId: args.state.postId,
    author: null,
    body: null,
    bodyHtml: null,
    bodyMarkdown: null,
    score: null,
    createdAt: null,
    depthHint: args.state.depth,
    permalink: args.permalink ?? null,
    isDeleted: false,
    isRemoved: false,
    isSubmitter: false,
    distinguished: null,
    stickied: false,
    isMorePlaceholder: true,
    moreIds: args.moreIds,
    moreCount: args.moreCount,
  };
}

// ---------------------------------------------------------------------------
// Listings
// ---------------------------------------------------------------------------

export function extractListing(markup: string, reference: ContentReference): Listing {
  if (isThreadReference(reference)) {
    throw new ExtractionError(`A ${reference.kind} page is not a listing`);
  }

  const $ = cheerio.load(markup);
  const table = $('#siteTable').first();
  if (table.length === 0) {
    throw new ExtractionError('Could not find listing in HTML');
  }

  const posts: PostRecord[] = [];
  for (const el of table.children('div.thing.link').toArray()) {
    const $thing = $(el);
    if ($thing.hasClass('promoted')) continue;
    const post = parsePost($thing);
    if (post) posts.push(post);
  }

  return {
    posts,
    nextPageUrl: resolveNextPage($('span.next-button a').first().attr('href'), reference.fetchUrl),
  };
}

function resolveNextPage(href: string | undefined, base: string): string | null {
  if (!href) return null;
  try {
    return new URL(href, base).href;
  } catch {
    if (process.env.DEBUG) console.debug('[threadscope]', 'ignoring malformed next-page link:', href);
    return null;
  }
}

export const oldRedditExtractor: ContentExtractor = {
  extractPost,
  extractComments,
  extractListing,
};

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

function normalizeText(text: string): string | null {
  const normalized = text.split(/\s+/).filter(Boolean).join(' ');
  return normalized || null;
}

function parseInteger(value: string | undefined): number | null {
  if (!value || !/^-?\d+$/.test(value.trim())) return null;
  return parseInt(value, 10);
}

function parseTimestamp(value: string | undefined): string | null {
  if (!value) return null;
  const date = new Date(value);
  return Number.isNaN(date.getTime()) ? null : date.toISOString();
}
