/**
 * URL resolution: classify a Reddit URL into a typed ContentReference.
 *
 * Matchers run in a fixed order, most specific first, and the first one that
 * claims the path wins. A matcher returns null when the path is not its shape
 * and throws when the path is its shape but a required segment is missing or
 * malformed, so a broken URL never falls through to a looser matcher.
 */

import { normalizeId } from './identifiers.js';
import {
  LISTING_SORTS,
  USER_SECTIONS,
  UnrecognizedUrlError,
  type ContentReference,
  type ContextInfo,
  type ListingSort,
  type UserSection,
} from '../types.js';

/** Host every reference is fetched from: the simple-markup variant of the site. */
export const CANONICAL_HOST = 'old.reddit.com';

const SHORTLINK_HOSTS = new Set(['redd.it', 'www.redd.it']);

const POST_ID_RE = /^[a-zA-Z0-9]{5,8}$/;
const COMMENT_ID_RE = /^[a-zA-Z0-9]{6,10}$/;
const NAME_RE = /^[A-Za-z0-9_-]{2,32}$/;

interface ParsedUrl {
  url: string;
  host: string;
  segments: string[];
  search: URLSearchParams;
}

type Matcher = (parsed: ParsedUrl) => ContentReference | null;

// ---------------------------------------------------------------------------
// Matchers
// ---------------------------------------------------------------------------

const matchShortlink: Matcher = ({ url, host, segments }) => {
  if (!SHORTLINK_HOSTS.has(host)) return null;

  const slug = segments[0] ?? '';
  if (!POST_ID_RE.test(slug)) {
    throw new UnrecognizedUrlError('Shortlink is missing a valid post ID', url);
  }

  const postId = normalizeId(slug);
  return freeze({ kind: 'post', originalUrl: url, fetchUrl: canonicalUrl(`/comments/${postId}/`), postId });
};

const matchComment: Matcher = ({ url, segments, search }) => {
  const thread = threadSegments(segments);
  if (!thread || thread.rest.length < 2) return null;

  const candidate = thread.rest[1];
  if (!COMMENT_ID_RE.test(candidate)) return null;

  const postId = parsePostId(thread.postSegment, url);
  const commentId = normalizeId(candidate);
  const context = parseContext(search);
  const query = context ? `?context=${context.parentDepth}` : '';

  return freeze({
    kind: 'comment',
    originalUrl: url,
    fetchUrl: canonicalUrl(`/comments/${postId}/_/${commentId}/${query}`),
    postId,
    commentId,
    ...(thread.subreddit ? { subreddit: thread.subreddit } : {}),
    ...(context ? { context } : {}),
  });
};

const matchPost: Matcher = ({ url, segments }) => {
  const thread = threadSegments(segments);
  if (!thread) return null;

  const postId = parsePostId(thread.postSegment, url);
  const path = thread.subreddit ? `/r/${thread.subreddit}/comments/${postId}/` : `/comments/${postId}/`;

  return freeze({
    kind: 'post',
    originalUrl: url,
    fetchUrl: canonicalUrl(path),
    postId,
    ...(thread.subreddit ? { subreddit: thread.subreddit } : {}),
  });
};

const matchUserProfile: Matcher = ({ url, segments }) => {
  if (segments[0] !== 'u' && segments[0] !== 'user') return null;

  const username = segments[1];
  if (!username || !NAME_RE.test(username)) {
    throw new UnrecognizedUrlError('User URL is missing a valid username', url);
  }
  if (segments.length === 2) {
    return freeze({ kind: 'user-profile', originalUrl: url, fetchUrl: canonicalUrl(`/user/${username}/`), username });
  }

  const section = parseUserSection(segments[2]);
  if (!section) {
    throw new UnrecognizedUrlError(`Unsupported user page: ${segments[2]}`, url);
  }

  return freeze({
    kind: 'user-profile',
    originalUrl: url,
    fetchUrl: canonicalUrl(`/user/${username}/${section}/`),
    username,
    section,
  });
};

const matchSubreddit: Matcher = ({ url, segments }) => {
  if (segments[0] !== 'r') return null;

  const subreddit = segments[1];
  if (!subreddit || !NAME_RE.test(subreddit)) {
    throw new UnrecognizedUrlError('Subreddit URL is missing a valid subreddit name', url);
  }

  if (segments.length === 2) {
    return freeze({ kind: 'subreddit', originalUrl: url, fetchUrl: canonicalUrl(`/r/${subreddit}/`), subreddit });
  }

  const sort = parseSort(segments[2]);
  if (!sort) {
    throw new UnrecognizedUrlError(`Unsupported subreddit page: ${segments[2]}`, url);
  }

  return freeze({
    kind: 'subreddit',
    originalUrl: url,
    fetchUrl: canonicalUrl(`/r/${subreddit}/${sort}/`),
    subreddit,
    sort,
  });
};

const matchFrontpage: Matcher = ({ url, segments }) => {
  if (segments.length === 0) {
    return freeze({ kind: 'frontpage', originalUrl: url, fetchUrl: canonicalUrl('/') });
  }

  const sort = segments.length === 1 ? parseSort(segments[0]) : null;
  if (!sort) return null;

  return freeze({ kind: 'frontpage', originalUrl: url, fetchUrl: canonicalUrl(`/${sort}/`), sort });
};

/** Priority order: comment-within-post before bare post, profiles and listings last. */
const MATCHERS: readonly Matcher[] = [
  matchShortlink,
  matchComment,
  matchPost,
  matchUserProfile,
  matchSubreddit,
  matchFrontpage,
];

// ---------------------------------------------------------------------------
// Public API
// ---------------------------------------------------------------------------

/**
 * Classify a Reddit URL.
 *
 * Accepts reddit.com, any *.reddit.com mirror and redd.it shortlinks.
 * Throws UnrecognizedUrlError when the URL matches no known shape.
 *
 * @example
 * ```ts
 * const ref = resolveUrl('https://www.reddit.com/r/test/comments/NPM69H/title/');
 * // { kind: 'post', postId: 'npm69h', subreddit: 'test',
 * //   fetchUrl: 'https://old.reddit.com/r/test/comments/npm69h/', ... }
 * ```
 */
export function resolveUrl(url: string): ContentReference {
  const parsed = parseRedditUrl(url);

  for (const matcher of MATCHERS) {
    const reference = matcher(parsed);
    if (reference) return reference;
  }

  throw new UnrecognizedUrlError('URL does not match a supported Reddit pattern', url);
}

/** True when the host belongs to Reddit (including shortlink hosts). */
export function isRedditHost(hostname: string): boolean {
  const host = hostname.toLowerCase();
  return SHORTLINK_HOSTS.has(host) || host === 'reddit.com' || host.endsWith('.reddit.com');
}

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

function parseRedditUrl(input: string): ParsedUrl {
  const url = input.trim();
  if (!url) {
    throw new UnrecognizedUrlError('A non-empty Reddit URL is required', input);
  }

  let parsed: URL;
  try {
    parsed = new URL(url);
  } catch {
    throw new UnrecognizedUrlError('Invalid URL format', input);
  }

  if (parsed.protocol !== 'http:' && parsed.protocol !== 'https:') {
    throw new UnrecognizedUrlError('Only HTTP and HTTPS URLs are supported', input);
  }
  if (!isRedditHost(parsed.hostname)) {
    throw new UnrecognizedUrlError('URL does not belong to reddit', input);
  }

  return {
    url,
    host: parsed.hostname.toLowerCase(),
    segments: parsed.pathname.split('/').filter(Boolean).map(safeDecode),
    search: parsed.searchParams,
  };
}

/**
 * Split `/r/<sub>/comments/<id>/...` or `/comments/<id>/...` into parts.
 * Returns null for paths of another shape; throws when the id is missing.
 */
function threadSegments(
  segments: string[],
): { subreddit?: string; postSegment: string; rest: string[] } | null {
  let offset: number;
  let subreddit: string | undefined;

  if (segments[0] === 'comments') {
    offset = 1;
  } else if (segments[0] === 'r' && segments[2] === 'comments') {
    subreddit = segments[1];
    offset = 3;
  } else {
    return null;
  }

  return { subreddit, postSegment: segments[offset] ?? '', rest: segments.slice(offset + 1) };
}

function parsePostId(segment: string, url: string): string {
  if (!segment) {
    throw new UnrecognizedUrlError('URL is missing the post ID', url);
  }
  if (!POST_ID_RE.test(segment)) {
    throw new UnrecognizedUrlError('URL contains an invalid post ID', url);
  }
  return normalizeId(segment);
}

function parseContext(search: URLSearchParams): ContextInfo | undefined {
  const raw = search.get('context');
  if (!raw || !/^\d+$/.test(raw)) return undefined;

  const parentDepth = parseInt(raw, 10);
  return parentDepth > 0 ? { parentDepth } : undefined;
}

function parseSort(segment: string): ListingSort | null {
  const lowered = segment.toLowerCase();
  return LISTING_SORTS.find((sort) => sort === lowered) ?? null;
}

function parseUserSection(segment: string): UserSection | null {
  const lowered = segment.toLowerCase();
  return USER_SECTIONS.find((section) => section === lowered) ?? null;
}

function canonicalUrl(path: string): string {
  return `https://${CANONICAL_HOST}${path}`;
}

function safeDecode(segment: string): string {
  try {
    return decodeURIComponent(segment);
  } catch {
    return segment;
  }
}

function freeze<T extends ContentReference>(reference: T): T {
  return Object.freeze(reference);
}
