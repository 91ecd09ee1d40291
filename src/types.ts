/**
 * Core types for threadscope
 */

// ── Identifiers ───────────────────────────────────────────────────────────────

/**
 * A post or comment id in canonical (lowercase) form.
 * Only `normalizeId()` produces these; compare and index by this form only.
 */
export type NormalizedId = string;

// ── Content references ────────────────────────────────────────────────────────

export type ContentKind = 'post' | 'comment' | 'user-profile' | 'subreddit' | 'frontpage';

/** Listing order segments recognized after a subreddit or on the frontpage. */
export const LISTING_SORTS = ['hot', 'new', 'top', 'rising', 'controversial', 'best', 'gilded'] as const;

export type ListingSort = (typeof LISTING_SORTS)[number];

/** Tabs of a user profile page. */
export const USER_SECTIONS = ['overview', 'submitted', 'comments'] as const;

export type UserSection = (typeof USER_SECTIONS)[number];

/** A contextual hint carried by the URL (`?context=N` on a comment permalink). */
export interface ContextInfo {
  /** Number of parent levels to show above the linked comment */
  readonly parentDepth: number;
}

interface ReferenceBase {
  /** The URL exactly as given to the resolver */
  readonly originalUrl: string;
  /** Where the fetch collaborator should go: always on the old.reddit.com host */
  readonly fetchUrl: string;
}

export interface PostReference extends ReferenceBase {
  readonly kind: 'post';
  readonly postId: NormalizedId;
  /** Absent for shortlinks and `/comments/<id>` URLs */
  readonly subreddit?: string;
}

export interface CommentReference extends ReferenceBase {
  readonly kind: 'comment';
  readonly postId: NormalizedId;
  readonly commentId: NormalizedId;
  readonly subreddit?: string;
  readonly context?: ContextInfo;
}

export interface UserProfileReference extends ReferenceBase {
  readonly kind: 'user-profile';
  readonly username: string;
  readonly section?: UserSection;
}

export interface SubredditReference extends ReferenceBase {
  readonly kind: 'subreddit';
  readonly subreddit: string;
  readonly sort?: ListingSort;
}

export interface FrontpageReference extends ReferenceBase {
  readonly kind: 'frontpage';
  readonly sort?: ListingSort;
}

export type ContentReference =
  | PostReference
  | CommentReference
  | UserProfileReference
  | SubredditReference
  | FrontpageReference;

/** References whose page is a discussion thread (post body + comments). */
export type ThreadReference = PostReference | CommentReference;

/** References whose page is a list of posts. */
export type ListingReference = UserProfileReference | SubredditReference | FrontpageReference;

export function isThreadReference(reference: ContentReference): reference is ThreadReference {
  return reference.kind === 'post' || reference.kind === 'comment';
}

// ── Extracted records ─────────────────────────────────────────────────────────

export type PostContent =
  | { readonly type: 'text'; readonly text: string; readonly html: string; readonly markdown: string }
  | { readonly type: 'link'; readonly url: string };

export interface PostRecord {
  readonly postId: string;
  readonly title: string | null;
  readonly author: string | null;
  readonly subreddit: string | null;
  readonly score: number | null;
  /** ISO-8601 timestamp */
  readonly createdAt: string | null;
  readonly bodyOrLink: PostContent | null;
  readonly numComments: number | null;
  readonly permalink: string | null;
  readonly domain: string | null;
  readonly flair: string | null;
  readonly isNsfw: boolean;
  readonly isSpoiler: boolean;
}

export interface CommentRecord {
  readonly commentId: string;
  /** `null` for a top-level comment */
  readonly parentId: string | null;
  readonly postId: string;
  readonly author: string | null;
  /** Plain text body */
  readonly body: string | null;
  readonly bodyHtml: string | null;
  readonly bodyMarkdown: string | null;
  readonly score: number | null;
  /** ISO-8601 timestamp */
  readonly createdAt: string | null;
  /** Nesting depth as seen in the markup (0 = top-level) */
  readonly depthHint: number | null;
  readonly permalink: string | null;
  readonly isDeleted: boolean;
  readonly isRemoved: boolean;
  readonly isSubmitter: boolean;
  readonly distinguished: 'moderator' | 'admin' | null;
  readonly stickied: boolean;
  /** A "load more replies" stub rather than real content */
  readonly isMorePlaceholder: boolean;
  /** Placeholders only: ids of the comments hidden behind the stub */
  readonly moreIds?: readonly string[];
  /** Placeholders only: reply count shown on the stub */
  readonly moreCount?: number | null;
}

export interface Listing {
  readonly posts: readonly PostRecord[];
  /** Absolute URL of the next listing page, when the page links one */
  readonly nextPageUrl: string | null;
}

// ── Threads ───────────────────────────────────────────────────────────────────

export interface CommentNode {
  readonly record: CommentRecord;
  readonly children: readonly CommentNode[];
  /** The node's real parent exists but is absent from the available data */
  readonly truncated: boolean;
}

export interface CommentThread {
  readonly postId: NormalizedId;
  readonly roots: readonly CommentNode[];
}

// ── Fetching ──────────────────────────────────────────────────────────────────

export interface FetchConfig {
  /** Custom user agent (default: a realistic desktop Chrome UA) */
  userAgent?: string;
  /** Extra request headers, merged over the browser-like defaults */
  headers?: Record<string, string>;
  /** Per-request timeout in milliseconds */
  timeoutMs: number;
  /** Total attempts for retryable failures (1 = no retry) */
  maxAttempts: number;
  /** First backoff delay; doubles after every failed attempt */
  retryBaseDelayMs: number;
  /** HTTP(S) proxy URL */
  proxy?: string;
}

export const DEFAULT_FETCH_CONFIG: Readonly<FetchConfig> = {
  timeoutMs: 30000,
  maxAttempts: 3,
  retryBaseDelayMs: 1000,
};

/** Downloads a page and returns its markup. */
export type PageFetcher = (url: string, signal?: AbortSignal) => Promise<string>;

// ── Pipeline results ──────────────────────────────────────────────────────────

export interface ThreadResult {
  readonly reference: ThreadReference;
  readonly post: PostRecord;
  readonly thread: CommentThread;
  /** For comment permalinks, the node of the linked comment (null if it was not on the page) */
  readonly focus: CommentNode | null;
}

export interface ListingResult {
  readonly reference: ListingReference;
  readonly listing: Listing;
}

export type ScrapeResult = ThreadResult | ListingResult;

// ── Errors ────────────────────────────────────────────────────────────────────

export class ThreadscopeError extends Error {
  constructor(message: string, public code?: string) {
    super(message);
    this.name = 'ThreadscopeError';
  }
}

export class InvalidIdentifierError extends ThreadscopeError {
  constructor(message: string) {
    super(message, 'INVALID_IDENTIFIER');
    this.name = 'InvalidIdentifierError';
  }
}

export class UnrecognizedUrlError extends ThreadscopeError {
  constructor(message: string, public url: string) {
    super(message, 'UNRECOGNIZED_URL');
    this.name = 'UnrecognizedUrlError';
  }
}

export class FetchError extends ThreadscopeError {
  constructor(
    message: string,
    public retryable = false,
    public statusCode?: number,
    code = 'FETCH',
  ) {
    super(message, code);
    this.name = 'FetchError';
  }
}

export class TimeoutError extends FetchError {
  constructor(message: string) {
    super(message, false, undefined, 'TIMEOUT');
    this.name = 'TimeoutError';
  }
}

export class BlockedError extends FetchError {
  readonly blocked = true;

  constructor(message: string, statusCode?: number) {
    super(message, false, statusCode, 'BLOCKED');
    this.name = 'BlockedError';
  }
}

export class NetworkError extends FetchError {
  constructor(message: string, retryable = true, statusCode?: number) {
    super(message, retryable, statusCode, 'NETWORK');
    this.name = 'NetworkError';
  }
}

export class ExtractionError extends ThreadscopeError {
  constructor(message: string) {
    super(message, 'EXTRACTION');
    this.name = 'ExtractionError';
  }
}
