/**
 * threadscope - Reddit URLs to structured posts and threaded comments
 *
 * Main library export
 */

import { buildCommentTree, findComment } from './core/comment-tree.js';
import type { ContentExtractor } from './core/extractor.js';
import { createPageFetcher } from './core/fetcher.js';
import { oldRedditExtractor } from './core/old-reddit.js';
import { resolveUrl } from './core/url-resolver.js';
import {
  FetchError,
  isThreadReference,
  type FetchConfig,
  type PageFetcher,
  type ScrapeResult,
} from './types.js';

export * from './types.js';
export { normalizeId, stripFullname, sameId } from './core/identifiers.js';
export { resolveUrl, isRedditHost, CANONICAL_HOST } from './core/url-resolver.js';
export { buildCommentTree, flattenThread, countNodes, findComment } from './core/comment-tree.js';
export type { ContentExtractor } from './core/extractor.js';
export { oldRedditExtractor } from './core/old-reddit.js';
export { createPageFetcher, retryFetch } from './core/fetcher.js';
export { closePool } from './core/http-fetch.js';
export { htmlToMarkdown, renderThreadMarkdown, renderListingMarkdown } from './core/markdown.js';

export interface ScrapeOptions {
  /** Fetch settings for the default fetcher (ignored when `fetcher` is given) */
  fetch?: Partial<FetchConfig>;
  /** Replace the HTTP layer, e.g. with a cache or a test stub */
  fetcher?: PageFetcher;
  /** Replace the markup layer (default: old.reddit.com extractor) */
  extractor?: ContentExtractor;
  signal?: AbortSignal;
}

/**
 * Resolve a Reddit URL, fetch its page and turn it into structured data.
 *
 * Posts and comment permalinks yield the post, the rebuilt comment thread and
 * (for permalinks) the focused comment; user, subreddit and frontpage URLs
 * yield a listing. The first error ends the run: UnrecognizedUrlError before
 * any I/O, FetchError from the fetcher, ExtractionError from the markup.
 *
 * @example
 * ```typescript
 * import { scrape } from 'threadscope';
 *
 * const result = await scrape('https://www.reddit.com/r/test/comments/abc123/title/');
 * if ('thread' in result) {
 *   console.log(result.post.title, result.thread.roots.length);
 * }
 * ```
 */
export async function scrape(url: string, options: ScrapeOptions = {}): Promise<ScrapeResult> {
  const reference = resolveUrl(url);
  const fetcher = options.fetcher ?? createPageFetcher(options.fetch);
  const extractor = options.extractor ?? oldRedditExtractor;

  if (process.env.DEBUG) console.debug('[threadscope]', `resolved ${reference.kind}, fetching ${reference.fetchUrl}`);
  const markup = await fetchMarkup(fetcher, reference.fetchUrl, options.signal);

  if (!isThreadReference(reference)) {
    return { reference, listing: extractor.extractListing(markup, reference) };
  }

  const post = extractor.extractPost(markup, reference);
  const comments = extractor.extractComments(markup, reference);
  const thread = buildCommentTree(reference.postId, comments);
  const focus = reference.kind === 'comment' ? findComment(thread, reference.commentId) : null;

  if (process.env.DEBUG) console.debug('[threadscope]', `extracted ${comments.length} comment records, ${thread.roots.length} roots`);
  return { reference, post, thread, focus };
}

/** Call the fetcher and surface any failure as a FetchError (aborts pass through). */
async function fetchMarkup(fetcher: PageFetcher, url: string, signal?: AbortSignal): Promise<string> {
  try {
    return await fetcher(url, signal);
  } catch (error) {
    if (error instanceof FetchError) throw error;
    if (error instanceof Error && error.name === 'AbortError') throw error;

    const message = error instanceof Error ? error.message : String(error);
    const wrapped = new FetchError(`Failed to fetch ${url}: ${message}`);
    wrapped.cause = error;
    throw wrapped;
  }
}
