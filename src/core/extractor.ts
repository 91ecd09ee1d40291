/**
 * Contract between the pipeline and whatever turns fetched markup into records.
 *
 * Implementations return ids exactly as they appear in the markup (structural
 * prefixes such as `t1_` removed, case untouched); normalization happens in the
 * resolver and the tree builder. Comments come back in display pre-order.
 * Markup that does not have the structure expected for the reference's kind
 * is an ExtractionError.
 */

import type { CommentRecord, ContentReference, Listing, PostRecord } from '../types.js';

export interface ContentExtractor {
  /** The post shown on a thread page. */
  extractPost(markup: string, reference: ContentReference): PostRecord;

  /** Every comment and "load more" placeholder on a thread page, in display order. */
  extractComments(markup: string, reference: ContentReference): CommentRecord[];

  /** The posts of a subreddit, frontpage or user listing page. */
  extractListing(markup: string, reference: ContentReference): Listing;
}
