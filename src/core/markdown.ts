/**
 * Markdown helpers: HTML bodies to markdown, threads to readable markdown.
 */

import TurndownService from 'turndown';
import type { CommentNode, ListingResult, PostRecord, ThreadResult } from '../types.js';

// Shared TurndownService; conversion keeps no per-call state.
const turndownSingleton = (() => {
  const td = new TurndownService({
    headingStyle: 'atx',
    codeBlockStyle: 'fenced',
    bulletListMarker: '-',
    emDelimiter: '_',
    strongDelimiter: '**',
  });

  // Reddit renders ~~text~~ as <del>
  td.addRule('strikethrough', {
    filter: ['del', 's'],
    replacement: (content) => `~~${content}~~`,
  });

  // Spoilers are <span class="md-spoiler-text">
  td.addRule('spoiler', {
    filter: (node) => node.nodeName === 'SPAN' && node.classList.contains('md-spoiler-text'),
    replacement: (content) => `>!${content}!<`,
  });

  return td;
})();

/**
 * Convert a comment or self-post body (the inner HTML of `div.md`) to markdown.
 */
export function htmlToMarkdown(html: string): string {
  return collapseBlankLines(turndownSingleton.turndown(html)).trim();
}

/**
 * Render a scraped thread as markdown: post header, body, then the comment
 * tree as nested block quotes.
 */
export function renderThreadMarkdown(result: ThreadResult): string {
  const { post, thread } = result;
  const lines: string[] = [`## ${post.subreddit ? `r/${post.subreddit}: ` : ''}${post.title ?? '(untitled)'}`, ''];

  lines.push(`**Posted by** u/${post.author ?? '[deleted]'} | Score: ${post.score ?? '?'} | ${post.numComments ?? 0} comments`);
  if (post.flair) lines.push(`**Flair:** ${post.flair}`);
  if (post.createdAt) lines.push(`*${post.createdAt}*`);

  if (post.bodyOrLink?.type === 'link') {
    lines.push('', post.bodyOrLink.url);
  } else if (post.bodyOrLink?.markdown) {
    lines.push('', post.bodyOrLink.markdown);
  }

  lines.push('', '---', '', '### Comments', '');

  if (thread.roots.length === 0) {
    lines.push('*No comments found.*');
    return lines.join('\n');
  }

  const blocks = thread.roots.map((node) => renderNode(node, 0, result.focus));
  lines.push(blocks.join('\n\n'));
  return lines.join('\n');
}

/** Render a listing page as a numbered list of posts. */
export function renderListingMarkdown(result: ListingResult): string {
  const { reference, listing } = result;
  const heading =
    reference.kind === 'subreddit' ? `r/${reference.subreddit}` :
    reference.kind === 'user-profile' ? `u/${reference.username}` :
    'Frontpage';
  const qualifier = reference.kind === 'user-profile' ? reference.section : reference.sort;
  const sort = qualifier ? ` (${qualifier})` : '';

  const items = listing.posts.map((post, i) => `${i + 1}. ${renderListingItem(post)}`);
  const lines = [`## ${heading}${sort}`, '', items.length > 0 ? items.join('\n\n') : '*No posts found.*'];
  if (listing.nextPageUrl) lines.push('', `Next page: ${listing.nextPageUrl}`);
  return lines.join('\n');
}

function renderListingItem(post: PostRecord): string {
  const meta = [
    `u/${post.author ?? '[deleted]'}`,
    `↑ ${post.score ?? '?'}`,
    `💬 ${post.numComments ?? 0}`,
    ...(post.flair ? [post.flair] : []),
  ].join(' | ');
  const link = post.permalink ? `\n   https://reddit.com${post.permalink}` : '';
  return `**${post.title ?? '(untitled)'}**\n   ${meta}${link}`;
}

function renderNode(node: CommentNode, depth: number, focus: CommentNode | null): string {
  const prefix = '> '.repeat(depth + 1);
  const { record } = node;

  let header: string;
  let body: string;
  if (record.isMorePlaceholder) {
    header = record.moreCount ? `*${record.moreCount} more replies*` : '*more replies*';
    body = '';
  } else {
    const marks = [
      node === focus ? '👉' : '',
      node.truncated ? '(parent missing)' : '',
      record.isSubmitter ? '[OP]' : '',
      record.distinguished ? `[${record.distinguished}]` : '',
    ].filter(Boolean).join(' ');
    header = `**u/${record.author ?? '[deleted]'}** (${record.score ?? '?'})${marks ? ` ${marks}` : ''}`;
    body = record.bodyMarkdown ?? record.body ?? '';
  }

  const own = [header, ...(body ? body.split('\n') : [])].map((line) => `${prefix}${line}`.trimEnd());
  const children = node.children.map((child) => renderNode(child, depth + 1, focus));
  return [own.join('\n'), ...children].join(`\n${prefix.trimEnd()}\n`);
}

function collapseBlankLines(markdown: string): string {
  return markdown.replace(/\n{3,}/g, '\n\n');
}
