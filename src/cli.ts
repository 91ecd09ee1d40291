#!/usr/bin/env node

/**
 * threadscope CLI
 *
 * Usage:
 *   threadscope <url>                  - Print the thread (or listing) as markdown
 *   threadscope <url> --json           - Print the full result as JSON
 *   threadscope <url> -o thread.json   - Write the JSON result to a file
 *   threadscope resolve <url>          - Show what a URL points at (no fetch)
 *   threadscope config [--path]        - Show the effective fetch configuration
 */

import { Command, InvalidArgumentError } from 'commander';
import ora from 'ora';
import { readFileSync, writeFileSync } from 'fs';
import { fileURLToPath } from 'url';
import { dirname, resolve } from 'path';
import {
  closePool,
  renderListingMarkdown,
  renderThreadMarkdown,
  resolveUrl,
  scrape,
  ThreadscopeError,
  UnrecognizedUrlError,
  type FetchConfig,
  type ScrapeResult,
} from './index.js';
import { configFromEnv, getConfigPath, isRecord, loadConfig, mergeFetchConfig, parseHeaders } from './config.js';

interface ScrapeCliOptions {
  json?: boolean;
  output?: string;
  timeout?: number;
  retries?: number;
  ua?: string;
  proxy?: string;
  header?: string[];
  silent?: boolean;
}

const program = new Command();

// Read version from package.json
let cliVersion = '0.0.0';
try {
  const pkgPath = resolve(dirname(fileURLToPath(import.meta.url)), '..', 'package.json');
  const pkg: unknown = JSON.parse(readFileSync(pkgPath, 'utf-8'));
  if (isRecord(pkg) && typeof pkg.version === 'string') cliVersion = pkg.version;
} catch (error) {
  if (process.env.DEBUG) console.debug('[threadscope]', 'could not read package version:', error);
}

program
  .name('threadscope')
  .description('Turn Reddit URLs into structured posts and threaded comments')
  .version(cliVersion)
  .enablePositionalOptions();

function parsePositiveInt(value: string): number {
  const parsed = parseInt(value, 10);
  if (!/^\d+$/.test(value.trim()) || parsed <= 0) {
    throw new InvalidArgumentError('Expected a positive integer.');
  }
  return parsed;
}

/**
 * Format an error with a hint for the common failure modes.
 */
function formatError(error: Error): string {
  const lines: string[] = [`\x1b[31m✖ ${error.message}\x1b[0m`];

  if (error instanceof UnrecognizedUrlError) {
    lines.push('\x1b[33m💡 Supported: post and comment permalinks, redd.it shortlinks, /u/<name>, /r/<name>, the frontpage.\x1b[0m');
  } else if (error instanceof ThreadscopeError) {
    switch (error.code) {
      case 'TIMEOUT':
        lines.push('\x1b[33m💡 Try increasing timeout: --timeout 60000\x1b[0m');
        break;
      case 'BLOCKED':
        lines.push('\x1b[33m💡 Try a different user agent: --ua "Mozilla/5.0..." or a proxy: --proxy <url>\x1b[0m');
        break;
      case 'EXTRACTION':
        lines.push('\x1b[33m💡 The page did not look like an old.reddit.com page. Run with DEBUG=1 to see what came back.\x1b[0m');
        break;
      case 'CONFIG':
        lines.push(`\x1b[33m💡 Check ${getConfigPath()}\x1b[0m`);
        break;
    }
  }

  return lines.join('\n');
}

function exitCodeFor(error: unknown): number {
  return error instanceof UnrecognizedUrlError ? 2 : 1;
}

function writeStdout(data: string): Promise<void> {
  return new Promise<void>((resolve, reject) => {
    process.stdout.write(data, (err) => {
      if (err) reject(err);
      else resolve();
    });
  });
}

function buildFetchConfig(options: ScrapeCliOptions): FetchConfig {
  return mergeFetchConfig(loadConfig(), configFromEnv(), {
    userAgent: options.ua,
    proxy: options.proxy,
    timeoutMs: options.timeout,
    maxAttempts: options.retries,
    headers: options.header ? parseHeaders(options.header) : undefined,
  });
}

function describeResult(result: ScrapeResult): string {
  if ('listing' in result) {
    return `Found ${result.listing.posts.length} posts`;
  }
  const { thread, focus, reference } = result;
  const focusNote = reference.kind === 'comment' && !focus ? ' (linked comment not on page)' : '';
  return `Fetched thread with ${thread.roots.length} top-level comments${focusNote}`;
}

async function fail(error: unknown, json: boolean | undefined): Promise<never> {
  if (json) {
    const message = error instanceof Error ? error.message : 'Unknown error';
    const code = error instanceof ThreadscopeError && error.code ? error.code : 'UNKNOWN';
    await writeStdout(JSON.stringify({ success: false, error: { type: code.toLowerCase(), message } }) + '\n');
  } else if (error instanceof Error) {
    console.error(formatError(error));
  } else {
    console.error('\x1b[31m✖ Unknown error occurred\x1b[0m');
  }

  await closePool();
  process.exit(exitCodeFor(error));
}

async function runScrape(url: string | undefined, options: ScrapeCliOptions): Promise<void> {
  if (!url || url.trim() === '') {
    await fail(new ThreadscopeError('URL is required. Usage: threadscope <url>'), options.json);
    return;
  }

  const spinner = options.silent || !process.stderr.isTTY ? null : ora('Fetching...').start();

  try {
    const result = await scrape(url, { fetch: buildFetchConfig(options) });
    spinner?.succeed(describeResult(result));

    if (options.output) {
      writeFileSync(options.output, JSON.stringify(result, null, 2) + '\n', 'utf-8');
      if (!options.silent) console.error(`Saved to ${options.output}`);
    } else if (options.json) {
      await writeStdout(JSON.stringify(result, null, 2) + '\n');
    } else {
      const markdown = 'listing' in result ? renderListingMarkdown(result) : renderThreadMarkdown(result);
      await writeStdout(markdown + '\n');
    }

    await closePool();
    process.exit(0);
  } catch (error) {
    spinner?.fail('Failed to scrape');
    await fail(error, options.json);
  }
}

program
  .argument('[url]', 'Reddit URL (post, comment, user, subreddit or frontpage)')
  .option('--json', 'Output as JSON')
  .option('-o, --output <file>', 'Write the JSON result to a file')
  .option('-t, --timeout <ms>', 'Request timeout (ms)', parsePositiveInt)
  .option('--retries <n>', 'Total attempts for retryable fetch failures', parsePositiveInt)
  .option('--ua <agent>', 'Custom user agent')
  .option('--proxy <url>', 'Proxy URL for requests (http://host:port)')
  .option('-H, --header <header...>', 'Custom headers (e.g., "Accept-Language: de-DE")')
  .option('-s, --silent', 'Silent mode (no spinner)')
  .action(async (url: string | undefined, options: ScrapeCliOptions) => {
    await runScrape(url, options);
  });

program
  .command('resolve <url>')
  .description('Show the content reference a URL resolves to, without fetching it')
  .action(async (url: string) => {
    try {
      await writeStdout(JSON.stringify(resolveUrl(url), null, 2) + '\n');
    } catch (error) {
      await fail(error, false);
    }
  });

program
  .command('config')
  .description('Show the effective fetch configuration')
  .option('--path', 'Only print the config file location')
  .action(async (options: { path?: boolean }) => {
    const path = getConfigPath();
    if (options.path) {
      await writeStdout(path + '\n');
      return;
    }
    try {
      const fetch = mergeFetchConfig(loadConfig(path), configFromEnv());
      await writeStdout(JSON.stringify({ path, fetch }, null, 2) + '\n');
    } catch (error) {
      await fail(error, false);
    }
  });

await program.parseAsync();
