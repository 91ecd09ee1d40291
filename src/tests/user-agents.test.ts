/**
 * Tests for the browser request profile
 */

import { describe, it, expect } from 'vitest';
import { getBrowserHeaders, getRealisticUserAgent, getSecCHUA, getSecCHUAPlatform } from '../core/user-agents.js';

const LINUX_UA = 'Mozilla/5.0 (X11; Linux x86_64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/136.0.0.0 Safari/537.36';

describe('getRealisticUserAgent', () => {
  it('returns a recent desktop Chrome for the requested platform', () => {
    expect(getRealisticUserAgent('linux')).toMatch(/^Mozilla\/5\.0 \(X11; Linux x86_64\) .* Chrome\/13[5-7]\.0\.0\.0 Safari\/537\.36$/);
    expect(getRealisticUserAgent('mac')).toContain('Macintosh; Intel Mac OS X 10_15_7');
    expect(getRealisticUserAgent('windows')).toContain('Windows NT 10.0; Win64; x64');
  });
});

describe('client hints', () => {
  it('matches the Chrome version of the user agent', () => {
    expect(getSecCHUA(LINUX_UA)).toBe('"Chromium";v="136", "Google Chrome";v="136", "Not.A/Brand";v="24"');
    expect(getSecCHUA(LINUX_UA.replace('136', '135'))).toBe(
      '"Chromium";v="135", "Google Chrome";v="135", "Not)A;Brand";v="99"',
    );
  });

  it('falls back to Chrome 137 for other browsers', () => {
    expect(getSecCHUA('curl/8.0')).toBe('"Chromium";v="137", "Google Chrome";v="137", "Not.A/Brand";v="24"');
  });

  it('derives the platform', () => {
    expect(getSecCHUAPlatform(LINUX_UA)).toBe('"Linux"');
    expect(getSecCHUAPlatform('curl/8.0')).toBe('"Unknown"');
  });
});

describe('getBrowserHeaders', () => {
  it('sends the user agent, its client hints and the over18 cookie', () => {
    expect(getBrowserHeaders(LINUX_UA)).toMatchObject({
      'User-Agent': LINUX_UA,
      'Cookie': 'over18=1',
      'Sec-CH-UA-Platform': '"Linux"',
      'Sec-Fetch-Mode': 'navigate',
    });
  });
});
