/**
 * Browser request profile for the fetch collaborator.
 *
 * old.reddit.com answers plain HTTP clients with a block page far more often
 * than it answers a desktop Chrome. Requests therefore carry a recent Chrome
 * user agent and the client-hint headers that Chrome sends with it.
 */

export type Platform = 'windows' | 'mac' | 'linux';

const CHROME_VERSIONS = [135, 136, 137] as const;

const PLATFORM_TOKENS: Record<Platform, string> = {
  windows: 'Windows NT 10.0; Win64; x64',
  mac: 'Macintosh; Intel Mac OS X 10_15_7',
  linux: 'X11; Linux x86_64',
};

function chromeUserAgent(platform: Platform, version: number): string {
  return `Mozilla/5.0 (${PLATFORM_TOKENS[platform]}) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/${version}.0.0.0 Safari/537.36`;
}

/**
 * Returns a realistic, recent Chrome user agent string.
 *
 * @param platform - Restrict to one OS. When omitted, picks weighted
 *                   (~55% Windows, ~35% Mac, ~10% Linux).
 */
export function getRealisticUserAgent(platform?: Platform): string {
  let chosen: Platform;
  if (platform) {
    chosen = platform;
  } else {
    const roll = Math.random();
    chosen = roll < 0.55 ? 'windows' : roll < 0.9 ? 'mac' : 'linux';
  }

  const version = CHROME_VERSIONS[Math.floor(Math.random() * CHROME_VERSIONS.length)];
  return chromeUserAgent(chosen, version);
}

/**
 * The "Not A Brand" token format varies by Chrome version.
 *
 * Chrome 134-135: `"Not)A;Brand";v="99"`
 * Chrome 136+:    `"Not.A/Brand";v="24"`
 */
function getNotABrandToken(chromeVersion: number): string {
  return chromeVersion >= 136 ? '"Not.A/Brand";v="24"' : '"Not)A;Brand";v="99"';
}

/**
 * Sec-CH-UA header value matching the given user agent, e.g.
 * `"Chromium";v="137", "Google Chrome";v="137", "Not.A/Brand";v="24"`.
 * Falls back to Chrome 137 for non-Chrome user agents.
 */
export function getSecCHUA(userAgent: string): string {
  const match = userAgent.match(/Chrome\/(\d+)/i);
  const version = match ? parseInt(match[1], 10) : 137;
  return `"Chromium";v="${version}", "Google Chrome";v="${version}", ${getNotABrandToken(version)}`;
}

export function getSecCHUAPlatform(userAgent: string): string {
  if (userAgent.includes('Windows')) return '"Windows"';
  if (userAgent.includes('Macintosh')) return '"macOS"';
  if (userAgent.includes('Linux')) return '"Linux"';
  return '"Unknown"';
}

/**
 * Full header set for a top-level page navigation from the given user agent.
 * `over18=1` skips the NSFW interstitial old Reddit shows before some threads.
 */
export function getBrowserHeaders(userAgent: string): Record<string, string> {
  return {
    'User-Agent': userAgent,
    'Accept': 'text/html,application/xhtml+xml,application/xml;q=0.9,image/avif,image/webp,image/apng,*/*;q=0.8',
    'Accept-Language': 'en-US,en;q=0.9',
    'Accept-Encoding': 'br, gzip, deflate',
    'Cookie': 'over18=1',
    'Sec-CH-UA': getSecCHUA(userAgent),
    'Sec-CH-UA-Mobile': '?0',
    'Sec-CH-UA-Platform': getSecCHUAPlatform(userAgent),
    'Sec-Fetch-Dest': 'document',
    'Sec-Fetch-Mode': 'navigate',
    'Sec-Fetch-Site': 'none',
    'Sec-Fetch-User': '?1',
    'Upgrade-Insecure-Requests': '1',
  };
}
