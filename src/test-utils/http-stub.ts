import { vi } from 'vitest';

export type Route = string | { status: number; body?: string } | (() => Response);

/**
 * Replace the global fetch with a lookup table keyed by URL.
 * Unknown URLs fail like an unreachable host.
 */
export function stubFetch(routes: Record<string, Route>) {
  return vi.spyOn(globalThis, 'fetch').mockImplementation(async (input) => {
    const url = typeof input === 'string' ? input : input instanceof URL ? input.toString() : input.url;
    const route = routes[url];

    if (route === undefined) {
      throw new TypeError(`fetch failed: getaddrinfo ENOTFOUND ${url}`);
    }
    if (typeof route === 'function') {
      return route();
    }
    if (typeof route === 'string') {
      return new Response(route);
    }
    return new Response(route.body ?? null, { status: route.status });
  });
}

/**
 * URLs requested so far, in order
 */
export function requestedUrls(spy: ReturnType<typeof stubFetch>): string[] {
  return spy.mock.calls.map(([input]) =>
    typeof input === 'string' ? input : input instanceof URL ? input.toString() : input.url,
  );
}

export type FeedItem = {
  title?: string;
  url?: string;
  length?: number | string;
};

/**
 * Minimal RSS 2.0 document
 */
export function rssFeed(items: FeedItem[], channelTitle = 'Test Show'): string {
  const body = items
    .map((item) => {
      const title = item.title === undefined ? '' : `<title>${item.title}</title>`;
      const length = item.length === undefined ? '' : ` length="${item.length}"`;
      const enclosure = item.url === undefined ? '' : `<enclosure url="${item.url}"${length} type="audio/mpeg"/>`;
      return `    <item>${title}${enclosure}</item>`;
    })
    .join('\n');

  return `<?xml version="1.0" encoding="UTF-8"?>
<rss version="2.0">
  <channel>
    <title>${channelTitle}</title>
${body}
  </channel>
</rss>
`;
}
