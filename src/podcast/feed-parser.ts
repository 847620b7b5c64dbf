import * as cheerio from 'cheerio';
import type { Element } from 'domhandler';
import { ParseError } from '../errors/custom-errors.js';
import type { Episode } from '../types/podcast.types.js';

/**
 * Parse an RSS feed document into its episodes, in feed order.
 *
 * Items without an enclosure (text posts, announcements) are not episodes and
 * are skipped. A malformed item fails the whole document: callers never see a
 * partial episode list.
 *
 * @throws ParseError if the document has no RSS channel or an item is malformed
 */
export function parseFeed(document: string): Episode[] {
  const $ = cheerio.load(document, { xml: true });

  const channel = $('rss > channel').first();
  if (channel.length === 0) {
    throw new ParseError('Feed has no RSS channel');
  }

  const episodes: Episode[] = [];

  channel
    .children('item')
    .toArray()
    .forEach((item, index) => {
      const episode = parseItem($, item, index + 1);
      if (episode) {
        episodes.push(episode);
      }
    });

  return episodes;
}

function parseItem($: cheerio.CheerioAPI, element: Element, position: number): Episode | null {
  const item = $(element);
  const enclosure = item.children('enclosure').first();

  if (enclosure.length === 0) {
    return null;
  }

  const title = item.children('title').first().text().trim();
  if (!title) {
    throw new ParseError(`Feed item ${position} has no title`);
  }

  const mediaUrl = enclosure.attr('url')?.trim();
  if (!mediaUrl) {
    throw new ParseError(`Feed item ${position} ("${title}") has an enclosure without url`);
  }

  return {
    title,
    mediaUrl,
    expectedSize: parseLength(enclosure.attr('length')),
  };
}

/**
 * Enclosure length in bytes; feeds often omit it or put "0"/garbage there
 */
function parseLength(value: string | undefined): number {
  if (!value || !/^\d+$/.test(value.trim())) {
    return 0;
  }
  return Number.parseInt(value.trim(), 10);
}
