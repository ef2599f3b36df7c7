import * as cheerio from 'cheerio';
import { XMLParser } from 'fast-xml-parser';
import { z } from 'zod';
import { ParseError } from '../../core/errors.js';

/**
 * Feed parser shared by the RSS and Atom readers. Tag values stay strings
 * (no number coercion) and repeated elements always come back as arrays.
 */
export const feedParser = new XMLParser({
  ignoreAttributes: false,
  attributeNamePrefix: '@_',
  parseTagValue: false,
  trimValues: true,
  isArray: (name) => name === 'item' || name === 'entry',
});

/** Parse a feed document into plain objects; malformed markup becomes a ParseError. */
export function parseFeed(xml: string, source: string): unknown {
  try {
    return feedParser.parse(xml);
  } catch (err) {
    throw new ParseError(source, err instanceof Error ? err.message : 'malformed XML', { cause: err });
  }
}

/** A text element, possibly carrying attributes (`<summary type="html">`). */
export const xmlText = z
  .union([z.string(), z.object({ '#text': z.string().optional() })])
  .optional();

export function textOf(node: z.infer<typeof xmlText>): string | null {
  if (node === undefined) return null;
  const value = typeof node === 'string' ? node : node['#text'];
  const trimmed = value?.trim();
  return trimmed ? trimmed : null;
}

/** Reduce an HTML fragment to its text with whitespace collapsed. */
export function htmlToText(html: string | null): string | null {
  if (html === null) return null;
  const text = cheerio.load(html).root().text().replace(/\s+/g, ' ').trim();
  return text ? text : null;
}
