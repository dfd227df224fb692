/**
 * htmlToText - Convert HTML fragments to plain text
 *
 * Block-level elements become line breaks, scripts and styles are dropped and
 * entities are decoded by cheerio.
 */

import * as cheerio from 'cheerio';

const REMOVED_SELECTORS = ['script', 'style', 'noscript', 'template'];

const BLOCK_SELECTORS = [
  'p',
  'div',
  'li',
  'ul',
  'ol',
  'blockquote',
  'pre',
  'tr',
  'table',
  'h1',
  'h2',
  'h3',
  'h4',
  'h5',
  'h6',
  'hr',
];

/**
 * Convert an HTML fragment to plain text.
 *
 * @param html - HTML fragment (not a full document)
 * @returns Text with collapsed whitespace; empty when the fragment has no text
 */
export function htmlToText(html: string): string {
  const $ = cheerio.load(html, null, false);

  $(REMOVED_SELECTORS.join(', ')).remove();
  $('br').replaceWith('\n');
  $(BLOCK_SELECTORS.join(', ')).each((_, el) => {
    $(el).after('\n');
  });

  return $.root()
    .text()
    .replace(/\r\n?/g, '\n')
    .replace(/\u00a0/g, ' ')
    .replace(/[ \t]+/g, ' ')
    .replace(/ *\n */g, '\n')
    .replace(/\n{3,}/g, '\n\n')
    .trim();
}
