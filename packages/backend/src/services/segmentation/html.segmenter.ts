import * as cheerio from 'cheerio';
import { LocationType } from '../../config/constants';
import { normalizeLines } from '../../utils/text.utils';
import { SegmentDraft } from './canonical';

const SECTION_HEADING = /^(ARTICLE\s+[IVXLC0-9]+\b.*|Section\s+[0-9A-Za-z.-]+\b.*|\d{1,2}\.\s+.+)$/i;

// a heading only opens a new section once the running one has this much text
const MIN_SECTION_CHARS = 250;
const MAX_LABEL_CHARS = 120;

// browser extension chrome captured along with saved filings
const NOISE_MARKERS = ['screenity', 'boomerang', 'chrome-extension://'];

const BLOCK_ELEMENTS = [
  'address', 'article', 'aside', 'blockquote', 'dd', 'div', 'dl', 'dt',
  'footer', 'h1', 'h2', 'h3', 'h4', 'h5', 'h6', 'header', 'li', 'ol', 'p',
  'pre', 'section', 'table', 'td', 'th', 'title', 'tr', 'ul',
].join(', ');

function isNoise(text: string): boolean {
  const lower = text.toLowerCase();
  return NOISE_MARKERS.some((marker) => lower.includes(marker));
}

export function extractHtmlLines(html: string): string[] {
  const $ = cheerio.load(html);

  $('script, style, noscript, template').remove();

  $('[class], [id]')
    .filter((_, el) => {
      const blob = `${$(el).attr('class') ?? ''} ${$(el).attr('id') ?? ''}`;
      return blob.toLowerCase().includes('screenity');
    })
    .remove();

  $('br').replaceWith('\n');
  $(BLOCK_ELEMENTS).each((_, el) => {
    $(el).prepend('\n').append('\n');
  });

  return normalizeLines($.root().text())
    .split('\n')
    .filter((line) => !isNoise(line));
}

export function splitIntoSections(lines: string[]): SegmentDraft[] {
  const sections: SegmentDraft[] = [];
  let currentLines: string[] = [];
  let currentLabel: string | undefined;
  let currentLength = 0;

  const flush = (): void => {
    if (currentLines.length === 0) return;
    sections.push({
      locationType: LocationType.SECTION,
      location: sections.length + 1,
      ...(currentLabel !== undefined && { label: currentLabel }),
      text: currentLines.join('\n'),
    });
    currentLines = [];
    currentLength = 0;
  };

  for (const line of lines) {
    if (SECTION_HEADING.test(line) && currentLength > MIN_SECTION_CHARS) {
      flush();
      currentLabel = line.slice(0, MAX_LABEL_CHARS);
    }
    currentLines.push(line);
    currentLength += line.length + 1;
  }
  flush();

  return sections;
}

export function segmentHtml(rawBytes: Buffer): SegmentDraft[] {
  return splitIntoSections(extractHtmlLines(rawBytes.toString('utf-8')));
}
