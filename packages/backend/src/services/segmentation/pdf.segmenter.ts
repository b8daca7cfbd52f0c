import { LocationType } from '../../config/constants';
import { normalizeLines } from '../../utils/text.utils';
import { SegmentDraft } from './canonical';

interface PdfTextItem {
  str: string;
  transform: number[];
}

interface PdfTextContent {
  items: PdfTextItem[];
}

const RENDER_OPTIONS = {
  normalizeWhitespace: false,
  disableCombineTextItems: false,
};

/** Same line-joining rule as pdf-parse's default renderer */
function joinTextItems(items: PdfTextItem[]): string {
  let text = '';
  let lastY: number | undefined;
  for (const item of items) {
    const y = item.transform[5];
    text += lastY === undefined || lastY === y ? item.str : `\n${item.str}`;
    lastY = y;
  }
  return text;
}

/** Extracts the text of every page, in page order, empty pages included */
export async function readPdfPages(rawBytes: Buffer): Promise<string[]> {
  // loaded on first use so nothing pulls pdf.js in until a PDF shows up
  const { default: pdfParse } = await import('pdf-parse');

  const pages: string[] = [];
  const result = await pdfParse(rawBytes, {
    // pdf-parse awaits whatever this returns before it renders the next page
    pagerender: (pageData) => {
      const pageIndex: number = pageData.pageIndex;
      return pageData.getTextContent(RENDER_OPTIONS).then((content: PdfTextContent) => {
        pages[pageIndex] = joinTextItems(content.items);
        return pages[pageIndex];
      });
    },
  });

  return Array.from({ length: result.numpages }, (_, index) => pages[index] ?? '');
}

export async function segmentPdf(rawBytes: Buffer): Promise<SegmentDraft[]> {
  const pages = await readPdfPages(rawBytes);
  return pages.map((text, index) => ({
    locationType: LocationType.PAGE,
    location: index + 1,
    text: normalizeLines(text),
  }));
}
