import { extractLines } from './geometry.js';
import { assembleRows } from './rows.js';
import { groupRows } from './sections.js';
import type { NormalizedLine, OcrBlock, SectionMap } from './types.js';

/**
 * Layout reconstruction: OCR blocks → lines → rows → sections.
 *
 * Pages are processed in ascending order and section numbers continue across
 * pages, so the keys of the returned map ("1", "2", …) follow document order.
 * An empty or unreadable scan yields `{}`.
 */
export function groupFragments(blocks: readonly OcrBlock[]): SectionMap {
  const lines = extractLines(blocks);
  if (lines.length === 0) return {};

  const pages = new Map<number, NormalizedLine[]>();
  for (const line of lines) {
    const bucket = pages.get(line.page);
    if (bucket) {
      bucket.push(line);
    } else {
      pages.set(line.page, [line]);
    }
  }

  const sections: SectionMap = {};
  let index = 1;
  for (const page of [...pages.keys()].sort((a, b) => a - b)) {
    const rows = assembleRows(pages.get(page) ?? []);
    for (const group of groupRows(rows)) {
      sections[String(index)] = group;
      index += 1;
    }
  }

  return sections;
}

export function countSectionRows(sections: SectionMap): number {
  return Object.values(sections).reduce((total, rows) => total + rows.length, 0);
}
