import type { BoundingBox, NormalizedLine, OcrBlock, PolygonPoint, ResolvedBox } from './types.js';

const MIN_EXTENT = 1e-9;

function isFiniteNumber(value: unknown): value is number {
  return typeof value === 'number' && Number.isFinite(value);
}

function fromExplicitBox(box: BoundingBox | undefined): Omit<ResolvedBox, 'bottom' | 'centerY' | 'right'> | null {
  if (!box) return null;
  const { top, left, width, height } = box;
  if (!isFiniteNumber(top) || !isFiniteNumber(left) || !isFiniteNumber(width) || !isFiniteNumber(height)) {
    return null;
  }
  return { top, left, width, height };
}

function fromPolygon(polygon: PolygonPoint[] | undefined): Omit<ResolvedBox, 'bottom' | 'centerY' | 'right'> | null {
  if (!polygon || polygon.length !== 4) return null;

  const xs: number[] = [];
  const ys: number[] = [];
  for (const point of polygon) {
    if (!point || !isFiniteNumber(point.x) || !isFiniteNumber(point.y)) return null;
    xs.push(point.x);
    ys.push(point.y);
  }

  const minX = Math.min(...xs);
  const minY = Math.min(...ys);
  return {
    top: minY,
    left: minX,
    width: Math.max(MIN_EXTENT, Math.max(...xs) - minX),
    height: Math.max(MIN_EXTENT, Math.max(...ys) - minY),
  };
}

/**
 * Resolves a block's box, preferring the explicit bounding box over the polygon.
 * Returns null when neither representation is usable.
 */
export function resolveBoundingBox(block: Pick<OcrBlock, 'boundingBox' | 'polygon'>): ResolvedBox | null {
  const base = fromExplicitBox(block.boundingBox) ?? fromPolygon(block.polygon);
  if (!base) return null;
  return {
    ...base,
    bottom: base.top + base.height,
    centerY: base.top + base.height / 2,
    right: base.left + base.width,
  };
}

export function compareLines(a: NormalizedLine, b: NormalizedLine): number {
  return a.page - b.page || a.centerY - b.centerY || a.left - b.left;
}

/**
 * Reduces raw OCR blocks to LINE records with resolved geometry, sorted by
 * (page, centerY, left). Blocks without text or geometry are dropped: the OCR
 * engine routinely emits them and they carry nothing to lay out.
 */
export function extractLines(blocks: readonly OcrBlock[]): NormalizedLine[] {
  const lines: NormalizedLine[] = [];

  for (const block of blocks) {
    if (block.blockType !== 'LINE') continue;
    const text = typeof block.text === 'string' ? block.text.trim() : '';
    if (!text) continue;

    const box = resolveBoundingBox(block);
    if (!box) continue;

    const page = isFiniteNumber(block.page) && block.page >= 1 ? Math.trunc(block.page) : 1;
    lines.push({
      text,
      ...box,
      page,
      ...(isFiniteNumber(block.confidence) && { confidence: block.confidence }),
    });
  }

  return lines.sort(compareLines);
}
