/** Tests for bounding-box resolution and line extraction. */
import { describe, it, expect } from 'vitest';
import { extractLines, resolveBoundingBox } from '../layout/geometry.js';
import type { OcrBlock } from '../layout/types.js';

describe('resolveBoundingBox', () => {
  it('uses the explicit bounding box and derives edges', () => {
    const box = resolveBoundingBox({ boundingBox: { top: 0.1, left: 0.2, width: 0.3, height: 0.02 } });
    expect(box).not.toBeNull();
    expect(box?.top).toBe(0.1);
    expect(box?.left).toBe(0.2);
    expect(box?.bottom).toBeCloseTo(0.12, 10);
    expect(box?.centerY).toBeCloseTo(0.11, 10);
    expect(box?.right).toBeCloseTo(0.5, 10);
  });

  it('falls back to the rectangle around a 4-point polygon', () => {
    const box = resolveBoundingBox({
      polygon: [
        { x: 0.7, y: 0.2 },
        { x: 0.5, y: 0.2 },
        { x: 0.5, y: 0.25 },
        { x: 0.7, y: 0.25 },
      ],
    });
    expect(box?.top).toBe(0.2);
    expect(box?.left).toBe(0.5);
    expect(box?.width).toBeCloseTo(0.2, 10);
    expect(box?.height).toBeCloseTo(0.05, 10);
  });

  it('prefers the explicit box over the polygon', () => {
    const box = resolveBoundingBox({
      boundingBox: { top: 0.4, left: 0.1, width: 0.2, height: 0.02 },
      polygon: [{ x: 0, y: 0 }, { x: 1, y: 0 }, { x: 1, y: 1 }, { x: 0, y: 1 }],
    });
    expect(box?.top).toBe(0.4);
  });

  it('floors a degenerate polygon to a tiny positive extent', () => {
    const point = { x: 0.3, y: 0.3 };
    const box = resolveBoundingBox({ polygon: [point, point, point, point] });
    expect(box?.width).toBe(1e-9);
    expect(box?.height).toBe(1e-9);
  });

  it('returns null when neither representation is usable', () => {
    expect(resolveBoundingBox({})).toBeNull();
    expect(resolveBoundingBox({ boundingBox: { top: Number.NaN, left: 0, width: 0.1, height: 0.1 } })).toBeNull();
    expect(resolveBoundingBox({ polygon: [{ x: 0, y: 0 }, { x: 1, y: 0 }, { x: 1, y: 1 }] })).toBeNull();
    expect(resolveBoundingBox({ polygon: [{ x: 0, y: 0 }, { x: 1 }, { x: 1, y: 1 }, { x: 0, y: 1 }] })).toBeNull();
  });
});

describe('extractLines', () => {
  it('keeps only LINE blocks with text and geometry, sorted by page, centre and left edge', () => {
    const blocks: OcrBlock[] = [
      { blockType: 'LINE', text: 'B', page: 2, boundingBox: { top: 0.1, left: 0.1, width: 0.1, height: 0.02 } },
      { blockType: 'LINE', text: 'A2', page: 1, boundingBox: { top: 0.5, left: 0.6, width: 0.1, height: 0.02 } },
      { blockType: 'LINE', text: '  A1  ', boundingBox: { top: 0.5, left: 0.1, width: 0.1, height: 0.02 } },
      { blockType: 'WORD', text: 'skip', page: 1, boundingBox: { top: 0.1, left: 0.1, width: 0.1, height: 0.02 } },
      { blockType: 'LINE', text: '   ', page: 1, boundingBox: { top: 0.1, left: 0.1, width: 0.1, height: 0.02 } },
      { blockType: 'LINE', text: 'no geometry', page: 1 },
      { blockType: 'PAGE', page: 1 },
    ];

    const lines = extractLines(blocks);

    expect(lines.map((line) => line.text)).toEqual(['A1', 'A2', 'B']);
    expect(lines.map((line) => line.page)).toEqual([1, 1, 2]);
  });

  it('returns an empty list for empty input', () => {
    expect(extractLines([])).toEqual([]);
  });

  it('keeps confidence when the engine reports it', () => {
    const [line] = extractLines([
      { blockType: 'LINE', text: 'x', confidence: 98.5, boundingBox: { top: 0, left: 0, width: 0.1, height: 0.01 } },
    ]);
    expect(line.confidence).toBe(98.5);
  });
});
