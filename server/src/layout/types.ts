/**
 * Shared types for layout reconstruction.
 *
 * Coordinates are fractions of the page (0..1), origin at the top-left corner,
 * as reported by the OCR engine.
 */

export interface BoundingBox {
  top?: number;
  left?: number;
  width?: number;
  height?: number;
}

export interface PolygonPoint {
  x?: number;
  y?: number;
}

/** One OCR primitive. Only `LINE` blocks take part in layout reconstruction. */
export interface OcrBlock {
  blockType?: string;
  text?: string;
  page?: number;
  confidence?: number;
  boundingBox?: BoundingBox;
  polygon?: PolygonPoint[];
}

export interface ResolvedBox {
  top: number;
  left: number;
  width: number;
  height: number;
  bottom: number;
  centerY: number;
  right: number;
}

export interface NormalizedLine extends ResolvedBox {
  text: string;
  page: number;
  confidence?: number;
}

export interface Row {
  text: string;
  left: number;
  top: number;
  bottom: number;
  height: number;
  centerY: number;
}

/** Section index ("1".."n", document order) → row texts in reading order. */
export type SectionMap = Record<string, string[]>;
