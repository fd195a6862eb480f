import { groupFragments } from './engine.js';
import type { OcrBlock, SectionMap } from './types.js';

/** Message a layout worker thread receives: one page set to group. */
export interface LayoutRequest {
  id: number;
  blocks: readonly OcrBlock[];
}

export type LayoutReply =
  | { id: number; ok: true; sections: SectionMap }
  | { id: number; ok: false; error: string };

export function isLayoutRequest(value: unknown): value is LayoutRequest {
  if (!value || typeof value !== 'object') return false;
  const request = value as { id?: unknown; blocks?: unknown };
  return typeof request.id === 'number' && Array.isArray(request.blocks);
}

export function isLayoutReply(value: unknown): value is LayoutReply {
  if (!value || typeof value !== 'object') return false;
  const reply = value as { id?: unknown; ok?: unknown };
  return typeof reply.id === 'number' && typeof reply.ok === 'boolean';
}

/**
 * Worker-side handling of one message. Returns null for anything that is not a
 * layout request; engine errors come back as an `ok: false` reply.
 */
export function answerLayoutRequest(message: unknown): LayoutReply | null {
  if (!isLayoutRequest(message)) return null;
  try {
    return { id: message.id, ok: true, sections: groupFragments(message.blocks) };
  } catch (err) {
    return { id: message.id, ok: false, error: err instanceof Error ? err.message : String(err) };
  }
}
