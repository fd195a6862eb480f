export const ALLOWED_UPLOAD_TYPES: ReadonlySet<string> = new Set([
  'application/pdf',
  'application/msword',
  'application/vnd.openxmlformats-officedocument.wordprocessingml.document',
  'text/plain',
]);

const MAX_FILENAME_LENGTH = 255;

/**
 * Drops any path components and replaces everything outside [A-Za-z0-9_.-]
 * with "_". Long names keep their extension.
 */
export function sanitizeFilename(filename: string): string {
  const base = filename.split(/[\\/]/).pop() ?? '';
  if (!base) return 'unknown_file';

  const cleaned = base.replace(/[^\w.-]/g, '_');
  if (cleaned.length <= MAX_FILENAME_LENGTH) return cleaned;

  const dot = cleaned.lastIndexOf('.');
  const ext = dot > 0 ? cleaned.slice(dot) : '';
  return cleaned.slice(0, 250) + ext.slice(0, MAX_FILENAME_LENGTH - 250);
}

export interface UploadCandidate {
  name: string;
  size: number;
  type: string;
}

export type UploadCheck = { ok: true } | { ok: false; error: string };

export function validateUpload(file: UploadCandidate, maxBytes: number): UploadCheck {
  if (!file.name) {
    return { ok: false, error: 'No filename provided' };
  }
  if (file.size === 0) {
    return { ok: false, error: 'File is empty' };
  }
  if (file.size > maxBytes) {
    return { ok: false, error: `File size too large. Maximum allowed: ${Math.floor(maxBytes / (1024 * 1024))}MB` };
  }
  // Browsers append parameters such as "; charset=utf-8" to text uploads.
  const mime = file.type.split(';')[0].trim().toLowerCase();
  if (!ALLOWED_UPLOAD_TYPES.has(mime)) {
    return { ok: false, error: 'File type not allowed. Upload a PDF, Word document or plain text file.' };
  }
  return { ok: true };
}
