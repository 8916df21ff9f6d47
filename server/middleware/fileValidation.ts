/**
 * Upload validation for gallery media.
 * Checks the declared MIME type, the extension and the file signature
 * (magic number) of each in-memory upload against its media kind.
 */

import type { MediaKind } from '@shared/schema';
import { MEDIA_KINDS } from '@shared/constants';

// Signature bytes; undefined matches any byte
const FILE_SIGNATURES: Record<string, ReadonlyArray<number | undefined>> = {
  jpg: [0xFF, 0xD8, 0xFF],
  jpeg: [0xFF, 0xD8, 0xFF],
  png: [0x89, 0x50, 0x4E, 0x47],
  gif: [0x47, 0x49, 0x46],
  webp: [0x52, 0x49, 0x46, 0x46, undefined, undefined, undefined, undefined, 0x57, 0x45, 0x42, 0x50], // RIFF....WEBP
  bmp: [0x42, 0x4D],
  mp4: [undefined, undefined, undefined, undefined, 0x66, 0x74, 0x79, 0x70], // ftyp at offset 4
};

const MIME_EXTENSIONS: Record<string, readonly string[]> = {
  'image/jpeg': ['jpg', 'jpeg'],
  'image/png': ['png'],
  'image/gif': ['gif'],
  'image/webp': ['webp'],
  'image/bmp': ['bmp'],
  'video/mp4': ['mp4'],
  // Some clients send mp4 without a specific type
  'application/octet-stream': ['mp4'],
};

export interface UploadedFile {
  originalName: string;
  mimeType: string;
  size: number;
  buffer: Buffer;
}

export type UploadRejection = 'format' | 'maxSize';

export function fileExtension(filename: string): string | undefined {
  const base = filename.split(/[/\\]/).pop() ?? '';
  const dot = base.lastIndexOf('.');
  if (dot <= 0 || dot === base.length - 1) return undefined;
  return base.slice(dot + 1).toLowerCase();
}

/**
 * Check that the extension is one the MIME type stands for, and that
 * both are accepted for the media kind.
 */
export function validateMimeType(kind: MediaKind, mimetype: string, filename: string): boolean {
  const settings = MEDIA_KINDS[kind];
  const ext = fileExtension(filename);
  if (!ext || !settings.extensions.includes(ext)) return false;
  if (!settings.mimeTypes.includes(mimetype)) return false;

  return (MIME_EXTENSIONS[mimetype] ?? []).includes(ext);
}

export function matchesSignature(buffer: Buffer, ext: string): boolean {
  const signature = FILE_SIGNATURES[ext];
  if (!signature) return false;
  if (buffer.length < signature.length) return false;

  return signature.every((byte, i) => byte === undefined || buffer[i] === byte);
}

/**
 * Returns the reason an upload is rejected, or null when it is accepted.
 */
export function validateUpload(kind: MediaKind, file: UploadedFile): UploadRejection | null {
  if (!validateMimeType(kind, file.mimeType, file.originalName)) return 'format';

  const ext = fileExtension(file.originalName);
  if (!ext || !matchesSignature(file.buffer, ext)) return 'format';

  if (file.size > MEDIA_KINDS[kind].maxFileSize) return 'maxSize';

  return null;
}

/**
 * Sanitize filename to prevent path traversal
 */
export function sanitizeFilename(filename: string): string {
  let safe = filename.replace(/\0/g, '');

  safe = safe.replace(/\\/g, '/');

  // Keep only the last path segment
  const parts = safe.split('/');
  safe = parts[parts.length - 1] || '';

  safe = safe.replace(/\.\./g, '');
  safe = safe.replace(/[*?:"<>|\/\\]/g, '_');
  safe = safe.replace(/^\.+/, '');
  safe = safe.trim();

  if (!safe) {
    safe = 'unnamed_file';
  }

  return safe;
}
