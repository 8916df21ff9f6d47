import path from 'path';
import type { MediaKind } from '@shared/schema';
import { MEDIA_KINDS } from '@shared/constants';

export interface MicroTimestamp {
  date: Date;
  microsecond: number;
}

/**
 * Returns a clock whose readings strictly increase at microsecond
 * resolution, even when several files are named within the same
 * millisecond.
 */
export function createMicrosecondClock(now: () => number = Date.now): () => MicroTimestamp {
  let last = 0;
  return () => {
    let micros = now() * 1000;
    if (micros <= last) micros = last + 1;
    last = micros;
    return {
      date: new Date(Math.floor(micros / 1000)),
      microsecond: micros % 1_000_000,
    };
  };
}

const defaultClock = createMicrosecondClock();

/**
 * `{username}-{gallery}-{day}-{month}-{year}-{hour}-{minute}-{second}-{microsecond}{ext}`
 * with UTC fields and the original extension lower-cased.
 */
export function buildMediaFilename(
  username: string,
  galleryName: string,
  originalName: string,
  at: MicroTimestamp = defaultClock()
): string {
  const d = at.date;
  const ext = path.extname(path.basename(originalName)).toLowerCase();
  const stamp = [
    d.getUTCDate(),
    d.getUTCMonth() + 1,
    d.getUTCFullYear(),
    d.getUTCHours(),
    d.getUTCMinutes(),
    d.getUTCSeconds(),
    at.microsecond,
  ].join('-');
  return `${username}-${galleryName}-${stamp}${ext}`;
}

// Segments below the media root, in order
export function gallerySegments(username: string, kind: MediaKind, galleryName: string): string[] {
  return [username, MEDIA_KINDS[kind].folder, galleryName];
}

export function mediaRelativeUrl(username: string, kind: MediaKind, galleryName: string, file: string): string {
  return [...gallerySegments(username, kind, galleryName), file]
    .map(segment => encodeURIComponent(segment))
    .join('/');
}

// Resolve segments under root, refusing anything that escapes it
export function resolveInside(root: string, ...segments: string[]): string {
  const base = path.resolve(root);
  for (const segment of segments) {
    if (!segment || segment === '.' || segment === '..' || /[/\\\0]/.test(segment)) {
      throw new Error(`Unsafe path segment: ${JSON.stringify(segment)}`);
    }
  }
  const resolved = path.resolve(base, ...segments);
  if (resolved !== base && !resolved.startsWith(base + path.sep)) {
    throw new Error('Resolved path escapes the media root');
  }
  return resolved;
}
