/**
 * Centralized limits and path conventions for accounts and galleries.
 * All sizes are in bytes.
 */
import type { MediaKind } from './schema';

export const FIELD_LENGTH = {
  firstName: { min: 3, max: 30 },
  lastName: { min: 3, max: 30 },
  username: { min: 8, max: 16 },
  password: { min: 8, max: 16 },
  contact: { min: 10, max: 10 },
  email: { max: 254 },
  galleryName: { min: 5, max: 20 },
} as const;

export const FIELD_PATTERNS = {
  name: /^[a-zA-Z]+$/,
  // Alphanumerics plus the special set; '/' is excluded because the username names a directory.
  username: /^(?=.*[!@#$%^&*()_+|~=`{}[\]:";'<>?,.])(?=.*[a-zA-Z0-9])[a-zA-Z0-9!@#$%^&*()_+|~=`{}[\]:";'<>?,.]{8,}$/,
  contact: /^\d+$/,
  password: /^(?=.*\d)(?=.*[a-z])(?=.*[A-Z])(?=.*[!@#$%^&*()_+=-])[0-9a-zA-Z!@#$%^&*()_+=-]{8,16}$/,
  galleryName: /^(?!\.)[^/\\\0]+$/,
} as const;

// Largest value a Postgres integer id column holds
export const MAX_RECORD_ID = 2_147_483_647;

// Maximum number of items a single gallery may hold
export const GALLERY_ITEM_LIMIT = 10;

export const MEDIA_URL_PREFIX = '/media';

export interface MediaKindSettings {
  folder: string;
  maxFileSize: number;
  // Lower-case extensions (without dot) accepted for upload
  extensions: readonly string[];
  mimeTypes: readonly string[];
}

export const MEDIA_KINDS: Record<MediaKind, MediaKindSettings> = {
  image: {
    folder: 'image',
    maxFileSize: 2 * 1024 * 1024,
    extensions: ['jpg', 'jpeg', 'png', 'gif', 'webp', 'bmp'],
    mimeTypes: ['image/jpeg', 'image/png', 'image/gif', 'image/webp', 'image/bmp'],
  },
  video: {
    folder: 'video',
    maxFileSize: 10 * 1024 * 1024,
    extensions: ['mp4'],
    mimeTypes: ['video/mp4', 'application/octet-stream'],
  },
};
