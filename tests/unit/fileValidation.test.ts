import { describe, it, expect } from 'vitest';
import {
  fileExtension,
  matchesSignature,
  sanitizeFilename,
  validateMimeType,
  validateUpload,
} from '../../server/middleware/fileValidation';
import { MP4_BYTES, PNG_BYTES } from '../helpers/fixtures';

describe('FileValidation Middleware', () => {
  describe('MIME Type Validation', () => {
    it('should accept image types for image uploads', () => {
      expect(validateMimeType('image', 'image/jpeg', 'photo.jpg')).toBe(true);
      expect(validateMimeType('image', 'image/jpeg', 'photo.jpeg')).toBe(true);
      expect(validateMimeType('image', 'image/png', 'screenshot.png')).toBe(true);
      expect(validateMimeType('image', 'image/gif', 'animation.gif')).toBe(true);
      expect(validateMimeType('image', 'image/webp', 'modern.webp')).toBe(true);
      expect(validateMimeType('image', 'image/bmp', 'legacy.bmp')).toBe(true);
    });

    it('should accept only mp4 for video uploads', () => {
      expect(validateMimeType('video', 'video/mp4', 'movie.mp4')).toBe(true);
      expect(validateMimeType('video', 'application/octet-stream', 'movie.mp4')).toBe(true);
      expect(validateMimeType('video', 'video/webm', 'video.webm')).toBe(false);
      expect(validateMimeType('video', 'video/quicktime', 'clip.mov')).toBe(false);
    });

    it('should reject types that belong to the other kind', () => {
      expect(validateMimeType('image', 'video/mp4', 'movie.mp4')).toBe(false);
      expect(validateMimeType('video', 'image/png', 'photo.png')).toBe(false);
    });

    it('should reject MIME type mismatch', () => {
      expect(validateMimeType('image', 'image/jpeg', 'file.png')).toBe(false);
      expect(validateMimeType('image', 'image/png', 'file.gif')).toBe(false);
    });

    it('should handle case-insensitive extensions', () => {
      expect(validateMimeType('image', 'image/jpeg', 'PHOTO.JPG')).toBe(true);
      expect(validateMimeType('image', 'image/png', 'Screenshot.PNG')).toBe(true);
    });

    it('should reject files without extensions', () => {
      expect(validateMimeType('image', 'image/jpeg', 'photo')).toBe(false);
      expect(validateMimeType('image', 'image/png', '.png')).toBe(false);
    });

    it('should reject MIME type for double extensions', () => {
      expect(validateMimeType('image', 'image/png', 'photo.png.exe')).toBe(false);
    });
  });

  describe('fileExtension', () => {
    it('should return the lower-cased last extension', () => {
      expect(fileExtension('archive.tar.GZ')).toBe('gz');
      expect(fileExtension('dir/photo.Png')).toBe('png');
      expect(fileExtension('trailing.')).toBeUndefined();
    });
  });

  describe('Signature Validation', () => {
    it('should match known magic numbers', () => {
      expect(matchesSignature(PNG_BYTES, 'png')).toBe(true);
      expect(matchesSignature(MP4_BYTES, 'mp4')).toBe(true);
      expect(matchesSignature(Buffer.from([0xFF, 0xD8, 0xFF, 0xE0]), 'jpg')).toBe(true);
      expect(matchesSignature(Buffer.from('GIF89a'), 'gif')).toBe(true);
    });

    it('should require the WEBP marker after the RIFF header', () => {
      const webp = Buffer.concat([Buffer.from('RIFF'), Buffer.alloc(4), Buffer.from('WEBP')]);
      const wav = Buffer.concat([Buffer.from('RIFF'), Buffer.alloc(4), Buffer.from('WAVE')]);

      expect(matchesSignature(webp, 'webp')).toBe(true);
      expect(matchesSignature(wav, 'webp')).toBe(false);
    });

    it('should reject short buffers and unknown extensions', () => {
      expect(matchesSignature(Buffer.from([0x89, 0x50]), 'png')).toBe(false);
      expect(matchesSignature(PNG_BYTES, 'svg')).toBe(false);
    });
  });

  describe('validateUpload', () => {
    it('should accept a well-formed image', () => {
      expect(validateUpload('image', {
        originalName: 'beach.png',
        mimeType: 'image/png',
        size: PNG_BYTES.length,
        buffer: PNG_BYTES,
      })).toBeNull();
    });

    it('should reject content that does not match the extension', () => {
      expect(validateUpload('image', {
        originalName: 'beach.gif',
        mimeType: 'image/gif',
        size: PNG_BYTES.length,
        buffer: PNG_BYTES,
      })).toBe('format');
    });

    it('should reject images over 2 MiB', () => {
      expect(validateUpload('image', {
        originalName: 'beach.png',
        mimeType: 'image/png',
        size: 2 * 1024 * 1024 + 1,
        buffer: PNG_BYTES,
      })).toBe('maxSize');
    });

    it('should accept mp4 videos up to 10 MiB', () => {
      const video = { originalName: 'clip.mp4', mimeType: 'video/mp4', buffer: MP4_BYTES };

      expect(validateUpload('video', { ...video, size: 10 * 1024 * 1024 })).toBeNull();
      expect(validateUpload('video', { ...video, size: 10 * 1024 * 1024 + 1 })).toBe('maxSize');
    });
  });

  describe('Filename Sanitization', () => {
    it('should remove path traversal attempts', () => {
      expect(sanitizeFilename('../../../etc/passwd')).toBe('passwd');
      expect(sanitizeFilename('..\\..\\..\\windows\\system32\\config')).toBe('config');
      expect(sanitizeFilename('path/to\\file/../../../etc/passwd')).toBe('passwd');
    });

    it('should remove dangerous characters', () => {
      expect(sanitizeFilename('file:name.png')).toBe('file_name.png');
      expect(sanitizeFilename('file*name?.png')).toBe('file_name_.png');
      expect(sanitizeFilename('file<name>|.png')).toBe('file_name__.png');
    });

    it('should remove leading dots', () => {
      expect(sanitizeFilename('.htaccess')).toBe('htaccess');
      expect(sanitizeFilename('...hidden')).toBe('hidden');
    });

    it('should handle empty or whitespace-only filenames', () => {
      expect(sanitizeFilename('')).toBe('unnamed_file');
      expect(sanitizeFilename('   ')).toBe('unnamed_file');
      expect(sanitizeFilename('...')).toBe('unnamed_file');
    });

    it('should preserve valid filenames', () => {
      expect(sanitizeFilename('photo.jpg')).toBe('photo.jpg');
      expect(sanitizeFilename('report 2024.mp4')).toBe('report 2024.mp4');
    });
  });
});
