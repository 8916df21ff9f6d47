import path from 'path';
import { describe, it, expect } from 'vitest';
import {
  buildMediaFilename,
  createMicrosecondClock,
  gallerySegments,
  mediaRelativeUrl,
  resolveInside,
} from '../../server/services/mediaPaths';

describe('Media paths', () => {
  describe('createMicrosecondClock', () => {
    it('should keep readings strictly increasing within one millisecond', () => {
      const clock = createMicrosecondClock(() => 1000);

      const first = clock();
      const second = clock();

      expect(first.microsecond).toBe(0);
      expect(first.date.getTime()).toBe(1000);
      expect(second.microsecond).toBe(1);
      expect(second.date.getTime()).toBe(1000);
    });

    it('should follow the wall clock once it moves forward', () => {
      let now = 1000;
      const clock = createMicrosecondClock(() => now);

      clock();
      now = 2500;
      const later = clock();

      expect(later.date.getTime()).toBe(2500);
      expect(later.microsecond).toBe(500000);
    });
  });

  describe('buildMediaFilename', () => {
    const at = { date: new Date(Date.UTC(2024, 2, 5, 7, 8, 9, 123)), microsecond: 123456 };

    it('should join owner, gallery and UTC timestamp fields', () => {
      expect(buildMediaFilename('alice!dev', 'summer', 'Beach.PNG', at))
        .toBe('alice!dev-summer-5-3-2024-7-8-9-123456.png');
    });

    it('should keep only the last extension of the original name', () => {
      expect(buildMediaFilename('alice!dev', 'summer', 'clip.final.MP4', at))
        .toBe('alice!dev-summer-5-3-2024-7-8-9-123456.mp4');
    });

    it('should produce distinct names for uploads in the same millisecond', () => {
      const clock = createMicrosecondClock(() => Date.UTC(2024, 0, 1));

      const names = [clock(), clock(), clock()].map(stamp =>
        buildMediaFilename('alice!dev', 'summer', 'a.png', stamp)
      );

      expect(new Set(names).size).toBe(3);
    });
  });

  describe('gallerySegments and mediaRelativeUrl', () => {
    it('should place galleries under the kind folder', () => {
      expect(gallerySegments('alice!dev', 'video', 'holiday')).toEqual(['alice!dev', 'video', 'holiday']);
    });

    it('should percent-encode each segment', () => {
      expect(mediaRelativeUrl('a#b?c!de', 'image', 'My Trip', 'x.png'))
        .toBe('a%23b%3Fc!de/image/My%20Trip/x.png');
    });
  });

  describe('resolveInside', () => {
    const root = path.resolve('/srv/media');

    it('should resolve plain segments under the root', () => {
      expect(resolveInside(root, 'alice!dev', 'image', 'summer'))
        .toBe(path.join(root, 'alice!dev', 'image', 'summer'));
    });

    it('should reject traversal and separator segments', () => {
      expect(() => resolveInside(root, '..')).toThrow('Unsafe path segment');
      expect(() => resolveInside(root, '.')).toThrow('Unsafe path segment');
      expect(() => resolveInside(root, 'a/b')).toThrow('Unsafe path segment');
      expect(() => resolveInside(root, 'a\\b')).toThrow('Unsafe path segment');
      expect(() => resolveInside(root, '')).toThrow('Unsafe path segment');
    });
  });
});
