import { promises as fs } from 'fs';
import path from 'path';
import type { MediaKind } from '@shared/schema';
import { ConflictError, handleFilesystemError, isErrnoCode } from '../middleware/errorHandler';
import { logger } from '../utils/logger';
import { buildMediaFilename, gallerySegments, resolveInside, type MicroTimestamp } from './mediaPaths';
import { sanitizeFilename } from '../middleware/fileValidation';

/**
 * Filesystem side of the media tree:
 * `<root>/<username>/<image|video>/<gallery>/<file>`.
 * Errors surface as ConflictError / NotFoundError where the cause is known.
 */
export class MediaStore {
  readonly root: string;

  constructor(root: string, private readonly clock?: () => MicroTimestamp) {
    this.root = path.resolve(root);
  }

  userRoot(username: string): string {
    return resolveInside(this.root, username);
  }

  galleryDir(username: string, kind: MediaKind, galleryName: string): string {
    return resolveInside(this.root, ...gallerySegments(username, kind, galleryName));
  }

  filePath(username: string, kind: MediaKind, galleryName: string, file: string): string {
    return resolveInside(this.root, ...gallerySegments(username, kind, galleryName), file);
  }

  async exists(target: string): Promise<boolean> {
    try {
      await fs.access(target);
      return true;
    } catch (error) {
      if (isErrnoCode(error, 'ENOENT')) return false;
      throw error;
    }
  }

  async createUserRoot(username: string): Promise<void> {
    await fs.mkdir(this.root, { recursive: true });
    try {
      await fs.mkdir(this.userRoot(username));
    } catch (error) {
      throw handleFilesystemError(error, 'User directory');
    }
  }

  async renameUserRoot(from: string, to: string): Promise<void> {
    const source = this.userRoot(from);
    const target = this.userRoot(to);
    if (await this.exists(target)) {
      throw new ConflictError('User directory already exists');
    }
    if (!(await this.exists(source))) {
      // Nothing was ever stored for the old name
      await fs.mkdir(target, { recursive: true });
      return;
    }
    await fs.rename(source, target);
  }

  async createGallery(username: string, kind: MediaKind, galleryName: string): Promise<void> {
    const dir = this.galleryDir(username, kind, galleryName);
    await fs.mkdir(path.dirname(dir), { recursive: true });
    try {
      await fs.mkdir(dir);
    } catch (error) {
      throw handleFilesystemError(error, 'Gallery directory');
    }
  }

  async renameGallery(username: string, kind: MediaKind, from: string, to: string): Promise<void> {
    const source = this.galleryDir(username, kind, from);
    const target = this.galleryDir(username, kind, to);
    if (source === target) return;
    // rename(2) silently replaces an empty target directory
    if (await this.exists(target)) {
      throw new ConflictError('Gallery directory already exists');
    }
    try {
      await fs.rename(source, target);
    } catch (error) {
      throw handleFilesystemError(error, 'Gallery directory');
    }
  }

  async removeGallery(username: string, kind: MediaKind, galleryName: string): Promise<void> {
    await fs.rm(this.galleryDir(username, kind, galleryName), { recursive: true, force: true });
  }

  // Removes a directory only while it is still empty
  async removeEmptyDir(dir: string): Promise<void> {
    try {
      await fs.rmdir(dir);
    } catch (error) {
      if (isErrnoCode(error, 'ENOENT')) return;
      if (isErrnoCode(error, 'ENOTEMPTY') || isErrnoCode(error, 'EEXIST')) {
        logger.warn('Left non-empty directory in place', { dir });
        return;
      }
      throw error;
    }
  }

  // Moves `from` to `to` unless the move already happened
  async moveIfPresent(from: string, to: string): Promise<boolean> {
    if (from === to) return false;
    if (!(await this.exists(from)) || (await this.exists(to))) return false;
    await fs.mkdir(path.dirname(to), { recursive: true });
    await fs.rename(from, to);
    return true;
  }

  async ensureDir(dir: string): Promise<void> {
    await fs.mkdir(dir, { recursive: true });
  }

  // Picks a fresh name for an upload; nothing is written yet
  nextFilename(username: string, galleryName: string, originalName: string): string {
    return buildMediaFilename(username, galleryName, sanitizeFilename(originalName), this.clock?.());
  }

  async writeFile(username: string, kind: MediaKind, galleryName: string, file: string, data: Buffer): Promise<void> {
    // 'wx' refuses to overwrite an existing file
    await fs.writeFile(this.filePath(username, kind, galleryName, file), data, { flag: 'wx' });
  }

  async deleteFile(username: string, kind: MediaKind, galleryName: string, file: string): Promise<void> {
    try {
      await fs.unlink(this.filePath(username, kind, galleryName, file));
    } catch (error) {
      throw handleFilesystemError(error, 'Media file');
    }
  }

  async removeFileIfPresent(target: string): Promise<void> {
    await fs.rm(target, { force: true });
  }
}
