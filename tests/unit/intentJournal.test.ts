import fs from 'fs';
import path from 'path';
import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import type { Gallery, User } from '@shared/schema';
import { IntentJournal } from '../../server/services/intentJournal';
import { MediaStore } from '../../server/services/mediaStore';
import { MemStorage } from '../../server/memStorage';
import { PNG_BYTES, makeTempDir, removeTempDir, userRow } from '../helpers/fixtures';

describe('IntentJournal', () => {
  let root: string;
  let storage: MemStorage;
  let media: MediaStore;
  let journal: IntentJournal;

  beforeEach(() => {
    root = makeTempDir();
    storage = new MemStorage();
    media = new MediaStore(root);
    journal = new IntentJournal(storage, media);
  });

  afterEach(() => {
    removeTempDir(root);
  });

  async function seedGallery(): Promise<{ user: User; gallery: Gallery }> {
    const user = await storage.createUser(userRow());
    const gallery = await storage.createGallery('image', { galleryName: 'summer', userId: user.id });
    await media.createGallery('alice!dev', 'image', 'summer');
    return { user, gallery };
  }

  function galleryPath(name: string): string {
    return path.join(root, 'alice!dev', 'image', name);
  }

  describe('run', () => {
    it('should clear the intent once the work succeeds', async () => {
      const user = await journal.run({ operation: 'create_user_root', username: 'alice!dev' }, async () => {
        await media.createUserRoot('alice!dev');
        return storage.createUser(userRow());
      });

      expect(user.username).toBe('alice!dev');
      expect(fs.existsSync(path.join(root, 'alice!dev'))).toBe(true);
      expect(await storage.getPendingIntents()).toEqual([]);
    });

    it('should remove a created user directory when the row is never written', async () => {
      const work = journal.run({ operation: 'create_user_root', username: 'alice!dev' }, async applied => {
        await media.createUserRoot('alice!dev');
        applied();
        throw new Error('insert failed');
      });

      await expect(work).rejects.toThrow('insert failed');
      expect(fs.existsSync(path.join(root, 'alice!dev'))).toBe(false);
      expect(await storage.getPendingIntents()).toEqual([]);
    });

    it('should move a renamed gallery back when the row keeps the old name', async () => {
      const { user, gallery } = await seedGallery();

      const work = journal.run({
        operation: 'rename_gallery',
        kind: 'image',
        galleryId: gallery.id,
        userId: user.id,
        username: 'alice!dev',
        from: 'summer',
        to: 'winter',
      }, async applied => {
        await media.renameGallery('alice!dev', 'image', 'summer', 'winter');
        applied();
        throw new Error('update failed');
      });

      await expect(work).rejects.toThrow('update failed');
      expect(fs.existsSync(galleryPath('summer'))).toBe(true);
      expect(fs.existsSync(galleryPath('winter'))).toBe(false);
    });

    it('should remove written files that never got a row', async () => {
      const { gallery } = await seedGallery();

      const work = journal.run({
        operation: 'store_files',
        kind: 'image',
        galleryId: gallery.id,
        username: 'alice!dev',
        galleryName: 'summer',
        files: ['a.png', 'b.png'],
      }, async applied => {
        applied();
        await media.writeFile('alice!dev', 'image', 'summer', 'a.png', PNG_BYTES);
        throw new Error('disk full');
      });

      await expect(work).rejects.toThrow('disk full');
      expect(fs.readdirSync(galleryPath('summer'))).toEqual([]);
    });

    it('should leave a gallery directory made by another request in place', async () => {
      const user = await storage.createUser(userRow());
      await media.createGallery('alice!dev', 'image', 'summer');

      const work = journal.run({
        operation: 'create_gallery',
        kind: 'image',
        userId: user.id,
        username: 'alice!dev',
        galleryName: 'summer',
      }, async applied => {
        await media.createGallery('alice!dev', 'image', 'summer');
        applied();
        return storage.createGallery('image', { galleryName: 'summer', userId: user.id });
      });

      await expect(work).rejects.toThrow('Gallery directory already exists');
      expect(fs.existsSync(galleryPath('summer'))).toBe(true);
      expect(await storage.getPendingIntents()).toEqual([]);
    });

    it('should leave a user directory made by another request in place', async () => {
      await media.createUserRoot('alice!dev');

      const work = journal.run({ operation: 'create_user_root', username: 'alice!dev' }, async applied => {
        await media.createUserRoot('alice!dev');
        applied();
        return storage.createUser(userRow());
      });

      await expect(work).rejects.toThrow('User directory already exists');
      expect(fs.existsSync(path.join(root, 'alice!dev'))).toBe(true);
      expect(await storage.getUserByUsername('alice!dev')).toBeUndefined();
      expect(await storage.getPendingIntents()).toEqual([]);
    });
  });

  describe('recoverPending', () => {
    it('should keep stored files that have rows and drop the rest', async () => {
      const { gallery } = await seedGallery();
      await media.writeFile('alice!dev', 'image', 'summer', 'kept.png', PNG_BYTES);
      await media.writeFile('alice!dev', 'image', 'summer', 'orphan.png', PNG_BYTES);
      await storage.createMediaItems('image', [{ galleryId: gallery.id, file: 'kept.png' }]);
      await storage.recordIntent('store_files', {
        operation: 'store_files',
        kind: 'image',
        galleryId: gallery.id,
        username: 'alice!dev',
        galleryName: 'summer',
        files: ['kept.png', 'orphan.png'],
      });

      expect(await journal.recoverPending()).toEqual({ recovered: 1, failed: 0 });
      expect(fs.readdirSync(galleryPath('summer'))).toEqual(['kept.png']);
      expect(await storage.getPendingIntents()).toEqual([]);
    });

    it('should finish a gallery delete whose row is gone', async () => {
      const { user, gallery } = await seedGallery();
      await storage.deleteGallery('image', gallery.id);
      await storage.recordIntent('delete_gallery', {
        operation: 'delete_gallery',
        kind: 'image',
        galleryId: gallery.id,
        userId: user.id,
        username: 'alice!dev',
        galleryName: 'summer',
      });

      expect(await journal.recoverPending()).toEqual({ recovered: 1, failed: 0 });
      expect(fs.existsSync(galleryPath('summer'))).toBe(false);
    });

    it('should drop the row of a file that was already unlinked', async () => {
      const { user, gallery } = await seedGallery();
      const [item] = await storage.createMediaItems('image', [{ galleryId: gallery.id, file: 'gone.png' }]);
      await storage.recordIntent('delete_file', {
        operation: 'delete_file',
        kind: 'image',
        itemId: item.id,
        userId: user.id,
        username: 'alice!dev',
        galleryName: 'summer',
        file: 'gone.png',
      });

      await journal.recoverPending();

      expect(await storage.getMediaItem('image', item.id, user.id)).toBeUndefined();
    });

    it('should complete a user rename whose row already carries the new name', async () => {
      const user = await storage.createUser(userRow());
      await media.createUserRoot('alice!dev');
      await storage.updateUser(user.id, { username: 'alice!new' });
      await storage.recordIntent('rename_user_root', {
        operation: 'rename_user_root',
        userId: user.id,
        from: 'alice!dev',
        to: 'alice!new',
      });

      await journal.recoverPending();

      expect(fs.existsSync(path.join(root, 'alice!new'))).toBe(true);
      expect(fs.existsSync(path.join(root, 'alice!dev'))).toBe(false);
    });

    it('should discard intents it cannot read', async () => {
      await storage.recordIntent('store_files', { operation: 'store_files' });

      expect(await journal.recoverPending()).toEqual({ recovered: 0, failed: 1 });
      expect(await storage.getPendingIntents()).toEqual([]);
    });
  });
});
