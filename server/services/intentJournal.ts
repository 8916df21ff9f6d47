import { z } from 'zod';
import type { IStorage } from '../storage';
import type { MediaStore } from './mediaStore';
import { logger } from '../utils/logger';

const kindSchema = z.enum(['image', 'video']);

const intentSchema = z.discriminatedUnion('operation', [
  z.object({ operation: z.literal('create_user_root'), username: z.string() }),
  z.object({ operation: z.literal('rename_user_root'), userId: z.number(), from: z.string(), to: z.string() }),
  z.object({
    operation: z.literal('create_gallery'),
    kind: kindSchema,
    userId: z.number(),
    username: z.string(),
    galleryName: z.string(),
  }),
  z.object({
    operation: z.literal('rename_gallery'),
    kind: kindSchema,
    galleryId: z.number(),
    userId: z.number(),
    username: z.string(),
    from: z.string(),
    to: z.string(),
  }),
  z.object({
    operation: z.literal('delete_gallery'),
    kind: kindSchema,
    galleryId: z.number(),
    userId: z.number(),
    username: z.string(),
    galleryName: z.string(),
  }),
  z.object({
    operation: z.literal('store_files'),
    kind: kindSchema,
    galleryId: z.number(),
    username: z.string(),
    galleryName: z.string(),
    files: z.array(z.string()),
  }),
  z.object({
    operation: z.literal('delete_file'),
    kind: kindSchema,
    itemId: z.number(),
    userId: z.number(),
    username: z.string(),
    galleryName: z.string(),
    file: z.string(),
  }),
]);

export type StorageIntent = z.infer<typeof intentSchema>;

export interface RecoveryReport {
  recovered: number;
  failed: number;
}

/**
 * Marks the point from which the current operation has changed state.
 * A failure before the mark leaves nothing of this request to undo.
 */
export type MarkApplied = () => void;

/**
 * Write-ahead journal for changes that touch both the database and the
 * media tree. An intent is recorded before the first step and cleared
 * once both sides agree. A failed operation is reconciled right away;
 * whatever survives a crash is reconciled by recoverPending() at startup.
 *
 * Reconciliation treats the database row as the source of truth and
 * moves the filesystem to match it.
 */
export class IntentJournal {
  constructor(
    private readonly storage: IStorage,
    private readonly media: MediaStore
  ) {}

  async run<T>(intent: StorageIntent, work: (applied: MarkApplied) => Promise<T>): Promise<T> {
    const record = await this.storage.recordIntent(intent.operation, intent);
    let applied = false;
    let result: T;
    try {
      result = await work(() => {
        applied = true;
      });
    } catch (error) {
      await this.settle(record.id, intent, applied);
      throw error;
    }
    await this.storage.clearIntent(record.id);
    return result;
  }

  private async settle(id: number, intent: StorageIntent, applied: boolean): Promise<void> {
    try {
      if (applied) {
        await this.reconcile(intent);
      } else {
        // The first step failed, so whatever is on disk belongs to someone else.
        logger.debug('Storage intent dropped before any change', { intentId: id, operation: intent.operation });
      }
      await this.storage.clearIntent(id);
    } catch (error) {
      logger.error('Storage intent left for recovery', {
        intentId: id,
        operation: intent.operation,
        error: error instanceof Error ? error.message : String(error),
      });
    }
  }

  async recoverPending(): Promise<RecoveryReport> {
    const report: RecoveryReport = { recovered: 0, failed: 0 };
    const pending = await this.storage.getPendingIntents();

    for (const row of pending) {
      const parsed = intentSchema.safeParse(row.payload);
      if (!parsed.success) {
        logger.error('Discarding unreadable storage intent', { intentId: row.id, operation: row.operation });
        await this.storage.clearIntent(row.id);
        report.failed++;
        continue;
      }

      try {
        await this.reconcile(parsed.data);
        await this.storage.clearIntent(row.id);
        report.recovered++;
      } catch (error) {
        logger.error('Storage intent recovery failed', {
          intentId: row.id,
          operation: row.operation,
          error: error instanceof Error ? error.message : String(error),
        });
        report.failed++;
      }
    }

    if (pending.length > 0) {
      logger.info('Storage intent recovery finished', { ...report });
    }
    return report;
  }

  async reconcile(intent: StorageIntent): Promise<void> {
    switch (intent.operation) {
      case 'create_user_root': {
        const user = await this.storage.getUserByUsername(intent.username);
        const dir = this.media.userRoot(intent.username);
        if (user) {
          await this.media.ensureDir(dir);
        } else {
          await this.media.removeEmptyDir(dir);
        }
        return;
      }

      case 'rename_user_root': {
        const user = await this.storage.getUser(intent.userId);
        if (!user) return;
        const from = this.media.userRoot(intent.from);
        const to = this.media.userRoot(intent.to);
        if (user.username === intent.to) {
          await this.media.moveIfPresent(from, to);
        } else {
          await this.media.moveIfPresent(to, from);
        }
        return;
      }

      case 'create_gallery': {
        const gallery = await this.storage.findGalleryByName(intent.kind, intent.userId, intent.galleryName);
        const dir = this.media.galleryDir(intent.username, intent.kind, intent.galleryName);
        if (gallery) {
          await this.media.ensureDir(dir);
        } else {
          await this.media.removeEmptyDir(dir);
        }
        return;
      }

      case 'rename_gallery': {
        const gallery = await this.storage.getGallery(intent.kind, intent.galleryId, intent.userId);
        if (!gallery) return;
        const from = this.media.galleryDir(intent.username, intent.kind, intent.from);
        const to = this.media.galleryDir(intent.username, intent.kind, intent.to);
        if (gallery.galleryName === intent.to) {
          await this.media.moveIfPresent(from, to);
        } else {
          await this.media.moveIfPresent(to, from);
        }
        return;
      }

      case 'delete_gallery': {
        const gallery = await this.storage.getGallery(intent.kind, intent.galleryId, intent.userId);
        if (!gallery) {
          await this.media.removeGallery(intent.username, intent.kind, intent.galleryName);
        }
        return;
      }

      case 'store_files': {
        for (const file of intent.files) {
          const row = await this.storage.findMediaItemByFile(intent.kind, intent.galleryId, file);
          if (!row) {
            await this.media.removeFileIfPresent(
              this.media.filePath(intent.username, intent.kind, intent.galleryName, file)
            );
          }
        }
        return;
      }

      case 'delete_file': {
        const target = this.media.filePath(intent.username, intent.kind, intent.galleryName, intent.file);
        if (!(await this.media.exists(target))) {
          await this.storage.deleteMediaItem(intent.kind, intent.itemId);
        }
        return;
      }
    }
  }
}
