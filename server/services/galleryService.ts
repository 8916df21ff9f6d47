import type {
  Gallery,
  GalleryWithItems,
  MediaItemWithGallery,
  MediaKind,
  User,
} from '@shared/schema';
import { GALLERY_ITEM_LIMIT } from '@shared/constants';
import { MEDIA_MESSAGES } from '@shared/messages';
import type { IStorage } from '../storage';
import type { MediaStore } from './mediaStore';
import type { IntentJournal } from './intentJournal';
import { validateUpload, type UploadedFile } from '../middleware/fileValidation';
import { ConflictError, NotFoundError, ValidationError } from '../middleware/errorHandler';
import { logger } from '../utils/logger';

export interface GalleryServiceDeps {
  storage: IStorage;
  media: MediaStore;
  journal: IntentJournal;
}

const ITEM_LABEL: Record<MediaKind, string> = {
  image: 'Image',
  video: 'Video',
};

// Galleries live under the owner's username
function ownerName(user: User): string {
  if (!user.username) {
    throw ValidationError.nonField('A username is required before storing media');
  }
  return user.username;
}

export class GalleryService {
  constructor(private readonly deps: GalleryServiceDeps) {}

  listGalleries(kind: MediaKind, user: User): Promise<GalleryWithItems[]> {
    return this.deps.storage.getGalleries(kind, user.id);
  }

  async getGallery(kind: MediaKind, user: User, id: number): Promise<GalleryWithItems> {
    const gallery = await this.deps.storage.getGallery(kind, id, user.id);
    if (!gallery) throw new NotFoundError('Gallery');
    return gallery;
  }

  private async assertNameFree(kind: MediaKind, user: User, galleryName: string, exceptId?: number) {
    const existing = await this.deps.storage.findGalleryByName(kind, user.id, galleryName);
    if (existing && existing.id !== exceptId) {
      throw ValidationError.forField('gallery_name', MEDIA_MESSAGES[kind].galleryExists);
    }
  }

  async createGallery(kind: MediaKind, user: User, galleryName: string): Promise<Gallery> {
    const { storage, media, journal } = this.deps;
    const username = ownerName(user);

    await this.assertNameFree(kind, user, galleryName);
    if (await media.exists(media.galleryDir(username, kind, galleryName))) {
      throw new ConflictError('Gallery directory already exists');
    }

    const gallery = await journal.run(
      { operation: 'create_gallery', kind, userId: user.id, username, galleryName },
      async applied => {
        await media.createGallery(username, kind, galleryName);
        applied();
        return storage.createGallery(kind, { galleryName, userId: user.id });
      }
    );

    logger.info('Gallery created', { kind, galleryId: gallery.id, userId: user.id });
    return gallery;
  }

  async renameGallery(kind: MediaKind, user: User, id: number, galleryName: string): Promise<Gallery> {
    const { storage, media, journal } = this.deps;
    const username = ownerName(user);

    const gallery = await this.getGallery(kind, user, id);
    await this.assertNameFree(kind, user, galleryName, id);

    const from = gallery.galleryName;
    if (from !== galleryName) {
      if (!(await media.exists(media.galleryDir(username, kind, from)))) {
        throw new NotFoundError('Gallery directory');
      }
      if (await media.exists(media.galleryDir(username, kind, galleryName))) {
        throw new ConflictError('Gallery directory already exists');
      }
    }

    const renamed = await journal.run(
      { operation: 'rename_gallery', kind, galleryId: id, userId: user.id, username, from, to: galleryName },
      async applied => {
        await media.renameGallery(username, kind, from, galleryName);
        applied();
        return storage.renameGallery(kind, id, galleryName);
      }
    );
    if (!renamed) throw new NotFoundError('Gallery');

    logger.info('Gallery renamed', { kind, galleryId: id, userId: user.id });
    return renamed;
  }

  async deleteGallery(kind: MediaKind, user: User, id: number): Promise<void> {
    const { storage, media, journal } = this.deps;
    const username = ownerName(user);
    const gallery = await this.getGallery(kind, user, id);

    await journal.run(
      {
        operation: 'delete_gallery',
        kind,
        galleryId: id,
        userId: user.id,
        username,
        galleryName: gallery.galleryName,
      },
      async applied => {
        await storage.deleteGallery(kind, id);
        applied();
        await media.removeGallery(username, kind, gallery.galleryName);
      }
    );

    logger.info('Gallery deleted', { kind, galleryId: id, userId: user.id, items: gallery.items.length });
  }

  listItems(kind: MediaKind, user: User): Promise<MediaItemWithGallery[]> {
    return this.deps.storage.getMediaItems(kind, user.id);
  }

  async getItem(kind: MediaKind, user: User, id: number): Promise<MediaItemWithGallery> {
    const item = await this.deps.storage.getMediaItem(kind, id, user.id);
    if (!item) throw new NotFoundError(ITEM_LABEL[kind]);
    return item;
  }

  /**
   * Stores a batch of uploads. Every file is checked and the gallery's
   * ceiling enforced before anything is written; either the whole batch
   * lands or none of it does.
   */
  async uploadItems(
    kind: MediaKind,
    user: User,
    galleryId: number,
    files: UploadedFile[]
  ): Promise<MediaItemWithGallery[]> {
    const { storage, media, journal } = this.deps;
    const messages = MEDIA_MESSAGES[kind];
    const username = ownerName(user);

    if (files.length === 0) {
      throw ValidationError.forField(kind, messages.itemRequired);
    }
    for (const file of files) {
      const rejection = validateUpload(kind, file);
      if (rejection) {
        throw ValidationError.forField(kind, messages[rejection]);
      }
    }

    const gallery = await this.getGallery(kind, user, galleryId);
    if (gallery.items.length + files.length > GALLERY_ITEM_LIMIT) {
      throw ValidationError.nonField(messages.maxLimit);
    }

    const galleryName = gallery.galleryName;
    const names = files.map(file => media.nextFilename(username, galleryName, file.originalName));
    await media.ensureDir(media.galleryDir(username, kind, galleryName));

    const created = await journal.run(
      { operation: 'store_files', kind, galleryId, username, galleryName, files: names },
      async applied => {
        // Generated names are unique, so a partial write is ours to remove
        applied();
        for (const [index, file] of files.entries()) {
          await media.writeFile(username, kind, galleryName, names[index], file.buffer);
        }
        return storage.createMediaItems(kind, names.map(file => ({ galleryId, file })));
      }
    );

    logger.info('Media uploaded', { kind, galleryId, userId: user.id, count: created.length });
    const galleryRow: Gallery = {
      id: gallery.id,
      galleryName: gallery.galleryName,
      userId: gallery.userId,
      createdAt: gallery.createdAt,
      updatedAt: gallery.updatedAt,
    };
    return created.map(item => ({ ...item, gallery: galleryRow }));
  }

  async deleteItem(kind: MediaKind, user: User, id: number): Promise<void> {
    const { storage, media, journal } = this.deps;
    const username = ownerName(user);
    const item = await this.getItem(kind, user, id);

    await journal.run(
      {
        operation: 'delete_file',
        kind,
        itemId: id,
        userId: user.id,
        username,
        galleryName: item.gallery.galleryName,
        file: item.file,
      },
      async applied => {
        // A missing file surfaces as 404 and leaves the row untouched
        await media.deleteFile(username, kind, item.gallery.galleryName, item.file);
        applied();
        await storage.deleteMediaItem(kind, id);
      }
    );

    logger.info('Media deleted', { kind, itemId: id, userId: user.id });
  }
}
