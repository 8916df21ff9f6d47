import { Router, type Request, type RequestHandler } from 'express';
import multer from 'multer';
import type { MediaKind, User } from '@shared/schema';
import { GALLERY_ITEM_LIMIT, MAX_RECORD_ID, MEDIA_KINDS } from '@shared/constants';
import { MEDIA_MESSAGES } from '@shared/messages';
import { asyncHandler, NotFoundError, ValidationError } from '../middleware/errorHandler';
import { currentUser } from '../middleware/authSecurity';
import type { UploadedFile } from '../middleware/fileValidation';
import { validate, validateUploadBody } from '../validation/schemas';
import { requestBaseUrl, serializeGallery, serializeMediaItem } from '../serializers';
import type { GalleryService } from '../services/galleryService';

export interface GalleryRouterDeps {
  galleries: GalleryService;
  auth: RequestHandler;
}

function parseId(req: Request, resource: string): number {
  const raw = req.params.id;
  if (!raw || !/^\d+$/.test(raw)) throw new NotFoundError(resource);
  const id = Number(raw);
  // No row can carry an id outside the integer column's range
  if (id < 1 || id > MAX_RECORD_ID) throw new NotFoundError(resource);
  return id;
}

// Authenticated routes always carry a user with a username
function owner(user: User): string {
  return user.username ?? '';
}

// Multer limit errors become field errors of the kind being uploaded
export function translateUploadError(kind: MediaKind, err: unknown): unknown {
  if (!(err instanceof multer.MulterError)) return err;

  const messages = MEDIA_MESSAGES[kind];
  switch (err.code) {
    case 'LIMIT_FILE_SIZE':
      return ValidationError.forField(kind, messages.maxSize);
    case 'LIMIT_FILE_COUNT':
      return ValidationError.nonField(messages.maxLimit);
    case 'LIMIT_UNEXPECTED_FILE':
      return ValidationError.forField(err.field ?? kind, 'Unexpected field in upload.');
    default:
      return ValidationError.nonField(err.message);
  }
}

function uploadMiddleware(kind: MediaKind): RequestHandler {
  const upload = multer({
    storage: multer.memoryStorage(),
    limits: {
      fileSize: MEDIA_KINDS[kind].maxFileSize,
      files: GALLERY_ITEM_LIMIT,
    },
  }).fields([{ name: kind }, { name: `${kind}[]` }]);

  return (req, res, next) => {
    upload(req, res, (err: unknown) => {
      if (err) {
        next(translateUploadError(kind, err));
        return;
      }
      next();
    });
  };
}

function collectFiles(req: Request): UploadedFile[] {
  const files = req.files;
  const list = !files ? [] : Array.isArray(files) ? files : Object.values(files).flat();
  return list.map(file => ({
    originalName: file.originalname,
    mimeType: file.mimetype,
    size: file.size,
    buffer: file.buffer,
  }));
}

/**
 * Gallery and item endpoints for one media kind:
 * - GET|POST /{kind}-gallery, GET|PUT|DELETE /{kind}-gallery/:id
 * - GET|POST /{kind}s, GET|DELETE /{kind}s/:id
 */
export function createGalleryRouter(kind: MediaKind, { galleries, auth }: GalleryRouterDeps): Router {
  const router = Router();
  const messages = MEDIA_MESSAGES[kind];
  const galleryPath = `/${kind}-gallery`;
  const itemPath = `/${kind}s`;
  const itemLabel = kind === 'image' ? 'Image' : 'Video';

  router.get(galleryPath, auth, asyncHandler(async (req, res) => {
    const user = currentUser(req);
    const list = await galleries.listGalleries(kind, user);
    if (list.length === 0) {
      res.json({ message: messages.noGalleries });
      return;
    }
    const baseUrl = requestBaseUrl(req);
    res.json(list.map(gallery => serializeGallery(kind, gallery, owner(user), baseUrl)));
  }));

  router.get(`${galleryPath}/:id`, auth, asyncHandler(async (req, res) => {
    const user = currentUser(req);
    const gallery = await galleries.getGallery(kind, user, parseId(req, 'Gallery'));
    res.json(serializeGallery(kind, gallery, owner(user), requestBaseUrl(req)));
  }));

  router.post(galleryPath, auth, asyncHandler(async (req, res) => {
    const { gallery_name } = validate('galleryCreate', req.body);
    const gallery = await galleries.createGallery(kind, currentUser(req), gallery_name);
    res.status(201).json({
      message: messages.galleryCreated,
      data: {
        id: gallery.id,
        gallery: gallery.galleryName,
        created_at: gallery.createdAt.toISOString(),
      },
    });
  }));

  router.put(`${galleryPath}/:id`, auth, asyncHandler(async (req, res) => {
    const id = parseId(req, 'Gallery');
    const { gallery_name } = validate('galleryRename', req.body);
    const gallery = await galleries.renameGallery(kind, currentUser(req), id, gallery_name);
    res.json({
      message: messages.galleryUpdated,
      data: {
        id: gallery.id,
        gallery: gallery.galleryName,
        created_at: gallery.createdAt.toISOString(),
        updated_at: gallery.updatedAt.toISOString(),
      },
    });
  }));

  router.delete(`${galleryPath}/:id`, auth, asyncHandler(async (req, res) => {
    await galleries.deleteGallery(kind, currentUser(req), parseId(req, 'Gallery'));
    res.json({ message: messages.galleryDeleted });
  }));

  router.get(itemPath, auth, asyncHandler(async (req, res) => {
    const user = currentUser(req);
    const items = await galleries.listItems(kind, user);
    if (items.length === 0) {
      res.json({ message: messages.noItems });
      return;
    }
    const baseUrl = requestBaseUrl(req);
    res.json(items.map(item => serializeMediaItem(kind, item, item.gallery, owner(user), baseUrl)));
  }));

  router.get(`${itemPath}/:id`, auth, asyncHandler(async (req, res) => {
    const user = currentUser(req);
    const item = await galleries.getItem(kind, user, parseId(req, itemLabel));
    res.json(serializeMediaItem(kind, item, item.gallery, owner(user), requestBaseUrl(req)));
  }));

  router.post(itemPath, auth, uploadMiddleware(kind), asyncHandler(async (req, res) => {
    const user = currentUser(req);
    const galleryId = validateUploadBody(kind, req.body);
    const items = await galleries.uploadItems(kind, user, galleryId, collectFiles(req));
    const baseUrl = requestBaseUrl(req);
    res.status(201).json({
      message: messages.itemsCreated,
      data: items.map(item => serializeMediaItem(kind, item, item.gallery, owner(user), baseUrl)),
    });
  }));

  router.delete(`${itemPath}/:id`, auth, asyncHandler(async (req, res) => {
    await galleries.deleteItem(kind, currentUser(req), parseId(req, itemLabel));
    res.json({ message: messages.itemDeleted });
  }));

  return router;
}
