import type { Request } from 'express';
import type { Gallery, GalleryWithItems, MediaItem, MediaKind, User } from '@shared/schema';
import { MEDIA_URL_PREFIX } from '@shared/constants';
import { mediaRelativeUrl } from './services/mediaPaths';

// Wire shapes use snake_case keys

export function requestBaseUrl(req: Request): string {
  return `${req.protocol}://${req.get('host') ?? 'localhost'}`;
}

export function serializeUser(user: User) {
  return {
    id: user.id,
    first_name: user.firstName,
    last_name: user.lastName,
    username: user.username,
    email: user.email,
    contact: user.contact,
  };
}

export function serializeMediaItem(
  kind: MediaKind,
  item: MediaItem,
  gallery: Gallery,
  owner: string,
  baseUrl: string
) {
  const url = `${baseUrl}${MEDIA_URL_PREFIX}/${mediaRelativeUrl(owner, kind, gallery.galleryName, item.file)}`;
  return {
    id: item.id,
    [kind]: url,
    [`${kind}_gallery_id`]: item.galleryId,
    gallery: gallery.galleryName,
    created_at: item.createdAt.toISOString(),
    updated_at: item.updatedAt.toISOString(),
  };
}

export function serializeGallery(kind: MediaKind, gallery: GalleryWithItems, owner: string, baseUrl: string) {
  return {
    id: gallery.id,
    gallery_name: gallery.galleryName,
    [`${kind}s`]: gallery.items.map(item => serializeMediaItem(kind, item, gallery, owner, baseUrl)),
    created_at: gallery.createdAt.toISOString(),
    updated_at: gallery.updatedAt.toISOString(),
  };
}
