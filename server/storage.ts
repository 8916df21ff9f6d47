import {
  users,
  imageGalleries,
  images,
  videoGalleries,
  videos,
  revokedTokens,
  storageIntents,
  type User,
  type InsertUser,
  type Gallery,
  type InsertGallery,
  type GalleryWithItems,
  type MediaItem,
  type MediaItemWithGallery,
  type InsertMediaItem,
  type MediaKind,
  type StorageIntentRow,
} from "@shared/schema";
import { and, asc, desc, eq, lt } from "drizzle-orm";
import type { Database } from "./db";
import { handleDatabaseError } from "./middleware/errorHandler";

export type UserUpdate = Partial<Pick<User, 'firstName' | 'lastName' | 'username' | 'email' | 'contact' | 'password' | 'token'>>;

export interface RevokedTokenInput {
  jti: string;
  userId: number;
  expiresAt: Date;
}

// Interface for storage operations
export interface IStorage {
  // User operations
  getUser(id: number): Promise<User | undefined>;
  getUserByUsername(username: string): Promise<User | undefined>;
  getUserByEmail(email: string): Promise<User | undefined>;
  createUser(user: InsertUser): Promise<User>;
  updateUser(id: number, updates: UserUpdate): Promise<User | undefined>;

  // Gallery operations, one table pair per media kind
  getGalleries(kind: MediaKind, userId: number): Promise<GalleryWithItems[]>;
  getGallery(kind: MediaKind, id: number, userId: number): Promise<GalleryWithItems | undefined>;
  findGalleryByName(kind: MediaKind, userId: number, galleryName: string): Promise<Gallery | undefined>;
  createGallery(kind: MediaKind, gallery: InsertGallery): Promise<Gallery>;
  renameGallery(kind: MediaKind, id: number, galleryName: string): Promise<Gallery | undefined>;
  deleteGallery(kind: MediaKind, id: number): Promise<boolean>;

  // Media item operations
  getMediaItems(kind: MediaKind, userId: number): Promise<MediaItemWithGallery[]>;
  getMediaItem(kind: MediaKind, id: number, userId: number): Promise<MediaItemWithGallery | undefined>;
  findMediaItemByFile(kind: MediaKind, galleryId: number, file: string): Promise<MediaItem | undefined>;
  createMediaItems(kind: MediaKind, items: InsertMediaItem[]): Promise<MediaItem[]>;
  deleteMediaItem(kind: MediaKind, id: number): Promise<boolean>;

  // Refresh token denylist
  revokeToken(token: RevokedTokenInput): Promise<boolean>;
  isTokenRevoked(jti: string): Promise<boolean>;
  purgeExpiredTokens(now: Date): Promise<number>;

  // Storage intent journal
  recordIntent(operation: string, payload: unknown): Promise<StorageIntentRow>;
  clearIntent(id: number): Promise<void>;
  getPendingIntents(): Promise<StorageIntentRow[]>;
}

export class DatabaseStorage implements IStorage {
  constructor(private readonly db: Database) {}

  async getUser(id: number): Promise<User | undefined> {
    const [user] = await this.db.select().from(users).where(eq(users.id, id));
    return user;
  }

  async getUserByUsername(username: string): Promise<User | undefined> {
    const [user] = await this.db.select().from(users).where(eq(users.username, username));
    return user;
  }

  async getUserByEmail(email: string): Promise<User | undefined> {
    const [user] = await this.db.select().from(users).where(eq(users.email, email));
    return user;
  }

  async createUser(userData: InsertUser): Promise<User> {
    try {
      const [user] = await this.db.insert(users).values(userData).returning();
      return user;
    } catch (error) {
      throw handleDatabaseError(error);
    }
  }

  async updateUser(id: number, updates: UserUpdate): Promise<User | undefined> {
    try {
      const [user] = await this.db
        .update(users)
        .set({ ...updates, updatedAt: new Date() })
        .where(eq(users.id, id))
        .returning();
      return user;
    } catch (error) {
      throw handleDatabaseError(error);
    }
  }

  async getGalleries(kind: MediaKind, userId: number): Promise<GalleryWithItems[]> {
    if (kind === 'image') {
      const rows = await this.db.query.imageGalleries.findMany({
        where: eq(imageGalleries.userId, userId),
        orderBy: [desc(imageGalleries.id)],
        with: { images: { orderBy: [asc(images.id)] } },
      });
      return rows.map(({ images: items, ...gallery }) => ({ ...gallery, items }));
    }

    const rows = await this.db.query.videoGalleries.findMany({
      where: eq(videoGalleries.userId, userId),
      orderBy: [desc(videoGalleries.id)],
      with: { videos: { orderBy: [asc(videos.id)] } },
    });
    return rows.map(({ videos: items, ...gallery }) => ({ ...gallery, items }));
  }

  async getGallery(kind: MediaKind, id: number, userId: number): Promise<GalleryWithItems | undefined> {
    if (kind === 'image') {
      const row = await this.db.query.imageGalleries.findFirst({
        where: and(eq(imageGalleries.id, id), eq(imageGalleries.userId, userId)),
        with: { images: { orderBy: [asc(images.id)] } },
      });
      if (!row) return undefined;
      const { images: items, ...gallery } = row;
      return { ...gallery, items };
    }

    const row = await this.db.query.videoGalleries.findFirst({
      where: and(eq(videoGalleries.id, id), eq(videoGalleries.userId, userId)),
      with: { videos: { orderBy: [asc(videos.id)] } },
    });
    if (!row) return undefined;
    const { videos: items, ...gallery } = row;
    return { ...gallery, items };
  }

  async findGalleryByName(kind: MediaKind, userId: number, galleryName: string): Promise<Gallery | undefined> {
    if (kind === 'image') {
      const [gallery] = await this.db
        .select()
        .from(imageGalleries)
        .where(and(eq(imageGalleries.userId, userId), eq(imageGalleries.galleryName, galleryName)));
      return gallery;
    }

    const [gallery] = await this.db
      .select()
      .from(videoGalleries)
      .where(and(eq(videoGalleries.userId, userId), eq(videoGalleries.galleryName, galleryName)));
    return gallery;
  }

  async createGallery(kind: MediaKind, galleryData: InsertGallery): Promise<Gallery> {
    if (kind === 'image') {
      const [gallery] = await this.db.insert(imageGalleries).values(galleryData).returning();
      return gallery;
    }

    const [gallery] = await this.db.insert(videoGalleries).values(galleryData).returning();
    return gallery;
  }

  async renameGallery(kind: MediaKind, id: number, galleryName: string): Promise<Gallery | undefined> {
    const updates = { galleryName, updatedAt: new Date() };
    if (kind === 'image') {
      const [gallery] = await this.db.update(imageGalleries).set(updates).where(eq(imageGalleries.id, id)).returning();
      return gallery;
    }

    const [gallery] = await this.db.update(videoGalleries).set(updates).where(eq(videoGalleries.id, id)).returning();
    return gallery;
  }

  async deleteGallery(kind: MediaKind, id: number): Promise<boolean> {
    // Media rows go with the gallery through ON DELETE CASCADE
    if (kind === 'image') {
      const deleted = await this.db.delete(imageGalleries).where(eq(imageGalleries.id, id)).returning({ id: imageGalleries.id });
      return deleted.length > 0;
    }

    const deleted = await this.db.delete(videoGalleries).where(eq(videoGalleries.id, id)).returning({ id: videoGalleries.id });
    return deleted.length > 0;
  }

  async getMediaItems(kind: MediaKind, userId: number): Promise<MediaItemWithGallery[]> {
    if (kind === 'image') {
      const rows = await this.db
        .select({ item: images, gallery: imageGalleries })
        .from(images)
        .innerJoin(imageGalleries, eq(images.galleryId, imageGalleries.id))
        .where(eq(imageGalleries.userId, userId))
        .orderBy(desc(images.id));
      return rows.map(({ item, gallery }) => ({ ...item, gallery }));
    }

    const rows = await this.db
      .select({ item: videos, gallery: videoGalleries })
      .from(videos)
      .innerJoin(videoGalleries, eq(videos.galleryId, videoGalleries.id))
      .where(eq(videoGalleries.userId, userId))
      .orderBy(desc(videos.id));
    return rows.map(({ item, gallery }) => ({ ...item, gallery }));
  }

  async getMediaItem(kind: MediaKind, id: number, userId: number): Promise<MediaItemWithGallery | undefined> {
    if (kind === 'image') {
      const [row] = await this.db
        .select({ item: images, gallery: imageGalleries })
        .from(images)
        .innerJoin(imageGalleries, eq(images.galleryId, imageGalleries.id))
        .where(and(eq(images.id, id), eq(imageGalleries.userId, userId)));
      return row ? { ...row.item, gallery: row.gallery } : undefined;
    }

    const [row] = await this.db
      .select({ item: videos, gallery: videoGalleries })
      .from(videos)
      .innerJoin(videoGalleries, eq(videos.galleryId, videoGalleries.id))
      .where(and(eq(videos.id, id), eq(videoGalleries.userId, userId)));
    return row ? { ...row.item, gallery: row.gallery } : undefined;
  }

  async findMediaItemByFile(kind: MediaKind, galleryId: number, file: string): Promise<MediaItem | undefined> {
    if (kind === 'image') {
      const [item] = await this.db
        .select()
        .from(images)
        .where(and(eq(images.galleryId, galleryId), eq(images.file, file)));
      return item;
    }

    const [item] = await this.db
      .select()
      .from(videos)
      .where(and(eq(videos.galleryId, galleryId), eq(videos.file, file)));
    return item;
  }

  async createMediaItems(kind: MediaKind, items: InsertMediaItem[]): Promise<MediaItem[]> {
    if (items.length === 0) return [];
    // One statement, so either every row lands or none does
    if (kind === 'image') {
      return this.db.insert(images).values(items).returning();
    }
    return this.db.insert(videos).values(items).returning();
  }

  async deleteMediaItem(kind: MediaKind, id: number): Promise<boolean> {
    if (kind === 'image') {
      const deleted = await this.db.delete(images).where(eq(images.id, id)).returning({ id: images.id });
      return deleted.length > 0;
    }

    const deleted = await this.db.delete(videos).where(eq(videos.id, id)).returning({ id: videos.id });
    return deleted.length > 0;
  }

  async revokeToken(token: RevokedTokenInput): Promise<boolean> {
    const inserted = await this.db
      .insert(revokedTokens)
      .values(token)
      .onConflictDoNothing()
      .returning({ jti: revokedTokens.jti });
    return inserted.length > 0;
  }

  async isTokenRevoked(jti: string): Promise<boolean> {
    const rows = await this.db
      .select({ jti: revokedTokens.jti })
      .from(revokedTokens)
      .where(eq(revokedTokens.jti, jti));
    return rows.length > 0;
  }

  async purgeExpiredTokens(now: Date): Promise<number> {
    const deleted = await this.db
      .delete(revokedTokens)
      .where(lt(revokedTokens.expiresAt, now))
      .returning({ jti: revokedTokens.jti });
    return deleted.length;
  }

  async recordIntent(operation: string, payload: unknown): Promise<StorageIntentRow> {
    const [intent] = await this.db.insert(storageIntents).values({ operation, payload }).returning();
    return intent;
  }

  async clearIntent(id: number): Promise<void> {
    await this.db.delete(storageIntents).where(eq(storageIntents.id, id));
  }

  async getPendingIntents(): Promise<StorageIntentRow[]> {
    return this.db.select().from(storageIntents).orderBy(asc(storageIntents.id));
  }
}
