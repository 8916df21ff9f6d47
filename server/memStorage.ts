import type {
  User,
  InsertUser,
  Gallery,
  InsertGallery,
  GalleryWithItems,
  MediaItem,
  MediaItemWithGallery,
  InsertMediaItem,
  MediaKind,
  RevokedToken,
  StorageIntentRow,
} from "@shared/schema";
import type { IStorage, RevokedTokenInput, UserUpdate } from "./storage";
import { ConflictError } from "./middleware/errorHandler";

interface KindTables {
  galleries: Map<number, Gallery>;
  items: Map<number, MediaItem>;
  nextGalleryId: number;
  nextItemId: number;
}

function newKindTables(): KindTables {
  return { galleries: new Map(), items: new Map(), nextGalleryId: 1, nextItemId: 1 };
}

// Process-local storage with the same contract as DatabaseStorage,
// including unique usernames/emails and cascading gallery deletes.
export class MemStorage implements IStorage {
  private users = new Map<number, User>();
  private nextUserId = 1;
  private kinds: Record<MediaKind, KindTables> = {
    image: newKindTables(),
    video: newKindTables(),
  };
  private revoked = new Map<string, RevokedToken>();
  private intents = new Map<number, StorageIntentRow>();
  private nextIntentId = 1;

  async getUser(id: number): Promise<User | undefined> {
    return this.users.get(id);
  }

  async getUserByUsername(username: string): Promise<User | undefined> {
    return Array.from(this.users.values()).find(user => user.username === username);
  }

  async getUserByEmail(email: string): Promise<User | undefined> {
    return Array.from(this.users.values()).find(user => user.email === email);
  }

  private assertUnique(id: number, username: string | null | undefined, email: string | null | undefined) {
    for (const other of this.users.values()) {
      if (other.id === id) continue;
      if ((username && other.username === username) || (email && other.email === email)) {
        throw new ConflictError('A record with this value already exists');
      }
    }
  }

  async createUser(userData: InsertUser): Promise<User> {
    this.assertUnique(0, userData.username, userData.email);
    const now = new Date();
    const user: User = {
      id: this.nextUserId++,
      firstName: userData.firstName,
      lastName: userData.lastName,
      username: userData.username ?? null,
      email: userData.email ?? null,
      contact: userData.contact,
      password: userData.password,
      token: '',
      createdAt: now,
      updatedAt: now,
    };
    this.users.set(user.id, user);
    return user;
  }

  async updateUser(id: number, updates: UserUpdate): Promise<User | undefined> {
    const existing = this.users.get(id);
    if (!existing) return undefined;
    this.assertUnique(id, updates.username, updates.email);
    const user: User = { ...existing, ...updates, updatedAt: new Date() };
    this.users.set(id, user);
    return user;
  }

  private itemsOf(kind: MediaKind, galleryId: number): MediaItem[] {
    return Array.from(this.kinds[kind].items.values())
      .filter(item => item.galleryId === galleryId)
      .sort((a, b) => a.id - b.id);
  }

  async getGalleries(kind: MediaKind, userId: number): Promise<GalleryWithItems[]> {
    return Array.from(this.kinds[kind].galleries.values())
      .filter(gallery => gallery.userId === userId)
      .sort((a, b) => b.id - a.id)
      .map(gallery => ({ ...gallery, items: this.itemsOf(kind, gallery.id) }));
  }

  async getGallery(kind: MediaKind, id: number, userId: number): Promise<GalleryWithItems | undefined> {
    const gallery = this.kinds[kind].galleries.get(id);
    if (!gallery || gallery.userId !== userId) return undefined;
    return { ...gallery, items: this.itemsOf(kind, id) };
  }

  async findGalleryByName(kind: MediaKind, userId: number, galleryName: string): Promise<Gallery | undefined> {
    return Array.from(this.kinds[kind].galleries.values())
      .find(gallery => gallery.userId === userId && gallery.galleryName === galleryName);
  }

  async createGallery(kind: MediaKind, galleryData: InsertGallery): Promise<Gallery> {
    const tables = this.kinds[kind];
    const now = new Date();
    const gallery: Gallery = {
      id: tables.nextGalleryId++,
      galleryName: galleryData.galleryName,
      userId: galleryData.userId,
      createdAt: now,
      updatedAt: now,
    };
    tables.galleries.set(gallery.id, gallery);
    return gallery;
  }

  async renameGallery(kind: MediaKind, id: number, galleryName: string): Promise<Gallery | undefined> {
    const tables = this.kinds[kind];
    const existing = tables.galleries.get(id);
    if (!existing) return undefined;
    const gallery: Gallery = { ...existing, galleryName, updatedAt: new Date() };
    tables.galleries.set(id, gallery);
    return gallery;
  }

  async deleteGallery(kind: MediaKind, id: number): Promise<boolean> {
    const tables = this.kinds[kind];
    if (!tables.galleries.delete(id)) return false;
    for (const item of Array.from(tables.items.values())) {
      if (item.galleryId === id) tables.items.delete(item.id);
    }
    return true;
  }

  private withGallery(kind: MediaKind, item: MediaItem, userId: number): MediaItemWithGallery | undefined {
    const gallery = this.kinds[kind].galleries.get(item.galleryId);
    if (!gallery || gallery.userId !== userId) return undefined;
    return { ...item, gallery };
  }

  async getMediaItems(kind: MediaKind, userId: number): Promise<MediaItemWithGallery[]> {
    const result: MediaItemWithGallery[] = [];
    for (const item of this.kinds[kind].items.values()) {
      const joined = this.withGallery(kind, item, userId);
      if (joined) result.push(joined);
    }
    return result.sort((a, b) => b.id - a.id);
  }

  async getMediaItem(kind: MediaKind, id: number, userId: number): Promise<MediaItemWithGallery | undefined> {
    const item = this.kinds[kind].items.get(id);
    return item ? this.withGallery(kind, item, userId) : undefined;
  }

  async findMediaItemByFile(kind: MediaKind, galleryId: number, file: string): Promise<MediaItem | undefined> {
    return this.itemsOf(kind, galleryId).find(item => item.file === file);
  }

  async createMediaItems(kind: MediaKind, items: InsertMediaItem[]): Promise<MediaItem[]> {
    const tables = this.kinds[kind];
    // Checked up front so a bad row leaves nothing behind
    for (const item of items) {
      if (!tables.galleries.has(item.galleryId)) {
        throw new ConflictError('Referenced gallery does not exist');
      }
    }
    const now = new Date();
    return items.map(data => {
      const item: MediaItem = {
        id: tables.nextItemId++,
        galleryId: data.galleryId,
        file: data.file,
        createdAt: now,
        updatedAt: now,
      };
      tables.items.set(item.id, item);
      return item;
    });
  }

  async deleteMediaItem(kind: MediaKind, id: number): Promise<boolean> {
    return this.kinds[kind].items.delete(id);
  }

  async revokeToken(token: RevokedTokenInput): Promise<boolean> {
    if (this.revoked.has(token.jti)) return false;
    this.revoked.set(token.jti, { ...token, revokedAt: new Date() });
    return true;
  }

  async isTokenRevoked(jti: string): Promise<boolean> {
    return this.revoked.has(jti);
  }

  async purgeExpiredTokens(now: Date): Promise<number> {
    let purged = 0;
    for (const [jti, token] of Array.from(this.revoked.entries())) {
      if (token.expiresAt < now) {
        this.revoked.delete(jti);
        purged++;
      }
    }
    return purged;
  }

  async recordIntent(operation: string, payload: unknown): Promise<StorageIntentRow> {
    const intent: StorageIntentRow = {
      id: this.nextIntentId++,
      operation,
      payload,
      createdAt: new Date(),
    };
    this.intents.set(intent.id, intent);
    return intent;
  }

  async clearIntent(id: number): Promise<void> {
    this.intents.delete(id);
  }

  async getPendingIntents(): Promise<StorageIntentRow[]> {
    return Array.from(this.intents.values()).sort((a, b) => a.id - b.id);
  }
}
