import { relations } from 'drizzle-orm';
import {
  index,
  integer,
  jsonb,
  pgTable,
  serial,
  timestamp,
  varchar,
} from "drizzle-orm/pg-core";
import { createInsertSchema } from "drizzle-zod";
import { z } from "zod";

// User accounts
export const users = pgTable("User", {
  id: serial("id").primaryKey(),
  firstName: varchar("first_name", { length: 30 }).notNull(),
  lastName: varchar("last_name", { length: 30 }).notNull(),
  username: varchar("username", { length: 16 }).unique(),
  email: varchar("email", { length: 254 }).unique(),
  contact: varchar("contact", { length: 10 }).notNull(),
  password: varchar("password", { length: 255 }).notNull(), // bcrypt hash
  token: varchar("token", { length: 512 }).notNull().default(""), // last issued access token
  createdAt: timestamp("created_at").defaultNow().notNull(),
  updatedAt: timestamp("updated_at").defaultNow().notNull(),
});

export const imageGalleries = pgTable("ImageGallery", {
  id: serial("id").primaryKey(),
  galleryName: varchar("gallery_name", { length: 20 }).notNull(),
  userId: integer("user_id").notNull().references(() => users.id, { onDelete: 'cascade' }),
  createdAt: timestamp("created_at").defaultNow().notNull(),
  updatedAt: timestamp("updated_at").defaultNow().notNull(),
}, (table) => [
  index("idx_image_gallery_user").on(table.userId),
]);

// `file` holds the generated file name only; the directory is derived from
// the owner and gallery so a rename never rewrites child rows.
export const images = pgTable("Image", {
  id: serial("id").primaryKey(),
  galleryId: integer("image_gallery_id").notNull().references(() => imageGalleries.id, { onDelete: 'cascade' }),
  file: varchar("image", { length: 255 }).notNull(),
  createdAt: timestamp("created_at").defaultNow().notNull(),
  updatedAt: timestamp("updated_at").defaultNow().notNull(),
}, (table) => [
  index("idx_image_gallery").on(table.galleryId),
]);

export const videoGalleries = pgTable("VideoGallery", {
  id: serial("id").primaryKey(),
  galleryName: varchar("gallery_name", { length: 20 }).notNull(),
  userId: integer("user_id").notNull().references(() => users.id, { onDelete: 'cascade' }),
  createdAt: timestamp("created_at").defaultNow().notNull(),
  updatedAt: timestamp("updated_at").defaultNow().notNull(),
}, (table) => [
  index("idx_video_gallery_user").on(table.userId),
]);

export const videos = pgTable("Video", {
  id: serial("id").primaryKey(),
  galleryId: integer("video_gallery_id").notNull().references(() => videoGalleries.id, { onDelete: 'cascade' }),
  file: varchar("video", { length: 255 }).notNull(),
  createdAt: timestamp("created_at").defaultNow().notNull(),
  updatedAt: timestamp("updated_at").defaultNow().notNull(),
}, (table) => [
  index("idx_video_gallery").on(table.galleryId),
]);

// Refresh tokens revoked before their natural expiry
export const revokedTokens = pgTable("revoked_tokens", {
  jti: varchar("jti", { length: 64 }).primaryKey(),
  userId: integer("user_id").notNull(),
  expiresAt: timestamp("expires_at").notNull(),
  revokedAt: timestamp("revoked_at").defaultNow().notNull(),
}, (table) => [
  index("idx_revoked_tokens_expires").on(table.expiresAt),
]);

// Write-ahead records for paired database + filesystem changes
export const storageIntents = pgTable("storage_intents", {
  id: serial("id").primaryKey(),
  operation: varchar("operation", { length: 40 }).notNull(),
  payload: jsonb("payload").notNull(),
  createdAt: timestamp("created_at").defaultNow().notNull(),
});

export const usersRelations = relations(users, ({ many }) => ({
  imageGalleries: many(imageGalleries),
  videoGalleries: many(videoGalleries),
}));

export const imageGalleriesRelations = relations(imageGalleries, ({ one, many }) => ({
  owner: one(users, {
    fields: [imageGalleries.userId],
    references: [users.id],
  }),
  images: many(images),
}));

export const imagesRelations = relations(images, ({ one }) => ({
  gallery: one(imageGalleries, {
    fields: [images.galleryId],
    references: [imageGalleries.id],
  }),
}));

export const videoGalleriesRelations = relations(videoGalleries, ({ one, many }) => ({
  owner: one(users, {
    fields: [videoGalleries.userId],
    references: [users.id],
  }),
  videos: many(videos),
}));

export const videosRelations = relations(videos, ({ one }) => ({
  gallery: one(videoGalleries, {
    fields: [videos.galleryId],
    references: [videoGalleries.id],
  }),
}));

// Insert schemas
export const insertUserSchema = createInsertSchema(users).pick({
  firstName: true,
  lastName: true,
  username: true,
  email: true,
  contact: true,
  password: true,
});

export const insertGallerySchema = createInsertSchema(imageGalleries).pick({
  galleryName: true,
  userId: true,
});

export const insertMediaItemSchema = createInsertSchema(images).pick({
  galleryId: true,
  file: true,
});

export type MediaKind = 'image' | 'video';

export type User = typeof users.$inferSelect;
export type InsertUser = z.infer<typeof insertUserSchema>;
// Image and video tables share their shape, so one type covers both kinds.
export type Gallery = typeof imageGalleries.$inferSelect;
export type InsertGallery = z.infer<typeof insertGallerySchema>;
export type MediaItem = typeof images.$inferSelect;
export type InsertMediaItem = z.infer<typeof insertMediaItemSchema>;
export type RevokedToken = typeof revokedTokens.$inferSelect;
export type StorageIntentRow = typeof storageIntents.$inferSelect;

export type GalleryWithItems = Gallery & { items: MediaItem[] };
export type MediaItemWithGallery = MediaItem & { gallery: Gallery };
