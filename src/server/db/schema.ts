/**
 * Drizzle schema for the catalog tables this tool reads and writes.
 *
 * The catalog is an existing SQLite database owned by another application:
 * - We never create or migrate it; only the columns used here are declared.
 * - Table and column names are the catalog's own (`Adobe_images`,
 *   `id_local`, ...); the TypeScript names are ours.
 *
 * Paths:
 *   original = AgLibraryRootFolder.absolutePath
 *            + AgLibraryFolder.pathFromRoot
 *            + AgLibraryFile.baseName + "." + AgLibraryFile.extension
 *
 * Smart previews:
 *   AgLibraryFile.id_global = AgDNGProxyInfo.fileUUID, and the fileUUID names
 *   the preview file inside the preview cache.
 *
 * Keywords:
 * - vocabulary: AgLibraryKeyword (one row per keyword, tree via `parent`)
 * - membership: AgLibraryKeywordImage (image <-> keyword)
 */

import { integer, real, sqliteTable, text } from "drizzle-orm/sqlite-core";

export const images = sqliteTable("Adobe_images", {
  id: integer("id_local").primaryKey(),
  idGlobal: text("id_global").notNull(),
  rootFile: integer("rootFile").notNull(),

  // ISO-like local time, e.g. "2021-06-12T14:03:22.00".
  captureTime: text("captureTime"),
  rating: real("rating"),
  fileFormat: text("fileFormat"),
});

export const files = sqliteTable("AgLibraryFile", {
  id: integer("id_local").primaryKey(),
  idGlobal: text("id_global").notNull(),
  baseName: text("baseName").notNull(),
  extension: text("extension").notNull(),
  folder: integer("folder").notNull(),
  idxFilename: text("idx_filename").notNull(),
});

export const folders = sqliteTable("AgLibraryFolder", {
  id: integer("id_local").primaryKey(),
  idGlobal: text("id_global").notNull(),
  // Relative to the root, "/"-separated, trailing slash ("2021/trip/"); "" for the root itself.
  pathFromRoot: text("pathFromRoot").notNull(),
  rootFolder: integer("rootFolder").notNull(),
});

export const rootFolders = sqliteTable("AgLibraryRootFolder", {
  id: integer("id_local").primaryKey(),
  idGlobal: text("id_global").notNull(),
  // Absolute, with trailing slash ("/Volumes/Photos/").
  absolutePath: text("absolutePath").notNull(),
  name: text("name").notNull(),
});

export const dngProxies = sqliteTable("AgDNGProxyInfo", {
  id: integer("id_local").primaryKey(),
  idGlobal: text("id_global").notNull(),
  fileUUID: text("fileUUID").notNull(),
});

export const keywords = sqliteTable("AgLibraryKeyword", {
  id: integer("id_local").primaryKey(),
  idGlobal: text("id_global").notNull(),

  // Seconds since 2001-01-01T00:00:00Z.
  dateCreated: real("dateCreated").notNull(),

  // Path of ids from the keyword root, each prefixed by its digit count:
  // id 12 under root 7 -> "/17/212".
  genealogy: text("genealogy").notNull(),

  // Null only for the hidden root keyword.
  name: text("name"),
  lcName: text("lc_name"),
  parent: integer("parent"),
});

export const keywordImages = sqliteTable("AgLibraryKeywordImage", {
  id: integer("id_local").primaryKey(),
  image: integer("image").notNull(),
  tag: integer("tag").notNull(),
});

export const collections = sqliteTable("AgLibraryCollection", {
  id: integer("id_local").primaryKey(),
  name: text("name").notNull(),
  creationId: text("creationId").notNull(),
  parent: integer("parent"),
});

export const collectionImages = sqliteTable("AgLibraryCollectionImage", {
  id: integer("id_local").primaryKey(),
  collection: integer("collection").notNull(),
  image: integer("image").notNull(),
});
