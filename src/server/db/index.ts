/**
 * Catalog store.
 *
 * Opens the catalog database exclusively for the whole session (single
 * writer), enumerates photos and reads/writes keyword membership.
 *
 * Concurrency:
 * - `openCatalog` fails fast with `CatalogLockedError` when the catalog is
 *   open elsewhere: a `<catalog>.lock` file exists, or SQLite refuses an
 *   exclusive lock. No waiting, no retry.
 * - The exclusive lock is held until `close()`.
 *
 * Writes:
 * - `addKeywords` runs in one transaction: a photo is never left linked to
 *   half of a keyword set.
 * - Vocabulary rows are reused by exact name; membership is only added for
 *   names the photo does not already carry (case-insensitive).
 */

import fs from "node:fs";
import path from "node:path";
import { randomUUID } from "node:crypto";
import Database from "better-sqlite3";
import {
  and,
  asc,
  eq,
  gte,
  inArray,
  isNull,
  lte,
  notInArray,
  sql,
  type SQL,
} from "drizzle-orm";
import { drizzle } from "drizzle-orm/better-sqlite3";
import type { BaseSQLiteDatabase } from "drizzle-orm/sqlite-core";

import { CatalogLockedError, CatalogOpenError } from "~/lib/errors";
import type { Logger } from "~/lib/log/logger";
import { missingNames } from "~/lib/tags/keywords";
import type { StorageRoot } from "~/server/storage/volumes";
import type { PhotoIdentity } from "~/session/photo";
import * as schema from "~/server/db/schema";

const {
  collectionImages,
  collections,
  dngProxies,
  files,
  folders,
  images,
  keywordImages,
  keywords,
  rootFolders,
} = schema;

// The catalog's epoch for dateCreated: 2001-01-01T00:00:00Z.
const COCOA_EPOCH_SECONDS = 978_307_200;

export type PhotoFilters = {
  onlyUntagged?: boolean;
  // Inclusive calendar days, "YYYY-MM-DD".
  capturedFrom?: string;
  capturedTo?: string;
  // 0 or less keeps unrated photos too.
  minRating?: number;
  // Case-insensitive substring of a collection name.
  collection?: string;
};

export type ListPhotosOptions = {
  /**
   * Membership high-water mark taken when the session started
   * (`keywordMark()`). With `onlyUntagged`, memberships above it do not make
   * a photo tagged, so the keywords a session writes itself do not shrink
   * the list it resumes from.
   */
  keywordMark?: number;
};

// Both the database and a transaction on it.
type CatalogQueries = BaseSQLiteDatabase<"sync", Database.RunResult, typeof schema>;

export function catalogRootId(rootFolderId: number): string {
  return `root-${rootFolderId}`;
}

export function toCocoaSeconds(date: Date): number {
  return date.getTime() / 1000 - COCOA_EPOCH_SECONDS;
}

export function keywordGenealogy(parentGenealogy: string, id: number): string {
  const digits = String(id);
  return `${parentGenealogy}/${digits.length}${digits}`;
}

// LIKE pattern matching `value` literally anywhere (escape character: backslash).
function containsPattern(value: string): string {
  return `%${value.replace(/[\\%_]/g, (c) => `\\${c}`)}%`;
}

function sqliteCode(err: unknown): string {
  if (typeof err === "object" && err !== null && "code" in err) {
    return String(err.code);
  }
  return "";
}

export class CatalogStore {
  private readonly db: CatalogQueries;

  constructor(
    readonly catalogPath: string,
    private readonly sqlite: Database.Database,
    private readonly options: { logger: Logger; now?: () => Date },
  ) {
    this.db = drizzle(sqlite, { schema });
  }

  listRoots(): StorageRoot[] {
    return this.db
      .select({ id: rootFolders.id, absolutePath: rootFolders.absolutePath, name: rootFolders.name })
      .from(rootFolders)
      .orderBy(asc(rootFolders.id))
      .all()
      .map((r) => ({ id: catalogRootId(r.id), absolutePath: r.absolutePath, name: r.name }));
  }

  // Highest keyword membership id so far; 0 for a catalog without any.
  keywordMark(): number {
    const row = this.db
      .select({ mark: sql<number | null>`max(${keywordImages.id})` })
      .from(keywordImages)
      .get();
    return row?.mark ?? 0;
  }

  // Photos matching `filters`, in image id order (stable across runs).
  listPhotos(filters: PhotoFilters = {}, options: ListPhotosOptions = {}): PhotoIdentity[] {
    const conditions: SQL[] = [];

    if (filters.onlyUntagged) {
      const { keywordMark } = options;
      const tagged = this.db
        .select({ image: keywordImages.image })
        .from(keywordImages)
        .where(keywordMark === undefined ? undefined : lte(keywordImages.id, keywordMark));
      conditions.push(notInArray(images.id, tagged));
    }
    // captureTime is ISO text; the first ten characters are the day.
    if (filters.capturedFrom) {
      conditions.push(sql`substr(${images.captureTime}, 1, 10) >= ${filters.capturedFrom}`);
    }
    if (filters.capturedTo) {
      conditions.push(sql`substr(${images.captureTime}, 1, 10) <= ${filters.capturedTo}`);
    }
    // Unrated photos have a NULL rating, which no comparison keeps.
    if (filters.minRating !== undefined && filters.minRating > 0) {
      conditions.push(gte(images.rating, filters.minRating));
    }
    if (filters.collection) {
      conditions.push(
        inArray(
          images.id,
          this.db
            .select({ image: collectionImages.image })
            .from(collectionImages)
            .innerJoin(collections, eq(collectionImages.collection, collections.id))
            .where(sql`${collections.name} LIKE ${containsPattern(filters.collection)} ESCAPE '\\'`),
        ),
      );
    }

    const rows = this.db
      .select({
        id: images.id,
        rootFolderId: rootFolders.id,
        pathFromRoot: folders.pathFromRoot,
        baseName: files.baseName,
        extension: files.extension,
        previewToken: dngProxies.fileUUID,
      })
      .from(images)
      .innerJoin(files, eq(images.rootFile, files.id))
      .innerJoin(folders, eq(files.folder, folders.id))
      .innerJoin(rootFolders, eq(folders.rootFolder, rootFolders.id))
      .leftJoin(dngProxies, eq(files.idGlobal, dngProxies.fileUUID))
      .where(and(...conditions))
      .orderBy(asc(images.id))
      .all();

    const seen = new Set<number>();
    const photos: PhotoIdentity[] = [];

    for (const row of rows) {
      // Several proxy rows for one file would repeat the image.
      if (seen.has(row.id)) continue;
      seen.add(row.id);

      const fileName = row.extension ? `${row.baseName}.${row.extension}` : row.baseName;
      const folder = row.pathFromRoot.replace(/^\/+/, "");

      photos.push({
        photoId: String(row.id),
        catalogId: row.id,
        rootId: catalogRootId(row.rootFolderId),
        relativePath: `${folder}${fileName}`,
        previewToken: row.previewToken && row.previewToken.length > 0 ? row.previewToken : null,
        displayName: fileName,
      });
    }

    return photos;
  }

  getKeywords(catalogId: number): string[] {
    return this.keywordsOf(this.db, catalogId);
  }

  /**
   * Link `names` to the photo; returns the names actually added (empty when
   * everything was already there).
   */
  addKeywords(catalogId: number, names: readonly string[]): string[] {
    return this.db.transaction((tx) => {
      const added = missingNames(this.keywordsOf(tx, catalogId), names);

      for (const name of added) {
        const keywordId = this.findOrCreateKeyword(tx, name);

        const linked = tx
          .select({ id: keywordImages.id })
          .from(keywordImages)
          .where(and(eq(keywordImages.image, catalogId), eq(keywordImages.tag, keywordId)))
          .get();

        if (!linked) {
          tx.insert(keywordImages).values({ image: catalogId, tag: keywordId }).run();
        }
      }

      return added;
    });
  }

  close(): void {
    if (this.sqlite.open) this.sqlite.close();
  }

  private keywordsOf(q: CatalogQueries, catalogId: number): string[] {
    return q
      .select({ name: keywords.name })
      .from(keywordImages)
      .innerJoin(keywords, eq(keywordImages.tag, keywords.id))
      .where(eq(keywordImages.image, catalogId))
      // Membership ids grow with insertion, so this is the order keywords were added.
      .orderBy(asc(keywordImages.id))
      .all()
      .flatMap((r) => (r.name === null ? [] : [r.name]));
  }

  private findOrCreateKeyword(q: CatalogQueries, name: string): number {
    const existing = q
      .select({ id: keywords.id })
      .from(keywords)
      .where(eq(keywords.name, name))
      .orderBy(asc(keywords.id))
      .get();
    // Exact name: "lake" and "Lake" are separate vocabulary rows.
    if (existing) return existing.id;

    // Top-level keywords hang under the hidden root keyword when there is one.
    const root = q
      .select({ id: keywords.id, genealogy: keywords.genealogy })
      .from(keywords)
      .where(and(isNull(keywords.name), isNull(keywords.parent)))
      .orderBy(asc(keywords.id))
      .get();

    const now = this.options.now?.() ?? new Date();

    const inserted = q
      .insert(keywords)
      .values({
        idGlobal: randomUUID().toUpperCase(),
        name,
        lcName: name.toLowerCase(),
        dateCreated: toCocoaSeconds(now),
        genealogy: "",
        parent: root?.id ?? null,
      })
      .returning({ id: keywords.id })
      .get();

    q.update(keywords)
      .set({ genealogy: keywordGenealogy(root?.genealogy ?? "", inserted.id) })
      .where(eq(keywords.id, inserted.id))
      .run();

    this.options.logger.debug(`catalog keyword=${JSON.stringify(name)} id=${inserted.id} created=true`);
    return inserted.id;
  }
}

/**
 * Open `catalogPath` for exclusive use. Throws `CatalogLockedError` or
 * `CatalogOpenError`; both are fatal for the session.
 */
export function openCatalog(
  catalogPath: string,
  options: { logger: Logger; now?: () => Date },
): CatalogStore {
  const absolute = path.resolve(catalogPath);

  if (!fs.existsSync(absolute)) {
    throw new CatalogOpenError(absolute, "file not found");
  }
  if (fs.existsSync(`${absolute}.lock`)) {
    throw new CatalogLockedError(absolute, "lock file present");
  }

  let sqlite: Database.Database;
  try {
    sqlite = new Database(absolute, { fileMustExist: true, timeout: 0 });
  } catch (err) {
    throw new CatalogOpenError(absolute, err instanceof Error ? err.message : String(err), {
      cause: err,
    });
  }

  try {
    sqlite.pragma("locking_mode = EXCLUSIVE");
    // Takes the exclusive file lock now; EXCLUSIVE mode keeps it after COMMIT.
    sqlite.exec("BEGIN EXCLUSIVE; COMMIT;");
    sqlite.prepare("SELECT count(*) FROM Adobe_images").get();
  } catch (err) {
    sqlite.close();

    const code = sqliteCode(err);
    if (code.startsWith("SQLITE_BUSY") || code.startsWith("SQLITE_LOCKED")) {
      throw new CatalogLockedError(absolute, "database locked", { cause: err });
    }
    throw new CatalogOpenError(absolute, err instanceof Error ? err.message : String(err), {
      cause: err,
    });
  }

  options.logger.info(`catalog=${absolute} opened=exclusive`);
  return new CatalogStore(absolute, sqlite, options);
}
