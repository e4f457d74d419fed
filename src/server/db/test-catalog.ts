/**
 * Builds small catalog files for tests from `catalog.sql`.
 */

import fs from "node:fs";
import Database from "better-sqlite3";

export type TestRoot = {
  id: number;
  absolutePath: string; // with trailing slash
  name: string;
};

export type TestPhoto = {
  id: number;
  rootId: number;
  folder: string; // "2021/trip/"
  baseName: string;
  extension: string;
  captureTime?: string;
  rating?: number;
  previewToken?: string;
  keywords?: string[];
  collections?: string[];
};

const schemaSql = fs.readFileSync(new URL("./catalog.sql", import.meta.url), "utf8");

export function createTestCatalog(
  catalogPath: string,
  fixture: { roots: TestRoot[]; photos: TestPhoto[] },
): void {
  const db = new Database(catalogPath);

  try {
    db.exec(schemaSql);

    const insertRoot = db.prepare(
      "INSERT INTO AgLibraryRootFolder (id_local, id_global, absolutePath, name) VALUES (?, ?, ?, ?)",
    );
    for (const root of fixture.roots) {
      insertRoot.run(root.id, `ROOT-${root.id}`, root.absolutePath, root.name);
    }

    const folderIds = new Map<string, number>();
    const keywordIds = new Map<string, number>();
    const collectionIds = new Map<string, number>();
    let nextId = 1000;

    for (const photo of fixture.photos) {
      const folderKey = `${photo.rootId}:${photo.folder}`;
      let folderId = folderIds.get(folderKey);
      if (folderId === undefined) {
        folderId = nextId++;
        folderIds.set(folderKey, folderId);
        db.prepare(
          "INSERT INTO AgLibraryFolder (id_local, id_global, pathFromRoot, rootFolder) VALUES (?, ?, ?, ?)",
        ).run(folderId, `FOLDER-${folderId}`, photo.folder, photo.rootId);
      }

      const fileId = nextId++;
      const fileGlobal = photo.previewToken ?? `FILE-${fileId}`;
      db.prepare(
        "INSERT INTO AgLibraryFile (id_local, id_global, baseName, extension, folder, idx_filename) VALUES (?, ?, ?, ?, ?, ?)",
      ).run(
        fileId,
        fileGlobal,
        photo.baseName,
        photo.extension,
        folderId,
        `${photo.baseName}.${photo.extension}`,
      );

      if (photo.previewToken) {
        const proxyId = nextId++;
        db.prepare(
          "INSERT INTO AgDNGProxyInfo (id_local, id_global, fileUUID) VALUES (?, ?, ?)",
        ).run(proxyId, `PROXY-${proxyId}`, photo.previewToken);
      }

      db.prepare(
        "INSERT INTO Adobe_images (id_local, id_global, rootFile, captureTime, rating) VALUES (?, ?, ?, ?, ?)",
      ).run(photo.id, `IMAGE-${photo.id}`, fileId, photo.captureTime ?? null, photo.rating ?? null);

      for (const name of photo.keywords ?? []) {
        let keywordId = keywordIds.get(name);
        if (keywordId === undefined) {
          keywordId = nextId++;
          keywordIds.set(name, keywordId);
          db.prepare(
            "INSERT INTO AgLibraryKeyword (id_local, id_global, dateCreated, genealogy, lc_name, name, parent) VALUES (?, ?, 0, ?, ?, ?, 1)",
          ).run(keywordId, `KEYWORD-${keywordId}`, `/11/4${keywordId}`, name.toLowerCase(), name);
        }
        db.prepare("INSERT INTO AgLibraryKeywordImage (image, tag) VALUES (?, ?)").run(
          photo.id,
          keywordId,
        );
      }

      for (const name of photo.collections ?? []) {
        let collectionId = collectionIds.get(name);
        if (collectionId === undefined) {
          collectionId = nextId++;
          collectionIds.set(name, collectionId);
          db.prepare(
            "INSERT INTO AgLibraryCollection (id_local, creationId, name) VALUES (?, 'com.adobe.ag.library.collection', ?)",
          ).run(collectionId, name);
        }
        db.prepare("INSERT INTO AgLibraryCollectionImage (collection, image) VALUES (?, ?)").run(
          collectionId,
          photo.id,
        );
      }
    }
  } finally {
    db.close();
  }
}
