/**
 * PhotoIdentity: one enumerated photo, immutable for its whole processing.
 */

export type PhotoIdentity = {
  // Stable id within its source: the catalog image id, or the relative path.
  readonly photoId: string;
  // Catalog image id (Adobe_images.id_local); null for folder sources.
  readonly catalogId: number | null;
  // Storage root holding the original.
  readonly rootId: string;
  // Path of the original below its root, "/"-separated.
  readonly relativePath: string;
  // Global id addressing the smart preview; null when none exists.
  readonly previewToken: string | null;
  readonly displayName: string;
};

export function describePhoto(identity: PhotoIdentity): string {
  return `photo=${identity.photoId} file=${identity.displayName}`;
}
