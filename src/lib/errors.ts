/**
 * Fatal startup errors. Each stops a session before any photo is processed;
 * everything that can go wrong for a single photo is a value instead.
 */

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

export class CatalogOpenError extends Error {
  constructor(
    public readonly catalogPath: string,
    detail: string,
    options?: { cause?: unknown },
  ) {
    super(`Cannot open catalog ${catalogPath}: ${detail}`, options);
    this.name = "CatalogOpenError";
  }
}

// Another process (usually the catalog application itself) holds the catalog.
export class CatalogLockedError extends Error {
  constructor(
    public readonly catalogPath: string,
    detail: string,
    options?: { cause?: unknown },
  ) {
    super(`Catalog is in use (${detail}): ${catalogPath}. Close the application using it and retry.`, options);
    this.name = "CatalogLockedError";
  }
}

export type ConfigDifference = {
  key: string;
  saved: string;
  requested: string;
};

export class ConfigMismatchError extends Error {
  constructor(public readonly differences: readonly ConfigDifference[]) {
    super(
      `Saved session was started with a different configuration: ${differences
        .map((d) => `${d.key} (saved=${d.saved} requested=${d.requested})`)
        .join(", ")}`,
    );
    this.name = "ConfigMismatchError";
  }
}

export class NoResumableSessionError extends Error {
  constructor(reason: string) {
    super(`No resumable session found: ${reason}`);
    this.name = "NoResumableSessionError";
  }
}

export class InvalidTransitionError extends Error {
  constructor(
    public readonly from: string,
    public readonly action: string,
  ) {
    super(`Cannot ${action} a session that is ${from}`);
    this.name = "InvalidTransitionError";
  }
}
