/**
 * Error types for the archive pipeline.
 *
 * Fatal problems (the archive cannot be created or written, the metadata
 * file is unusable) are thrown. Per-file import problems are returned as
 * values, see ImportFailure in importer.ts.
 */

export class ArchiveCreateError extends Error {
  readonly dbPath: string;

  constructor(dbPath: string, cause: unknown) {
    super(`Could not create ${dbPath}: ${describeError(cause)}`, { cause });
    this.name = 'ArchiveCreateError';
    this.dbPath = dbPath;
  }
}

export class ArchiveWriteError extends Error {
  readonly sourcePath: string | null;

  constructor(message: string, cause: unknown, sourcePath: string | null = null) {
    super(`${message}: ${describeError(cause)}`, { cause });
    this.name = 'ArchiveWriteError';
    this.sourcePath = sourcePath;
  }
}

export class MetadataConfigError extends Error {
  readonly configPath: string | null;

  constructor(message: string, configPath: string | null = null) {
    super(configPath ? `${configPath}: ${message}` : message);
    this.name = 'MetadataConfigError';
    this.configPath = configPath;
  }
}

export function describeError(err: unknown): string {
  if (err instanceof Error) return err.message;
  return String(err);
}
