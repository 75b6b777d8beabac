export class MirrorError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** Both the HEAD and the GET probe failed for a URL. */
export class NotFoundError extends MirrorError {
  readonly url: string;

  constructor(url: string, cause?: unknown) {
    super(`Remote file not found: ${url}${cause ? ` (${describeError(cause)})` : ""}`, { cause });
    this.url = url;
  }
}

/** A file name does not follow `{type}_tripdata_{year}-{month}.{ext}`. */
export class ParseError extends MirrorError {
  readonly fileName: string;

  constructor(fileName: string, reason: string) {
    super(`Cannot parse trip file name "${fileName}": ${reason}`);
    this.fileName = fileName;
  }
}

export class DiscoveryError extends MirrorError {}

export class TransferError extends MirrorError {
  readonly path: string;

  constructor(path: string, message: string, cause?: unknown) {
    super(`${message}: ${path}${cause ? ` (${describeError(cause)})` : ""}`, { cause });
    this.path = path;
  }
}

export class MetadataError extends MirrorError {}

export class ConfigError extends MirrorError {
  readonly issues: string[];

  constructor(issues: string[]) {
    super(`Invalid configuration: ${issues.join("; ")}`);
    this.issues = issues;
  }
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
