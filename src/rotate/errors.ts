export class RotatingWriterError extends Error {
  readonly path: string;

  constructor(message: string, filePath: string, cause?: unknown) {
    super(message, cause === undefined ? undefined : { cause });
    this.name = new.target.name;
    this.path = filePath;
  }
}

/** The active file could not be opened or created. */
export class ConstructionError extends RotatingWriterError {}

/** Renaming the over-size file failed; the file is still at its original path. */
export class RotationRenameError extends RotatingWriterError {
  readonly archivePath: string;

  constructor(filePath: string, archivePath: string, cause?: unknown) {
    super(`cannot rename ${filePath} to ${archivePath}: ${errorMessage(cause)}`, filePath, cause);
    this.archivePath = archivePath;
  }
}

/** The rename succeeded but a fresh file could not be opened at the original path. */
export class RotationReopenError extends RotatingWriterError {
  readonly archivePath: string;

  constructor(filePath: string, archivePath: string, cause?: unknown) {
    super(`archived to ${archivePath} but cannot reopen ${filePath}: ${errorMessage(cause)}`, filePath, cause);
    this.archivePath = archivePath;
  }
}

export class UnderlyingWriteError extends RotatingWriterError {
  readonly bytesWritten: number;

  constructor(filePath: string, bytesWritten: number, cause?: unknown) {
    super(`write to ${filePath} failed after ${bytesWritten} bytes: ${errorMessage(cause)}`, filePath, cause);
    this.bytesWritten = bytesWritten;
  }
}

export function errorMessage(err: unknown): string {
  if (err instanceof Error) return err.message;
  return String(err);
}
