import { readFile, stat } from 'fs/promises';
import { SourceUnavailableError, errorMessage } from '../errors';

export type SnapshotRead = {
  content: string;
  modifiedAt: Date | null;
};

export interface SnapshotSource {
  readonly description: string;
  read(signal: AbortSignal): Promise<SnapshotRead>;
}

const UNAVAILABLE_CODES = new Set(['ENOENT', 'EACCES', 'EPERM', 'EISDIR', 'ENOTDIR', 'EBUSY']);

function errorCode(err: unknown) {
  if (err instanceof Error && 'code' in err && typeof err.code === 'string') {
    return err.code;
  }
  return null;
}

export class FileSnapshotSource implements SnapshotSource {
  private path: string;

  constructor(path: string) {
    this.path = path;
  }

  get description() {
    return this.path;
  }

  async read(signal: AbortSignal): Promise<SnapshotRead> {
    try {
      const info = await stat(this.path);
      const content = await readFile(this.path, { encoding: 'utf-8', signal });
      return { content, modifiedAt: info.mtime };
    } catch (err: unknown) {
      if (signal.aborted || (err instanceof Error && err.name === 'AbortError')) {
        throw new SourceUnavailableError(`read of ${this.path} aborted`, { cause: err });
      }
      const code = errorCode(err);
      if (code && UNAVAILABLE_CODES.has(code)) {
        throw new SourceUnavailableError(`cannot read ${this.path}: ${code}`, { cause: err });
      }
      throw new SourceUnavailableError(`cannot read ${this.path}: ${errorMessage(err)}`, { cause: err });
    }
  }
}
