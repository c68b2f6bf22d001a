import { existsSync, readFileSync, statSync, type Stats } from 'fs';

/**
 * Synchronous file-system reads used by status detection and script lookup.
 * Tests substitute an in-memory implementation to count reads.
 * @public
 */
export interface IConfigFileSystem {
  exists(path: string): boolean;
  isFile(path: string): boolean;
  isDirectory(path: string): boolean;
  /** True for a regular file with any executable bit set. */
  isExecutable(path: string): boolean;
  /** Reads UTF-8 text; throws the underlying fs error on failure. */
  readFile(path: string): string;
}

/**
 * Stats for `path`, or undefined when it cannot be stat'ed. A regular file
 * in the middle of the path raises ENOTDIR, which counts as missing.
 */
function statOrUndefined(path: string): Stats | undefined {
  try {
    return statSync(path, { throwIfNoEntry: false });
  } catch {
    return undefined;
  }
}

/**
 * Node implementation over `fs` sync calls.
 * @public
 */
export class NodeConfigFileSystem implements IConfigFileSystem {
  public exists(path: string): boolean {
    return existsSync(path);
  }

  public isFile(path: string): boolean {
    return statOrUndefined(path)?.isFile() ?? false;
  }

  public isDirectory(path: string): boolean {
    return statOrUndefined(path)?.isDirectory() ?? false;
  }

  public isExecutable(path: string): boolean {
    const stats = statOrUndefined(path);
    return stats !== undefined && stats.isFile() && (stats.mode & 0o111) !== 0;
  }

  public readFile(path: string): string {
    return readFileSync(path, 'utf8');
  }
}
