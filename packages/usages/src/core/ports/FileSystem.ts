import type { Result } from "@usagelens/core";

/**
 * Port for the file operations a run performs outside the checkpoint store.
 */
export interface FileSystem {
  /**
   * Read file contents as string.
   */
  read(filePath: string): Promise<Result<string, Error>>;

  /**
   * Replace a file so readers see either the old or the new content.
   */
  writeAtomic(filePath: string, content: string): Promise<Result<void, Error>>;

  isDirectory(dirPath: string): Promise<boolean>;
}
