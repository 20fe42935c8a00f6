import { randomBytes } from "node:crypto";
import { readFile, rename, rm, stat, writeFile } from "node:fs/promises";

import { Err, Ok, type Result, toError } from "@usagelens/core";

import type { FileSystem } from "../../core/ports/FileSystem.js";

/**
 * Node.js implementation of the FileSystem port.
 */
export class NodeFileSystem implements FileSystem {
  async read(filePath: string): Promise<Result<string, Error>> {
    try {
      return Ok(await readFile(filePath, "utf-8"));
    } catch (error) {
      return Err(toError(error));
    }
  }

  async writeAtomic(filePath: string, content: string): Promise<Result<void, Error>> {
    const tmp = `${filePath}.${process.pid}.${randomBytes(4).toString("hex")}.tmp`;
    try {
      await writeFile(tmp, content, "utf-8");
      await rename(tmp, filePath); // Atomic on POSIX
      return Ok(undefined);
    } catch (error) {
      await rm(tmp, { force: true });
      return Err(toError(error));
    }
  }

  async isDirectory(dirPath: string): Promise<boolean> {
    try {
      return (await stat(dirPath)).isDirectory();
    } catch {
      return false;
    }
  }
}
