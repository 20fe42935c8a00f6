import { readFile, stat } from "node:fs/promises";
import path from "node:path";

import { Err, Ok, type Result, toError } from "@usagelens/core";
import { glob } from "glob";

import { ConfigError } from "../../core/errors.js";
import type { CorpusWalker } from "../../core/ports/CorpusWalker.js";

// Directories that never hold client code worth analysing
const ALWAYS_IGNORE = ["**/.git/**", "**/__pycache__/**", "**/node_modules/**"];

/**
 * Glob-based corpus walker over files with the given extensions.
 */
export class GlobCorpusWalker implements CorpusWalker {
  constructor(private readonly extensions: string[] = [".py"]) {}

  async walk(root: string, exclude: string[]): Promise<Result<string[], ConfigError>> {
    try {
      const info = await stat(root);
      if (!info.isDirectory()) {
        return Err(new ConfigError(`Corpus root is not a directory: ${root}`));
      }
    } catch (error) {
      return Err(new ConfigError(`Corpus root is not readable: ${root} (${toError(error).message})`));
    }

    try {
      const files = await glob(
        this.extensions.map((ext) => `**/*${ext}`),
        {
          cwd: root,
          nodir: true,
          posix: true,
          ignore: [...ALWAYS_IGNORE, ...toIgnorePatterns(root, exclude)],
        }
      );
      return Ok(files.sort());
    } catch (error) {
      return Err(new ConfigError(`Could not list corpus root ${root}: ${toError(error).message}`));
    }
  }
}

/**
 * Turn exclusion entries into glob ignore patterns relative to the root.
 * A plain path also excludes everything below it.
 */
export function toIgnorePatterns(root: string, entries: string[]): string[] {
  const patterns: string[] = [];

  for (const raw of entries) {
    let entry = raw.trim().replace(/\\/g, "/");
    if (!entry || entry.startsWith("#")) continue;

    if (path.isAbsolute(entry)) {
      entry = path.relative(root, entry).replace(/\\/g, "/");
    }
    entry = entry.replace(/^\.\//, "").replace(/\/+$/, "");
    if (!entry || entry.startsWith("..")) continue;

    patterns.push(entry, `${entry}/**`);
  }
  return patterns;
}

/**
 * Read a newline-separated exclusion list.
 */
export async function readExclusionFile(file: string): Promise<Result<string[], ConfigError>> {
  try {
    const text = await readFile(file, "utf-8");
    return Ok(text.split(/\r?\n/).filter((line) => line.trim().length > 0));
  } catch (error) {
    return Err(new ConfigError(`Cannot read exclusion file ${file}: ${toError(error).message}`));
  }
}
