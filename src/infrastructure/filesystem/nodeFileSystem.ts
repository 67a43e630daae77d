/**
 * Node.js FileSystem Adapter
 *
 * Implements the FileSystem port using Node.js fs/promises and path modules.
 */

import * as fs from "fs/promises";
import * as path from "path";
import * as crypto from "crypto";
import type { DirectoryEntry, EntryType, FileSystem } from "../../domain/ports";

/**
 * Node.js implementation of the FileSystem port.
 */
export class NodeFileSystem implements FileSystem {
  async readFile(filepath: string): Promise<string> {
    return fs.readFile(filepath, "utf-8");
  }

  async readBytes(filepath: string): Promise<Uint8Array> {
    return fs.readFile(filepath);
  }

  async writeFile(filepath: string, content: string): Promise<void> {
    const dir = path.dirname(filepath);
    await fs.mkdir(dir, { recursive: true });

    // Write beside the target then rename over it
    const suffix = crypto.randomBytes(6).toString("hex");
    const tempPath = path.join(dir, `.${path.basename(filepath)}.${suffix}.tmp`);
    try {
      await fs.writeFile(tempPath, content, "utf-8");
      const mode = await existingMode(filepath);
      if (mode !== undefined) {
        await fs.chmod(tempPath, mode);
      }
      await fs.rename(tempPath, filepath);
    } catch (error) {
      await fs.rm(tempPath, { force: true });
      throw error;
    }
  }

  async exists(filepath: string): Promise<boolean> {
    try {
      await fs.access(filepath);
      return true;
    } catch {
      return false;
    }
  }

  async listChildren(dirpath: string): Promise<DirectoryEntry[]> {
    const dirents = await fs.readdir(dirpath, { withFileTypes: true });
    const entries: DirectoryEntry[] = [];

    for (const dirent of dirents) {
      const fullPath = path.join(dirpath, dirent.name);
      let type: EntryType = "other";

      if (dirent.isSymbolicLink()) {
        try {
          const stats = await fs.stat(fullPath);
          type = stats.isDirectory() ? "directory" : stats.isFile() ? "file" : "other";
        } catch {
          // Dangling link
          type = "other";
        }
      } else if (dirent.isDirectory()) {
        type = "directory";
      } else if (dirent.isFile()) {
        type = "file";
      }

      entries.push({
        name: dirent.name,
        path: fullPath,
        type,
        isSymlink: dirent.isSymbolicLink(),
      });
    }

    return entries.sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0));
  }

  async realpath(filepath: string): Promise<string> {
    return fs.realpath(filepath);
  }

  join(...segments: string[]): string {
    return path.join(...segments);
  }

  relative(from: string, to: string): string {
    return path.relative(from, to);
  }

  resolve(...segments: string[]): string {
    return path.resolve(...segments);
  }

  dirname(filepath: string): string {
    return path.dirname(filepath);
  }

  basename(filepath: string): string {
    return path.basename(filepath);
  }

  extname(filepath: string): string {
    return path.extname(filepath);
  }
}

/**
 * Permission bits of an existing file, undefined when there is none yet.
 */
async function existingMode(filepath: string): Promise<number | undefined> {
  try {
    const stats = await fs.stat(filepath);
    return stats.mode & 0o7777;
  } catch (error) {
    if (error instanceof Error && "code" in error && error.code === "ENOENT") {
      return undefined;
    }
    throw error;
  }
}

/**
 * Default singleton instance
 */
export const nodeFileSystem = new NodeFileSystem();
