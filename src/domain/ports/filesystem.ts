/**
 * FileSystem Port
 *
 * Abstract interface for the file-system collaborator.
 * The sync core only reads, lists and writes; it never deletes or renames.
 */

/**
 * Kind of a directory entry after symlinks are followed.
 */
export type EntryType = "file" | "directory" | "other";

/**
 * One entry of a directory listing.
 */
export interface DirectoryEntry {
  /** Base name */
  name: string;

  /** Absolute path */
  path: string;

  /** Entry type with symlinks resolved */
  type: EntryType;

  /** Whether the entry itself is a symbolic link */
  isSymlink: boolean;
}

/**
 * Abstract filesystem interface.
 *
 * All filesystem operations of the sync core go through this interface so
 * tests can substitute an in-memory implementation.
 */
export interface FileSystem {
  /**
   * Read a file's content as UTF-8 string
   */
  readFile(filepath: string): Promise<string>;

  /**
   * Read a file's raw bytes
   */
  readBytes(filepath: string): Promise<Uint8Array>;

  /**
   * Write content atomically (temp file then rename), creating parent
   * directories as needed. Readers never observe a half-written file.
   * An existing file keeps its permission bits.
   */
  writeFile(filepath: string, content: string): Promise<void>;

  /**
   * Check if a path exists
   */
  exists(filepath: string): Promise<boolean>;

  /**
   * List a directory's entries, sorted by name
   */
  listChildren(dirpath: string): Promise<DirectoryEntry[]>;

  /**
   * Canonical path with every symlink resolved
   */
  realpath(filepath: string): Promise<string>;

  /**
   * Join path segments
   */
  join(...segments: string[]): string;

  /**
   * Get relative path from one path to another
   */
  relative(from: string, to: string): string;

  /**
   * Resolve to absolute path
   */
  resolve(...segments: string[]): string;

  /**
   * Get directory name from path
   */
  dirname(filepath: string): string;

  /**
   * Get the last path segment
   */
  basename(filepath: string): string;

  /**
   * Get file extension
   */
  extname(filepath: string): string;
}
