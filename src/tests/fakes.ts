/**
 * Test doubles shared by the unit and end-to-end suites.
 */

import * as path from "path";
import type {
  DirectoryEntry,
  DocstringRequest,
  EntryType,
  FileSystem,
  SummarizationProvider,
  SummaryContext,
} from "../domain/ports";

const posix = path.posix;

function fsError(code: string, message: string): Error {
  return Object.assign(new Error(`${code}: ${message}`), { code });
}

/**
 * In-memory FileSystem with POSIX paths and absolute symlinks.
 */
export class MemoryFileSystem implements FileSystem {
  readonly files = new Map<string, string>();
  readonly writes: string[] = [];

  /** Absolute paths whose writes fail */
  readonly failingWrites = new Set<string>();

  private readonly dirs = new Set<string>(["/"]);
  private readonly links = new Map<string, string>();
  private readonly rawBytes = new Map<string, Uint8Array>();

  constructor(files: Record<string, string> = {}) {
    for (const [filepath, content] of Object.entries(files)) {
      this.addFile(filepath, content);
    }
  }

  addFile(filepath: string, content: string): void {
    const absolute = posix.resolve("/", filepath);
    this.addDir(posix.dirname(absolute));
    this.files.set(absolute, content);
    this.rawBytes.delete(absolute);
  }

  /** Store bytes as they are; readFile sees them decoded as UTF-8 */
  addBinaryFile(filepath: string, bytes: Uint8Array): void {
    const absolute = posix.resolve("/", filepath);
    this.addFile(absolute, new TextDecoder().decode(bytes));
    this.rawBytes.set(absolute, bytes);
  }

  /** Current content as bytes */
  bytesOf(filepath: string): Uint8Array | undefined {
    const absolute = posix.resolve("/", filepath);
    const content = this.files.get(absolute);
    if (content === undefined) return undefined;
    return this.rawBytes.get(absolute) ?? new TextEncoder().encode(content);
  }

  addDir(dirpath: string): void {
    let current = posix.resolve("/", dirpath);
    while (!this.dirs.has(current)) {
      this.dirs.add(current);
      current = posix.dirname(current);
    }
  }

  addSymlink(linkPath: string, target: string): void {
    const absolute = posix.resolve("/", linkPath);
    this.addDir(posix.dirname(absolute));
    this.links.set(absolute, posix.resolve("/", target));
  }

  async readFile(filepath: string): Promise<string> {
    const content = this.files.get(this.resolveLinks(filepath));
    if (content === undefined) {
      throw fsError("ENOENT", `no such file or directory, open '${filepath}'`);
    }
    return content;
  }

  async readBytes(filepath: string): Promise<Uint8Array> {
    const bytes = this.bytesOf(this.resolveLinks(filepath));
    if (bytes === undefined) {
      throw fsError("ENOENT", `no such file or directory, open '${filepath}'`);
    }
    return bytes;
  }

  async writeFile(filepath: string, content: string): Promise<void> {
    const absolute = posix.resolve("/", filepath);
    if (this.failingWrites.has(absolute)) {
      throw fsError("EACCES", `permission denied, open '${absolute}'`);
    }
    this.addDir(posix.dirname(absolute));
    this.files.set(absolute, content);
    this.rawBytes.delete(absolute);
    this.writes.push(absolute);
  }

  async exists(filepath: string): Promise<boolean> {
    const real = this.resolveLinks(filepath);
    return this.files.has(real) || this.dirs.has(real);
  }

  async listChildren(dirpath: string): Promise<DirectoryEntry[]> {
    const real = this.resolveLinks(dirpath);
    if (!this.dirs.has(real)) {
      throw fsError("ENOENT", `no such file or directory, scandir '${dirpath}'`);
    }

    const names = new Set<string>();
    for (const candidate of [...this.files.keys(), ...this.dirs, ...this.links.keys()]) {
      if (candidate !== real && posix.dirname(candidate) === real) {
        names.add(posix.basename(candidate));
      }
    }

    return [...names].sort().map((name) => {
      const childPath = posix.join(dirpath, name);
      const isSymlink = this.links.has(posix.join(real, name));
      return { name, path: childPath, type: this.typeOf(childPath), isSymlink };
    });
  }

  async realpath(filepath: string): Promise<string> {
    return this.resolveLinks(filepath);
  }

  join(...segments: string[]): string {
    return posix.join(...segments);
  }

  relative(from: string, to: string): string {
    return posix.relative(from, to);
  }

  resolve(...segments: string[]): string {
    return posix.resolve("/", ...segments);
  }

  dirname(filepath: string): string {
    return posix.dirname(filepath);
  }

  basename(filepath: string): string {
    return posix.basename(filepath);
  }

  extname(filepath: string): string {
    return posix.extname(filepath);
  }

  private typeOf(filepath: string): EntryType {
    const real = this.resolveLinks(filepath);
    if (this.dirs.has(real)) return "directory";
    if (this.files.has(real)) return "file";
    return "other";
  }

  private resolveLinks(filepath: string): string {
    let current = "/";
    let hops = 0;
    for (const segment of posix.resolve("/", filepath).split("/").filter(Boolean)) {
      current = posix.join(current, segment);
      let target = this.links.get(current);
      while (target !== undefined) {
        if (++hops > 40) {
          throw fsError("ELOOP", `too many symbolic links encountered, stat '${filepath}'`);
        }
        current = target;
        target = this.links.get(current);
      }
    }
    return current;
  }
}

export interface ProviderCall {
  capability: "summarize" | "docstring";
  scope: string;
  name: string;
  text: string;
  context?: SummaryContext;
}

/**
 * Deterministic provider that records every call.
 *
 * Summaries are `Summary of <scope> <name>`; docstrings are
 * `Docstring for <qualified name>.`.
 */
export class StubSummarizationProvider implements SummarizationProvider {
  readonly calls: ProviderCall[] = [];

  /** `start:<name>` and `end:<name>` in the order they happened */
  readonly events: string[] = [];

  /** Names whose calls always fail */
  readonly failing = new Set<string>();

  /** Names whose next N calls fail */
  readonly failTimes = new Map<string, number>();

  /** Artificial latency per call */
  delayMs: (context: SummaryContext) => number = () => 0;

  /** Highest number of calls that were in progress at once */
  maxConcurrent = 0;

  private active = 0;

  async summarize(text: string, context: SummaryContext): Promise<string> {
    this.calls.push({ capability: "summarize", scope: context.scope, name: context.name, text, context });
    this.events.push(`start:${context.name}`);
    this.active++;
    this.maxConcurrent = Math.max(this.maxConcurrent, this.active);

    try {
      const delay = this.delayMs(context);
      if (delay > 0) {
        await new Promise((resolve) => setTimeout(resolve, delay));
      }
      this.failIfRequested(context.name);
      if (context.part?.stage === "chunk") {
        return `Part ${context.part.index + 1} of ${context.name}`;
      }
      return `Summary of ${context.scope} ${context.name}`;
    } finally {
      this.active--;
      this.events.push(`end:${context.name}`);
    }
  }

  async generateDocstring(request: DocstringRequest): Promise<string> {
    this.calls.push({
      capability: "docstring",
      scope: request.kind,
      name: request.qualifiedName,
      text: request.body,
    });
    this.failIfRequested(request.qualifiedName);
    return `Docstring for ${request.qualifiedName}.`;
  }

  /**
   * Names summarized with the given scope, in call order.
   */
  summarized(scope?: string): string[] {
    return this.calls
      .filter((call) => call.capability === "summarize" && (scope === undefined || call.scope === scope))
      .map((call) => call.name);
  }

  reset(): void {
    this.calls.length = 0;
    this.events.length = 0;
  }

  private failIfRequested(name: string): void {
    if (this.failing.has(name)) {
      throw new Error(`provider unavailable for ${name}`);
    }
    const remaining = this.failTimes.get(name) ?? 0;
    if (remaining > 0) {
      this.failTimes.set(name, remaining - 1);
      throw new Error(`transient failure for ${name}`);
    }
  }
}
