import type { IFileSystem } from "../interfaces/filesystem.js";
import { normalizePath } from "../server/file-resolver.js";
import { fromString } from "../utils/buffer.js";

/**
 * Flat in-memory file tree. Paths are collapsed the way the OS would
 * (`a/../b` is `b`), so traversal behaves like it does on disk.
 */
export class InMemoryFileSystem implements IFileSystem {
  private readonly files = new Map<string, Uint8Array>();
  private readonly unreadable = new Set<string>();
  readonly reads: string[] = [];

  constructor(initial: Record<string, string | Uint8Array> = {}) {
    for (const [path, contents] of Object.entries(initial)) {
      this.writeFile(path, contents);
    }
  }

  writeFile(path: string, contents: string | Uint8Array): void {
    const data = typeof contents === "string" ? fromString(contents) : contents;
    this.files.set(normalizePath(path), data.slice());
  }

  /** Make reads of `path` fail with EACCES. */
  denyRead(path: string): void {
    this.unreadable.add(normalizePath(path));
  }

  async readFile(path: string): Promise<Uint8Array> {
    const normalized = normalizePath(path);
    this.reads.push(path);

    if (this.unreadable.has(normalized)) {
      throw new Error(`EACCES: permission denied: ${normalized}`);
    }

    const file = this.files.get(normalized);
    if (file) {
      return file.slice();
    }

    if (this.isDirectory(normalized)) {
      throw new Error(`EISDIR: illegal operation on a directory: ${normalized}`);
    }
    throw new Error(`ENOENT: no such file or directory: ${normalized}`);
  }

  private isDirectory(path: string): boolean {
    const prefix = path === "." ? "" : `${path}/`;
    for (const filePath of this.files.keys()) {
      if (filePath.startsWith(prefix)) return true;
    }
    return false;
  }
}
