/**
 * Abstract File System Interface
 *
 * The server only ever reads whole files, so this is the entire surface it
 * needs from a runtime.
 */

export interface IFileSystem {
  /**
   * Read a whole file into memory.
   * Rejects when the path is missing, is a directory or cannot be read.
   */
  readFile(path: string): Promise<Uint8Array>
}
