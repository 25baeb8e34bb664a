import * as fs from "node:fs/promises";
import type { IFileSystem } from "../../interfaces/filesystem.js";

export class NodeFileSystem implements IFileSystem {
  async readFile(filePath: string): Promise<Uint8Array> {
    const data = await fs.readFile(filePath);
    return new Uint8Array(data.buffer, data.byteOffset, data.byteLength);
  }
}
