import * as fs from "node:fs/promises";
import * as path from "node:path";
import type {
  IFileHandle,
  IFileStat,
  IFileSystem,
} from "../../interfaces/filesystem.js";

export class NodeFileHandle implements IFileHandle {
  constructor(private handle: fs.FileHandle) {}

  async read(
    buffer: Uint8Array,
    offset: number,
    length: number,
    position: number,
  ): Promise<{ bytesRead: number }> {
    const result = await this.handle.read(buffer, offset, length, position);
    return { bytesRead: result.bytesRead };
  }

  async write(
    buffer: Uint8Array,
    offset: number,
    length: number,
    position: number,
  ): Promise<{ bytesWritten: number }> {
    const result = await this.handle.write(buffer, offset, length, position);
    return { bytesWritten: result.bytesWritten };
  }

  async close(): Promise<void> {
    await this.handle.close();
  }
}

/**
 * Relative paths resolve against `root`, so callers can point a generator
 * at a directory without changing the process working directory.
 */
export class NodeFileSystem implements IFileSystem {
  constructor(private readonly root: string = process.cwd()) {}

  async open(filePath: string, mode: "r" | "w"): Promise<IFileHandle> {
    const handle = await fs.open(this.resolve(filePath), mode);
    return new NodeFileHandle(handle);
  }

  async stat(filePath: string): Promise<IFileStat> {
    const stats = await fs.stat(this.resolve(filePath));
    return {
      size: stats.size,
      mtime: stats.mtime,
      isDirectory: stats.isDirectory(),
      isFile: stats.isFile(),
    };
  }

  async mkdir(dirPath: string): Promise<void> {
    await fs.mkdir(this.resolve(dirPath), { recursive: true });
  }

  async exists(filePath: string): Promise<boolean> {
    try {
      await fs.access(this.resolve(filePath));
      return true;
    } catch {
      return false;
    }
  }

  async readdir(dirPath: string): Promise<string[]> {
    return fs.readdir(this.resolve(dirPath));
  }

  private resolve(filePath: string): string {
    return path.resolve(this.root, filePath);
  }
}
