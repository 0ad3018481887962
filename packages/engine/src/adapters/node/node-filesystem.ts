import * as fs from "node:fs/promises";
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

  async close(): Promise<void> {
    await this.handle.close();
  }
}

export class NodeFileSystem implements IFileSystem {
  async open(filePath: string): Promise<IFileHandle> {
    const handle = await fs.open(filePath, "r");
    return new NodeFileHandle(handle);
  }

  async stat(filePath: string): Promise<IFileStat | null> {
    try {
      const stats = await fs.stat(filePath);
      return {
        size: stats.size,
        mtime: stats.mtime,
        isDirectory: stats.isDirectory(),
        isFile: stats.isFile(),
      };
    } catch (err) {
      if (isMissingFileError(err)) return null;
      throw err;
    }
  }
}

function isMissingFileError(err: unknown): boolean {
  return (
    err instanceof Error &&
    "code" in err &&
    (err.code === "ENOENT" || err.code === "ENOTDIR")
  );
}
