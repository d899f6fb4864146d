/**
 * Local filesystem storage backend.
 */
import { mkdir, readdir, readFile, stat, writeFile } from "node:fs/promises";
import { join, dirname, resolve, sep } from "node:path";
import type { StorageBackend } from "./backend.js";

export class DiskStorage implements StorageBackend {
  private basePath: string;

  constructor(basePath: string) {
    this.basePath = resolve(basePath);
  }

  private resolve(key: string): string {
    return join(this.basePath, key);
  }

  describe(key: string): string {
    return this.resolve(key);
  }

  async write(key: string, data: Uint8Array | string): Promise<void> {
    const fullPath = this.resolve(key);
    await mkdir(dirname(fullPath), { recursive: true });
    await writeFile(fullPath, data);
  }

  async read(key: string): Promise<Uint8Array> {
    const buf = await readFile(this.resolve(key));
    return new Uint8Array(buf);
  }

  async list(prefix: string): Promise<string[]> {
    const prefixPath = this.resolve(prefix);
    try {
      const s = await stat(prefixPath);
      if (s.isFile()) return [prefix];
    } catch {
      return [];
    }

    const keys: string[] = [];
    const walk = async (dir: string): Promise<void> => {
      const entries = await readdir(dir, { withFileTypes: true });
      for (const entry of entries) {
        const full = join(dir, entry.name);
        if (entry.isDirectory()) {
          await walk(full);
        } else if (entry.isFile()) {
          // Keys are relative to basePath, "/"-separated
          keys.push(full.slice(this.basePath.length + 1).split(sep).join("/"));
        }
      }
    };

    await walk(prefixPath);
    return keys.sort();
  }

  async exists(key: string): Promise<boolean> {
    try {
      await stat(this.resolve(key));
      return true;
    } catch {
      return false;
    }
  }
}
