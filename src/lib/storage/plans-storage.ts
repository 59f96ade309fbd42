/**
 * File access for the simulator's FMS plans directory.
 *
 * Everything that touches the route and uplink files goes through
 * PlansStorage so the sync logic can run against an in-memory double.
 */

import { readdir, readFile, rename, stat, writeFile } from "fs/promises";
import path from "path";

export interface PlanFileInfo {
  name: string;
  path: string;
  /** Birth time; ctime where the file system records none */
  createdAt: Date;
}

export interface WriteOptions {
  /**
   * Write a new file instead of updating the existing one in place, so
   * its creation time restarts. Used for freshly synthesized files.
   */
  recreate?: boolean;
}

export interface PlansStorage {
  list(): Promise<PlanFileInfo[]>;
  read(name: string): Promise<string>;
  write(name: string, content: string, options?: WriteOptions): Promise<void>;
}

/**
 * PlansStorage over a real directory.
 */
export function createFsPlansStorage(directory: string): PlansStorage {
  const resolve = (name: string) => path.join(directory, path.basename(name));

  return {
    async list() {
      const entries = await readdir(directory, { withFileTypes: true });
      const files: PlanFileInfo[] = [];
      for (const entry of entries) {
        if (!entry.isFile()) continue;
        const filePath = resolve(entry.name);
        const stats = await stat(filePath);
        files.push({
          name: entry.name,
          path: filePath,
          createdAt: stats.birthtimeMs > 0 ? stats.birthtime : stats.ctime,
        });
      }
      return files;
    },

    read(name) {
      return readFile(resolve(name), "utf8");
    },

    async write(name, content, options = {}) {
      const filePath = resolve(name);
      if (!options.recreate) {
        await writeFile(filePath, content, "utf8");
        return;
      }
      // Rename over the old file: a new inode, so a new birth time
      const tempPath = `${filePath}.${process.pid}.tmp`;
      await writeFile(tempPath, content, "utf8");
      await rename(tempPath, filePath);
    },
  };
}
