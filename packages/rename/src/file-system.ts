import fs from "node:fs/promises";

export interface FileIdentity {
  dev: number;
  ino: number;
}

/** The filesystem operations the renamer performs, so tests can substitute failures. */
export interface RenameFileSystem {
  readdir(folder: string): Promise<string[]>;
  /** Identity of the entry at `target`, or null when nothing exists there. */
  identify(target: string): Promise<FileIdentity | null>;
  rename(from: string, to: string): Promise<void>;
}

export const nodeFileSystem: RenameFileSystem = {
  readdir: (folder) => fs.readdir(folder),
  async identify(target) {
    try {
      const stats = await fs.lstat(target);
      return { dev: stats.dev, ino: stats.ino };
    } catch (err) {
      if (err instanceof Error && "code" in err && err.code === "ENOENT") {
        return null;
      }
      throw err;
    }
  },
  rename: (from, to) => fs.rename(from, to),
};
