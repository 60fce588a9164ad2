import { copyFile, mkdir, readFile, writeFile } from "node:fs/promises";
import { IOError } from "../errors.js";

/**
 * The file operations a build performs. Every method rejects with an IOError.
 */
export interface BuildFileSystem {
  /** Create a directory and any missing parents. Existing directories are fine. */
  mkdirp(path: string): Promise<void>;
  readFile(path: string): Promise<string>;
  /** Create or overwrite */
  writeFile(path: string, content: string): Promise<void>;
  copyFile(source: string, destination: string): Promise<void>;
}

export const nodeFileSystem: BuildFileSystem = {
  async mkdirp(path) {
    try {
      await mkdir(path, { recursive: true });
    } catch (err) {
      throw new IOError("create directory", path, err);
    }
  },

  async readFile(path) {
    try {
      return await readFile(path, "utf-8");
    } catch (err) {
      throw new IOError("read", path, err);
    }
  },

  async writeFile(path, content) {
    try {
      await writeFile(path, content, "utf-8");
    } catch (err) {
      throw new IOError("write", path, err);
    }
  },

  async copyFile(source, destination) {
    try {
      await copyFile(source, destination);
    } catch (err) {
      throw new IOError("copy", source, err);
    }
  },
};
