import type { BuildFileSystem } from "../build/filesystem.js";
import { IOError } from "../errors.js";

export interface MemoryFileSystem extends BuildFileSystem {
  files: Map<string, string>;
  directories: Set<string>;
}

export interface MemoryFileSystemOptions {
  /** Paths whose write or copy destination fails with EACCES */
  failing?: Iterable<string>;
}

const systemError = (code: string) => Object.assign(new Error(code), { code });

/**
 * In-process stand-in for the node file system.
 */
export function createMemoryFileSystem(
  initial: Record<string, string> = {},
  options: MemoryFileSystemOptions = {}
): MemoryFileSystem {
  const files = new Map(Object.entries(initial));
  const directories = new Set<string>();
  const failing = new Set(options.failing ?? []);

  return {
    files,
    directories,

    async mkdirp(path) {
      directories.add(path);
    },

    async readFile(path) {
      const content = files.get(path);
      if (content === undefined) {
        throw new IOError("read", path, systemError("ENOENT"));
      }
      return content;
    },

    async writeFile(path, content) {
      if (failing.has(path)) {
        throw new IOError("write", path, systemError("EACCES"));
      }
      files.set(path, content);
    },

    async copyFile(source, destination) {
      const content = files.get(source);
      if (content === undefined) {
        throw new IOError("copy", source, systemError("ENOENT"));
      }
      if (failing.has(destination)) {
        throw new IOError("copy", source, systemError("EACCES"));
      }
      files.set(destination, content);
    },
  };
}
