import { ModuleResolutionError, PathResolver } from "@bb-coverage/core";
import fs from "fs/promises";
import sysPath from "path";

/**
 * Locates modules on the local file system.
 *
 * Candidates, in order:
 * 1. the module path itself;
 * 2. `<searchPath>/<modulePath>` for each search path;
 * 3. `<searchPath>/<basename(modulePath)>` for each search path.
 */
export class FileSystemPathResolver implements PathResolver {
  async resolveModulePath(searchPaths: readonly string[], moduleName: string): Promise<string> {
    for (const candidate of getCandidates(searchPaths, moduleName)) {
      if (await isFile(candidate)) {
        return sysPath.resolve(candidate);
      }
    }
    throw new ModuleResolutionError(moduleName, searchPaths);
  }
}

function* getCandidates(searchPaths: readonly string[], moduleName: string): IterableIterator<string> {
  yield moduleName;
  // Trace paths are guest paths: strip the root so they nest under the search path
  const relative: string = moduleName.replace(/^[/\\]+/, "");
  for (const searchPath of searchPaths) {
    yield sysPath.join(searchPath, relative);
  }
  const baseName: string = sysPath.basename(moduleName);
  for (const searchPath of searchPaths) {
    yield sysPath.join(searchPath, baseName);
  }
}

async function isFile(path: string): Promise<boolean> {
  try {
    return (await fs.stat(path)).isFile();
  } catch (e) {
    const code: unknown = typeof e === "object" && e !== null ? Reflect.get(e, "code") : undefined;
    if (code === "ENOENT" || code === "ENOTDIR") {
      return false;
    }
    throw e;
  }
}
