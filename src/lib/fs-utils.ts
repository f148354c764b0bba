import { promises as fs } from "node:fs";
import path from "node:path";

export async function ensureDir(dirPath: string): Promise<void> {
  await fs.mkdir(dirPath, { recursive: true });
}

export function safeResolvePath(rootDir: string, relativePath: string): string {
  const normalized = relativePath.replace(/^\/+/, "");
  const candidate = path.resolve(rootDir, normalized);
  const safeRoot = `${path.resolve(rootDir)}${path.sep}`;

  if (candidate !== path.resolve(rootDir) && !candidate.startsWith(safeRoot)) {
    throw new Error(`Unsafe path: ${relativePath}`);
  }

  return candidate;
}

export async function writeTextFile(filePath: string, content: string): Promise<void> {
  await fs.mkdir(path.dirname(filePath), { recursive: true });
  await fs.writeFile(filePath, content, "utf8");
}

export async function pathExists(targetPath: string): Promise<boolean> {
  try {
    await fs.access(targetPath);
    return true;
  } catch {
    return false;
  }
}

export async function removeDir(dirPath: string): Promise<void> {
  await fs.rm(dirPath, { recursive: true, force: true });
}

export function compareNormalizedPaths(left: string, right: string): number {
  const normalizedLeft = left.normalize("NFC").replaceAll("\\", "/");
  const normalizedRight = right.normalize("NFC").replaceAll("\\", "/");

  if (normalizedLeft < normalizedRight) {
    return -1;
  }
  if (normalizedLeft > normalizedRight) {
    return 1;
  }
  return 0;
}

/** Every regular file below `rootDir`, as sorted posix-relative paths with their bytes. */
export async function readFilesRecursive(rootDir: string): Promise<Array<{ path: string; bytes: Buffer }>> {
  const files: Array<{ path: string; bytes: Buffer }> = [];

  async function walk(dir: string): Promise<void> {
    const entries = await fs.readdir(dir, { withFileTypes: true });

    for (const entry of entries.sort((a, b) => compareNormalizedPaths(a.name, b.name))) {
      const absolute = path.join(dir, entry.name);

      if (entry.isDirectory()) {
        await walk(absolute);
      } else if (entry.isFile()) {
        files.push({
          path: path.relative(rootDir, absolute).replaceAll("\\", "/"),
          bytes: await fs.readFile(absolute)
        });
      }
    }
  }

  if (await pathExists(rootDir)) {
    await walk(rootDir);
  }

  return files;
}
