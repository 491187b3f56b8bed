import { existsSync, promises as fs } from "fs";
import path from "path";

export async function ensureDir(dirPath: string): Promise<void> {
  await fs.mkdir(dirPath, { recursive: true });
}

export async function pathExists(filePath: string): Promise<boolean> {
  try {
    await fs.access(filePath);
    return true;
  } catch {
    return false;
  }
}

export async function readJson(filePath: string): Promise<unknown> {
  const content = await fs.readFile(filePath, "utf8");
  return JSON.parse(content);
}

export async function writeJson(filePath: string, data: unknown): Promise<void> {
  await writeText(filePath, JSON.stringify(data, null, 2) + "\n");
}

export async function writeText(filePath: string, content: string): Promise<void> {
  await ensureDir(path.dirname(filePath));
  await fs.writeFile(filePath, content, "utf8");
}

export async function writeBinary(filePath: string, data: Buffer): Promise<void> {
  await ensureDir(path.dirname(filePath));
  await fs.writeFile(filePath, data);
}

export async function removePath(targetPath: string): Promise<void> {
  await fs.rm(targetPath, { recursive: true, force: true });
}

/** Regular files directly inside `dirPath` matching `predicate`, sorted by name. */
export async function listFiles(
  dirPath: string,
  predicate: (fileName: string) => boolean
): Promise<string[]> {
  const entries = await fs.readdir(dirPath, { withFileTypes: true });
  return entries
    .filter((entry) => entry.isFile() && predicate(entry.name))
    .map((entry) => entry.name)
    .sort()
    .map((name) => path.join(dirPath, name));
}

/** Path of the nearest `marker` at or above `startDir`; finds root assets from src/ and dist/src/ alike. */
export function findUp(marker: string, startDir: string = __dirname): string {
  let dir = path.resolve(startDir);
  while (!existsSync(path.join(dir, marker))) {
    const parent = path.dirname(dir);
    if (parent === dir) {
      throw new Error(`No ${marker} found above ${startDir}`);
    }
    dir = parent;
  }
  return path.join(dir, marker);
}
