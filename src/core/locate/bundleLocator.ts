import * as fs from "fs/promises";
import { Dirent } from "fs";
import path from "path";
import { PathCache } from "./pathCache";
import { isNodeError } from "../../utils/errors";

export const DEFAULT_BUNDLE_FILE_NAME = "workbench.desktop.main.js";
export const DEFAULT_MAX_DEPTH = 5;
const WELL_KNOWN_DIR = ["resources", "app", "out", "vs", "workbench"];
const SKIPPED_DIRS = new Set(["node_modules", ".git"]);

export interface LocateOptions {
  fileName?: string;
  roots: string[];
  cache?: PathCache;
  maxDepth?: number;
}

async function isFile(filePath: string) {
  try {
    return (await fs.stat(filePath)).isFile();
  } catch {
    return false;
  }
}

async function search(dir: string, fileName: string, depth: number, maxDepth: number): Promise<string | null> {
  if (depth > maxDepth) return null;
  let entries: Dirent[];
  try {
    entries = await fs.readdir(dir, { withFileTypes: true });
  } catch (e) {
    if (isNodeError(e, "ENOENT") || isNodeError(e, "EACCES") || isNodeError(e, "ENOTDIR") || isNodeError(e, "EPERM")) return null;
    throw e;
  }
  const hit = entries.find(entry => entry.isFile() && entry.name === fileName);
  if (hit) return path.join(dir, hit.name);
  for (const entry of entries.sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0))) {
    if (!entry.isDirectory() || SKIPPED_DIRS.has(entry.name)) continue;
    const found = await search(path.join(dir, entry.name), fileName, depth + 1, maxDepth);
    if (found !== null) return found;
  }
  return null;
}

/**
 * 依次尝试：仍然存在的缓存路径、每个根目录下的固定相对位置、限深递归搜索。
 * 找到后写入缓存；都找不到时返回 null。
 */
export async function locateBundle(options: LocateOptions): Promise<string | null> {
  const fileName = options.fileName ?? DEFAULT_BUNDLE_FILE_NAME;
  const maxDepth = options.maxDepth ?? DEFAULT_MAX_DEPTH;
  const cache = options.cache;

  const cached = await cache?.get(fileName);
  if (cached !== undefined) {
    if (await isFile(cached)) return cached;
    await cache?.delete(fileName);
  }

  let found: string | null = null;
  for (const root of options.roots) {
    const wellKnown = path.join(root, ...WELL_KNOWN_DIR, fileName);
    if (await isFile(wellKnown)) {
      found = wellKnown;
      break;
    }
  }
  for (const root of options.roots) {
    if (found !== null) break;
    found = await search(root, fileName, 0, maxDepth);
  }

  if (found !== null) await cache?.set(fileName, found);
  return found;
}
