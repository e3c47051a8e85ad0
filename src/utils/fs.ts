import * as fs from "fs/promises";
import path from "path";

export async function createFolderRecursive(dirPath: string): Promise<void> {
  await fs.mkdir(dirPath, { recursive: true });
}

/**
 * 将相对路径（相对于当前工作目录）解析为绝对路径。
 */
export function toAbsolutePath(relativePath: string, root: string = process.cwd()): string {
  if (path.isAbsolute(relativePath)) {
    return relativePath;
  }
  return path.resolve(root, relativePath);
}

function tempSiblingPath(filePath: string): string {
  const random = Math.random().toString(36).slice(2, 8);
  return path.join(path.dirname(filePath), `.${path.basename(filePath)}.${process.pid}.${random}.tmp`);
}

/**
 * 先写同目录临时文件再 rename 覆盖目标，写入中途失败时原文件保持不变。
 */
export async function writeFileAtomic(filePath: string, data: string | Buffer, encoding: BufferEncoding = "utf8"): Promise<void> {
  await createFolderRecursive(path.dirname(filePath));
  const tempPath = tempSiblingPath(filePath);
  try {
    if (typeof data === "string") {
      await fs.writeFile(tempPath, data, { encoding });
    } else {
      await fs.writeFile(tempPath, data);
    }
    await fs.rename(tempPath, filePath);
  } catch (e) {
    await fs.rm(tempPath, { force: true });
    throw e;
  }
}

export async function copyFileAtomic(sourcePath: string, targetPath: string): Promise<void> {
  await createFolderRecursive(path.dirname(targetPath));
  const tempPath = tempSiblingPath(targetPath);
  try {
    await fs.copyFile(sourcePath, tempPath);
    await fs.rename(tempPath, targetPath);
  } catch (e) {
    await fs.rm(tempPath, { force: true });
    throw e;
  }
}
