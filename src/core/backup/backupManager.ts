import * as fs from "fs/promises";
import { Stats } from "fs";
import path from "path";
import { createHash } from "crypto";
import { BackupRecord } from "../../types";
import { BundleError, ERROR_KIND, getErrorMessage, isNodeError } from "../../utils/errors";
import { copyFileAtomic, createFolderRecursive, writeFileAtomic } from "../../utils/fs";
import { t } from "../../utils/i18n";

const BACKUP_EXT = ".bak";
const MANIFEST_EXT = ".json";
const BACKUP_NAME_REGEX = /^(.+)\.(\d{8}-\d{6}-\d{3})(?:-(\d+))?\.bak$/;

interface BackupManifest {
  originalPath: string;
  backupPath: string;
  createdAt: string;
  size: number;
  sha256: string;
}

function pad(num: number, len = 2) {
  return String(num).padStart(len, "0");
}

/** 可按字典序排序的 UTC 时间戳，如 20240131-235959-123 */
export function formatTimestamp(date: Date): string {
  return (
    `${date.getUTCFullYear()}${pad(date.getUTCMonth() + 1)}${pad(date.getUTCDate())}-` +
    `${pad(date.getUTCHours())}${pad(date.getUTCMinutes())}${pad(date.getUTCSeconds())}-` +
    pad(date.getUTCMilliseconds(), 3)
  );
}

export function parseTimestamp(stamp: string): Date | null {
  const match = /^(\d{4})(\d{2})(\d{2})-(\d{2})(\d{2})(\d{2})-(\d{3})$/.exec(stamp);
  if (!match) return null;
  const [, y, mo, d, h, mi, s, ms] = match.map(Number);
  return new Date(Date.UTC(y, mo - 1, d, h, mi, s, ms));
}

async function sha256Of(filePath: string): Promise<string> {
  return createHash("sha256")
    .update(await fs.readFile(filePath))
    .digest("hex");
}

function isManifest(value: unknown): value is BackupManifest {
  return (
    typeof value === "object" &&
    value !== null &&
    "originalPath" in value &&
    typeof value.originalPath === "string" &&
    "createdAt" in value &&
    typeof value.createdAt === "string" &&
    "size" in value &&
    typeof value.size === "number" &&
    "sha256" in value &&
    typeof value.sha256 === "string"
  );
}

/**
 * 管理改写前的快照。备份只追加，不修改，恢复时也不会删除。
 */
export class BackupManager {
  constructor(private readonly backupDir: string) {}

  get directory() {
    return this.backupDir;
  }

  /**
   * 逐字节复制并校验大小与 SHA-256，校验失败时抛出 BackupVerificationError，
   * 调用方必须在改写原文件之前停止。
   */
  public async backup(filePath: string, now: Date = new Date()): Promise<BackupRecord> {
    let sourceStat: Stats;
    try {
      sourceStat = await fs.stat(filePath);
    } catch (e) {
      if (isNodeError(e, "ENOENT")) {
        throw new BundleError(ERROR_KIND.PathNotFound, t("backup.sourceMissing", filePath), filePath, { cause: e });
      }
      throw e;
    }
    if (!sourceStat.isFile()) {
      throw new BundleError(ERROR_KIND.PathNotFound, t("backup.sourceMissing", filePath), filePath);
    }

    let backupPath: string;
    try {
      await createFolderRecursive(this.backupDir);
      backupPath = await this.reserveBackupPath(path.basename(filePath), now);
    } catch (e) {
      throw new BundleError(ERROR_KIND.BackupVerificationError, t("backup.verifyFailed", filePath, getErrorMessage(e)), filePath, {
        cause: e
      });
    }
    try {
      await fs.copyFile(filePath, backupPath);
      const [originalHash, backupHash, backupStat] = await Promise.all([sha256Of(filePath), sha256Of(backupPath), fs.stat(backupPath)]);
      if (backupStat.size !== sourceStat.size || backupHash !== originalHash) {
        throw new Error(t("backup.mismatch", sourceStat.size, backupStat.size));
      }
      const record: BackupRecord = {
        originalPath: path.resolve(filePath),
        backupPath,
        createdAt: now,
        size: backupStat.size,
        sha256: backupHash
      };
      await this.writeManifest(record);
      return record;
    } catch (e) {
      await fs.rm(backupPath, { force: true });
      await fs.rm(`${backupPath}${MANIFEST_EXT}`, { force: true });
      throw new BundleError(ERROR_KIND.BackupVerificationError, t("backup.verifyFailed", filePath, getErrorMessage(e)), filePath, {
        cause: e
      });
    }
  }

  /** 按创建时间倒序列出所有备份 */
  public async list(): Promise<BackupRecord[]> {
    let names: string[];
    try {
      names = await fs.readdir(this.backupDir);
    } catch (e) {
      if (isNodeError(e, "ENOENT")) return [];
      throw e;
    }
    const records: BackupRecord[] = [];
    for (const name of names) {
      if (!name.endsWith(BACKUP_EXT)) continue;
      const record = await this.readRecord(path.join(this.backupDir, name));
      if (record) records.push(record);
    }
    return records.sort(
      (a, b) => b.createdAt.getTime() - a.createdAt.getTime() || (a.backupPath < b.backupPath ? 1 : a.backupPath > b.backupPath ? -1 : 0)
    );
  }

  /** 最近的一份备份，可按原文件名过滤 */
  public async latest(baseName?: string): Promise<BackupRecord | null> {
    const records = await this.list();
    const matched = baseName === undefined ? records : records.filter(record => this.originalBaseName(record) === baseName);
    return matched[0] ?? null;
  }

  /**
   * 把备份内容写回目标路径。失败时抛出 RestoreError，备份文件本身保持不动。
   */
  public async restore(record: BackupRecord, targetPath: string = record.originalPath): Promise<void> {
    if (!targetPath) {
      throw new BundleError(ERROR_KIND.RestoreError, t("backup.noRestoreTarget", record.backupPath), record.backupPath);
    }
    try {
      if (record.sha256 !== "") {
        const currentHash = await sha256Of(record.backupPath);
        if (currentHash !== record.sha256) {
          throw new Error(t("backup.checksumChanged", record.backupPath));
        }
      }
      await copyFileAtomic(record.backupPath, targetPath);
    } catch (e) {
      throw new BundleError(ERROR_KIND.RestoreError, t("backup.restoreFailed", record.backupPath, getErrorMessage(e)), targetPath, {
        cause: e
      });
    }
  }

  public async readRecord(backupPath: string): Promise<BackupRecord | null> {
    const match = BACKUP_NAME_REGEX.exec(path.basename(backupPath));
    if (!match) return null;
    try {
      const parsed: unknown = JSON.parse(await fs.readFile(`${backupPath}${MANIFEST_EXT}`, "utf8"));
      if (isManifest(parsed)) {
        return {
          originalPath: parsed.originalPath,
          backupPath,
          createdAt: new Date(parsed.createdAt),
          size: parsed.size,
          sha256: parsed.sha256
        };
      }
    } catch {
      // 清单缺失或损坏时退回到文件名里的信息
    }
    const createdAt = parseTimestamp(match[2]);
    if (!createdAt) return null;
    const stat = await fs.stat(backupPath);
    return { originalPath: "", backupPath, createdAt, size: stat.size, sha256: "" };
  }

  private originalBaseName(record: BackupRecord) {
    if (record.originalPath) return path.basename(record.originalPath);
    return BACKUP_NAME_REGEX.exec(path.basename(record.backupPath))?.[1] ?? "";
  }

  private async reserveBackupPath(baseName: string, now: Date): Promise<string> {
    const stamp = formatTimestamp(now);
    for (let attempt = 0; ; attempt++) {
      const suffix = attempt === 0 ? "" : `-${attempt}`;
      const candidate = path.join(this.backupDir, `${baseName}.${stamp}${suffix}${BACKUP_EXT}`);
      try {
        const handle = await fs.open(candidate, "wx");
        await handle.close();
        return candidate;
      } catch (e) {
        if (!isNodeError(e, "EEXIST")) throw e;
      }
    }
  }

  private async writeManifest(record: BackupRecord) {
    const manifest: BackupManifest = {
      originalPath: record.originalPath,
      backupPath: record.backupPath,
      createdAt: record.createdAt.toISOString(),
      size: record.size,
      sha256: record.sha256
    };
    await writeFileAtomic(`${record.backupPath}${MANIFEST_EXT}`, `${JSON.stringify(manifest, null, 2)}\n`);
  }
}
