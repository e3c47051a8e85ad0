import path from "path";
import {
  BundleContextInternal,
  PIPELINE_STAGE,
  PipelineStage,
  STORE_LOAD_STATUS,
  SubstitutionResult,
  BackupRecord,
  TranslationMap
} from "../../types";
import { readBundle, writeBundle } from "../bundle/bundleFile";
import { extractLiterals } from "../extract/literalExtractor";
import { loadStore, saveStore, storePathFor } from "../store/translationStore";
import { BackupManager } from "../backup/backupManager";
import { applyTranslations } from "../substitute/substitutionEngine";
import { getErrorMessage } from "../../utils/errors";
import { NotificationManager } from "../../utils/notification";
import { t } from "../../utils/i18n";

export function setStage(ctx: BundleContextInternal, stage: PipelineStage) {
  ctx.stage = stage;
  NotificationManager.showProgress({ message: t("pipeline.stage", stage) });
}

export async function readAndExtract(ctx: BundleContextInternal): Promise<string[]> {
  ctx.source = await readBundle(ctx.bundlePath);
  ctx.candidates = extractLiterals(ctx.source.text, {
    extraPropertyNames: ctx.extraPropertyNames,
    strict: ctx.strictNoiseFilter
  });
  NotificationManager.showProgress({ message: t("pipeline.extracted", ctx.candidates.length, path.basename(ctx.bundlePath)) });
  return ctx.candidates;
}

export interface LoadedTranslations {
  storePath: string;
  recovered: boolean;
  /** 损坏的文件未能留下备份时为 false，本次运行不得覆盖它 */
  writable: boolean;
}

/**
 * 读取目标语言的译文文件。文件损坏时先留一份备份再按空映射继续，返回值标记是否发生过恢复。
 * 备份失败不会中断流程，只是本次不再写回该文件。
 */
export async function loadTranslations(ctx: BundleContextInternal, lang: string = ctx.targetLang): Promise<LoadedTranslations> {
  const storePath = storePathFor(ctx.storeDir, lang);
  const loaded = await loadStore(storePath);
  ctx.translations = loaded.map;
  if (loaded.status !== STORE_LOAD_STATUS.Corrupt) {
    return { storePath, recovered: false, writable: true };
  }
  NotificationManager.showWarning(loaded.message ?? t("store.corrupt", storePath));
  try {
    const record = await new BackupManager(ctx.backupDir).backup(storePath);
    NotificationManager.showWarning(t("store.corruptBackedUp", record.backupPath));
    return { storePath, recovered: true, writable: true };
  } catch (e) {
    NotificationManager.showWarning(t("store.corruptBackupFailed", storePath, getErrorMessage(e)));
    return { storePath, recovered: true, writable: false };
  }
}

/**
 * 仅在允许时落盘译文文件。
 */
export async function saveTranslations(ctx: BundleContextInternal, loaded: LoadedTranslations): Promise<void> {
  if (loaded.writable) {
    await saveStore(ctx.translations, loaded.storePath);
  } else {
    NotificationManager.showWarning(t("store.saveSkipped", loaded.storePath));
  }
}

/**
 * 已写进文件的译文会在下次提取时再次出现，把它们从候选项中去掉；已是键的保留。
 */
export function excludeTranslatedValues(candidates: string[], map: TranslationMap): string[] {
  const values = new Set(Object.values(map).filter(value => value !== ""));
  return candidates.filter(candidate => Object.hasOwn(map, candidate) || !values.has(candidate));
}

export interface RewriteOutcome {
  substitution: SubstitutionResult;
  backup: BackupRecord | null;
  written: boolean;
}

/**
 * 替换、备份、写回。没有任何替换发生时既不备份也不写文件。
 * 备份失败会抛出 BackupVerificationError，此时原文件尚未改动。
 */
export async function substituteAndWrite(ctx: BundleContextInternal): Promise<RewriteOutcome> {
  if (ctx.source === null) {
    ctx.source = await readBundle(ctx.bundlePath);
  }
  setStage(ctx, PIPELINE_STAGE.Substituting);
  const { text, result } = applyTranslations(ctx.source.text, ctx.translations, {
    minKeyLength: ctx.minKeyLength,
    escapeNonLatin1: ctx.source.encoding === "latin1"
  });
  NotificationManager.showProgress({ message: t("pipeline.substituted", result.appliedKeys, result.replacedOccurrences) });
  if (result.replacedOccurrences === 0 || text === ctx.source.text) {
    return { substitution: result, backup: null, written: false };
  }

  let backup: BackupRecord | null = null;
  if (ctx.skipBackup) {
    NotificationManager.showWarning(t("pipeline.backupSkipped"));
  } else {
    setStage(ctx, PIPELINE_STAGE.BackingUp);
    backup = await new BackupManager(ctx.backupDir).backup(ctx.bundlePath);
    NotificationManager.showProgress({ message: t("pipeline.backedUp", backup.backupPath) });
  }

  setStage(ctx, PIPELINE_STAGE.Writing);
  await writeBundle(ctx.bundlePath, { text, encoding: ctx.source.encoding });
  return { substitution: result, backup, written: true };
}
