import * as fs from "fs/promises";
import path from "path";
import { STORE_LOAD_STATUS, MergeResult, SeedResult, StoreLoadResult, StoreSummary, TranslationMap } from "../../types";
import { getErrorMessage, isNodeError } from "../../utils/errors";
import { writeFileAtomic } from "../../utils/fs";
import { t } from "../../utils/i18n";

export function storePathFor(storeDir: string, lang: string): string {
  return path.join(storeDir, `translations_${lang}.json`);
}

/**
 * 读取译文文件。文件不存在或无法解析时都返回空映射，不抛错；
 * 解析失败时 status 为 corrupt，由调用方决定如何提示。
 */
export async function loadStore(filePath: string): Promise<StoreLoadResult> {
  let content: string;
  try {
    content = await fs.readFile(filePath, "utf8");
  } catch (e) {
    if (isNodeError(e, "ENOENT")) {
      return { map: {}, status: STORE_LOAD_STATUS.Missing };
    }
    return { map: {}, status: STORE_LOAD_STATUS.Corrupt, message: t("store.readFailed", filePath, getErrorMessage(e)) };
  }
  let parsed: unknown;
  try {
    parsed = JSON.parse(content.replace(/^\uFEFF/, ""));
  } catch (e) {
    return { map: {}, status: STORE_LOAD_STATUS.Corrupt, message: t("store.parseFailed", filePath, getErrorMessage(e)) };
  }
  if (parsed === null || typeof parsed !== "object" || Array.isArray(parsed)) {
    return { map: {}, status: STORE_LOAD_STATUS.Corrupt, message: t("store.notAnObject", filePath) };
  }
  const map: TranslationMap = {};
  for (const [key, value] of Object.entries(parsed)) {
    if (typeof value === "string") {
      map[key] = value;
    }
  }
  return { map, status: STORE_LOAD_STATUS.Ok };
}

/**
 * 返回尚未翻译的候选项：不在映射中，或映射值为空串。保留候选项原有顺序。
 */
export function diffUntranslated(candidates: string[], map: TranslationMap): string[] {
  return candidates.filter(key => !Object.hasOwn(map, key) || map[key] === "");
}

/**
 * 合并新译文。空值永远不会覆盖已有内容，手动修改过的译文因此得以保留。
 */
export function mergeTranslations(map: TranslationMap, incoming: TranslationMap): MergeResult {
  const result: TranslationMap = { ...map };
  let changed = 0;
  for (const [key, value] of Object.entries(incoming)) {
    if (value === "") continue;
    if (!Object.hasOwn(result, key) || result[key] !== value) {
      result[key] = value;
      changed++;
    }
  }
  return { map: result, changed };
}

export function seedPending(map: TranslationMap, candidates: string[], options: { prune?: boolean } = {}): SeedResult {
  const result: TranslationMap = { ...map };
  let added = 0;
  let pruned = 0;
  for (const key of candidates) {
    if (!Object.hasOwn(result, key)) {
      result[key] = "";
      added++;
    }
  }
  if (options.prune === true) {
    const candidateSet = new Set(candidates);
    for (const key of Object.keys(result)) {
      if (result[key] === "" && !candidateSet.has(key)) {
        delete result[key];
        pruned++;
      }
    }
  }
  return { map: result, added, pruned };
}

export function sortStore(map: TranslationMap): TranslationMap {
  const sorted: TranslationMap = {};
  for (const key of Object.keys(map).sort()) {
    sorted[key] = map[key];
  }
  return sorted;
}

export function serializeStore(map: TranslationMap): string {
  return `${JSON.stringify(sortStore(map), null, 2)}\n`;
}

export async function saveStore(map: TranslationMap, filePath: string): Promise<void> {
  await writeFileAtomic(filePath, serializeStore(map));
}

export function summarizeStore(map: TranslationMap, candidates?: string[]): StoreSummary {
  const keys = candidates ?? Object.keys(map);
  const translated = keys.filter(key => Object.hasOwn(map, key) && map[key] !== "").length;
  return { total: keys.length, translated, pending: keys.length - translated };
}
