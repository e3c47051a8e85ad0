import { ChunkOptions, MAX_CHUNK_SIZE, SendFn, SendResult, TranslateResult } from "../../types";
import { t } from "../../utils/i18n";
import { NotificationManager } from "../../utils/notification";

export function splitIntoChunks<T>(list: T[], chunkSize: number): T[][] {
  const requested = Number.isFinite(chunkSize) ? Math.floor(chunkSize) : MAX_CHUNK_SIZE;
  const size = Math.max(1, Math.min(requested, MAX_CHUNK_SIZE));
  const chunks: T[][] = [];
  for (let i = 0; i < list.length; i += size) {
    chunks.push(list.slice(i, i + size));
  }
  return chunks;
}

/**
 * 分块调度器：逐块顺序发送，某一块失败时记录并原样返回该块原文，不中断整批。
 * @param target 目标语言
 * @param sourceTextList 原文列表
 * @param options 每块条数（不超过 50）与块间隔 ms
 * @param sendFn 实际的发送函数（不同服务实现）
 */
export async function batchTranslate(
  target: string,
  sourceTextList: string[],
  options: ChunkOptions,
  sendFn: SendFn
): Promise<TranslateResult> {
  const result: TranslateResult = { success: true, data: [], missed: [], failedChunks: 0, message: "" };
  if (sourceTextList.length === 0) return result;

  const chunks = splitIntoChunks(sourceTextList, options.chunkSize);
  let offset = 0;
  for (let i = 0; i < chunks.length; i++) {
    const texts = chunks[i];
    let res: SendResult;
    try {
      res = await sendFn(target, texts);
    } catch (e: unknown) {
      res = { success: false, message: e instanceof Error ? e.message : String(e) };
    }
    if (res.success && res.data?.length === texts.length) {
      result.data.push(...res.data);
    } else {
      const reason = res.success ? t("translator.lineCountMismatch", texts.length, res.data?.length ?? 0) : (res.message ?? t("common.unknownError"));
      result.failedChunks++;
      result.data.push(...texts);
      texts.forEach((_, index) => result.missed.push(offset + index));
      NotificationManager.showProgress({ message: t("translator.chunkFailed", i + 1, chunks.length, reason), type: "error" });
    }
    offset += texts.length;
    NotificationManager.showProgress({ message: t("translator.progress", target, offset, sourceTextList.length) });
    if (options.interval > 0 && i + 1 < chunks.length) {
      await new Promise(r => setTimeout(r, options.interval));
    }
  }

  if (result.failedChunks > 0) {
    result.success = result.failedChunks < chunks.length;
    result.message = t("translator.partialFailed", result.failedChunks, chunks.length);
  }
  return result;
}
