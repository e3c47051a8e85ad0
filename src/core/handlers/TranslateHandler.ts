import { BundleContextInternal, EXECUTION_RESULT_CODE, PIPELINE_STAGE, TranslateExecutionResult, TranslateResult, TranslationMap } from "../../types";
import { diffUntranslated, mergeTranslations, seedPending } from "../store/translationStore";
import { excludeTranslatedValues, loadTranslations, readAndExtract, saveTranslations, setStage, substituteAndWrite } from "../tools/pipelineTools";
import { createTranslator } from "../../translator";
import { t } from "../../utils/i18n";
import { NotificationManager } from "../../utils/notification";

/**
 * 完整流程：提取 → 比对 → 翻译 → 合并落盘 → 替换 → 备份 → 写回。
 */
export class TranslateHandler {
  constructor(private ctx: BundleContextInternal) {}

  public async run(): Promise<TranslateExecutionResult> {
    setStage(this.ctx, PIPELINE_STAGE.Extracting);
    const extracted = await readAndExtract(this.ctx);

    setStage(this.ctx, PIPELINE_STAGE.Diffing);
    const loaded = await loadTranslations(this.ctx);
    const { storePath, recovered } = loaded;
    const candidates = excludeTranslatedValues(extracted, this.ctx.translations);
    this.ctx.candidates = candidates;
    const pending = diffUntranslated(candidates, this.ctx.translations);
    NotificationManager.showProgress({ message: t("pipeline.pending", pending.length, candidates.length, this.ctx.targetLang) });

    let translateRes: TranslateResult = { success: true, data: [], missed: [], failedChunks: 0 };
    if (pending.length > 0) {
      setStage(this.ctx, PIPELINE_STAGE.Translating);
      const translator = this.ctx.translator ?? (await createTranslator({ apiKey: this.ctx.apiKey }));
      this.ctx.translator = translator;
      translateRes = await translator.translate(pending, this.ctx.targetLang);
      if (translateRes.message !== undefined && translateRes.message !== "") {
        NotificationManager.showWarning(translateRes.message);
      }
    }

    setStage(this.ctx, PIPELINE_STAGE.Merging);
    const missed = new Set(translateRes.missed);
    const incoming: TranslationMap = {};
    pending.forEach((key, index) => {
      const value = translateRes.data[index];
      if (!missed.has(index) && value !== undefined) {
        incoming[key] = value;
      }
    });
    const merged = mergeTranslations(this.ctx.translations, incoming);
    const seeded = seedPending(merged.map, candidates, { prune: this.ctx.pruneStore });
    this.ctx.translations = seeded.map;
    await saveTranslations(this.ctx, loaded);

    const outcome = await substituteAndWrite(this.ctx);
    setStage(this.ctx, PIPELINE_STAGE.Done);

    const translated = Object.keys(incoming).length;
    const data = {
      extracted: candidates.length,
      requested: pending.length,
      translated,
      failedChunks: translateRes.failedChunks,
      changed: merged.changed,
      substitution: outcome.substitution,
      backup: outcome.backup,
      storePath
    };
    const summary = t("pipeline.translateSummary", translated, pending.length, outcome.substitution.appliedKeys, outcome.substitution.replacedOccurrences);

    if (translateRes.failedChunks > 0) {
      return { success: translateRes.success, message: summary, code: EXECUTION_RESULT_CODE.TranslatorPartialFailed, data };
    }
    if (recovered) {
      return { success: true, message: summary, code: EXECUTION_RESULT_CODE.StoreCorruptRecovered, data };
    }
    if (!outcome.written) {
      return { success: true, message: t("pipeline.nothingToApply", this.ctx.bundlePath), code: EXECUTION_RESULT_CODE.NoApplicableTranslations, data };
    }
    return { success: true, message: summary, code: EXECUTION_RESULT_CODE.Success, data };
  }
}
