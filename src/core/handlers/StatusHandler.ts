import { BundleContextInternal, EXECUTION_RESULT_CODE, STORE_LOAD_STATUS, StatusExecutionResult, StoreSummary } from "../../types";
import { loadStore, storePathFor, summarizeStore } from "../store/translationStore";
import { SUPPORTED_LANGUAGES } from "../../translator";
import { NotificationManager } from "../../utils/notification";
import { t } from "../../utils/i18n";

/**
 * 只读：统计各语言译文文件中已翻译与待翻译的条目数。
 */
export class StatusHandler {
  constructor(private ctx: BundleContextInternal) {}

  public async run(): Promise<StatusExecutionResult> {
    const langs = this.ctx.langs.length > 0 ? this.ctx.langs : Object.keys(SUPPORTED_LANGUAGES);
    const byLang: Record<string, StoreSummary & { exists: boolean }> = {};
    for (const lang of langs) {
      const loaded = await loadStore(storePathFor(this.ctx.storeDir, lang));
      if (loaded.status === STORE_LOAD_STATUS.Corrupt) {
        NotificationManager.showWarning(loaded.message ?? t("store.corrupt", lang));
      }
      const summary = summarizeStore(loaded.map);
      byLang[lang] = { ...summary, exists: loaded.status !== STORE_LOAD_STATUS.Missing };
      if (byLang[lang].exists) {
        NotificationManager.showProgress({ message: t("pipeline.statusLine", lang, summary.translated, summary.total, summary.pending) });
      }
    }
    return { success: true, message: t("pipeline.statusDone", langs.length), code: EXECUTION_RESULT_CODE.Success, data: { byLang } };
  }
}
