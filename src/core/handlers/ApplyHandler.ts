import { ApplyExecutionResult, BundleContextInternal, EXECUTION_RESULT_CODE, PIPELINE_STAGE } from "../../types";
import { readBundle } from "../bundle/bundleFile";
import { loadTranslations, setStage, substituteAndWrite } from "../tools/pipelineTools";
import { t } from "../../utils/i18n";

/**
 * 仅用已有译文改写，不提取也不翻译。
 */
export class ApplyHandler {
  constructor(private ctx: BundleContextInternal) {}

  public async run(): Promise<ApplyExecutionResult> {
    this.ctx.source = await readBundle(this.ctx.bundlePath);
    await loadTranslations(this.ctx);
    const outcome = await substituteAndWrite(this.ctx);
    setStage(this.ctx, PIPELINE_STAGE.Done);
    const data = { substitution: outcome.substitution, backup: outcome.backup };
    if (!outcome.written) {
      return { success: true, message: t("pipeline.nothingToApply", this.ctx.bundlePath), code: EXECUTION_RESULT_CODE.NoApplicableTranslations, data };
    }
    return {
      success: true,
      message: t("pipeline.applySummary", outcome.substitution.appliedKeys, outcome.substitution.replacedOccurrences, this.ctx.bundlePath),
      code: EXECUTION_RESULT_CODE.Success,
      data
    };
  }
}
