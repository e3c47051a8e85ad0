import { BundleContextInternal, EXECUTION_RESULT_CODE, ExtractExecutionResult, PIPELINE_STAGE } from "../../types";
import { saveExtractedStrings } from "../extract/stringsFile";
import { seedPending } from "../store/translationStore";
import { excludeTranslatedValues, loadTranslations, readAndExtract, saveTranslations, setStage } from "../tools/pipelineTools";
import { t } from "../../utils/i18n";

export class ExtractHandler {
  constructor(private ctx: BundleContextInternal) {}

  public async run(): Promise<ExtractExecutionResult> {
    setStage(this.ctx, PIPELINE_STAGE.Extracting);
    const candidates = await readAndExtract(this.ctx);
    if (candidates.length === 0) {
      setStage(this.ctx, PIPELINE_STAGE.Done);
      return { success: true, message: t("pipeline.noStringsExtracted", this.ctx.bundlePath), code: EXECUTION_RESULT_CODE.NoStringsExtracted };
    }
    await saveExtractedStrings(this.ctx.stringsFile, candidates);

    setStage(this.ctx, PIPELINE_STAGE.Merging);
    const loaded = await loadTranslations(this.ctx);
    const { storePath, recovered } = loaded;
    const seeded = seedPending(this.ctx.translations, excludeTranslatedValues(candidates, this.ctx.translations), {
      prune: this.ctx.pruneStore
    });
    this.ctx.translations = seeded.map;
    await saveTranslations(this.ctx, loaded);

    setStage(this.ctx, PIPELINE_STAGE.Done);
    return {
      success: true,
      message: t("pipeline.extractSummary", candidates.length, seeded.added, seeded.pruned, this.ctx.stringsFile),
      code: recovered ? EXECUTION_RESULT_CODE.StoreCorruptRecovered : EXECUTION_RESULT_CODE.Success,
      data: {
        extracted: candidates.length,
        added: seeded.added,
        pruned: seeded.pruned,
        stringsFile: this.ctx.stringsFile,
        storePath
      }
    };
  }
}
