import path from "path";
import { BackupExecutionResult, BundleContextInternal, EXECUTION_RESULT_CODE, PIPELINE_STAGE } from "../../types";
import { BackupManager } from "../backup/backupManager";
import { setStage } from "../tools/pipelineTools";
import { t } from "../../utils/i18n";

export class RestoreHandler {
  constructor(private ctx: BundleContextInternal) {}

  public async run(): Promise<BackupExecutionResult> {
    const manager = new BackupManager(this.ctx.backupDir);
    const record =
      this.ctx.backupPath !== ""
        ? await manager.readRecord(this.ctx.backupPath)
        : await manager.latest(this.ctx.bundlePath !== "" ? path.basename(this.ctx.bundlePath) : undefined);
    if (record === null) {
      return {
        success: false,
        message: t("pipeline.noBackupFound", this.ctx.backupPath || this.ctx.bundlePath || manager.directory),
        code: EXECUTION_RESULT_CODE.NoBackupFound
      };
    }
    const target = this.ctx.restoreTarget || this.ctx.bundlePath || record.originalPath;
    setStage(this.ctx, PIPELINE_STAGE.Writing);
    await manager.restore(record, target);
    setStage(this.ctx, PIPELINE_STAGE.Done);
    return {
      success: true,
      message: t("pipeline.restored", record.backupPath, target),
      code: EXECUTION_RESULT_CODE.Success,
      data: { records: [record] }
    };
  }
}
