import { BackupExecutionResult, BundleContextInternal, EXECUTION_RESULT_CODE } from "../../types";
import { BackupManager } from "../backup/backupManager";
import { t } from "../../utils/i18n";

export class ListBackupsHandler {
  constructor(private ctx: BundleContextInternal) {}

  public async run(): Promise<BackupExecutionResult> {
    const records = await new BackupManager(this.ctx.backupDir).list();
    if (records.length === 0) {
      return { success: true, message: t("pipeline.noBackups", this.ctx.backupDir), code: EXECUTION_RESULT_CODE.NoBackups, data: { records } };
    }
    return { success: true, message: t("pipeline.backupsListed", records.length), code: EXECUTION_RESULT_CODE.Success, data: { records } };
  }
}
