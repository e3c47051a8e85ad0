import {
  AnyExecutionResult,
  BundleContextInternal,
  BundleContextPublic,
  BundleLocalizerOptions,
  EXECUTION_RESULT_CODE,
  ExecutionResultCode,
  PIPELINE_STAGE,
  TASK
} from "../types";
import { createBundleContext } from "./context";
import { ExtractHandler } from "./handlers/ExtractHandler";
import { TranslateHandler } from "./handlers/TranslateHandler";
import { ApplyHandler } from "./handlers/ApplyHandler";
import { RestoreHandler } from "./handlers/RestoreHandler";
import { ListBackupsHandler } from "./handlers/ListBackupsHandler";
import { StatusHandler } from "./handlers/StatusHandler";
import { getCacheConfig, resolveApiKey } from "../utils/config";
import { ERROR_KIND, ErrorKind, getErrorMessage, isBundleError } from "../utils/errors";
import { toAbsolutePath } from "../utils/fs";
import { t } from "../utils/i18n";

const ERROR_CODE_MAP: Record<ErrorKind, ExecutionResultCode> = {
  [ERROR_KIND.PathNotFound]: EXECUTION_RESULT_CODE.BundleNotFound,
  [ERROR_KIND.DecodeError]: EXECUTION_RESULT_CODE.DecodeFailed,
  [ERROR_KIND.StoreCorrupt]: EXECUTION_RESULT_CODE.UnknownError,
  [ERROR_KIND.ProviderError]: EXECUTION_RESULT_CODE.UnknownError,
  [ERROR_KIND.BackupVerificationError]: EXECUTION_RESULT_CODE.BackupFailed,
  [ERROR_KIND.WriteError]: EXECUTION_RESULT_CODE.WriteFailed,
  [ERROR_KIND.RestoreError]: EXECUTION_RESULT_CODE.RestoreFailed
};

const TASKS_NEEDING_BUNDLE = new Set<string>([TASK.Extract, TASK.Translate, TASK.Apply]);

function assign<K extends keyof BundleContextInternal>(ctx: BundleContextInternal, key: K, value: BundleContextInternal[K] | undefined) {
  if (value !== undefined) ctx[key] = value;
}

/**
 * 流程编排入口。每个实例持有独立上下文，同一实例同一时间只执行一个任务。
 */
export class BundleLocalizer {
  private ctx: BundleContextInternal;

  constructor(options?: BundleLocalizerOptions) {
    this.ctx = createBundleContext();
    this.setOptions(this.readConfigOptions());
    this.setOptions(options);
  }

  // 配置文件中的值作为实例默认值，调用时传入的选项再覆盖
  private readConfigOptions(): BundleLocalizerOptions {
    const ctx = this.ctx;
    return {
      targetLang: getCacheConfig<string>("translationServices.targetLanguage", ctx.targetLang),
      bundlePath: getCacheConfig<string>("workspace.bundlePath", ctx.bundlePath),
      storeDir: getCacheConfig<string>("workspace.storeDir", ctx.storeDir),
      backupDir: getCacheConfig<string>("workspace.backupDir", ctx.backupDir),
      stringsFile: getCacheConfig<string>("workspace.stringsFile", ctx.stringsFile),
      extraPropertyNames: getCacheConfig<string[]>("extraction.extraPropertyNames", ctx.extraPropertyNames),
      strictNoiseFilter: getCacheConfig<boolean>("extraction.strictNoiseFilter", ctx.strictNoiseFilter),
      pruneStore: getCacheConfig<boolean>("extraction.pruneStore", ctx.pruneStore),
      minKeyLength: getCacheConfig<number>("substitution.minKeyLength", ctx.minKeyLength)
    };
  }

  public setOptions(options: BundleLocalizerOptions = {}): void {
    const ctx = this.ctx;
    assign(ctx, "task", options.task);
    assign(ctx, "targetLang", options.targetLang?.trim().toLowerCase());
    assign(ctx, "langs", options.langs);
    assign(ctx, "skipBackup", options.skipBackup);
    assign(ctx, "pruneStore", options.pruneStore);
    assign(ctx, "extraPropertyNames", options.extraPropertyNames);
    assign(ctx, "strictNoiseFilter", options.strictNoiseFilter);
    assign(ctx, "minKeyLength", options.minKeyLength);
    assign(ctx, "translator", options.translator);
    assign(ctx, "apiKey", options.apiKey === undefined ? undefined : resolveApiKey(options.apiKey));
    for (const key of ["bundlePath", "backupPath", "restoreTarget", "storeDir", "backupDir", "stringsFile"] as const) {
      const value = options[key];
      if (value !== undefined) {
        ctx[key] = value === "" ? "" : toAbsolutePath(value);
      }
    }
  }

  public async execute(options: BundleLocalizerOptions | null = null): Promise<AnyExecutionResult> {
    if (!this.ctx.isVacant) {
      return { success: true, message: t("common.progress.processing"), code: EXECUTION_RESULT_CODE.Processing, stage: this.ctx.stage };
    }
    try {
      this.ctx.isVacant = false;
      this.resetRunState();
      if (options) this.setOptions(options);
      if (this.ctx.apiKey === "") this.ctx.apiKey = resolveApiKey();
      const invalid = this.validate();
      if (invalid !== null) {
        return { success: false, message: invalid, code: EXECUTION_RESULT_CODE.InvalidOptions, stage: this.ctx.stage };
      }
      let res: AnyExecutionResult;
      switch (this.ctx.task) {
        case TASK.Extract:
          res = await new ExtractHandler(this.ctx).run();
          break;
        case TASK.Translate:
          res = await new TranslateHandler(this.ctx).run();
          break;
        case TASK.Apply:
          res = await new ApplyHandler(this.ctx).run();
          break;
        case TASK.Restore:
          res = await new RestoreHandler(this.ctx).run();
          break;
        case TASK.ListBackups:
          res = await new ListBackupsHandler(this.ctx).run();
          break;
        case TASK.Status:
          res = await new StatusHandler(this.ctx).run();
          break;
        default:
          return { success: false, message: t("pipeline.unknownTask", String(this.ctx.task)), code: EXECUTION_RESULT_CODE.InvalidOptions };
      }
      return { ...res, stage: this.ctx.stage };
    } catch (e: unknown) {
      const abortedAt = this.ctx.stage;
      this.ctx.stage = PIPELINE_STAGE.Aborted;
      const code = isBundleError(e) ? ERROR_CODE_MAP[e.kind] : EXECUTION_RESULT_CODE.UnknownError;
      return { success: false, message: t("common.progress.error", abortedAt, getErrorMessage(e, t("common.unknownError"))), code, stage: this.ctx.stage };
    } finally {
      this.ctx.isVacant = true;
    }
  }

  public getPublicContext(): BundleContextPublic {
    return {
      task: this.ctx.task,
      bundlePath: this.ctx.bundlePath,
      targetLang: this.ctx.targetLang,
      langs: [...this.ctx.langs],
      skipBackup: this.ctx.skipBackup,
      pruneStore: this.ctx.pruneStore,
      backupPath: this.ctx.backupPath,
      restoreTarget: this.ctx.restoreTarget,
      storeDir: this.ctx.storeDir,
      backupDir: this.ctx.backupDir,
      stringsFile: this.ctx.stringsFile,
      extraPropertyNames: [...this.ctx.extraPropertyNames],
      strictNoiseFilter: this.ctx.strictNoiseFilter,
      minKeyLength: this.ctx.minKeyLength,
      stage: this.ctx.stage
    };
  }

  private resetRunState() {
    this.ctx.stage = PIPELINE_STAGE.Idle;
    this.ctx.source = null;
    this.ctx.candidates = [];
    this.ctx.translations = {};
  }

  private validate(): string | null {
    if (TASKS_NEEDING_BUNDLE.has(this.ctx.task) && this.ctx.bundlePath === "") {
      return t("pipeline.missingBundlePath", this.ctx.task);
    }
    if ((this.ctx.task === TASK.Translate || this.ctx.task === TASK.Extract || this.ctx.task === TASK.Apply) && this.ctx.targetLang === "") {
      return t("pipeline.missingTargetLang");
    }
    if (!Number.isInteger(this.ctx.minKeyLength) || this.ctx.minKeyLength < 1) {
      return t("pipeline.invalidMinKeyLength", this.ctx.minKeyLength);
    }
    return null;
  }
}
