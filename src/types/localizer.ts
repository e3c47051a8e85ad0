import type { BackupRecord, StoreSummary, SubstitutionResult } from "./common";
import type { Translator } from "./translator";

export const TASK = {
  Extract: "extract",
  Translate: "translate",
  Apply: "apply",
  Restore: "restore",
  ListBackups: "list-backups",
  Status: "status"
} as const;

export type Task = (typeof TASK)[keyof typeof TASK];

export const PIPELINE_STAGE = {
  Idle: "idle",
  Extracting: "extracting",
  Diffing: "diffing",
  Translating: "translating",
  Merging: "merging",
  BackingUp: "backingUp",
  Substituting: "substituting",
  Writing: "writing",
  Done: "done",
  Aborted: "aborted"
} as const;

export type PipelineStage = (typeof PIPELINE_STAGE)[keyof typeof PIPELINE_STAGE];

export interface BundleLocalizerOptions {
  task?: Task;
  bundlePath?: string;
  targetLang?: string;
  langs?: string[];
  apiKey?: string;
  skipBackup?: boolean;
  pruneStore?: boolean;
  backupPath?: string;
  restoreTarget?: string;
  storeDir?: string;
  backupDir?: string;
  stringsFile?: string;
  extraPropertyNames?: string[];
  strictNoiseFilter?: boolean;
  minKeyLength?: number;
  translator?: Translator | null;
}

export const EXECUTION_RESULT_CODE = {
  NoUntranslatedEntries: 101,
  NoApplicableTranslations: 102,
  NoBackups: 103,
  Success: 200,
  Processing: 301,
  BundleNotFound: 302,
  TranslatorPartialFailed: 303,
  StoreCorruptRecovered: 304,
  NoStringsExtracted: 305,
  UnknownError: 400,
  DecodeFailed: 401,
  BackupFailed: 402,
  WriteFailed: 403,
  RestoreFailed: 404,
  NoBackupFound: 405,
  InvalidOptions: 420
} as const;

export type ExecutionResultCode = (typeof EXECUTION_RESULT_CODE)[keyof typeof EXECUTION_RESULT_CODE];

export interface ExecutionResult {
  success: boolean;
  message: string;
  code: ExecutionResultCode;
  stage?: PipelineStage;
  defaultSuccessMessage?: string;
  defaultErrorMessage?: string;
}

export interface ExtractExecutionResult extends ExecutionResult {
  data?: {
    extracted: number;
    added: number;
    pruned: number;
    stringsFile: string;
    storePath: string;
  };
}

export interface TranslateExecutionResult extends ExecutionResult {
  data?: {
    extracted: number;
    requested: number;
    translated: number;
    failedChunks: number;
    changed: number;
    substitution: SubstitutionResult;
    backup: BackupRecord | null;
    storePath: string;
  };
}

export interface ApplyExecutionResult extends ExecutionResult {
  data?: {
    substitution: SubstitutionResult;
    backup: BackupRecord | null;
  };
}

export interface BackupExecutionResult extends ExecutionResult {
  data?: {
    records: BackupRecord[];
  };
}

export interface StatusExecutionResult extends ExecutionResult {
  data?: {
    byLang: Record<string, StoreSummary & { exists: boolean }>;
  };
}

export type AnyExecutionResult =
  | ExecutionResult
  | ExtractExecutionResult
  | TranslateExecutionResult
  | ApplyExecutionResult
  | BackupExecutionResult
  | StatusExecutionResult;
