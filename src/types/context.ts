import type { Task, PipelineStage } from "./localizer";
import type { SourceText, TranslationMap } from "./common";
import type { Translator } from "./translator";

// Visible to callers through BundleLocalizer.getPublicContext()
export interface BundleContextPublic {
  task: Task;
  bundlePath: string;
  targetLang: string;
  langs: string[];
  skipBackup: boolean;
  pruneStore: boolean;
  backupPath: string;
  restoreTarget: string;
  storeDir: string;
  backupDir: string;
  stringsFile: string;
  extraPropertyNames: string[];
  strictNoiseFilter: boolean;
  minKeyLength: number;
  stage: PipelineStage;
}

export interface BundleContextInternal extends BundleContextPublic {
  apiKey: string;
  translator: Translator | null;
  source: SourceText | null;
  candidates: string[];
  translations: TranslationMap;
  isVacant: boolean;
}
