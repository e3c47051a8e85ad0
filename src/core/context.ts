import path from "path";
import { BundleContextInternal, DEFAULT_WORKSPACE_DIR, PIPELINE_STAGE, TASK } from "../types";
import { DEFAULT_MIN_KEY_LENGTH } from "./substitute/substitutionEngine";

export function createBundleContext(): BundleContextInternal {
  return {
    task: TASK.Translate,
    bundlePath: "",
    targetLang: "ko",
    langs: [],
    skipBackup: false,
    pruneStore: false,
    backupPath: "",
    restoreTarget: "",
    storeDir: DEFAULT_WORKSPACE_DIR,
    backupDir: path.join(DEFAULT_WORKSPACE_DIR, "backups"),
    stringsFile: path.join(DEFAULT_WORKSPACE_DIR, "extracted_strings.txt"),
    extraPropertyNames: [],
    strictNoiseFilter: false,
    minKeyLength: DEFAULT_MIN_KEY_LENGTH,
    stage: PIPELINE_STAGE.Idle,
    apiKey: "",
    translator: null,
    source: null,
    candidates: [],
    translations: {},
    isVacant: true
  };
}
