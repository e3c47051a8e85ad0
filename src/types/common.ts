export type EntryKey = string;
export type EntryValue = string;

export type TranslationMap = Record<EntryKey, EntryValue>;

export type TextEncodingName = "utf-8" | "latin1";

export interface SourceText {
  text: string;
  encoding: TextEncodingName;
}

export const STORE_LOAD_STATUS = {
  Ok: "ok",
  Missing: "missing",
  Corrupt: "corrupt"
} as const;

export type StoreLoadStatus = (typeof STORE_LOAD_STATUS)[keyof typeof STORE_LOAD_STATUS];

export interface StoreLoadResult {
  map: TranslationMap;
  status: StoreLoadStatus;
  message?: string;
}

export interface MergeResult {
  map: TranslationMap;
  changed: number;
}

export interface SeedResult {
  map: TranslationMap;
  added: number;
  pruned: number;
}

export interface StoreSummary {
  total: number;
  translated: number;
  pending: number;
}

export interface SubstitutionResult {
  appliedKeys: number;
  replacedOccurrences: number;
}

export interface BackupRecord {
  originalPath: string;
  backupPath: string;
  createdAt: Date;
  size: number;
  sha256: string;
}
