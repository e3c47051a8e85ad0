export type TranslatorKind = "deepl" | "fallback";

export interface TranslateResult {
  success: boolean;
  data: string[];
  /** Indices returned unchanged because no translation was obtained. */
  missed: number[];
  failedChunks: number;
  message?: string;
  api?: TranslatorKind;
}

export interface Translator {
  readonly kind: TranslatorKind;
  translate(sourceTextList: string[], target: string): Promise<TranslateResult>;
}

export interface ChunkOptions {
  chunkSize: number;
  interval: number;
}

export interface SendResult {
  success: boolean;
  data?: string[];
  message?: string;
}

export type SendFn = (target: string, texts: string[]) => Promise<SendResult>;
