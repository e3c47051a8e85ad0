import { DeepLTranslator } from "./deepl";
import { FallbackTranslator } from "./fallback";
import { DEEPL_VERSION, DeeplVersion, MAX_CHUNK_SIZE, Translator } from "../types";
import { getCacheConfig } from "../utils/config";
import { getErrorMessage } from "../utils/errors";
import { t } from "../utils/i18n";
import { NotificationManager } from "../utils/notification";

export { DeepLTranslator } from "./deepl";
export { FallbackTranslator } from "./fallback";
export { batchTranslate, splitIntoChunks } from "./utils/batchTranslate";

export const SUPPORTED_LANGUAGES: Record<string, string> = {
  ko: "Korean (한국어)",
  ja: "Japanese (日本語)",
  zh: "Chinese (中文)",
  fr: "French (Français)",
  de: "German (Deutsch)",
  es: "Spanish (Español)",
  it: "Italian (Italiano)",
  pt: "Portuguese (Português)",
  ru: "Russian (Русский)"
};

export function isSupportedLanguage(lang: string): boolean {
  return Object.hasOwn(SUPPORTED_LANGUAGES, lang);
}

const PROBE_TEXT = "Hello";
const PROBE_TARGET = "de";

export interface CreateTranslatorOptions {
  apiKey?: string;
  probe?: boolean;
  sourceLang?: string;
  version?: DeeplVersion;
  chunkSize?: number;
  interval?: number;
  timeoutSec?: number;
}

/**
 * 用一条短文本试探服务是否可用（凭据、网络、配额）。
 */
export async function probeTranslator(translator: Translator, target = PROBE_TARGET): Promise<boolean> {
  try {
    const res = await translator.translate([PROBE_TEXT], target);
    return res.success && res.failedChunks === 0 && res.missed.length === 0 && (res.data[0] ?? "").trim() !== "";
  } catch (e) {
    NotificationManager.showProgress({ message: t("translator.probeError", getErrorMessage(e)), type: "warn" });
    return false;
  }
}

/**
 * 有凭据时返回 DeepL 实现；试探失败则在本次运行中退化为示例词典实现。
 */
export async function createTranslator(options: CreateTranslatorOptions = {}): Promise<Translator> {
  const apiKey = (options.apiKey ?? "").trim();
  if (apiKey === "") {
    NotificationManager.showProgress({ message: t("translator.noApiKey"), type: "warn" });
    return new FallbackTranslator();
  }
  const translator = new DeepLTranslator({
    apiKey,
    sourceLang: options.sourceLang ?? getCacheConfig<string>("translationServices.sourceLanguage", "en"),
    version: options.version ?? getCacheConfig<DeeplVersion>("translationServices.deeplVersion", DEEPL_VERSION.auto),
    chunkSize: options.chunkSize ?? getCacheConfig<number>("translationServices.chunkSize", MAX_CHUNK_SIZE),
    interval: options.interval ?? getCacheConfig<number>("translationServices.interval", 0),
    timeoutSec: options.timeoutSec ?? getCacheConfig<number>("translationServices.timeoutSec", 30)
  });
  const probe = options.probe ?? getCacheConfig<boolean>("translationServices.probe", true);
  if (probe && !(await probeTranslator(translator))) {
    NotificationManager.showWarning(t("translator.degraded"));
    return new FallbackTranslator();
  }
  return translator;
}
