import axios, { AxiosError } from "axios";
import { batchTranslate } from "./utils/batchTranslate";
import { DEEPL_VERSION, DeeplVersion, MAX_CHUNK_SIZE, SendResult, TranslateResult, Translator } from "../types";
import { getProxyAgent } from "../utils/proxy";

const freeUrl = "https://api-free.deepl.com/v2/translate";
const proUrl = "https://api.deepl.com/v2/translate";

// DeepL 对部分目标语言要求带地区
const TARGET_LANG_MAP: Record<string, string> = {
  en: "EN-US",
  pt: "PT-PT"
};

interface TranslationResponse {
  message?: string;
  translations?: { detected_source_language?: string; text: string }[];
}

export interface DeepLOptions {
  apiKey: string;
  sourceLang?: string;
  version?: DeeplVersion;
  chunkSize?: number;
  interval?: number;
  timeoutSec?: number;
}

export function toDeeplTargetCode(lang: string): string {
  const normalized = lang.trim().replace(/_/g, "-");
  const base = normalized.split("-")[0].toLowerCase();
  if (normalized.includes("-")) return normalized.toUpperCase();
  return TARGET_LANG_MAP[base] ?? base.toUpperCase();
}

export function toDeeplSourceCode(lang: string): string {
  return lang.trim().split(/[-_]/)[0].toUpperCase();
}

export function resolveDeeplUrl(apiKey: string, version: DeeplVersion = DEEPL_VERSION.auto): string {
  if (version === DEEPL_VERSION.pro) return proUrl;
  if (version === DEEPL_VERSION.free) return freeUrl;
  return apiKey.trim().endsWith(":fx") ? freeUrl : proUrl;
}

export class DeepLTranslator implements Translator {
  readonly kind = "deepl";
  private readonly url: string;

  constructor(private readonly options: DeepLOptions) {
    this.url = resolveDeeplUrl(options.apiKey, options.version);
  }

  public async translate(sourceTextList: string[], target: string): Promise<TranslateResult> {
    const res = await batchTranslate(
      target,
      sourceTextList,
      { chunkSize: this.options.chunkSize ?? MAX_CHUNK_SIZE, interval: this.options.interval ?? 0 },
      (lang, texts) => this.send(lang, texts)
    );
    res.api = this.kind;
    return res;
  }

  private async send(target: string, texts: string[]): Promise<SendResult> {
    try {
      const params = new URLSearchParams({ target_lang: toDeeplTargetCode(target) });
      if (this.options.sourceLang !== undefined && this.options.sourceLang !== "") {
        params.append("source_lang", toDeeplSourceCode(this.options.sourceLang));
      }
      // 添加多个文本参数
      texts.forEach(text => params.append("text", text));
      const httpsAgent = getProxyAgent();
      const { data } = await axios.post<TranslationResponse>(this.url, params, {
        headers: {
          Authorization: `DeepL-Auth-Key ${this.options.apiKey}`,
          "Content-Type": "application/x-www-form-urlencoded"
        },
        timeout: (this.options.timeoutSec ?? 30) * 1000,
        ...(httpsAgent ? { httpsAgent, proxy: false as const } : {})
      });

      const translations = data.translations ?? [];
      const transformed = translations.map((item, index) => (item.text.trim() === "" ? texts[index] : item.text));
      return { success: true, data: transformed };
    } catch (e: unknown) {
      let message = "Unknown error";
      if (e instanceof AxiosError) {
        const body: unknown = e.response?.data;
        message =
          typeof body === "object" && body !== null && "message" in body && typeof body.message === "string" ? body.message : e.message;
      } else if (e instanceof Error) {
        message = e.message;
      } else if (typeof e === "string") {
        message = e;
      }
      return { success: false, message };
    }
  }
}
