import ko from "../data/fallback/ko.json";
import ja from "../data/fallback/ja.json";
import { TranslateResult, TranslationMap, Translator } from "../types";

export const SAMPLE_DICTIONARIES: Record<string, TranslationMap> = {
  ko,
  ja
};

export function normalizeLang(lang: string): string {
  return lang.trim().toLowerCase().split(/[-_]/)[0];
}

/**
 * 无可用服务时使用的静态示例词典。未命中的条目原样返回并记入 missed。
 */
export class FallbackTranslator implements Translator {
  readonly kind = "fallback";

  constructor(private readonly dictionaries: Record<string, TranslationMap> = SAMPLE_DICTIONARIES) {}

  public translate(sourceTextList: string[], target: string): Promise<TranslateResult> {
    const dict = this.dictionaries[normalizeLang(target)] ?? {};
    const data: string[] = [];
    const missed: number[] = [];
    sourceTextList.forEach((text, index) => {
      const hit = Object.hasOwn(dict, text) ? dict[text] : "";
      if (hit === "") {
        missed.push(index);
        data.push(text);
      } else {
        data.push(hit);
      }
    });
    return Promise.resolve({ success: true, data, missed, failedChunks: 0, api: this.kind });
  }
}
