import { SubstitutionResult, TranslationMap } from "../../types";

export const DEFAULT_MIN_KEY_LENGTH = 3;

const QUOTES = ['"', "'"] as const;

type QuoteChar = (typeof QUOTES)[number];

export interface SubstituteOptions {
  minKeyLength?: number;
  /** 目标文件只能容纳 latin1 时，把 U+00FF 以上的字符写成 \uXXXX 转义 */
  escapeNonLatin1?: boolean;
}

export interface SubstituteOutput {
  text: string;
  result: SubstitutionResult;
}

function escapeRegExp(str: string) {
  return str.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

function toUnicodeEscape(char: string): string {
  return `\\u${char.charCodeAt(0).toString(16).padStart(4, "0")}`;
}

/**
 * 让译文能安全地放进指定引号的字面量中。已有的转义序列原样保留。
 * escapeNonLatin1 为 true 时按 UTF-16 码元逐个转义，代理对会得到两个 \uXXXX。
 */
export function escapeForQuote(text: string, quote: QuoteChar, escapeNonLatin1 = false): string {
  const isWide = (char: string) => escapeNonLatin1 && char.charCodeAt(0) > 0xff;
  let out = "";
  for (let i = 0; i < text.length; i++) {
    const char = text[i];
    if (char === "\\") {
      const next = text[i + 1];
      if (next === undefined) {
        out += "\\\\";
      } else {
        // \한 与 한 等价
        out += isWide(next) ? toUnicodeEscape(next) : `\\${next}`;
      }
      i++;
    } else if (isWide(char)) {
      out += toUnicodeEscape(char);
    } else if (char === quote) {
      out += `\\${quote}`;
    } else if (char === "\n") {
      out += "\\n";
    } else if (char === "\r") {
      out += "\\r";
    } else {
      out += char;
    }
  }
  return out;
}

/**
 * 参与替换的条目：译文非空且不同于原文、键长不小于 minKeyLength，按键长降序，等长时按键排序。
 */
export function getSubstitutionOrder(map: TranslationMap, minKeyLength = DEFAULT_MIN_KEY_LENGTH): [string, string][] {
  return Object.entries(map)
    .filter(([key, value]) => value !== "" && value !== key && key.length >= minKeyLength)
    .sort(([a], [b]) => b.length - a.length || (a < b ? -1 : a > b ? 1 : 0));
}

/**
 * 把文本中 "key" 或 'key' 形式的完整字面量替换为同种引号包裹的译文。
 * 前面有奇数个连续反斜杠的引号属于另一个字面量内部，不作为边界。
 */
export function applyTranslations(text: string, map: TranslationMap, options: SubstituteOptions = {}): SubstituteOutput {
  const entries = getSubstitutionOrder(map, options.minKeyLength ?? DEFAULT_MIN_KEY_LENGTH);
  let output = text;
  let appliedKeys = 0;
  let replacedOccurrences = 0;

  for (const [key, value] of entries) {
    let count = 0;
    for (const quote of QUOTES) {
      const quoted = `${quote}${key}${quote}`;
      if (!output.includes(quoted)) continue;
      const pattern = new RegExp(`(\\\\*)${escapeRegExp(quoted)}`, "g");
      const replacement = `${quote}${escapeForQuote(value, quote, options.escapeNonLatin1)}${quote}`;
      output = output.replace(pattern, (match: string, slashes: string) => {
        if (slashes.length % 2 === 1) return match;
        count++;
        return slashes + replacement;
      });
    }
    if (count > 0) {
      appliedKeys++;
      replacedOccurrences += count;
    }
  }

  return { text: output, result: { appliedKeys, replacedOccurrences } };
}
