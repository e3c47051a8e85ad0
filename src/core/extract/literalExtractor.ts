import { isNoiseLiteral } from "./textFilter";

/** 常见的承载界面文案的属性名 */
export const UI_PROPERTY_NAMES = [
  "label",
  "categoryLabel",
  "placeholder",
  "detail",
  "title",
  "message",
  "buttonLabel",
  "failureMessage",
  "successMessage",
  "value",
  "aria-label",
  "name",
  "description",
  "children",
  "text",
  "tooltip"
];

export interface ExtractOptions {
  extraPropertyNames?: string[];
  strict?: boolean;
}

type QuoteChar = '"' | "'";

function escapeRegExp(str: string) {
  return str.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

// 字面量主体：不跨行、不含反斜杠与同类引号
function body(quote: QuoteChar) {
  return `([^${quote}\\\\\\n]+)`;
}

function buildPatterns(propertyNames: string[]): RegExp[] {
  const names = [...new Set(propertyNames)].map(escapeRegExp).join("|");
  const patterns: RegExp[] = [];
  for (const quote of ['"', "'"] as const) {
    // label:"Open File" / "label": 'Open File'
    patterns.push(new RegExp(`(?<![\\w$-])["']?(?:${names})["']?\\s*:\\s*${quote}${body(quote)}${quote}`, "g"));
    // return "Auto-scroll to bottom"
    patterns.push(new RegExp(`\\breturn\\s*${quote}${body(quote)}${quote}`, "g"));
    // children:()=>"Settings"
    patterns.push(new RegExp(`\\b\\w+:\\s*\\(\\)\\s*=>\\s*${quote}${body(quote)}${quote}`, "g"));
    // 以大写字母开头、以句号结尾的句子
    patterns.push(new RegExp(`${quote}((?:[A-Z][^${quote}\\\\.\\n]+\\.)+)${quote}`, "g"));
  }
  return patterns;
}

/**
 * 从打包后的脚本文本中启发式地提取可翻译的字符串字面量。
 * 不解析语法，只按字面量边界扫描，召回率有限。
 * 结果去重并按码元顺序排序。
 */
export function extractLiterals(content: string, options: ExtractOptions = {}): string[] {
  const patterns = buildPatterns([...UI_PROPERTY_NAMES, ...(options.extraPropertyNames ?? [])]);
  const found = new Set<string>();
  for (const pattern of patterns) {
    for (const match of content.matchAll(pattern)) {
      const text = match[match.length - 1];
      if (text !== undefined) found.add(text);
    }
  }
  return [...found].filter(text => !isNoiseLiteral(text, options.strict ?? false)).sort();
}
