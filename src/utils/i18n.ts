import en from "../locales/en.json";
import ko from "../locales/ko.json";
import { getCacheConfig } from "./config";

const locales: Record<string, Record<string, string>> = {
  en,
  ko
};

function format(str: string, args: unknown[]): string {
  return str.replace(/{(\d+)}/g, (_, index) => {
    const i = Number(index);
    const val = args[i];
    if (val === undefined || val === null) return `{${i}}`;
    // 安全类型处理
    if (typeof val === "string" || typeof val === "number" || typeof val === "boolean") {
      return String(val);
    }
    // 对象/数组等类型，转换成 JSON
    try {
      return JSON.stringify(val);
    } catch {
      return `{${i}}`;
    }
  });
}

export function resolveDisplayLang(): string {
  const configured = getCacheConfig<string>("general.displayLanguage", "");
  const raw = configured || process.env.LC_ALL || process.env.LANG || "en";
  const code = raw.toLowerCase().split(/[-_.]/)[0];
  return Object.hasOwn(locales, code) ? code : "en";
}

export function t(key: string, ...args: unknown[]): string {
  const messages = locales[resolveDisplayLang()] ?? locales["en"]; // 默认回退到英文
  const template = messages[key] ?? locales["en"][key] ?? key;
  return format(template, args);
}
