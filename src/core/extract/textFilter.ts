export const MIN_LITERAL_LENGTH = 2;
export const MAX_LITERAL_LENGTH = 500;

const LONE_PUNCTUATION = new Set([",", ".", ":", ";"]);

const EXCLUDE_PATTERNS = [
  /^[0-9]+$/, // 纯数字
  /^[a-zA-Z0-9]{1,3}$/, // 1-3 位字母数字
  /^https?:\/\//, // URL
  /^www\./, // URL
  /^[a-zA-Z0-9._%+-]+@[a-zA-Z0-9.-]+\.[a-zA-Z]{2,}$/, // 邮箱
  /^[a-zA-Z0-9_\-/\\]+$/ // 路径、文件名、标识符
];

function isCodeLikeSnippet(text: string) {
  const trimmed = text.trim();
  if ([...trimmed].every(char => "()[]{}<>;,:|&^~`".includes(char))) return true;
  if (/^(?:=>|==?=?|!=?=?|&&|\|\||\+\+|--)$/.test(trimmed)) return true;
  if (/^(?:import|export|function|return|const|let|var)\b/.test(trimmed)) return true;
  if (/^[\w$]+\([^)]*\)$/.test(trimmed) && !/\s/.test(trimmed)) return true;
  return false;
}

/**
 * 额外的噪声判断：CSS 值、转义序列、常量名等在界面上不可见的文本。
 */
export function isMachineLikeText(text: string) {
  if (/^(?:mailto:|tel:|data:)\S+$/i.test(text)) return true;
  if (/^[A-Za-z]:\\/.test(text)) return true;
  if (/^[A-Z_][A-Z0-9_]{2,}$/.test(text)) return true;
  if (/^\$\{?[\w.]+\}?$/.test(text)) return true;
  if (/^<\/?[a-z][^>]*>$/i.test(text)) return true;
  if (/^&[a-zA-Z]+;$/.test(text)) return true;
  if (/^#(?:[\da-fA-F]{3}|[\da-fA-F]{4}|[\da-fA-F]{6}|[\da-fA-F]{8})$/.test(text)) return true;
  if (/^(?:rgb|rgba|hsl|hsla)\s*\([^)]*\)$/i.test(text)) return true;
  if (/^var\(--[\w-]+\)$/i.test(text)) return true;
  if (/^-?\d+(?:\.\d+)?(?:px|r?em|vh|vw|vmin|vmax|%)$/i.test(text)) return true;
  if (/^\d+(?:\.\d+)?$/.test(text)) return true;
  if (/^\[object\s+[A-Za-z][\w$]*\]$/i.test(text)) return true;
  if (/^(?:undefined|null|true|false|NaN|Infinity)$/i.test(text)) return true;
  if (/^\*?\.[a-z0-9]+$/i.test(text)) return true;
  if (/^[-\w]+(?:\.[-\w]+)+$/.test(text) && !/\s/.test(text) && !/[A-Z]/.test(text)) return true;
  if (/^(?:\\[nrtbfv0'"\\])+$/i.test(text)) return true;
  if (/^\\u[\da-fA-F]{4}$/i.test(text)) return true;
  if (/^\\x[\da-fA-F]{2}$/i.test(text)) return true;
  return isCodeLikeSnippet(text);
}

/**
 * 判断一个字面量是否应被剔除。strict 为 true 时附加 isMachineLikeText 的规则。
 */
export function isNoiseLiteral(text: string, strict = false) {
  if (LONE_PUNCTUATION.has(text.trim())) return true;
  if (text.length < MIN_LITERAL_LENGTH || text.length > MAX_LITERAL_LENGTH) return true;
  if (EXCLUDE_PATTERNS.some(pattern => pattern.test(text))) return true;
  return strict && isMachineLikeText(text);
}
