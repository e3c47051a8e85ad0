import fs from "fs";
import path from "path";
import JSON5 from "json5";
import { CONFIG_FILE_NAME, ConfigTree } from "../types";

let loadedConfig: ConfigTree = {};
const cachedConfig: Record<string, unknown> = {};

function isPlainObject(value: unknown): value is ConfigTree {
  return Object.prototype.toString.call(value) === "[object Object]";
}

function lookup(tree: ConfigTree, key: string): unknown {
  if (Object.hasOwn(tree, key)) return tree[key];
  let current: unknown = tree;
  for (const seg of key.split(".")) {
    if (!isPlainObject(current) || !Object.hasOwn(current, seg)) return undefined;
    current = current[seg];
  }
  return current;
}

/**
 * 读取 JSON5 配置文件并替换当前配置。文件不存在时返回 false 并保留空配置。
 */
export function loadConfigFile(filePath: string = path.join(process.cwd(), CONFIG_FILE_NAME)): boolean {
  clearConfigCache("");
  if (!fs.existsSync(filePath)) {
    loadedConfig = {};
    return false;
  }
  const parsed: unknown = JSON5.parse(fs.readFileSync(filePath, "utf8"));
  if (!isPlainObject(parsed)) {
    throw new Error(`Config file must contain an object: ${filePath}`);
  }
  loadedConfig = parsed;
  return true;
}

export function setConfigTree(tree: ConfigTree) {
  clearConfigCache("");
  loadedConfig = tree;
}

export function getConfig<T>(key: string, defaultValue: T): T {
  const value = lookup(loadedConfig, key);
  if (value === undefined || value === null) return defaultValue;
  if (typeof value !== typeof defaultValue) return defaultValue;
  if (Array.isArray(defaultValue) !== Array.isArray(value)) return defaultValue;
  return value as T;
}

export function getCacheConfig<T>(key: string, defaultValue: T): T {
  if (!Object.hasOwn(cachedConfig, key)) {
    cachedConfig[key] = getConfig<T>(key, defaultValue);
  }
  return cachedConfig[key] as T;
}

export function setCacheConfig(key: string, value: unknown) {
  cachedConfig[key] = value;
}

export function clearConfigCache(key: string) {
  if (Object.hasOwn(cachedConfig, key)) {
    delete cachedConfig[key];
  } else {
    for (const k in cachedConfig) {
      if (k.startsWith(key)) {
        delete cachedConfig[k];
      }
    }
  }
}

/**
 * 凭据优先取配置，其次取环境变量 DEEPL_API_KEY；都没有时返回空串。
 */
export function resolveApiKey(explicit?: string): string {
  if (explicit !== undefined && explicit.trim() !== "") return explicit.trim();
  const configured = getCacheConfig<string>("translationServices.deeplApiKey", "");
  if (configured.trim() !== "") return configured.trim();
  return (process.env.DEEPL_API_KEY ?? "").trim();
}
