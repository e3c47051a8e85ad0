export const DEEPL_VERSION = {
  auto: "auto",
  free: "free",
  pro: "pro"
} as const;

export type DeeplVersion = (typeof DEEPL_VERSION)[keyof typeof DEEPL_VERSION];

export type ProxyProtocol = "http" | "https";

export const MAX_CHUNK_SIZE = 50;

export const CONFIG_FILE_NAME = "bundle-l10n.config.json5";

export const DEFAULT_WORKSPACE_DIR = ".bundle-l10n";

export type ConfigTree = { [key: string]: unknown };
