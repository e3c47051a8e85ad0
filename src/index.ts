export * from "./types";
export { BundleLocalizer } from "./core/BundleLocalizer";
export { extractLiterals, UI_PROPERTY_NAMES } from "./core/extract/literalExtractor";
export { isNoiseLiteral, MIN_LITERAL_LENGTH, MAX_LITERAL_LENGTH } from "./core/extract/textFilter";
export { saveExtractedStrings, loadExtractedStrings } from "./core/extract/stringsFile";
export { readBundle, writeBundle, decodeBundle } from "./core/bundle/bundleFile";
export {
  loadStore,
  saveStore,
  diffUntranslated,
  mergeTranslations,
  seedPending,
  summarizeStore,
  storePathFor
} from "./core/store/translationStore";
export { applyTranslations, escapeForQuote, DEFAULT_MIN_KEY_LENGTH } from "./core/substitute/substitutionEngine";
export { BackupManager } from "./core/backup/backupManager";
export { locateBundle } from "./core/locate/bundleLocator";
export type { PathCache } from "./core/locate/pathCache";
export { JsonPathCache, MemoryPathCache } from "./core/locate/pathCache";
export { createTranslator, probeTranslator, SUPPORTED_LANGUAGES, isSupportedLanguage, DeepLTranslator, FallbackTranslator } from "./translator";
export { BundleError, ERROR_KIND, isBundleError } from "./utils/errors";
export type { ErrorKind } from "./utils/errors";
export { NotificationManager } from "./utils/notification";
export { loadConfigFile, setConfigTree, getConfig } from "./utils/config";
