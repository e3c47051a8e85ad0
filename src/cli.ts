#!/usr/bin/env node
import path from "path";
import * as dotenv from "dotenv";
import { Command } from "commander";
import { BundleLocalizer } from "./core/BundleLocalizer";
import { JsonPathCache } from "./core/locate/pathCache";
import { DEFAULT_BUNDLE_FILE_NAME, DEFAULT_MAX_DEPTH, locateBundle } from "./core/locate/bundleLocator";
import { isSupportedLanguage, SUPPORTED_LANGUAGES } from "./translator";
import { AnyExecutionResult, BundleLocalizerOptions, CONFIG_FILE_NAME, DEFAULT_WORKSPACE_DIR, TASK } from "./types";
import { getCacheConfig, loadConfigFile } from "./utils/config";
import { getErrorMessage } from "./utils/errors";
import { toAbsolutePath } from "./utils/fs";
import { t } from "./utils/i18n";
import { NotificationManager } from "./utils/notification";

dotenv.config();

interface GlobalOptions {
  config?: string;
  quiet?: boolean;
  storeDir?: string;
  backupDir?: string;
}

interface TranslateCliOptions {
  lang?: string;
  apiKey?: string;
  backup: boolean;
  prune?: boolean;
}

const program = new Command();

program
  .name("bundle-l10n")
  .description(t("cli.description"))
  .version("0.3.0")
  .option("-c, --config <file>", t("cli.option.config"), CONFIG_FILE_NAME)
  .option("--store-dir <dir>", t("cli.option.storeDir"))
  .option("--backup-dir <dir>", t("cli.option.backupDir"))
  .option("-q, --quiet", t("cli.option.quiet"));

program.hook("preAction", () => {
  const opts = program.opts<GlobalOptions>();
  if (opts.quiet === true) NotificationManager.init(null);
  loadConfigFile(toAbsolutePath(opts.config ?? CONFIG_FILE_NAME));
});

function globalPaths(): BundleLocalizerOptions {
  const opts = program.opts<GlobalOptions>();
  return { storeDir: opts.storeDir, backupDir: opts.backupDir };
}

function checkLang(lang: string | undefined) {
  if (lang !== undefined && !isSupportedLanguage(lang)) {
    NotificationManager.showWarning(t("cli.unsupportedLang", lang, Object.keys(SUPPORTED_LANGUAGES).join(", ")));
  }
}

async function run(options: BundleLocalizerOptions): Promise<AnyExecutionResult> {
  const localizer = new BundleLocalizer({ ...globalPaths(), ...options });
  NotificationManager.showTitle(t("cli.title", options.task ?? TASK.Translate));
  const res = await localizer.execute();
  NotificationManager.showResult(res);
  if (!res.success) process.exitCode = 1;
  return res;
}

program
  .command("extract")
  .description(t("cli.command.extract"))
  .argument("<bundle>", t("cli.argument.bundle"))
  .option("-l, --lang <code>", t("cli.option.lang"))
  .option("--strings-file <file>", t("cli.option.stringsFile"))
  .option("--prune", t("cli.option.prune"))
  .option("--strict", t("cli.option.strict"))
  .action(async (bundle: string, opts: { lang?: string; stringsFile?: string; prune?: boolean; strict?: boolean }) => {
    await run({
      task: TASK.Extract,
      bundlePath: bundle,
      targetLang: opts.lang,
      stringsFile: opts.stringsFile,
      pruneStore: opts.prune,
      strictNoiseFilter: opts.strict
    });
  });

program
  .command("translate")
  .description(t("cli.command.translate"))
  .argument("<bundle>", t("cli.argument.bundle"))
  .option("-l, --lang <code>", t("cli.option.lang"))
  .option("-k, --api-key <key>", t("cli.option.apiKey"))
  .option("--no-backup", t("cli.option.noBackup"))
  .option("--prune", t("cli.option.prune"))
  .action(async (bundle: string, opts: TranslateCliOptions) => {
    checkLang(opts.lang);
    await run({
      task: TASK.Translate,
      bundlePath: bundle,
      targetLang: opts.lang,
      apiKey: opts.apiKey,
      skipBackup: !opts.backup,
      pruneStore: opts.prune
    });
  });

program
  .command("apply")
  .description(t("cli.command.apply"))
  .argument("<bundle>", t("cli.argument.bundle"))
  .option("-l, --lang <code>", t("cli.option.lang"))
  .option("--no-backup", t("cli.option.noBackup"))
  .action(async (bundle: string, opts: { lang?: string; backup: boolean }) => {
    await run({ task: TASK.Apply, bundlePath: bundle, targetLang: opts.lang, skipBackup: !opts.backup });
  });

program
  .command("restore")
  .description(t("cli.command.restore"))
  .argument("<bundle>", t("cli.argument.bundle"))
  .option("-b, --backup <file>", t("cli.option.backupFile"))
  .action(async (bundle: string, opts: { backup?: string }) => {
    await run({ task: TASK.Restore, bundlePath: bundle, backupPath: opts.backup });
  });

program
  .command("backups")
  .description(t("cli.command.backups"))
  .action(async () => {
    const res = await run({ task: TASK.ListBackups });
    if ("data" in res && res.data !== undefined && "records" in res.data) {
      for (const record of res.data.records) {
        process.stdout.write(`${record.createdAt.toISOString()}\t${record.size}\t${record.backupPath}\n`);
      }
    }
  });

program
  .command("status")
  .description(t("cli.command.status"))
  .option("--langs <codes>", t("cli.option.langs"))
  .action(async (opts: { langs?: string }) => {
    const langs = (opts.langs ?? "")
      .split(",")
      .map(lang => lang.trim().toLowerCase())
      .filter(Boolean);
    const res = await run({ task: TASK.Status, langs });
    if ("data" in res && res.data !== undefined && "byLang" in res.data) {
      for (const [lang, summary] of Object.entries(res.data.byLang)) {
        const state = summary.exists ? `${summary.translated}/${summary.total}` : "-";
        process.stdout.write(`${lang}\t${state}\t${SUPPORTED_LANGUAGES[lang] ?? ""}\n`);
      }
    }
  });

program
  .command("locate")
  .description(t("cli.command.locate"))
  .option("-r, --root <dir...>", t("cli.option.root"))
  .option("-n, --name <file>", t("cli.option.fileName"), DEFAULT_BUNDLE_FILE_NAME)
  .option("-d, --max-depth <n>", t("cli.option.maxDepth"), String(DEFAULT_MAX_DEPTH))
  .action(async (opts: { root?: string[]; name: string; maxDepth: string }) => {
    const roots = (opts.root ?? [process.cwd()]).map(root => toAbsolutePath(root));
    const cacheFile = getCacheConfig<string>("workspace.pathCacheFile", path.join(DEFAULT_WORKSPACE_DIR, "path_cache.json"));
    const found = await locateBundle({
      fileName: opts.name,
      roots,
      cache: new JsonPathCache(toAbsolutePath(cacheFile)),
      maxDepth: Number(opts.maxDepth)
    });
    if (found === null) {
      NotificationManager.showWarning(t("cli.locateMissed", opts.name, roots.join(", ")));
      process.exitCode = 1;
      return;
    }
    process.stdout.write(`${found}\n`);
  });

program
  .command("langs")
  .description(t("cli.command.langs"))
  .action(() => {
    for (const [code, name] of Object.entries(SUPPORTED_LANGUAGES)) {
      process.stdout.write(`${code}\t${name}\n`);
    }
  });

program.parseAsync(process.argv).catch((e: unknown) => {
  NotificationManager.showError(getErrorMessage(e, t("common.unknownError")));
  process.exitCode = 1;
});
