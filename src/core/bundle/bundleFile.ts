import * as fs from "fs/promises";
import { SourceText } from "../../types";
import { BundleError, ERROR_KIND, getErrorMessage, isNodeError } from "../../utils/errors";
import { writeFileAtomic } from "../../utils/fs";
import { NotificationManager } from "../../utils/notification";
import { t } from "../../utils/i18n";

export function decodeBundle(buffer: Buffer, filePath = ""): SourceText {
  try {
    const text = new TextDecoder("utf-8", { fatal: true, ignoreBOM: true }).decode(buffer);
    return { text, encoding: "utf-8" };
  } catch (utf8Error) {
    NotificationManager.showWarning(t("bundle.decodeFallback", filePath, getErrorMessage(utf8Error)));
    const text = buffer.toString("latin1");
    if (text.includes("\u0000")) {
      throw new BundleError(ERROR_KIND.DecodeError, t("bundle.decodeFailed", filePath, getErrorMessage(utf8Error)), filePath, {
        cause: utf8Error
      });
    }
    return { text, encoding: "latin1" };
  }
}

export async function readBundle(filePath: string): Promise<SourceText> {
  let buffer: Buffer;
  try {
    buffer = await fs.readFile(filePath);
  } catch (e) {
    if (isNodeError(e, "ENOENT") || isNodeError(e, "EISDIR")) {
      throw new BundleError(ERROR_KIND.PathNotFound, t("bundle.notFound", filePath), filePath, { cause: e });
    }
    throw e;
  }
  return decodeBundle(buffer, filePath);
}

/**
 * 按读取时的编码写回。latin1 无法表示的字符会在落盘前报错，原文件不受影响。
 */
export async function writeBundle(filePath: string, source: SourceText): Promise<void> {
  if (source.encoding === "latin1" && /[^\u0000-\u00ff]/.test(source.text)) {
    throw new BundleError(ERROR_KIND.WriteError, t("bundle.unencodable", filePath), filePath);
  }
  try {
    await writeFileAtomic(filePath, Buffer.from(source.text, source.encoding === "latin1" ? "latin1" : "utf8"));
  } catch (e) {
    throw new BundleError(ERROR_KIND.WriteError, t("bundle.writeFailed", filePath, getErrorMessage(e)), filePath, { cause: e });
  }
}
