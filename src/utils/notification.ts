import { ExecutionResult } from "../types";

const PREFIX = "bundle-l10n ";

export interface OutputSink {
  write(chunk: string): unknown;
}

export type LogType = "success" | "warn" | "error" | "info";

/**
 * 终端信息通知管理器
 */
export class NotificationManager {
  private static output: OutputSink | null = process.stderr;
  private static lastProgress = "";

  // 指定输出位置，传 null 时静默
  static init(output: OutputSink | null = process.stderr) {
    this.output = output;
    this.lastProgress = "";
  }

  // 显示主标题
  static showTitle(title: string): void {
    const divider = "=".repeat(title.length + 4);
    this.appendLine(`\n${divider}`);
    this.appendLine(`  ${title}  `);
    this.appendLine(`${divider}\n`);
  }

  // 进度信息
  static showProgress(data: { message?: string; type?: LogType }): void {
    if (data.message !== undefined && data.message !== this.lastProgress) {
      this.lastProgress = data.message;
      this.logToOutput(data.message, data.type);
    }
  }

  static showResult(result: ExecutionResult): void {
    const typeNum = Math.floor(result.code / 100);
    switch (typeNum) {
      case 1:
      case 2:
        return this.showSuccess((result.message || result.defaultSuccessMessage) ?? "");
      case 3:
        return this.showWarning(result.message);
      case 4:
        return this.showError((result.message || result.defaultErrorMessage) ?? "");
      default:
        return this.showSuccess((result.message || result.defaultSuccessMessage) ?? "");
    }
  }

  static showSuccess(message: string): void {
    this.logToOutput(`${PREFIX}${message}`, "success");
  }

  static showError(message: string): void {
    this.logToOutput(`${PREFIX}${message}`, "error");
  }

  static showWarning(message: string): void {
    this.logToOutput(`${PREFIX}${message}`, "warn");
  }

  static logToOutput(message: string, type: LogType = "info"): void {
    const timestamp = new Date().toLocaleString();
    let prefix = "⏳";
    if (type === "error") {
      prefix = "❌";
    } else if (type === "warn") {
      prefix = "⚠️";
    } else if (type === "success") {
      prefix = "✅";
    }
    this.appendLine(`[${timestamp}] ${prefix}${message}`);
  }

  private static appendLine(line: string) {
    this.output?.write(`${line}\n`);
  }
}
