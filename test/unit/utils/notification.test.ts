import * as assert from "assert";
import { NotificationManager } from "@/utils/notification";
import { EXECUTION_RESULT_CODE } from "@/types";

describe("utils/notification", () => {
  let lines: string[];

  beforeEach(() => {
    lines = [];
    NotificationManager.init({ write: chunk => lines.push(chunk) });
  });

  afterEach(() => {
    NotificationManager.init(null);
  });

  it("连续相同的进度信息只输出一次", () => {
    NotificationManager.showProgress({ message: "Stage: extracting" });
    NotificationManager.showProgress({ message: "Stage: extracting" });
    NotificationManager.showProgress({ message: "Stage: diffing" });
    assert.strictEqual(lines.length, 2);
    assert.ok(lines[0].endsWith("] ⏳Stage: extracting\n"));
  });

  it("showResult 按结果码选择级别", () => {
    NotificationManager.showResult({ success: true, message: "done", code: EXECUTION_RESULT_CODE.Success });
    NotificationManager.showResult({ success: true, message: "partial", code: EXECUTION_RESULT_CODE.TranslatorPartialFailed });
    NotificationManager.showResult({ success: false, message: "", code: EXECUTION_RESULT_CODE.WriteFailed, defaultErrorMessage: "failed" });
    assert.ok(lines[0].endsWith("] ✅bundle-l10n done\n"));
    assert.ok(lines[1].endsWith("] ⚠️bundle-l10n partial\n"));
    assert.ok(lines[2].endsWith("] ❌bundle-l10n failed\n"));
  });
});
