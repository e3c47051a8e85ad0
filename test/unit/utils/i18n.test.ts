import * as assert from "assert";
import { setConfigTree } from "@/utils/config";
import { resolveDisplayLang, t } from "@/utils/i18n";

describe("utils/i18n", () => {
  afterEach(() => {
    setConfigTree({});
  });

  it("按序号填充占位符", () => {
    assert.strictEqual(t("translator.chunkFailed", 2, 5, "timeout"), "Chunk 2/5 failed: timeout");
  });

  it("缺少参数时保留占位符，未知键返回键本身", () => {
    assert.strictEqual(t("bundle.notFound"), "Bundle not found: {0}");
    assert.strictEqual(t("no.such.key"), "no.such.key");
  });

  it("配置的显示语言优先", () => {
    setConfigTree({ general: { displayLanguage: "ko" } });
    assert.strictEqual(resolveDisplayLang(), "ko");
    assert.strictEqual(t("pipeline.stage", "done"), "단계: done");
    setConfigTree({ general: { displayLanguage: "xx" } });
    assert.strictEqual(resolveDisplayLang(), "en");
  });
});
