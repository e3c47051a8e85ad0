import * as assert from "assert";
import { FallbackTranslator, normalizeLang } from "@/translator/fallback";

describe("translator/fallback", () => {
  it("命中示例词典，未命中原样返回", async () => {
    const res = await new FallbackTranslator().translate(["Open File", "Unknown Thing", "Account"], "ko-KR");
    assert.deepStrictEqual(res.data, ["파일 열기", "Unknown Thing", "계정"]);
    assert.deepStrictEqual(res.missed, [1]);
    assert.strictEqual(res.success, true);
    assert.strictEqual(res.api, "fallback");
  });

  it("没有词典的语言全部透传", async () => {
    const res = await new FallbackTranslator().translate(["Open File"], "xx");
    assert.deepStrictEqual(res.data, ["Open File"]);
    assert.deepStrictEqual(res.missed, [0]);
  });

  it("支持自定义词典，空译文视为未命中", async () => {
    const translator = new FallbackTranslator({ fr: { Save: "Enregistrer", Close: "" } });
    const res = await translator.translate(["Save", "Close"], "fr");
    assert.deepStrictEqual(res.data, ["Enregistrer", "Close"]);
    assert.deepStrictEqual(res.missed, [1]);
  });

  it("normalizeLang 取主语言代码", () => {
    assert.strictEqual(normalizeLang(" ja_JP "), "ja");
    assert.strictEqual(normalizeLang("KO"), "ko");
  });
});
