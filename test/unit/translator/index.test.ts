import * as assert from "assert";
import path from "path";
import mockRequire from "mock-require";

const DEEPL_MODULE = path.resolve(__dirname, "../../../src/translator/deepl");
const INDEX_MODULE = path.resolve(__dirname, "../../../src/translator/index");

class FakeAxiosError extends Error {
  constructor(
    message: string,
    public response?: { data: unknown }
  ) {
    super(message);
  }
}

let postCalls = 0;
const rejectingAxios = {
  post: () => {
    postCalls++;
    return Promise.reject(new FakeAxiosError("Request failed with status code 403", { data: { message: "Authorization failure" } }));
  }
};

describe("translator/index", () => {
  let translatorModule: typeof import("@/translator");

  before(() => {
    mockRequire("axios", { ...rejectingAxios, AxiosError: FakeAxiosError });
    mockRequire.reRequire(DEEPL_MODULE);
    translatorModule = mockRequire.reRequire(INDEX_MODULE);
  });

  after(() => {
    mockRequire.stopAll();
    mockRequire.reRequire(DEEPL_MODULE);
    mockRequire.reRequire(INDEX_MODULE);
  });

  beforeEach(() => {
    postCalls = 0;
  });

  it("没有凭据时使用示例词典", async () => {
    const translator = await translatorModule.createTranslator({ apiKey: "" });
    assert.strictEqual(translator.kind, "fallback");
    assert.strictEqual(postCalls, 0);
  });

  it("凭据无效时退化为示例词典且不抛错", async () => {
    const translator = await translatorModule.createTranslator({ apiKey: "invalid-key", probe: true });
    assert.strictEqual(translator.kind, "fallback");
    assert.strictEqual(postCalls, 1);
    const res = await translator.translate(["Open File", "Mystery Label"], "ko");
    assert.deepStrictEqual(res.data, ["파일 열기", "Mystery Label"]);
    assert.deepStrictEqual(res.missed, [1]);
  });

  it("关闭试探时直接返回 DeepL 实现", async () => {
    const translator = await translatorModule.createTranslator({ apiKey: "test-secret", probe: false });
    assert.strictEqual(translator.kind, "deepl");
    assert.strictEqual(postCalls, 0);
  });

  it("probeTranslator 根据试探结果判断可用性", async () => {
    const ok = await translatorModule.probeTranslator({
      kind: "fallback",
      translate: list => Promise.resolve({ success: true, data: list.map(() => "Hallo"), missed: [], failedChunks: 0 })
    });
    assert.strictEqual(ok, true);
    const broken = await translatorModule.probeTranslator({
      kind: "fallback",
      translate: () => Promise.reject(new Error("offline"))
    });
    assert.strictEqual(broken, false);
  });

  it("支持的语言列表", () => {
    assert.deepStrictEqual(Object.keys(translatorModule.SUPPORTED_LANGUAGES), ["ko", "ja", "zh", "fr", "de", "es", "it", "pt", "ru"]);
    assert.strictEqual(translatorModule.isSupportedLanguage("ko"), true);
    assert.strictEqual(translatorModule.isSupportedLanguage("xx"), false);
  });
});
