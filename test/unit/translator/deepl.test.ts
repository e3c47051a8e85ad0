import * as assert from "assert";
import path from "path";
import mockRequire from "mock-require";

const DEEPL_MODULE = path.resolve(__dirname, "../../../src/translator/deepl");

interface PostCall {
  url: string;
  params: URLSearchParams;
  headers: Record<string, string>;
}

class FakeAxiosError extends Error {
  constructor(
    message: string,
    public response?: { data: unknown }
  ) {
    super(message);
  }
}

let calls: PostCall[] = [];
let reply: (params: URLSearchParams) => unknown = () => ({});

const axiosStub = {
  post: (url: string, params: URLSearchParams, config: { headers: Record<string, string> }) => {
    calls.push({ url, params, headers: config.headers });
    try {
      return Promise.resolve({ data: reply(params) });
    } catch (e) {
      return Promise.reject(e);
    }
  }
};

describe("translator/deepl", () => {
  let deepl: typeof import("@/translator/deepl");

  before(() => {
    mockRequire("axios", { ...axiosStub, AxiosError: FakeAxiosError });
    deepl = mockRequire.reRequire(DEEPL_MODULE);
  });

  after(() => {
    mockRequire.stopAll();
    mockRequire.reRequire(DEEPL_MODULE);
  });

  beforeEach(() => {
    calls = [];
  });

  it("以表单提交文本并携带凭据", async () => {
    reply = params => ({ translations: params.getAll("text").map(text => ({ text: `[${params.get("target_lang")}] ${text}` })) });
    const translator = new deepl.DeepLTranslator({ apiKey: "test-secret:fx" });
    const res = await translator.translate(["Open File", "Save As..."], "ko");
    assert.deepStrictEqual(res.data, ["[KO] Open File", "[KO] Save As..."]);
    assert.deepStrictEqual(res.missed, []);
    assert.strictEqual(res.api, "deepl");
    assert.strictEqual(calls.length, 1);
    assert.strictEqual(calls[0].url, "https://api-free.deepl.com/v2/translate");
    assert.strictEqual(calls[0].headers.Authorization, "DeepL-Auth-Key test-secret:fx");
    assert.deepStrictEqual(calls[0].params.getAll("text"), ["Open File", "Save As..."]);
    assert.strictEqual(calls[0].params.get("source_lang"), null);
  });

  it("传入源语言时附带 source_lang", async () => {
    reply = params => ({ translations: params.getAll("text").map(text => ({ text })) });
    await new deepl.DeepLTranslator({ apiKey: "test-secret", sourceLang: "en-US" }).translate(["Zoom In"], "ja");
    assert.strictEqual(calls[0].url, "https://api.deepl.com/v2/translate");
    assert.strictEqual(calls[0].params.get("source_lang"), "EN");
    assert.strictEqual(calls[0].params.get("target_lang"), "JA");
  });

  it("空译文回退为原文", async () => {
    reply = () => ({ translations: [{ text: "확대" }, { text: " " }] });
    const res = await new deepl.DeepLTranslator({ apiKey: "test-secret" }).translate(["Zoom In", "Zoom Out"], "ko");
    assert.deepStrictEqual(res.data, ["확대", "Zoom Out"]);
  });

  it("请求失败时整块透传并计入失败", async () => {
    reply = () => {
      throw new FakeAxiosError("Request failed with status code 403", { data: { message: "Wrong endpoint" } });
    };
    const res = await new deepl.DeepLTranslator({ apiKey: "test-secret" }).translate(["Open File", "Save As..."], "ko");
    assert.deepStrictEqual(res.data, ["Open File", "Save As..."]);
    assert.deepStrictEqual(res.missed, [0, 1]);
    assert.strictEqual(res.failedChunks, 1);
    assert.strictEqual(res.success, false);
  });

  it("按块拆分请求", async () => {
    reply = params => ({ translations: params.getAll("text").map(text => ({ text })) });
    const list = Array.from({ length: 7 }, (_, i) => `Entry ${i}`);
    const res = await new deepl.DeepLTranslator({ apiKey: "test-secret", chunkSize: 3 }).translate(list, "de");
    assert.deepStrictEqual(
      calls.map(call => call.params.getAll("text").length),
      [3, 3, 1]
    );
    assert.deepStrictEqual(res.data, list);
  });

  it("语言代码与端点映射", () => {
    assert.strictEqual(deepl.toDeeplTargetCode("en"), "EN-US");
    assert.strictEqual(deepl.toDeeplTargetCode("pt"), "PT-PT");
    assert.strictEqual(deepl.toDeeplTargetCode("ko"), "KO");
    assert.strictEqual(deepl.toDeeplTargetCode("pt_br"), "PT-BR");
    assert.strictEqual(deepl.resolveDeeplUrl("test-secret"), "https://api.deepl.com/v2/translate");
    assert.strictEqual(deepl.resolveDeeplUrl("test-secret:fx"), "https://api-free.deepl.com/v2/translate");
    assert.strictEqual(deepl.resolveDeeplUrl("test-secret:fx", "pro"), "https://api.deepl.com/v2/translate");
  });
});
