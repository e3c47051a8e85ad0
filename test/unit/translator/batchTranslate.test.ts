import * as assert from "assert";
import { batchTranslate, splitIntoChunks } from "@/translator/utils/batchTranslate";
import { SendFn } from "@/types";

const upper: SendFn = (_target, texts) => Promise.resolve({ success: true, data: texts.map(text => text.toUpperCase()) });

describe("translator/utils/batchTranslate", () => {
  it("splitIntoChunks 每块不超过 50 条", () => {
    const list = Array.from({ length: 120 }, (_, i) => i);
    assert.deepStrictEqual(
      splitIntoChunks(list, 100).map(chunk => chunk.length),
      [50, 50, 20]
    );
    assert.deepStrictEqual(splitIntoChunks([1, 2, 3], 0), [[1], [2], [3]]);
  });

  it("chunkSize 不是有限数时按 50 分块", async () => {
    assert.deepStrictEqual(splitIntoChunks([1, 2, 3], NaN), [[1, 2, 3]]);
    assert.deepStrictEqual(splitIntoChunks([1, 2, 3], Infinity), [[1, 2, 3]]);
    const res = await batchTranslate("ko", ["a", "b"], { chunkSize: NaN, interval: 0 }, upper);
    assert.deepStrictEqual(res.data, ["A", "B"]);
  });

  it("空列表不发送请求", async () => {
    let calls = 0;
    const res = await batchTranslate("ko", [], { chunkSize: 50, interval: 0 }, (target, texts) => {
      calls++;
      return upper(target, texts);
    });
    assert.strictEqual(calls, 0);
    assert.deepStrictEqual(res, { success: true, data: [], missed: [], failedChunks: 0, message: "" });
  });

  it("按块顺序发送并保持原顺序", async () => {
    const list = Array.from({ length: 120 }, (_, i) => `item ${i}`);
    const sizes: number[] = [];
    const res = await batchTranslate("ko", list, { chunkSize: 50, interval: 0 }, (target, texts) => {
      sizes.push(texts.length);
      return upper(target, texts);
    });
    assert.deepStrictEqual(sizes, [50, 50, 20]);
    assert.strictEqual(res.data.length, 120);
    assert.strictEqual(res.data[119], "ITEM 119");
    assert.deepStrictEqual(res.missed, []);
  });

  it("单块失败时原文透传并记入 missed", async () => {
    let call = 0;
    const res = await batchTranslate("ko", ["a1", "b2", "c3", "d4", "e5"], { chunkSize: 2, interval: 0 }, (target, texts) => {
      call++;
      if (call === 2) return Promise.reject(new Error("quota exceeded"));
      return upper(target, texts);
    });
    assert.deepStrictEqual(res.data, ["A1", "B2", "c3", "d4", "E5"]);
    assert.deepStrictEqual(res.missed, [2, 3]);
    assert.strictEqual(res.failedChunks, 1);
    assert.strictEqual(res.success, true);
    assert.strictEqual(res.message, "1 of 3 chunks failed and were left untranslated");
  });

  it("返回条数不一致视为失败，全部失败时 success 为 false", async () => {
    const res = await batchTranslate("ko", ["a1", "b2"], { chunkSize: 50, interval: 0 }, () =>
      Promise.resolve({ success: true, data: ["only one"] })
    );
    assert.deepStrictEqual(res.data, ["a1", "b2"]);
    assert.deepStrictEqual(res.missed, [0, 1]);
    assert.strictEqual(res.success, false);
  });
});
