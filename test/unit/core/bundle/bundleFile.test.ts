import * as assert from "assert";
import * as fs from "fs/promises";
import os from "os";
import path from "path";
import { decodeBundle, readBundle, writeBundle } from "@/core/bundle/bundleFile";
import { ERROR_KIND, isBundleError } from "@/utils/errors";

// label:"é" 的 Latin-1 字节，不是合法的 UTF-8
const LATIN1_BYTES = Buffer.from([0x6c, 0x61, 0x62, 0x65, 0x6c, 0x3a, 0x22, 0xe9, 0x22]);

describe("core/bundle/bundleFile", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), "bundle-l10n-file-"));
  });

  afterEach(async () => {
    await fs.rm(dir, { recursive: true, force: true });
  });

  it("优先按 UTF-8 解码", async () => {
    const filePath = path.join(dir, "bundle.js");
    await fs.writeFile(filePath, 'title:"설정"', "utf8");
    assert.deepStrictEqual(await readBundle(filePath), { text: 'title:"설정"', encoding: "utf-8" });
  });

  it("UTF-8 失败时退回 Latin-1", () => {
    assert.deepStrictEqual(decodeBundle(LATIN1_BYTES), { text: 'label:"é"', encoding: "latin1" });
  });

  it("两种编码都不合理时抛出 DecodeError", () => {
    assert.throws(
      () => decodeBundle(Buffer.from([0xff, 0x00, 0x41])),
      (e: unknown) => isBundleError(e, ERROR_KIND.DecodeError)
    );
  });

  it("文件不存在或是目录时抛出 PathNotFound", async () => {
    await assert.rejects(readBundle(path.join(dir, "missing.js")), (e: unknown) => isBundleError(e, ERROR_KIND.PathNotFound));
    await assert.rejects(readBundle(dir), (e: unknown) => isBundleError(e, ERROR_KIND.PathNotFound));
  });

  it("按读取时的编码写回", async () => {
    const filePath = path.join(dir, "legacy.js");
    await fs.writeFile(filePath, LATIN1_BYTES);
    const source = await readBundle(filePath);
    await writeBundle(filePath, { text: source.text.replace("é", "è"), encoding: source.encoding });
    const bytes = await fs.readFile(filePath);
    assert.strictEqual(bytes[7], 0xe8);
    assert.strictEqual(bytes.length, LATIN1_BYTES.length);
  });

  it("Latin-1 无法表示的字符在写入前报错，原文件不变", async () => {
    const filePath = path.join(dir, "legacy.js");
    await fs.writeFile(filePath, LATIN1_BYTES);
    await assert.rejects(writeBundle(filePath, { text: 'label:"파일"', encoding: "latin1" }), (e: unknown) =>
      isBundleError(e, ERROR_KIND.WriteError)
    );
    assert.deepStrictEqual(await fs.readFile(filePath), LATIN1_BYTES);
  });
});
