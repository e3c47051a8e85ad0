import * as assert from "assert";
import * as fs from "fs/promises";
import os from "os";
import path from "path";
import mockRequire from "mock-require";
import { writeFileAtomic } from "@/utils/fs";

const FS_MODULE = path.resolve(__dirname, "../../../src/utils/fs");

describe("utils/fs", () => {
  let dir: string;
  let fsUtils: typeof import("@/utils/fs");

  before(() => {
    const failingRename = () => Promise.reject(Object.assign(new Error("rename failed"), { code: "EXDEV" }));
    mockRequire("fs/promises", { ...fs, rename: failingRename });
    fsUtils = mockRequire.reRequire(FS_MODULE);
  });

  after(() => {
    mockRequire.stopAll();
    mockRequire.reRequire(FS_MODULE);
  });

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), "bundle-l10n-fs-"));
  });

  afterEach(async () => {
    await fs.rm(dir, { recursive: true, force: true });
  });

  it("writeFileAtomic 失败时保留原文件且不留临时文件", async () => {
    const filePath = path.join(dir, "translations_ko.json");
    await fs.writeFile(filePath, '{"Save":"저장"}\n', "utf8");
    await assert.rejects(fsUtils.writeFileAtomic(filePath, "{}\n"), /rename failed/);
    assert.strictEqual(await fs.readFile(filePath, "utf8"), '{"Save":"저장"}\n');
    assert.deepStrictEqual(await fs.readdir(dir), ["translations_ko.json"]);
  });

  it("copyFileAtomic 失败时目标文件保持不变", async () => {
    const source = path.join(dir, "bundle.js");
    const target = path.join(dir, "bundle.js.bak");
    await fs.writeFile(source, "new", "utf8");
    await fs.writeFile(target, "old", "utf8");
    await assert.rejects(fsUtils.copyFileAtomic(source, target), /rename failed/);
    assert.strictEqual(await fs.readFile(target, "utf8"), "old");
    assert.deepStrictEqual((await fs.readdir(dir)).sort(), ["bundle.js", "bundle.js.bak"]);
  });
});

describe("utils/fs 正常写入", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), "bundle-l10n-fs-"));
  });

  afterEach(async () => {
    await fs.rm(dir, { recursive: true, force: true });
  });

  it("目标是目录时报错且不留临时文件", async () => {
    const target = path.join(dir, "occupied");
    await fs.mkdir(path.join(target, "inner"), { recursive: true });
    await assert.rejects(writeFileAtomic(target, "data"));
    assert.deepStrictEqual(await fs.readdir(dir), ["occupied"]);
    assert.deepStrictEqual(await fs.readdir(target), ["inner"]);
  });

  it("writeFileAtomic 会创建缺失的目录并覆盖旧内容", async () => {
    const filePath = path.join(dir, "nested", "out.txt");
    await writeFileAtomic(filePath, "first");
    await writeFileAtomic(filePath, "second");
    assert.strictEqual(await fs.readFile(filePath, "utf8"), "second");
    assert.deepStrictEqual(await fs.readdir(path.dirname(filePath)), ["out.txt"]);
  });
});
