import * as fs from "fs/promises";
import { isNodeError } from "../../utils/errors";
import { writeFileAtomic } from "../../utils/fs";

export interface PathCache {
  get(key: string): Promise<string | undefined>;
  set(key: string, value: string): Promise<void>;
  delete(key: string): Promise<void>;
}

export class MemoryPathCache implements PathCache {
  private readonly entries = new Map<string, string>();

  public get(key: string) {
    return Promise.resolve(this.entries.get(key));
  }

  public set(key: string, value: string) {
    this.entries.set(key, value);
    return Promise.resolve();
  }

  public delete(key: string) {
    this.entries.delete(key);
    return Promise.resolve();
  }
}

/**
 * 以 JSON 文件持久化的路径缓存。文件缺失或内容无法解析时视为空缓存。
 */
export class JsonPathCache implements PathCache {
  constructor(private readonly filePath: string) {}

  public async get(key: string) {
    const entries = await this.read();
    return Object.hasOwn(entries, key) ? entries[key] : undefined;
  }

  public async set(key: string, value: string) {
    const entries = await this.read();
    entries[key] = value;
    await this.write(entries);
  }

  public async delete(key: string) {
    const entries = await this.read();
    if (!Object.hasOwn(entries, key)) return;
    delete entries[key];
    await this.write(entries);
  }

  private async read(): Promise<Record<string, string>> {
    let content: string;
    try {
      content = await fs.readFile(this.filePath, "utf8");
    } catch (e) {
      if (isNodeError(e, "ENOENT")) return {};
      throw e;
    }
    let parsed: unknown;
    try {
      parsed = JSON.parse(content);
    } catch {
      return {};
    }
    const entries: Record<string, string> = {};
    if (typeof parsed === "object" && parsed !== null && !Array.isArray(parsed)) {
      for (const [key, value] of Object.entries(parsed)) {
        if (typeof value === "string") entries[key] = value;
      }
    }
    return entries;
  }

  private async write(entries: Record<string, string>) {
    await writeFileAtomic(this.filePath, `${JSON.stringify(entries, null, 2)}\n`);
  }
}
