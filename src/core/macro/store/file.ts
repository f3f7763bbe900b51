import * as fs from "node:fs/promises";
import * as path from "node:path";
import type { Outcome } from "../../../outcome/outcome";
import { ioError, ok, schemaMismatch } from "../../../outcome/constructors";
import { MacroDictionary, type MacroDictionaryOptions } from "../dictionary";
import type { MacroDictionaryStore } from "./interface";

async function ensureDir(dir: string): Promise<void> {
  await fs.mkdir(dir, { recursive: true });
}

function isMissing(e: unknown): boolean {
  return typeof e === "object" && e !== null && "code" in e && e.code === "ENOENT";
}

/**
 * One JSON file. Saves go to a sibling temp file that is then renamed over
 * the target, so a failed save leaves the previous file intact.
 */
export class FileMacroDictionaryStore implements MacroDictionaryStore {
  constructor(
    private readonly filePath: string,
    private readonly opts: MacroDictionaryOptions = {}
  ) {}

  get location(): string {
    return this.filePath;
  }

  async save(dictionary: MacroDictionary): Promise<Outcome<string>> {
    const tmp = `${this.filePath}.${process.pid}.${Date.now()}.tmp`;
    let dirReady = false;
    try {
      await ensureDir(path.dirname(this.filePath));
      dirReady = true;
      await fs.writeFile(tmp, JSON.stringify(dictionary.toJSON(), null, 2), "utf8");
      await fs.rename(tmp, this.filePath);
      return ok(this.filePath);
    } catch (e) {
      if (dirReady) await fs.rm(tmp, { force: true });
      return ioError("write", this.filePath, e);
    }
  }

  async load(): Promise<Outcome<MacroDictionary | undefined>> {
    let text: string;
    try {
      text = await fs.readFile(this.filePath, "utf8");
    } catch (e) {
      if (isMissing(e)) return ok(undefined);
      return ioError("read", this.filePath, e);
    }

    let data: unknown;
    try {
      data = JSON.parse(text);
    } catch (e) {
      return schemaMismatch(`Not JSON: ${this.filePath}`, { cause: e instanceof Error ? e.message : String(e) });
    }
    return MacroDictionary.fromJSON(data, this.opts);
  }
}
