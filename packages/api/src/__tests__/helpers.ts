import os from "node:os";
import path from "node:path";
import fs from "node:fs";
import { isAppError } from "@cutdraft/utils";
import { EffectCatalog } from "../lib/effectCatalog.js";
import type { MaterialProber } from "../lib/materialProbe.js";

/** 测试用的小型特效目录 */
export function testCatalog(): EffectCatalog {
  return EffectCatalog.fromJson({
    font: [{ name: "文轩体", id: "7000000000000000001" }],
    intro: [
      { name: "斜切", id: "7000000000000000011", duration: "0.5s" },
      { name: "渐显", id: "7000000000000000012", duration: "0.8s" },
    ],
    outro: [{ name: "渐隐", id: "7000000000000000021", duration: "0.5s" }],
    textIntro: [
      { name: "打字机 I", id: "7000000000000000031", duration: "1s" },
      { name: "复古打字机", id: "7000000000000000032", duration: "1s" },
    ],
    textOutro: [
      { name: "故障闪动", id: "7000000000000000041", duration: "0.5s" },
      { name: "打字机 I", id: "7000000000000000042", duration: "0.5s" },
    ],
    transition: [{ name: "信号故障", id: "7000000000000000051", duration: "0.5s" }],
    filter: [
      { name: "清晰", id: "7000000000000000061" },
      { name: "黑白", id: "7000000000000000062" },
    ],
  });
}

/**
 * 固定返回给定时长的探测器，记录被探测过的路径。
 */
export class FakeProber implements MaterialProber {
  readonly probed: string[] = [];

  constructor(private readonly duration: number | undefined) {}

  async probeDuration(filePath: string): Promise<number | undefined> {
    this.probed.push(filePath);
    return this.duration;
  }
}

/** 在系统临时目录下建一个独立目录 */
export async function makeTempDir(): Promise<string> {
  return fs.promises.mkdtemp(path.join(os.tmpdir(), "cutdraft-"));
}

export async function removeDir(dir: string): Promise<void> {
  await fs.promises.rm(dir, { recursive: true, force: true });
}

/** 在目录下写一个占位素材文件，返回其绝对路径 */
export async function touchFile(dir: string, name: string): Promise<string> {
  const filePath = path.join(dir, name);
  await fs.promises.writeFile(filePath, "placeholder");
  return filePath;
}

/**
 * 取出 promise 拒绝时的业务错误码；未拒绝或不是业务错误时测试失败。
 */
export async function rejectionCode(promise: Promise<unknown>): Promise<string> {
  try {
    await promise;
  } catch (err) {
    if (isAppError(err)) return err.code;
    throw err;
  }
  throw new Error("预期操作失败，但实际成功");
}

export function thrownCode(fn: () => unknown): string {
  try {
    fn();
  } catch (err) {
    if (isAppError(err)) return err.code;
    throw err;
  }
  throw new Error("预期操作失败，但实际成功");
}
