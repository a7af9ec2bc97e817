import path from "node:path";
import fs from "node:fs";
import { randomUUID } from "node:crypto";
import { serializeDraft, type Draft } from "@cutdraft/draft";
import type { FolderHandle } from "./draftRegistry.js";

/** 草稿内容文件名 */
export const DRAFT_CONTENT_FILE = "draft_content.json";

/**
 * 把草稿写入持久化存储的协作方。
 */
export interface DraftWriter {
  /**
   * @returns 写入的文件路径
   */
  write(folder: FolderHandle, draft: Draft): Promise<string>;
}

// 清理失败时仍抛出原始的写入错误，清理错误挂在 cause 上
async function removeTempFile(tmp: string, writeError: unknown): Promise<void> {
  try {
    await fs.promises.rm(tmp, { force: true });
  } catch (cleanupError) {
    if (writeError instanceof Error && writeError.cause === undefined) {
      writeError.cause = cleanupError;
    }
    throw writeError;
  }
}

/**
 * 以 JSON 形式写到 <草稿文件夹>/<草稿名>/draft_content.json。
 *
 * 先写临时文件再 rename，读者不会看到写了一半的文件。
 */
export class JsonDraftWriter implements DraftWriter {
  async write(folder: FolderHandle, draft: Draft): Promise<string> {
    const draftDir = path.join(folder.path, draft.name);
    await fs.promises.mkdir(draftDir, { recursive: true });

    const target = path.join(draftDir, DRAFT_CONTENT_FILE);
    const tmp = `${target}.${randomUUID()}.tmp`;
    try {
      await fs.promises.writeFile(tmp, serializeDraft(draft), "utf-8");
      await fs.promises.rename(tmp, target);
    } catch (err) {
      await removeTempFile(tmp, err);
      throw err;
    }
    return target;
  }
}
