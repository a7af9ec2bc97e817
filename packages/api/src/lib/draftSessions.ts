import path from "node:path";
import fs from "node:fs";
import type { FastifyBaseLogger } from "fastify";
import {
  ConflictError,
  createId,
  InternalError,
  isAppError,
  unwrapOr,
  ValidationError,
  type Maybe,
} from "@cutdraft/utils";
import {
  addTrack,
  DEFAULT_DRAFT_HEIGHT,
  DEFAULT_DRAFT_WIDTH,
  isTrackKind,
  TRACK_KINDS,
  type Draft,
  type DraftName,
  type FolderId,
  type Track,
} from "@cutdraft/draft";
import type {
  AddTrackRequest,
  CreateDraftRequest,
  RegisterFolderRequest,
} from "../types.js";
import type { DraftRegistry, FolderHandle } from "./draftRegistry.js";
import type { DraftWriter } from "./draftWriter.js";
import type { CatalogKind, EffectCatalog } from "./effectCatalog.js";
import { Mutex } from "./mutex.js";
import { validateDraftName, validatePath } from "./pathGuard.js";

export interface DraftSessionsDeps {
  registry: DraftRegistry;
  catalog: EffectCatalog;
  writer: DraftWriter;
  logger?: FastifyBaseLogger;
}

function positiveInteger(
  value: Maybe<number>,
  field: string,
  fallback: number
): number {
  const n = unwrapOr(value, fallback);
  if (!Number.isSafeInteger(n) || n <= 0) {
    throw new ValidationError(
      "InvalidParameter",
      `${field} 必须是正整数: ${n}`
    );
  }
  return n;
}

async function pathExists(target: string): Promise<boolean> {
  try {
    await fs.promises.access(target);
    return true;
  } catch {
    return false;
  }
}

/**
 * 草稿会话的生命周期：登记文件夹、创建 / 关闭草稿、加轨道、保存，以及特效目录查询。
 */
export class DraftSessions {
  private readonly registry: DraftRegistry;
  private readonly catalog: EffectCatalog;
  private readonly writer: DraftWriter;
  private readonly log?: FastifyBaseLogger;
  // 同名草稿的保存按调用顺序排队，没有排队者时移除
  private readonly saveLocks = new Map<DraftName, Mutex>();

  constructor(deps: DraftSessionsDeps) {
    this.registry = deps.registry;
    this.catalog = deps.catalog;
    this.writer = deps.writer;
    this.log = deps.logger;
  }

  async registerFolder(req: RegisterFolderRequest): Promise<FolderHandle> {
    if (req.folderId.trim().length === 0) {
      throw new ValidationError("InvalidParameter", "folder_id 不能为空");
    }
    const absPath = await validatePath(req.folderPath, "folder");
    return this.registry.registerFolder(req.folderId, absPath);
  }

  listDrafts(folderId: FolderId): Promise<DraftName[]> {
    return this.registry.listDrafts(folderId);
  }

  /**
   * 创建草稿。未允许替换时，注册表或磁盘上已有同名草稿都视为冲突。
   */
  async createDraft(req: CreateDraftRequest): Promise<Draft> {
    const name = validateDraftName(req.draftName);
    const width = positiveInteger(req.width, "width", DEFAULT_DRAFT_WIDTH);
    const height = positiveInteger(req.height, "height", DEFAULT_DRAFT_HEIGHT);
    const allowReplace = unwrapOr(req.allowReplace, false);

    const folder = await this.registry.getFolder(req.folderId);
    if (!allowReplace && (await pathExists(path.join(folder.path, name)))) {
      throw new ConflictError(
        "AlreadyExists",
        `草稿目录已存在: ${path.join(folder.path, name)}`
      );
    }

    return this.registry.createDraft({
      folderId: req.folderId,
      name,
      width,
      height,
      allowReplace,
    });
  }

  async addTrack(draftName: DraftName, req: AddTrackRequest): Promise<Track> {
    const kind = req.trackType;
    if (!isTrackKind(kind)) {
      throw new ValidationError(
        "InvalidParameter",
        `无效的轨道类型: ${kind}，可选值为 ${TRACK_KINDS.join(", ")}`
      );
    }
    if (req.trackName.present && req.trackName.value.trim().length === 0) {
      throw new ValidationError("InvalidParameter", "track_name 不能为空");
    }

    const id = createId("track");
    const draft = await this.registry.updateDraft(draftName, (current) =>
      addTrack(current, {
        id,
        kind,
        name: req.trackName.present ? req.trackName.value : undefined,
        relativeIndex: unwrapOr(req.relativeIndex, 0),
      })
    );
    const track = draft.tracks.find((t) => t.id === id);
    if (!track) {
      throw new InternalError(`轨道 ${id} 提交后未找到`);
    }
    this.log?.info(
      { draftName, trackName: track.name, kind },
      "轨道已添加"
    );
    return track;
  }

  getDraft(draftName: DraftName): Promise<Draft> {
    return this.registry.getDraft(draftName);
  }

  /**
   * 把草稿写到所属文件夹下。
   *
   * 只在取快照时短暂持有注册表锁，写盘在锁外进行；同名草稿的保存彼此排队，
   * 后发起的保存总是最后落盘。
   * @returns 写入的文件路径
   */
  async saveDraft(draftName: DraftName): Promise<string> {
    const lock = this.saveLocks.get(draftName) ?? new Mutex();
    this.saveLocks.set(draftName, lock);
    try {
      return await lock.runExclusive(() => this.writeSnapshot(draftName));
    } finally {
      if (lock.pending === 0 && this.saveLocks.get(draftName) === lock) {
        this.saveLocks.delete(draftName);
      }
    }
  }

  private async writeSnapshot(draftName: DraftName): Promise<string> {
    const { draft, folder } = await this.registry.readDraft(
      draftName,
      (snapshot, folder) => ({ draft: snapshot, folder })
    );
    try {
      const filePath = await this.writer.write(folder, draft);
      this.log?.info({ draftName, path: filePath }, "草稿已保存");
      return filePath;
    } catch (err) {
      if (isAppError(err)) throw err;
      this.log?.error({ err, draftName }, "草稿保存失败");
      throw new InternalError(`草稿保存失败: ${draftName}`, err);
    }
  }

  closeDraft(draftName: DraftName): Promise<void> {
    return this.registry.closeDraft(draftName);
  }

  listCatalog(kind: CatalogKind): string[] {
    return this.catalog.list(kind);
  }
}
