import type { FastifyBaseLogger } from "fastify";
import {
  ConflictError,
  InternalError,
  NotFoundError,
} from "@cutdraft/utils";
import {
  createEmptyDraft,
  type Draft,
  type DraftName,
  type FolderId,
} from "@cutdraft/draft";
import { Mutex } from "./mutex.js";

/**
 * 已登记的草稿文件夹。登记后不可变，进程存活期间一直有效。
 */
export interface FolderHandle {
  id: FolderId;
  /** 规范化后的绝对路径 */
  path: string;
  registeredAt: string;
}

export interface CreateDraftParams {
  folderId: FolderId;
  name: DraftName;
  width: number;
  height: number;
  /** 为 true 时同名草稿会被原子替换 */
  allowReplace: boolean;
}

export interface RegistryStats {
  folders: number;
  drafts: number;
}

export interface DraftRegistryOptions {
  logger?: FastifyBaseLogger;
}

/**
 * 草稿会话注册表：进程内唯一的共享可变状态。
 *
 * - 两张表（文件夹、活动草稿）的所有读写都在同一把可重入锁内完成
 * - 对外只交出快照（structuredClone），修改必须通过 updateDraft 的回调进行，
 *   调用方拿不到表内对象的引用
 * - 纯内存、不持久化，重启即丢失
 */
export class DraftRegistry {
  private readonly folders = new Map<FolderId, FolderHandle>();
  private readonly drafts = new Map<DraftName, Draft>();
  private readonly lock = new Mutex();
  private readonly log?: FastifyBaseLogger;

  constructor(options: DraftRegistryOptions = {}) {
    this.log = options.logger;
  }

  /**
   * 登记草稿文件夹。id 已存在时报 DuplicateId，不覆盖原有登记。
   * @param folderPath 已通过路径校验的绝对路径
   */
  registerFolder(id: FolderId, folderPath: string): Promise<FolderHandle> {
    return this.lock.runExclusive(() => {
      if (this.folders.has(id)) {
        throw new ConflictError("DuplicateId", `草稿文件夹 '${id}' 已登记`);
      }
      const handle: FolderHandle = {
        id,
        path: folderPath,
        registeredAt: new Date().toISOString(),
      };
      this.folders.set(id, handle);
      this.log?.info({ folderId: id, path: folderPath }, "草稿文件夹已登记");
      return { ...handle };
    });
  }

  getFolder(id: FolderId): Promise<FolderHandle> {
    return this.lock.runExclusive(() => ({ ...this.requireFolder(id) }));
  }

  listFolders(): Promise<FolderHandle[]> {
    return this.lock.runExclusive(() =>
      [...this.folders.values()].map((f) => ({ ...f }))
    );
  }

  /**
   * 创建空草稿并放入注册表。
   *
   * 同名草稿已存在时：allowReplace 为 false 报 AlreadyExists，否则在锁内整体替换。
   */
  createDraft(params: CreateDraftParams): Promise<Draft> {
    return this.lock.runExclusive(() => {
      this.requireFolder(params.folderId);
      const existing = this.drafts.get(params.name);
      if (existing && !params.allowReplace) {
        throw new ConflictError(
          "AlreadyExists",
          `草稿 '${params.name}' 已存在`
        );
      }
      const draft = createEmptyDraft({
        name: params.name,
        folderId: params.folderId,
        width: params.width,
        height: params.height,
      });
      this.drafts.set(params.name, draft);
      this.log?.info(
        {
          draftName: params.name,
          folderId: params.folderId,
          replaced: existing !== undefined,
        },
        "草稿已创建"
      );
      return structuredClone(draft);
    });
  }

  /** 返回草稿快照，对快照的修改不会影响注册表 */
  getDraft(name: DraftName): Promise<Draft> {
    return this.lock.runExclusive(() => structuredClone(this.requireDraft(name)));
  }

  /** 草稿不存在时报 DraftNotFound */
  assertDraft(name: DraftName): Promise<void> {
    return this.lock.runExclusive(() => {
      this.requireDraft(name);
    });
  }

  /**
   * 在锁内完成“取出 → 修改 → 写回”。
   *
   * updater 收到的是副本，返回新的草稿；抛错时注册表保持不变。
   * @returns 写回后的草稿快照
   */
  updateDraft(
    name: DraftName,
    updater: (draft: Draft) => Draft
  ): Promise<Draft> {
    return this.lock.runExclusive(() => {
      const current = this.requireDraft(name);
      const next = updater(structuredClone(current));
      if (next.name !== name) {
        throw new InternalError(`草稿更新不允许修改名称: ${name}`);
      }
      this.drafts.set(name, structuredClone(next));
      return structuredClone(next);
    });
  }

  /**
   * 在锁内读取草稿快照及其所属文件夹。reader 是同步的，不能在持锁期间做 I/O。
   */
  readDraft<T>(
    name: DraftName,
    reader: (draft: Draft, folder: FolderHandle) => T
  ): Promise<T> {
    return this.lock.runExclusive(() => {
      const draft = this.requireDraft(name);
      const folder = this.folders.get(draft.folderId);
      if (!folder) {
        throw new InternalError(
          `草稿 '${name}' 关联的文件夹 '${draft.folderId}' 不存在`
        );
      }
      return reader(structuredClone(draft), { ...folder });
    });
  }

  /** 从注册表移除草稿，不触碰磁盘上已保存的文件 */
  closeDraft(name: DraftName): Promise<void> {
    return this.lock.runExclusive(() => {
      this.requireDraft(name);
      this.drafts.delete(name);
      this.log?.info({ draftName: name }, "草稿已关闭");
    });
  }

  /**
   * 列出创建时关联到该文件夹、且仍处于打开状态的草稿名（按创建顺序）。
   */
  listDrafts(folderId: FolderId): Promise<DraftName[]> {
    return this.lock.runExclusive(() => {
      this.requireFolder(folderId);
      return [...this.drafts.values()]
        .filter((d) => d.folderId === folderId)
        .map((d) => d.name);
    });
  }

  stats(): Promise<RegistryStats> {
    return this.lock.runExclusive(() => ({
      folders: this.folders.size,
      drafts: this.drafts.size,
    }));
  }

  // 以下两个方法只在持锁时调用
  private requireFolder(id: FolderId): FolderHandle {
    const folder = this.folders.get(id);
    if (!folder) {
      throw new NotFoundError("UnknownFolder", `草稿文件夹 '${id}' 未登记`);
    }
    return folder;
  }

  private requireDraft(name: DraftName): Draft {
    const draft = this.drafts.get(name);
    if (!draft) {
      throw new NotFoundError("DraftNotFound", `草稿 '${name}' 不存在`);
    }
    return draft;
  }
}
