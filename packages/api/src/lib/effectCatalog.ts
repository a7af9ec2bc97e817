import fs from "node:fs";
import { fileURLToPath } from "node:url";
import {
  InternalError,
  none,
  parseTime,
  some,
  ValidationError,
  type Maybe,
} from "@cutdraft/utils";
import type { EffectRef, TextAnimationRef } from "@cutdraft/draft";

/** 随服务发布的默认特效目录 */
export const DEFAULT_CATALOG_PATH = fileURLToPath(
  new URL("../../data/catalog.json", import.meta.url)
);

export const CATALOG_KINDS = [
  "font",
  "intro",
  "outro",
  "textIntro",
  "textOutro",
  "transition",
  "filter",
] as const;

export type CatalogKind = (typeof CATALOG_KINDS)[number];

// 用于错误提示
const CATALOG_LABELS: Record<CatalogKind, string> = {
  font: "字体",
  intro: "入场动画",
  outro: "出场动画",
  textIntro: "文字入场动画",
  textOutro: "文字出场动画",
  transition: "转场",
  filter: "滤镜",
};

export interface CatalogEntry {
  name: string;
  id: string;
  /** 默认时长（微秒） */
  duration: Maybe<number>;
}

export type CatalogData = Record<CatalogKind, readonly CatalogEntry[]>;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function parseEntry(kind: CatalogKind, raw: unknown, index: number): CatalogEntry {
  if (
    !isRecord(raw) ||
    typeof raw.name !== "string" ||
    raw.name.length === 0 ||
    typeof raw.id !== "string" ||
    raw.id.length === 0
  ) {
    throw new InternalError(`特效目录格式错误: ${kind}[${index}] 缺少 name 或 id`);
  }
  const rawDuration = raw.duration;
  let duration: Maybe<number> = none;
  if (rawDuration !== undefined) {
    if (typeof rawDuration !== "string") {
      throw new InternalError(
        `特效目录格式错误: ${kind}[${index}].duration 必须是时间字符串`
      );
    }
    try {
      duration = some(parseTime(rawDuration));
    } catch (err) {
      throw new InternalError(`特效目录格式错误: ${kind}[${index}].duration`, err);
    }
  }
  return { name: raw.name, id: raw.id, duration };
}

/**
 * 特效目录：字体、动画、转场、滤镜等七个互不相交的名称表。
 *
 * 启动时从 JSON 加载一次，之后只读；按名称精确匹配（区分大小写）。
 */
export class EffectCatalog {
  private readonly tables = new Map<CatalogKind, Map<string, CatalogEntry>>();

  constructor(data: CatalogData) {
    for (const kind of CATALOG_KINDS) {
      const table = new Map<string, CatalogEntry>();
      for (const entry of data[kind]) {
        if (table.has(entry.name)) {
          throw new InternalError(
            `特效目录格式错误: ${kind} 中存在重复名称 "${entry.name}"`
          );
        }
        table.set(entry.name, entry);
      }
      this.tables.set(kind, table);
    }
  }

  /**
   * 从已解析的 JSON 构造目录，校验结构。
   */
  static fromJson(raw: unknown): EffectCatalog {
    if (!isRecord(raw)) {
      throw new InternalError("特效目录格式错误: 顶层必须是对象");
    }
    const data: Partial<Record<CatalogKind, CatalogEntry[]>> = {};
    for (const kind of CATALOG_KINDS) {
      const list = raw[kind];
      if (!Array.isArray(list)) {
        throw new InternalError(`特效目录格式错误: 缺少 ${kind} 列表`);
      }
      data[kind] = list.map((item, index) => parseEntry(kind, item, index));
    }
    return new EffectCatalog({
      font: data.font ?? [],
      intro: data.intro ?? [],
      outro: data.outro ?? [],
      textIntro: data.textIntro ?? [],
      textOutro: data.textOutro ?? [],
      transition: data.transition ?? [],
      filter: data.filter ?? [],
    });
  }

  static async fromFile(filePath: string): Promise<EffectCatalog> {
    let text: string;
    try {
      text = await fs.promises.readFile(filePath, "utf-8");
    } catch (err) {
      throw new InternalError(`无法读取特效目录: ${filePath}`, err);
    }
    let parsed: unknown;
    try {
      parsed = JSON.parse(text);
    } catch (err) {
      throw new InternalError(`特效目录不是合法的 JSON: ${filePath}`, err);
    }
    return EffectCatalog.fromJson(parsed);
  }

  private table(kind: CatalogKind): Map<string, CatalogEntry> {
    const table = this.tables.get(kind);
    if (!table) {
      throw new InternalError(`特效目录未加载: ${kind}`);
    }
    return table;
  }

  /** 目录中是否存在该名称 */
  has(kind: CatalogKind, name: string): boolean {
    return this.table(kind).has(name);
  }

  /**
   * 按名称查找目录条目，不存在时抛出 UnknownEffectName。
   */
  resolve(kind: CatalogKind, name: string): EffectRef {
    const entry = this.table(kind).get(name);
    if (!entry) {
      throw new ValidationError(
        "UnknownEffectName",
        `无效的${CATALOG_LABELS[kind]}类型: ${name}`
      );
    }
    return { name: entry.name, id: entry.id, duration: entry.duration };
  }

  /**
   * 解析文字动画：先查文字出场目录，再查文字入场目录。
   */
  resolveTextAnimation(name: string): TextAnimationRef {
    if (this.has("textOutro", name)) {
      return { ...this.resolve("textOutro", name), catalog: "textOutro" };
    }
    if (this.has("textIntro", name)) {
      return { ...this.resolve("textIntro", name), catalog: "textIntro" };
    }
    throw new ValidationError(
      "UnknownEffectName",
      `无效的文字动画类型: ${name}`
    );
  }

  /** 目录中全部名称，保持 JSON 中的顺序 */
  list(kind: CatalogKind): string[] {
    return [...this.table(kind).keys()];
  }
}
