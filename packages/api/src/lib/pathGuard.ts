import path from "node:path";
import fs from "node:fs";
import {
  NotFoundError,
  PathSecurityError,
  ValidationError,
} from "@cutdraft/utils";

export type PathKind = "file" | "folder";

// 只要原始输入里出现 ".." 就拒绝，包括 "data/..archive" 这类并非真正回溯的写法
const TRAVERSAL_TOKEN = "..";

/**
 * 校验并规范化调用方传入的文件 / 文件夹路径。
 *
 * 两阶段：
 * 1. 语法检查：空串、NUL 字符、包含 ".." 一律拒绝（不看规范化后的结果）
 * 2. 语义检查：规范化为绝对路径，stat 确认存在且类型匹配
 *
 * 任何接受路径参数的操作都必须先经过这里。
 * @returns 规范化后的绝对路径
 */
export async function validatePath(
  rawPath: string,
  kind: PathKind
): Promise<string> {
  if (rawPath.length === 0) {
    throw new ValidationError("InvalidParameter", "路径不能为空");
  }
  if (rawPath.includes("\0")) {
    throw new PathSecurityError(`非法路径: 包含 NUL 字符`);
  }
  if (rawPath.includes(TRAVERSAL_TOKEN)) {
    throw new PathSecurityError(`非法路径: 检测到路径穿越 ${rawPath}`);
  }

  const absPath = path.resolve(path.normalize(rawPath));

  let stat: fs.Stats;
  try {
    stat = await fs.promises.stat(absPath);
  } catch {
    throw notFound(rawPath, kind);
  }
  const matches = kind === "file" ? stat.isFile() : stat.isDirectory();
  if (!matches) {
    throw notFound(rawPath, kind);
  }
  return absPath;
}

function notFound(rawPath: string, kind: PathKind): NotFoundError {
  return kind === "file"
    ? new NotFoundError("FileNotFound", `文件不存在: ${rawPath}`)
    : new NotFoundError("FolderNotFound", `文件夹不存在: ${rawPath}`);
}

/**
 * 校验草稿名：草稿保存时会作为文件夹名拼到草稿文件夹路径下，
 * 因此不允许包含路径分隔符或 ".."。
 */
export function validateDraftName(name: string): string {
  if (name.trim().length === 0) {
    throw new ValidationError("InvalidParameter", "draft_name 不能为空");
  }
  if (name.includes(TRAVERSAL_TOKEN)) {
    throw new PathSecurityError(`非法草稿名: 检测到路径穿越 ${name}`);
  }
  if (/[\\/\0]/.test(name)) {
    throw new ValidationError(
      "InvalidParameter",
      `draft_name 不能包含路径分隔符: ${name}`
    );
  }
  return name;
}
