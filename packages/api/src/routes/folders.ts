import type { FastifyInstance } from "fastify";
import type { DraftSessions } from "../lib/draftSessions.js";
import { asBody, requireString } from "../lib/requestFields.js";
import type { DraftResponse } from "../types.js";

export interface FolderRouteOptions {
  sessions: DraftSessions;
}

// 草稿文件夹相关路由
export async function folderRoutes(
  fastify: FastifyInstance,
  opts: FolderRouteOptions
): Promise<void> {
  const { sessions } = opts;

  /**
   * 登记草稿文件夹
   * POST /folder/register
   * 请求体需要 folder_id 和 folder_path（已存在的目录）
   */
  fastify.post("/folder/register", async (request) => {
    const body = asBody(request.body);
    const folder = await sessions.registerFolder({
      folderId: requireString(body, "folder_id"),
      folderPath: requireString(body, "folder_path"),
    });
    const res: DraftResponse = {
      success: true,
      message: "草稿文件夹登记成功",
      data: { folder_id: folder.id, path: folder.path },
    };
    return res;
  });

  // 列出文件夹下仍处于打开状态的草稿
  fastify.get<{ Params: { folderId: string } }>(
    "/folder/:folderId/drafts",
    async (request) => {
      const drafts = await sessions.listDrafts(request.params.folderId);
      const res: DraftResponse = {
        success: true,
        message: `共 ${drafts.length} 个草稿`,
        data: { drafts },
      };
      return res;
    }
  );
}
