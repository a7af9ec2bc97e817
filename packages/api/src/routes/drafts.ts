import type { FastifyInstance } from "fastify";
import type { DraftSessions } from "../lib/draftSessions.js";
import {
  asBody,
  optionalBoolean,
  optionalInteger,
  optionalString,
  requireString,
} from "../lib/requestFields.js";
import type { DraftResponse } from "../types.js";

export interface DraftRouteOptions {
  sessions: DraftSessions;
}

type DraftParams = { Params: { draftName: string } };

// 草稿生命周期路由：创建、查看、加轨道、保存、关闭
export async function draftRoutes(
  fastify: FastifyInstance,
  opts: DraftRouteOptions
): Promise<void> {
  const { sessions } = opts;

  /**
   * 创建草稿
   * POST /draft/create
   * 请求体需要 folder_id、draft_name；可选 width、height（默认 1920x1080）、allow_replace
   */
  fastify.post("/draft/create", async (request) => {
    const body = asBody(request.body);
    const draft = await sessions.createDraft({
      folderId: requireString(body, "folder_id"),
      draftName: requireString(body, "draft_name"),
      width: optionalInteger(body, "width"),
      height: optionalInteger(body, "height"),
      allowReplace: optionalBoolean(body, "allow_replace"),
    });
    const res: DraftResponse = {
      success: true,
      message: "草稿创建成功",
      draft_name: draft.name,
      data: {
        width: draft.width,
        height: draft.height,
        folder_id: draft.folderId,
      },
    };
    return res;
  });

  // 查看草稿当前内容
  fastify.get<DraftParams>("/draft/:draftName", async (request) => {
    const draft = await sessions.getDraft(request.params.draftName);
    const res: DraftResponse<typeof draft> = {
      success: true,
      message: "获取草稿成功",
      draft_name: draft.name,
      data: draft,
    };
    return res;
  });

  /**
   * 添加轨道
   * POST /draft/:draftName/track/add
   * 请求体需要 track_type；可选 track_name、relative_index
   */
  fastify.post<DraftParams>("/draft/:draftName/track/add", async (request) => {
    const { draftName } = request.params;
    const body = asBody(request.body);
    const track = await sessions.addTrack(draftName, {
      trackType: requireString(body, "track_type"),
      trackName: optionalString(body, "track_name"),
      relativeIndex: optionalInteger(body, "relative_index"),
    });
    const res: DraftResponse = {
      success: true,
      message: "轨道添加成功",
      draft_name: draftName,
      data: { track_name: track.name },
    };
    return res;
  });

  // 保存草稿到所属文件夹
  fastify.post<DraftParams>("/draft/:draftName/save", async (request) => {
    const { draftName } = request.params;
    const filePath = await sessions.saveDraft(draftName);
    const res: DraftResponse = {
      success: true,
      message: "草稿保存成功",
      draft_name: draftName,
      data: { path: filePath },
    };
    return res;
  });

  // 关闭草稿（只从内存中移除，已保存的文件保留）
  fastify.delete<DraftParams>("/draft/:draftName", async (request) => {
    const { draftName } = request.params;
    await sessions.closeDraft(draftName);
    const res: DraftResponse = {
      success: true,
      message: "草稿已关闭",
      draft_name: draftName,
    };
    return res;
  });
}
