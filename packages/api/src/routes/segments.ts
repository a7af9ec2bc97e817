import type { FastifyInstance } from "fastify";
import type { SegmentComposer } from "../lib/segmentComposer.js";
import {
  asBody,
  optionalNumber,
  optionalName,
  optionalNumberArray,
  optionalString,
  requireNonEmptyString,
  requireString,
  type JsonBody,
} from "../lib/requestFields.js";
import type { DraftResponse, SegmentPlacement } from "../types.js";

export interface SegmentRouteOptions {
  composer: SegmentComposer;
}

type DraftParams = { Params: { draftName: string } };

function placementResponse(
  draftName: string,
  label: string,
  placement: SegmentPlacement
): DraftResponse {
  return {
    success: true,
    message: `${label}片段添加成功`,
    draft_name: draftName,
    data: {
      segment_id: placement.segmentId,
      track_name: placement.trackName,
      start: placement.start,
      duration: placement.duration,
    },
  };
}

// 各类片段共有的 start_time / track_name
function placementFields(body: JsonBody) {
  return {
    startTime: optionalString(body, "start_time"),
    trackName: optionalString(body, "track_name"),
  };
}

// 片段相关路由：音频、视频、贴纸、文本、滤镜
export async function segmentRoutes(
  fastify: FastifyInstance,
  opts: SegmentRouteOptions
): Promise<void> {
  const { composer } = opts;

  fastify.post<DraftParams>(
    "/draft/:draftName/segment/audio",
    async (request) => {
      const { draftName } = request.params;
      const body = asBody(request.body);
      const placement = await composer.addAudio(draftName, {
        ...placementFields(body),
        materialPath: requireString(body, "material_path"),
        duration: optionalString(body, "duration"),
        volume: optionalNumber(body, "volume"),
        fadeIn: optionalString(body, "fade_in"),
        fadeOut: optionalString(body, "fade_out"),
      });
      return placementResponse(draftName, "音频", placement);
    }
  );

  fastify.post<DraftParams>(
    "/draft/:draftName/segment/video",
    async (request) => {
      const { draftName } = request.params;
      const body = asBody(request.body);
      const placement = await composer.addVideo(draftName, {
        ...placementFields(body),
        materialPath: requireString(body, "material_path"),
        duration: optionalString(body, "duration"),
        animationType: optionalName(body, "animation_type"),
        transitionType: optionalName(body, "transition_type"),
        alpha: optionalNumber(body, "alpha"),
        scale: optionalNumber(body, "scale"),
      });
      return placementResponse(draftName, "视频", placement);
    }
  );

  fastify.post<DraftParams>(
    "/draft/:draftName/segment/sticker",
    async (request) => {
      const { draftName } = request.params;
      const body = asBody(request.body);
      const placement = await composer.addSticker(draftName, {
        ...placementFields(body),
        materialPath: requireString(body, "material_path"),
        duration: optionalString(body, "duration"),
        backgroundBlur: optionalNumber(body, "background_blur"),
      });
      return placementResponse(draftName, "贴纸", placement);
    }
  );

  /**
   * 添加文本片段
   * 请求体需要 text、duration；其余样式、动画、气泡、花字参数均可选
   */
  fastify.post<DraftParams>(
    "/draft/:draftName/segment/text",
    async (request) => {
      const { draftName } = request.params;
      const body = asBody(request.body);
      const placement = await composer.addText(draftName, {
        ...placementFields(body),
        text: requireNonEmptyString(body, "text"),
        duration: requireString(body, "duration"),
        font: optionalName(body, "font"),
        size: optionalNumber(body, "size"),
        color: optionalNumberArray(body, "color"),
        transformY: optionalNumber(body, "transform_y"),
        animationType: optionalName(body, "animation_type"),
        bubbleCategoryId: optionalString(body, "bubble_category_id"),
        bubbleResourceId: optionalString(body, "bubble_resource_id"),
        effectResourceId: optionalString(body, "effect_resource_id"),
      });
      return placementResponse(draftName, "文本", placement);
    }
  );

  fastify.post<DraftParams>(
    "/draft/:draftName/segment/filter",
    async (request) => {
      const { draftName } = request.params;
      const body = asBody(request.body);
      const placement = await composer.addFilter(draftName, {
        ...placementFields(body),
        filterType: requireString(body, "filter_type"),
        duration: requireString(body, "duration"),
        intensity: optionalNumber(body, "intensity"),
      });
      return placementResponse(draftName, "滤镜", placement);
    }
  );
}
