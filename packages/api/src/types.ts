import type { Maybe } from "@cutdraft/utils";

/**
 * 各接口请求体经 requestFields 解析后的结构。
 *
 * 线上字段为 snake_case（如 material_path），这里统一转成驼峰；
 * 可选字段一律用 Maybe 表示，保留“未提供”与“提供了 0”的区别。
 */

export interface RegisterFolderRequest {
  folderId: string;
  folderPath: string;
}

export interface CreateDraftRequest {
  folderId: string;
  draftName: string;
  width: Maybe<number>;
  height: Maybe<number>;
  allowReplace: Maybe<boolean>;
}

export interface AddTrackRequest {
  trackType: string;
  trackName: Maybe<string>;
  relativeIndex: Maybe<number>;
}

/** 所有片段请求共有的定位字段 */
interface SegmentPlacementRequest {
  /** 缺省为 "0s" */
  startTime: Maybe<string>;
  trackName: Maybe<string>;
}

export interface AudioSegmentRequest extends SegmentPlacementRequest {
  materialPath: string;
  /** 缺省时沿用素材时长 */
  duration: Maybe<string>;
  volume: Maybe<number>;
  fadeIn: Maybe<string>;
  fadeOut: Maybe<string>;
}

export interface VideoSegmentRequest extends SegmentPlacementRequest {
  materialPath: string;
  duration: Maybe<string>;
  animationType: Maybe<string>;
  transitionType: Maybe<string>;
  alpha: Maybe<number>;
  scale: Maybe<number>;
}

export interface StickerSegmentRequest extends SegmentPlacementRequest {
  materialPath: string;
  duration: Maybe<string>;
  backgroundBlur: Maybe<number>;
}

export interface TextSegmentRequest extends SegmentPlacementRequest {
  text: string;
  duration: string;
  font: Maybe<string>;
  size: Maybe<number>;
  color: Maybe<number[]>;
  transformY: Maybe<number>;
  animationType: Maybe<string>;
  bubbleCategoryId: Maybe<string>;
  bubbleResourceId: Maybe<string>;
  effectResourceId: Maybe<string>;
}

export interface FilterSegmentRequest extends SegmentPlacementRequest {
  filterType: string;
  duration: string;
  intensity: Maybe<number>;
}

/**
 * 片段添加成功后的落点信息（时间单位：微秒）。
 */
export interface SegmentPlacement {
  segmentId: string;
  trackName: string;
  start: number;
  duration: number;
}

/**
 * 草稿类接口的统一响应结构。
 */
export interface DraftResponse<T = Record<string, unknown>> {
  success: true;
  message: string;
  draft_name?: string;
  data?: T;
}

/**
 * 失败响应。code 为业务错误码（如 PathTraversal、UnknownEffectName）。
 */
export interface ErrorResponse {
  success: false;
  error: string;
  code: string;
}
