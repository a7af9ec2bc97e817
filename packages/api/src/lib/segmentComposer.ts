import type { FastifyBaseLogger } from "fastify";
import {
  createId,
  InternalError,
  mapMaybe,
  none,
  parseTime,
  some,
  unwrapOr,
  ValidationError,
  type Maybe,
} from "@cutdraft/utils";
import {
  addSegment,
  findSegmentTrack,
  timeRange,
  type DraftName,
  type RGB,
  type Segment,
  type TextBubble,
  type TimeRange,
} from "@cutdraft/draft";
import type {
  AudioSegmentRequest,
  FilterSegmentRequest,
  SegmentPlacement,
  StickerSegmentRequest,
  TextSegmentRequest,
  VideoSegmentRequest,
} from "../types.js";
import type { DraftRegistry } from "./draftRegistry.js";
import type { EffectCatalog } from "./effectCatalog.js";
import type { MaterialProber } from "./materialProbe.js";
import { validatePath } from "./pathGuard.js";
import { checkRange, type NumberRange } from "./requestFields.js";

const VOLUME_RANGE: NumberRange = { min: 0, max: 1 };
const ALPHA_RANGE: NumberRange = { min: 0, max: 1 };
const SCALE_RANGE: NumberRange = { min: 0, max: 5, minInclusive: false };
const TRANSFORM_Y_RANGE: NumberRange = { min: -1, max: 1 };
const BLUR_RANGE: NumberRange = { min: 0, max: 1 };
const COLOR_RANGE: NumberRange = { min: 0, max: 1 };
const FONT_SIZE_RANGE: NumberRange = { min: 0, max: 300, minInclusive: false };
const INTENSITY_RANGE: NumberRange = { min: 0, max: 100 };

const DEFAULT_VOLUME = 1.0;
const DEFAULT_INTENSITY = 100;

export interface SegmentComposerDeps {
  registry: DraftRegistry;
  catalog: EffectCatalog;
  prober: MaterialProber;
  logger?: FastifyBaseLogger;
}

function invalid(message: string): ValidationError {
  return new ValidationError("InvalidParameter", message);
}

function parseStart(startTime: Maybe<string>): number {
  return startTime.present ? parseTime(startTime.value) : 0;
}

function parseColor(color: Maybe<number[]>): Maybe<RGB> {
  if (!color.present) return none;
  if (color.value.length !== 3) {
    throw invalid(`color 必须包含 3 个分量: [${color.value.join(", ")}]`);
  }
  for (const component of color.value) {
    checkRange(some(component), "color", COLOR_RANGE);
  }
  const [r, g, b] = color.value;
  const rgb: RGB = [r, g, b];
  return some(rgb);
}

function parseBubble(
  categoryId: Maybe<string>,
  resourceId: Maybe<string>
): Maybe<TextBubble> {
  if (categoryId.present && resourceId.present) {
    return some({ categoryId: categoryId.value, resourceId: resourceId.value });
  }
  if (categoryId.present || resourceId.present) {
    throw invalid("bubble_category_id 与 bubble_resource_id 需同时提供");
  }
  return none;
}

/**
 * 片段组装：校验请求 → 解析路径 / 时间 / 特效 → 构造完整片段 → 在注册表锁内提交。
 *
 * 所有校验都在提交之前完成，任何一步失败草稿都保持原样。
 */
export class SegmentComposer {
  private readonly registry: DraftRegistry;
  private readonly catalog: EffectCatalog;
  private readonly prober: MaterialProber;
  private readonly log?: FastifyBaseLogger;

  constructor(deps: SegmentComposerDeps) {
    this.registry = deps.registry;
    this.catalog = deps.catalog;
    this.prober = deps.prober;
    this.log = deps.logger;
  }

  async addAudio(
    draftName: DraftName,
    req: AudioSegmentRequest
  ): Promise<SegmentPlacement> {
    await this.registry.assertDraft(draftName);

    const volume = checkRange(req.volume, "volume", VOLUME_RANGE);
    const materialPath = await validatePath(req.materialPath, "file");
    const start = parseStart(req.startTime);
    const duration = mapMaybe(req.duration, parseTime);
    const fadeIn = mapMaybe(req.fadeIn, parseTime);
    const fadeOut = mapMaybe(req.fadeOut, parseTime);
    const range = await this.resolveRange(start, duration, materialPath);

    return this.commit(
      draftName,
      {
        id: createId("segment"),
        kind: "audio",
        range,
        materialPath,
        volume: unwrapOr(volume, DEFAULT_VOLUME),
        fade:
          fadeIn.present || fadeOut.present
            ? some({ in: fadeIn, out: fadeOut })
            : none,
      },
      req.trackName
    );
  }

  async addVideo(
    draftName: DraftName,
    req: VideoSegmentRequest
  ): Promise<SegmentPlacement> {
    await this.registry.assertDraft(draftName);

    const alpha = checkRange(req.alpha, "alpha", ALPHA_RANGE);
    const scale = checkRange(req.scale, "scale", SCALE_RANGE);
    const materialPath = await validatePath(req.materialPath, "file");
    const start = parseStart(req.startTime);
    const duration = mapMaybe(req.duration, parseTime);
    const animation = mapMaybe(req.animationType, (name) =>
      this.catalog.resolve("intro", name)
    );
    const transition = mapMaybe(req.transitionType, (name) =>
      this.catalog.resolve("transition", name)
    );
    const range = await this.resolveRange(start, duration, materialPath);

    return this.commit(
      draftName,
      {
        id: createId("segment"),
        kind: "video",
        range,
        materialPath,
        animation,
        transition,
        clip: alpha.present || scale.present ? some({ alpha, scale }) : none,
      },
      req.trackName
    );
  }

  async addSticker(
    draftName: DraftName,
    req: StickerSegmentRequest
  ): Promise<SegmentPlacement> {
    await this.registry.assertDraft(draftName);

    const backgroundBlur = checkRange(
      req.backgroundBlur,
      "background_blur",
      BLUR_RANGE
    );
    const materialPath = await validatePath(req.materialPath, "file");
    const start = parseStart(req.startTime);
    const duration = mapMaybe(req.duration, parseTime);
    const range = await this.resolveRange(start, duration, materialPath);

    return this.commit(
      draftName,
      {
        id: createId("segment"),
        kind: "sticker",
        range,
        materialPath,
        backgroundBlur,
      },
      req.trackName
    );
  }

  async addText(
    draftName: DraftName,
    req: TextSegmentRequest
  ): Promise<SegmentPlacement> {
    await this.registry.assertDraft(draftName);

    if (req.text.length === 0) {
      throw invalid("text 不能为空");
    }
    const size = checkRange(req.size, "size", FONT_SIZE_RANGE);
    const color = parseColor(req.color);
    const transformY = checkRange(
      req.transformY,
      "transform_y",
      TRANSFORM_Y_RANGE
    );
    const bubble = parseBubble(req.bubbleCategoryId, req.bubbleResourceId);
    const range = timeRange(parseStart(req.startTime), parseTime(req.duration));
    const font = mapMaybe(req.font, (name) => this.catalog.resolve("font", name));
    const animation = mapMaybe(req.animationType, (name) =>
      this.catalog.resolveTextAnimation(name)
    );

    return this.commit(
      draftName,
      {
        id: createId("segment"),
        kind: "text",
        range,
        text: req.text,
        font,
        style: size.present || color.present ? some({ size, color }) : none,
        transformY,
        animation,
        bubble,
        effectResourceId: req.effectResourceId,
      },
      req.trackName
    );
  }

  async addFilter(
    draftName: DraftName,
    req: FilterSegmentRequest
  ): Promise<SegmentPlacement> {
    await this.registry.assertDraft(draftName);

    const intensity = checkRange(req.intensity, "intensity", INTENSITY_RANGE);
    const range = timeRange(parseStart(req.startTime), parseTime(req.duration));
    const filter = this.catalog.resolve("filter", req.filterType);

    return this.commit(
      draftName,
      {
        id: createId("segment"),
        kind: "filter",
        range,
        filter,
        intensity: unwrapOr(intensity, DEFAULT_INTENSITY),
      },
      req.trackName
    );
  }

  /**
   * 未指定时长时沿用素材时长，探测不到则要求调用方显式提供。
   */
  private async resolveRange(
    start: number,
    duration: Maybe<number>,
    materialPath: string
  ): Promise<TimeRange> {
    if (duration.present) {
      return timeRange(start, duration.value);
    }
    const probed = await this.prober.probeDuration(materialPath);
    if (probed === undefined) {
      throw invalid(`无法获取素材时长，请显式指定 duration: ${materialPath}`);
    }
    return timeRange(start, probed);
  }

  private async commit(
    draftName: DraftName,
    segment: Segment,
    trackName: Maybe<string>
  ): Promise<SegmentPlacement> {
    const draft = await this.registry.updateDraft(draftName, (current) =>
      addSegment(
        current,
        segment,
        trackName.present ? trackName.value : undefined
      )
    );
    const track = findSegmentTrack(draft, segment.id);
    if (!track) {
      throw new InternalError(`片段 ${segment.id} 提交后未找到所在轨道`);
    }
    this.log?.info(
      {
        draftName,
        segmentId: segment.id,
        kind: segment.kind,
        trackName: track.name,
      },
      "片段已添加"
    );
    return {
      segmentId: segment.id,
      trackName: track.name,
      start: segment.range.start,
      duration: segment.range.duration,
    };
  }
}
