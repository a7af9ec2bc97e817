import { afterEach, beforeEach, describe, it, expect } from "vitest";
import { none, some } from "@cutdraft/utils";
import { addTrack, findSegmentTrack, type Segment, type TrackKind } from "@cutdraft/draft";
import { DraftRegistry } from "../lib/draftRegistry.js";
import { SegmentComposer } from "../lib/segmentComposer.js";
import type {
  AudioSegmentRequest,
  FilterSegmentRequest,
  StickerSegmentRequest,
  TextSegmentRequest,
  VideoSegmentRequest,
} from "../types.js";
import {
  FakeProber,
  makeTempDir,
  rejectionCode,
  removeDir,
  testCatalog,
  touchFile,
} from "./helpers.js";

describe("SegmentComposer", () => {
  let dir: string;
  let mediaPath: string;
  let registry: DraftRegistry;
  let prober: FakeProber;
  let composer: SegmentComposer;

  beforeEach(async () => {
    dir = await makeTempDir();
    mediaPath = await touchFile(dir, "material.mp4");
    registry = new DraftRegistry();
    await registry.registerFolder("f1", dir);
    await registry.createDraft({
      folderId: "f1",
      name: "d1",
      width: 1920,
      height: 1080,
      allowReplace: false,
    });
    prober = new FakeProber(7_000_000);
    composer = new SegmentComposer({ registry, catalog: testCatalog(), prober });
  });

  afterEach(async () => {
    await removeDir(dir);
  });

  async function withTrack(kind: TrackKind, name?: string): Promise<void> {
    await registry.updateDraft("d1", (d) =>
      addTrack(d, { id: `track-${kind}-${name ?? "default"}`, kind, name })
    );
  }

  async function stored(segmentId: string): Promise<Segment | undefined> {
    const draft = await registry.getDraft("d1");
    return findSegmentTrack(draft, segmentId)?.segments.find((s) => s.id === segmentId);
  }

  function audioReq(overrides: Partial<AudioSegmentRequest> = {}): AudioSegmentRequest {
    return {
      materialPath: mediaPath,
      startTime: none,
      trackName: none,
      duration: some("5s"),
      volume: none,
      fadeIn: none,
      fadeOut: none,
      ...overrides,
    };
  }

  function videoReq(overrides: Partial<VideoSegmentRequest> = {}): VideoSegmentRequest {
    return {
      materialPath: mediaPath,
      startTime: none,
      trackName: none,
      duration: some("3s"),
      animationType: none,
      transitionType: none,
      alpha: none,
      scale: none,
      ...overrides,
    };
  }

  function stickerReq(
    overrides: Partial<StickerSegmentRequest> = {}
  ): StickerSegmentRequest {
    return {
      materialPath: mediaPath,
      startTime: none,
      trackName: none,
      duration: some("2s"),
      backgroundBlur: none,
      ...overrides,
    };
  }

  function textReq(overrides: Partial<TextSegmentRequest> = {}): TextSegmentRequest {
    return {
      text: "字幕",
      startTime: none,
      trackName: none,
      duration: "2s",
      font: none,
      size: none,
      color: none,
      transformY: none,
      animationType: none,
      bubbleCategoryId: none,
      bubbleResourceId: none,
      effectResourceId: none,
      ...overrides,
    };
  }

  function filterReq(overrides: Partial<FilterSegmentRequest> = {}): FilterSegmentRequest {
    return {
      filterType: "黑白",
      startTime: none,
      trackName: none,
      duration: "4s",
      intensity: none,
      ...overrides,
    };
  }

  describe("音频", () => {
    it("添加到默认音频轨并返回落点", async () => {
      await withTrack("audio");
      const placement = await composer.addAudio(
        "d1",
        audioReq({ startTime: some("1s") })
      );
      expect(placement).toMatchObject({
        trackName: "audio",
        start: 1_000_000,
        duration: 5_000_000,
      });
      expect(placement.segmentId).toMatch(/^segment-/);
      expect(await stored(placement.segmentId)).toMatchObject({
        kind: "audio",
        materialPath: mediaPath,
        volume: 1,
        fade: none,
      });
    });

    it("未提供淡入淡出与 0s 淡入结果不同", async () => {
      await withTrack("audio");
      const plain = await composer.addAudio("d1", audioReq());
      const zeroFade = await composer.addAudio(
        "d1",
        audioReq({ startTime: some("5s"), fadeIn: some("0s") })
      );
      expect(await stored(plain.segmentId)).toMatchObject({ fade: none });
      expect(await stored(zeroFade.segmentId)).toMatchObject({
        fade: some({ in: some(0), out: none }),
      });
    });

    it("未指定时长时沿用素材时长", async () => {
      await withTrack("audio");
      const placement = await composer.addAudio("d1", audioReq({ duration: none }));
      expect(placement.duration).toBe(7_000_000);
      expect(prober.probed).toEqual([mediaPath]);
    });

    it("指定时长时不探测素材", async () => {
      await withTrack("audio");
      await composer.addAudio("d1", audioReq());
      expect(prober.probed).toEqual([]);
    });

    it("探测不到素材时长时要求显式提供", async () => {
      await withTrack("audio");
      const blind = new SegmentComposer({
        registry,
        catalog: testCatalog(),
        prober: new FakeProber(undefined),
      });
      expect(await rejectionCode(blind.addAudio("d1", audioReq({ duration: none })))).toBe(
        "InvalidParameter"
      );
    });

    it("音量越界在修改草稿前被拒绝", async () => {
      await withTrack("audio");
      const before = await registry.getDraft("d1");
      expect(await rejectionCode(composer.addAudio("d1", audioReq({ volume: some(1.5) })))).toBe(
        "InvalidParameter"
      );
      expect(await registry.getDraft("d1")).toEqual(before);
    });

    it("拒绝路径穿越和不存在的素材", async () => {
      await withTrack("audio");
      expect(
        await rejectionCode(composer.addAudio("d1", audioReq({ materialPath: "../secret" })))
      ).toBe("PathTraversal");
      expect(
        await rejectionCode(
          composer.addAudio("d1", audioReq({ materialPath: `${dir}/missing.mp3` }))
        )
      ).toBe("FileNotFound");
    });

    it("非法时间字符串报 InvalidTimeFormat", async () => {
      await withTrack("audio");
      expect(
        await rejectionCode(composer.addAudio("d1", audioReq({ startTime: some("1 s") })))
      ).toBe("InvalidTimeFormat");
    });

    it("淡入淡出数值过大时报 InvalidTimeFormat 且草稿不变", async () => {
      await withTrack("audio");
      const before = await registry.getDraft("d1");
      expect(
        await rejectionCode(
          composer.addAudio("d1", audioReq({ fadeIn: some("9".repeat(400) + "s") }))
        )
      ).toBe("InvalidTimeFormat");
      expect(
        await rejectionCode(composer.addAudio("d1", audioReq({ fadeOut: some("9999999999h") })))
      ).toBe("InvalidTimeFormat");
      expect(await registry.getDraft("d1")).toEqual(before);
    });

    it("时间重叠报 SegmentOverlap", async () => {
      await withTrack("audio");
      await composer.addAudio("d1", audioReq());
      expect(
        await rejectionCode(composer.addAudio("d1", audioReq({ startTime: some("4s") })))
      ).toBe("SegmentOverlap");
    });
  });

  describe("轨道选择", () => {
    it("草稿不存在报 DraftNotFound", async () => {
      expect(await rejectionCode(composer.addAudio("nope", audioReq()))).toBe(
        "DraftNotFound"
      );
    });

    it("没有同类轨道报 NoCompatibleTrack", async () => {
      expect(await rejectionCode(composer.addAudio("d1", audioReq()))).toBe(
        "NoCompatibleTrack"
      );
    });

    it("按名称指定轨道", async () => {
      await withTrack("audio");
      await withTrack("audio", "bgm");
      const placement = await composer.addAudio(
        "d1",
        audioReq({ trackName: some("bgm") })
      );
      expect(placement.trackName).toBe("bgm");
    });

    it("指定轨道不存在或类型不符", async () => {
      await withTrack("text", "subtitles");
      expect(
        await rejectionCode(composer.addAudio("d1", audioReq({ trackName: some("none") })))
      ).toBe("TrackNotFound");
      expect(
        await rejectionCode(
          composer.addAudio("d1", audioReq({ trackName: some("subtitles") }))
        )
      ).toBe("IncompatibleTrack");
    });

    it("并发添加 N 个片段全部落到轨道上", async () => {
      await withTrack("audio");
      const placements = await Promise.all(
        Array.from({ length: 12 }, (_, i) =>
          composer.addAudio(
            "d1",
            audioReq({ startTime: some(`${i * 5}s`), duration: some("5s") })
          )
        )
      );
      const draft = await registry.getDraft("d1");
      expect(draft.tracks[0].segments).toHaveLength(12);
      expect(new Set(placements.map((p) => p.segmentId)).size).toBe(12);
    });
  });

  describe("视频与贴纸", () => {
    it("解析入场动画与转场，记录画面参数", async () => {
      await withTrack("video");
      const placement = await composer.addVideo(
        "d1",
        videoReq({
          animationType: some("斜切"),
          transitionType: some("信号故障"),
          alpha: some(0),
        })
      );
      expect(await stored(placement.segmentId)).toMatchObject({
        kind: "video",
        animation: some({ name: "斜切", id: "7000000000000000011", duration: some(500_000) }),
        transition: some({ name: "信号故障" }),
        clip: some({ alpha: some(0), scale: none }),
      });
    });

    it("未提供 alpha 和 scale 时没有画面参数", async () => {
      await withTrack("video");
      const placement = await composer.addVideo("d1", videoReq());
      expect(await stored(placement.segmentId)).toMatchObject({ clip: none });
    });

    it("未知动画报 UnknownEffectName 且草稿不变", async () => {
      await withTrack("video");
      const before = await registry.getDraft("d1");
      expect(
        await rejectionCode(composer.addVideo("d1", videoReq({ animationType: some("不存在") })))
      ).toBe("UnknownEffectName");
      expect(await registry.getDraft("d1")).toEqual(before);
    });

    it("scale 必须大于 0", async () => {
      await withTrack("video");
      expect(await rejectionCode(composer.addVideo("d1", videoReq({ scale: some(0) })))).toBe(
        "InvalidParameter"
      );
    });

    it("贴纸放到视频轨，0 模糊也会被记录", async () => {
      await withTrack("video");
      const placement = await composer.addSticker(
        "d1",
        stickerReq({ backgroundBlur: some(0) })
      );
      expect(placement.trackName).toBe("video");
      expect(await stored(placement.segmentId)).toMatchObject({
        kind: "sticker",
        backgroundBlur: some(0),
      });
    });
  });

  describe("文本", () => {
    it("记录字体、样式与文字动画", async () => {
      await withTrack("text");
      const placement = await composer.addText(
        "d1",
        textReq({
          font: some("文轩体"),
          size: some(8),
          color: some([1, 0.5, 0]),
          transformY: some(-0.8),
          animationType: some("打字机 I"),
        })
      );
      expect(placement.duration).toBe(2_000_000);
      expect(await stored(placement.segmentId)).toMatchObject({
        kind: "text",
        text: "字幕",
        font: some({ name: "文轩体" }),
        style: some({ size: some(8), color: some([1, 0.5, 0]) }),
        transformY: some(-0.8),
        animation: some({ catalog: "textOutro", duration: some(500_000) }),
        bubble: none,
      });
    });

    it("没有样式参数时 style 为空", async () => {
      await withTrack("text");
      const placement = await composer.addText("d1", textReq());
      expect(await stored(placement.segmentId)).toMatchObject({ style: none });
    });

    it("气泡 id 需成对提供", async () => {
      await withTrack("text");
      expect(
        await rejectionCode(composer.addText("d1", textReq({ bubbleCategoryId: some("c1") })))
      ).toBe("InvalidParameter");
      const placement = await composer.addText(
        "d1",
        textReq({ bubbleCategoryId: some("c1"), bubbleResourceId: some("r1") })
      );
      expect(await stored(placement.segmentId)).toMatchObject({
        bubble: some({ categoryId: "c1", resourceId: "r1" }),
      });
    });

    it("颜色必须是 3 个 0-1 之间的分量", async () => {
      await withTrack("text");
      expect(
        await rejectionCode(composer.addText("d1", textReq({ color: some([1, 1]) })))
      ).toBe("InvalidParameter");
      expect(
        await rejectionCode(composer.addText("d1", textReq({ color: some([1, 2, 0]) })))
      ).toBe("InvalidParameter");
    });

    it("文本为空或字号越界时拒绝", async () => {
      await withTrack("text");
      expect(await rejectionCode(composer.addText("d1", textReq({ text: "" })))).toBe(
        "InvalidParameter"
      );
      expect(await rejectionCode(composer.addText("d1", textReq({ size: some(0) })))).toBe(
        "InvalidParameter"
      );
    });

    it("未知字体与文字动画报 UnknownEffectName", async () => {
      await withTrack("text");
      expect(await rejectionCode(composer.addText("d1", textReq({ font: some("无此字体") })))).toBe(
        "UnknownEffectName"
      );
      expect(
        await rejectionCode(composer.addText("d1", textReq({ animationType: some("斜切") })))
      ).toBe("UnknownEffectName");
    });
  });

  describe("滤镜", () => {
    it("默认强度 100", async () => {
      await withTrack("filter");
      const placement = await composer.addFilter("d1", filterReq());
      expect(await stored(placement.segmentId)).toMatchObject({
        kind: "filter",
        filter: { name: "黑白", id: "7000000000000000062" },
        intensity: 100,
      });
    });

    it("强度越界或滤镜未知时拒绝", async () => {
      await withTrack("filter");
      expect(
        await rejectionCode(composer.addFilter("d1", filterReq({ intensity: some(101) })))
      ).toBe("InvalidParameter");
      expect(
        await rejectionCode(composer.addFilter("d1", filterReq({ filterType: "彩色" })))
      ).toBe("UnknownEffectName");
    });
  });
});
