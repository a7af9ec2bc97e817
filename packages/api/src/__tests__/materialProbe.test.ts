import { describe, it, expect } from "vitest";
import { FfmpegMaterialProber, parseFfmpegDuration } from "../lib/materialProbe.js";

const FFMPEG_OUTPUT = `Input #0, mov,mp4,m4a,3gp,3g2,mj2, from 'clip.mp4':
  Metadata:
    major_brand     : isom
  Duration: 00:01:03.52, start: 0.000000, bitrate: 1205 kb/s
  Stream #0:0(und): Video: h264 (High), yuv420p, 1920x1080, 30 fps
At least one output file must be specified`;

describe("parseFfmpegDuration", () => {
  it("解析 Duration 行为微秒", () => {
    expect(parseFfmpegDuration(FFMPEG_OUTPUT)).toBe(63_520_000);
  });

  it("没有 Duration 或时长为 0 时返回 undefined", () => {
    expect(parseFfmpegDuration("clip.png: Invalid data found")).toBeUndefined();
    expect(parseFfmpegDuration("Duration: 00:00:00.00, start: 0")).toBeUndefined();
  });
});

describe("FfmpegMaterialProber", () => {
  it("ffmpeg 不可用时返回 undefined", async () => {
    const prober = new FfmpegMaterialProber("/nonexistent/ffmpeg");
    await expect(prober.probeDuration("clip.mp4")).resolves.toBeUndefined();
  });
});
