import { execFile } from "node:child_process";
import { promisify } from "node:util";
import type { FastifyBaseLogger } from "fastify";
import { SEC } from "@cutdraft/utils";

const execFileAsync = promisify(execFile);

/**
 * 读取素材自身属性的协作方。片段未指定时长时，用素材的自然时长补齐。
 */
export interface MaterialProber {
  /**
   * @returns 素材时长（微秒）；图片等无时长素材或探测失败时返回 undefined
   */
  probeDuration(filePath: string): Promise<number | undefined>;
}

const DURATION_REGEX = /Duration:\s*(\d{2}):(\d{2}):(\d{2})\.(\d+)/;

/**
 * 从 ffmpeg -i 的输出中解析 Duration 行，返回微秒。
 */
export function parseFfmpegDuration(output: string): number | undefined {
  const m = output.match(DURATION_REGEX);
  if (!m) return undefined;
  const [, h, min, sec, frac] = m;
  const seconds =
    parseInt(h, 10) * 3600 +
    parseInt(min, 10) * 60 +
    parseInt(sec, 10) +
    parseInt(frac, 10) / Math.pow(10, frac.length);
  const micros = Math.round(seconds * SEC);
  return micros > 0 ? micros : undefined;
}

function stderrOf(err: unknown): string | undefined {
  if (
    typeof err === "object" &&
    err !== null &&
    "stderr" in err &&
    typeof err.stderr === "string"
  ) {
    return err.stderr;
  }
  return undefined;
}

/**
 * 使用 ffmpeg 获取素材时长，无需 ffprobe。
 *
 * 只给 -i 不给输出时 ffmpeg 以非 0 退出，但 stderr 里已经打印了 Duration，
 * 因此失败分支同样解析 stderr。
 */
export class FfmpegMaterialProber implements MaterialProber {
  constructor(
    private readonly ffmpegBin: string,
    private readonly log?: FastifyBaseLogger
  ) {}

  async probeDuration(filePath: string): Promise<number | undefined> {
    let output: string | undefined;
    try {
      const { stderr } = await execFileAsync(
        this.ffmpegBin,
        ["-hide_banner", "-i", filePath],
        { encoding: "utf-8" }
      );
      output = stderr;
    } catch (err) {
      output = stderrOf(err);
      if (output === undefined) {
        this.log?.warn({ err, filePath }, "调用 ffmpeg 失败");
        return undefined;
      }
    }
    return parseFfmpegDuration(output);
  }
}
