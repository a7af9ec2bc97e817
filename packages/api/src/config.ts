import { DEFAULT_CATALOG_PATH } from "./lib/effectCatalog.js";

export type LogLevel =
  | "fatal"
  | "error"
  | "warn"
  | "info"
  | "debug"
  | "trace"
  | "silent";

const LOG_LEVELS: readonly LogLevel[] = [
  "fatal",
  "error",
  "warn",
  "info",
  "debug",
  "trace",
  "silent",
];

function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

/**
 * 服务运行配置，全部来自环境变量（loadEnv 负责把 .env 文件读进 process.env）。
 */
export interface AppConfig {
  /** 监听端口，默认 8000 */
  port: number;
  /** 监听地址，默认 0.0.0.0 */
  host: string;
  logLevel: LogLevel;
  /** 探测素材时长用的 ffmpeg 可执行文件 */
  ffmpegPath: string;
  /** 特效目录 JSON 文件 */
  catalogPath: string;
  /** true 表示反射请求来源；否则为允许的来源列表 */
  corsOrigin: boolean | string[];
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const port = env.PORT ? Number(env.PORT) : 8000;
  if (!Number.isInteger(port) || port <= 0 || port > 65535) {
    throw new Error(`PORT 配置无效: ${env.PORT}`);
  }

  const logLevel = env.LOG_LEVEL?.trim().toLowerCase() || "info";
  if (!isLogLevel(logLevel)) {
    throw new Error(`LOG_LEVEL 配置无效: ${env.LOG_LEVEL}`);
  }

  const rawOrigin = env.CORS_ORIGIN?.trim();
  const corsOrigin =
    !rawOrigin || rawOrigin === "*"
      ? true
      : rawOrigin
          .split(",")
          .map((s) => s.trim())
          .filter(Boolean);

  return {
    port,
    host: env.HOST?.trim() || "0.0.0.0",
    logLevel,
    // 优先使用 FFMPEG_PATH，否则依赖 PATH 中的 ffmpeg
    ffmpegPath: env.FFMPEG_PATH?.trim() || "ffmpeg",
    catalogPath: env.CATALOG_PATH?.trim() || DEFAULT_CATALOG_PATH,
    corsOrigin,
  };
}
