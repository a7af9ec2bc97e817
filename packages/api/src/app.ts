import Fastify, { type FastifyInstance } from "fastify";
import cors from "@fastify/cors";
import type { LogLevel } from "./config.js";
import { DraftRegistry } from "./lib/draftRegistry.js";
import { DraftSessions } from "./lib/draftSessions.js";
import { JsonDraftWriter, type DraftWriter } from "./lib/draftWriter.js";
import type { EffectCatalog } from "./lib/effectCatalog.js";
import { registerErrorHandler } from "./lib/httpErrors.js";
import {
  FfmpegMaterialProber,
  type MaterialProber,
} from "./lib/materialProbe.js";
import { SegmentComposer } from "./lib/segmentComposer.js";
import { draftRoutes } from "./routes/drafts.js";
import { folderRoutes } from "./routes/folders.js";
import { healthRoutes } from "./routes/health.js";
import { metadataRoutes } from "./routes/metadata.js";
import { segmentRoutes } from "./routes/segments.js";

export interface BuildAppOptions {
  catalog: EffectCatalog;
  /** false 关闭日志（测试用） */
  logger?: false | { level: LogLevel };
  /** 以下协作方不传时使用默认实现 */
  registry?: DraftRegistry;
  writer?: DraftWriter;
  prober?: MaterialProber;
  ffmpegPath?: string;
  corsOrigin?: boolean | string[];
}

/**
 * 组装 Fastify 实例：插件、错误处理、各路由模块及其依赖。
 * 不负责监听端口，测试直接对返回的实例调用 inject。
 */
export async function buildApp(
  options: BuildAppOptions
): Promise<FastifyInstance> {
  const fastify = Fastify({ logger: options.logger ?? true });

  await fastify.register(cors, { origin: options.corsOrigin ?? true });
  registerErrorHandler(fastify);

  const registry =
    options.registry ?? new DraftRegistry({ logger: fastify.log });
  const prober =
    options.prober ??
    new FfmpegMaterialProber(options.ffmpegPath ?? "ffmpeg", fastify.log);
  const sessions = new DraftSessions({
    registry,
    catalog: options.catalog,
    writer: options.writer ?? new JsonDraftWriter(),
    logger: fastify.log,
  });
  const composer = new SegmentComposer({
    registry,
    catalog: options.catalog,
    prober,
    logger: fastify.log,
  });

  await fastify.register(healthRoutes, { registry });
  await fastify.register(folderRoutes, { sessions });
  await fastify.register(draftRoutes, { sessions });
  await fastify.register(segmentRoutes, { composer });
  await fastify.register(metadataRoutes, { sessions });

  return fastify;
}
