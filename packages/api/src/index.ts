import "./loadEnv.js";
import { buildApp } from "./app.js";
import { loadConfig } from "./config.js";
import { EffectCatalog } from "./lib/effectCatalog.js";

const config = loadConfig();

// 特效目录启动时加载一次，之后只读
const catalog = await EffectCatalog.fromFile(config.catalogPath);

const fastify = await buildApp({
  catalog,
  logger: { level: config.logLevel },
  ffmpegPath: config.ffmpegPath,
  corsOrigin: config.corsOrigin,
});

try {
  await fastify.listen({ port: config.port, host: config.host });
} catch (err) {
  // 启动失败时记录错误并退出进程
  fastify.log.error(err);
  process.exit(1);
}
