import type { FastifyInstance } from "fastify";
import type { DraftRegistry } from "../lib/draftRegistry.js";

export interface HealthRouteOptions {
  registry: DraftRegistry;
}

// 服务信息与健康检查
export async function healthRoutes(
  fastify: FastifyInstance,
  opts: HealthRouteOptions
): Promise<void> {
  fastify.get("/", async () => ({
    name: "cutdraft",
    version: "1.0.0",
    description: "剪辑草稿编排服务：登记草稿文件夹、创建草稿、添加轨道与片段并保存",
  }));

  fastify.get("/health", async () => {
    const stats = await opts.registry.stats();
    return { status: "ok" as const, ...stats };
  });
}
