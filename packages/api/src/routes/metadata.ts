import type { FastifyInstance } from "fastify";
import type { DraftSessions } from "../lib/draftSessions.js";
import type { CatalogKind } from "../lib/effectCatalog.js";

export interface MetadataRouteOptions {
  sessions: DraftSessions;
}

// 路由路径 → 目录及响应中的列表字段名
const METADATA_ROUTES: readonly {
  url: string;
  kind: CatalogKind;
  field: "fonts" | "animations" | "transitions" | "filters";
}[] = [
  { url: "/metadata/fonts", kind: "font", field: "fonts" },
  { url: "/metadata/animations/intro", kind: "intro", field: "animations" },
  { url: "/metadata/animations/outro", kind: "outro", field: "animations" },
  {
    url: "/metadata/animations/text-intro",
    kind: "textIntro",
    field: "animations",
  },
  {
    url: "/metadata/animations/text-outro",
    kind: "textOutro",
    field: "animations",
  },
  { url: "/metadata/transitions", kind: "transition", field: "transitions" },
  { url: "/metadata/filters", kind: "filter", field: "filters" },
];

// 特效目录查询路由（只读）
export async function metadataRoutes(
  fastify: FastifyInstance,
  opts: MetadataRouteOptions
): Promise<void> {
  for (const route of METADATA_ROUTES) {
    fastify.get(route.url, async () => {
      const names = opts.sessions.listCatalog(route.kind);
      return { success: true, count: names.length, [route.field]: names };
    });
  }
}
