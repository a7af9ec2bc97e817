import type { FastifyInstance } from "fastify";
import {
  ConflictError,
  NotFoundError,
  PathSecurityError,
  ValidationError,
  isAppError,
} from "@cutdraft/utils";
import type { ErrorResponse } from "../types.js";

export interface MappedError {
  statusCode: number;
  body: ErrorResponse;
}

function clientStatusOf(error: unknown): number | undefined {
  if (
    typeof error === "object" &&
    error !== null &&
    "statusCode" in error &&
    typeof error.statusCode === "number" &&
    error.statusCode >= 400 &&
    error.statusCode < 500
  ) {
    return error.statusCode;
  }
  return undefined;
}

/**
 * 把异常映射为 HTTP 状态码与统一的错误响应体。
 *
 * 校验 / 路径安全 / 状态冲突 → 400，资源不存在 → 404，其余 → 500。
 * 非业务异常不向调用方暴露细节。
 */
export function toErrorResponse(error: unknown): MappedError {
  if (isAppError(error)) {
    let statusCode = 500;
    if (
      error instanceof ValidationError ||
      error instanceof PathSecurityError ||
      error instanceof ConflictError
    ) {
      statusCode = 400;
    } else if (error instanceof NotFoundError) {
      statusCode = 404;
    }
    return {
      statusCode,
      body: { success: false, error: error.message, code: error.code },
    };
  }

  // Fastify 自身的请求错误（JSON 解析失败、Content-Type 不支持等）
  const clientStatus = clientStatusOf(error);
  if (clientStatus !== undefined && error instanceof Error) {
    return {
      statusCode: clientStatus,
      body: { success: false, error: error.message, code: "InvalidParameter" },
    };
  }

  return {
    statusCode: 500,
    body: { success: false, error: "服务器内部错误", code: "Internal" },
  };
}

/**
 * 注册全局错误处理与 404 处理。路由内只管抛出业务错误。
 */
export function registerErrorHandler(fastify: FastifyInstance): void {
  fastify.setErrorHandler((error, request, reply) => {
    const { statusCode, body } = toErrorResponse(error);
    if (error instanceof PathSecurityError) {
      request.log.warn({ err: error }, "拒绝可疑路径");
    } else if (statusCode >= 500) {
      request.log.error({ err: error }, "请求处理失败");
    } else {
      request.log.info({ code: body.code, msg: body.error }, "请求被拒绝");
    }
    return reply.status(statusCode).send(body);
  });

  fastify.setNotFoundHandler((request, reply) => {
    const body: ErrorResponse = {
      success: false,
      error: `接口不存在: ${request.method} ${request.url}`,
      code: "RouteNotFound",
    };
    return reply.status(404).send(body);
  });
}
