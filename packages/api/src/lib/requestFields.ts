import {
  none,
  some,
  ValidationError,
  type Maybe,
} from "@cutdraft/utils";

/** 已确认是 JSON 对象的请求体 */
export type JsonBody = Record<string, unknown>;

function invalid(message: string): ValidationError {
  return new ValidationError("InvalidParameter", message);
}

/**
 * 确认请求体是 JSON 对象；body 缺省（如无请求体的 POST）时按空对象处理。
 */
export function asBody(value: unknown): JsonBody {
  if (value === undefined || value === null) return {};
  if (typeof value !== "object" || Array.isArray(value)) {
    throw invalid("请求体必须是 JSON 对象");
  }
  return Object.fromEntries(Object.entries(value));
}

export function requireString(body: JsonBody, field: string): string {
  const value = body[field];
  if (value === undefined || value === null) {
    throw invalid(`缺少 ${field}`);
  }
  if (typeof value !== "string") {
    throw invalid(`${field} 必须是字符串`);
  }
  return value;
}

/** 必填且去掉首尾空白后非空 */
export function requireNonEmptyString(body: JsonBody, field: string): string {
  const value = requireString(body, field);
  if (value.trim().length === 0) {
    throw invalid(`${field} 不能为空`);
  }
  return value;
}

/** null / 缺省 → none；提供了但不是字符串 → InvalidParameter */
export function optionalString(body: JsonBody, field: string): Maybe<string> {
  const value = body[field];
  if (value === undefined || value === null) return none;
  if (typeof value !== "string") {
    throw invalid(`${field} 必须是字符串`);
  }
  return some(value);
}

/** 特效、字体等名称字段：空串或纯空白与未提供相同，都视为 none */
export function optionalName(body: JsonBody, field: string): Maybe<string> {
  const value = optionalString(body, field);
  if (value.present && value.value.trim().length === 0) return none;
  return value;
}

export function optionalNumber(body: JsonBody, field: string): Maybe<number> {
  const value = body[field];
  if (value === undefined || value === null) return none;
  if (typeof value !== "number" || !Number.isFinite(value)) {
    throw invalid(`${field} 必须是有限数值`);
  }
  return some(value);
}

export function optionalInteger(body: JsonBody, field: string): Maybe<number> {
  const value = optionalNumber(body, field);
  if (value.present && !Number.isSafeInteger(value.value)) {
    throw invalid(`${field} 必须是整数`);
  }
  return value;
}

export function optionalBoolean(body: JsonBody, field: string): Maybe<boolean> {
  const value = body[field];
  if (value === undefined || value === null) return none;
  if (typeof value !== "boolean") {
    throw invalid(`${field} 必须是布尔值`);
  }
  return some(value);
}

export function optionalNumberArray(
  body: JsonBody,
  field: string
): Maybe<number[]> {
  const value = body[field];
  if (value === undefined || value === null) return none;
  if (!Array.isArray(value)) {
    throw invalid(`${field} 必须是数组`);
  }
  const numbers: number[] = [];
  for (const item of value) {
    if (typeof item !== "number" || !Number.isFinite(item)) {
      throw invalid(`${field} 只能包含数值`);
    }
    numbers.push(item);
  }
  return some(numbers);
}

/** 数值区间，端点是否包含可分别指定 */
export interface NumberRange {
  min: number;
  max: number;
  /** 默认 true */
  minInclusive?: boolean;
}

export function describeRange(range: NumberRange): string {
  const left = range.minInclusive === false ? "(" : "[";
  return `${left}${range.min}, ${range.max}]`;
}

export function isInRange(value: number, range: NumberRange): boolean {
  const aboveMin =
    range.minInclusive === false ? value > range.min : value >= range.min;
  return aboveMin && value <= range.max;
}

/**
 * 校验可选数值的取值范围；未提供时原样返回 none。
 */
export function checkRange(
  value: Maybe<number>,
  field: string,
  range: NumberRange
): Maybe<number> {
  if (value.present && !isInRange(value.value, range)) {
    throw invalid(
      `${field} 超出范围，应在 ${describeRange(range)} 之间: ${value.value}`
    );
  }
  return value;
}
