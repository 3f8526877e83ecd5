/**
 * 标识符工具模块。
 *
 * 职责说明：
 * 1. dispatch id / 日志条目 id 统一走 nanoid，避免各模块自行选择实现。
 */
import { nanoid } from "nanoid";

export function generateId(size: number = 16): string {
  return nanoid(size);
}
