/**
 * 路径构造工具模块。
 *
 * 职责说明：
 * 1. 统一管理项目根目录下 `botwire.json` 与 `.env` 的路径规则。
 * 2. 相对路径一律相对项目根目录解析。
 */
import path from "path";

export const CONFIG_FILE_NAME = "botwire.json";

export function getConfigPath(projectRoot: string): string {
  return path.join(projectRoot, CONFIG_FILE_NAME);
}

export function getDotenvPath(projectRoot: string): string {
  return path.join(projectRoot, ".env");
}

export function resolveProjectPath(projectRoot: string, target: string): string {
  return path.isAbsolute(target) ? target : path.resolve(projectRoot, target);
}
