/**
 * `botwire check`：读取并校验项目配置，打印补齐默认值后的结果（token 打码）。
 */

import path from "path";
import { describeError } from "../errors.js";
import {
  loadBotwireConfig,
  type BotwireConfig,
} from "../process/project/config.js";

export async function checkCommand(cwd: string = "."): Promise<void> {
  const projectRoot = path.resolve(cwd);
  try {
    const config = await loadBotwireConfig(projectRoot);
    console.log("✅ botwire.json is valid");
    console.log(JSON.stringify(toPrintableConfig(config), null, 2));
  } catch (error) {
    console.error(`❌ ${describeError(error)}`);
    process.exit(1);
  }
}

export function maskToken(token: string): string {
  if (token.length <= 8) return "****";
  return `${token.slice(0, 4)}****${token.slice(-2)}`;
}

export function toPrintableConfig(config: BotwireConfig): Record<string, unknown> {
  return {
    ...config,
    token: maskToken(config.token),
    retry: {
      ...config.retry,
      maxAttempts: Number.isFinite(config.retry.maxAttempts)
        ? config.retry.maxAttempts
        : "unlimited",
    },
  };
}
