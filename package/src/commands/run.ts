/**
 * `botwire run`：前台启动 bot（当前终端进程内运行）。
 *
 * 流程（中文）
 * - 读取 `.env` + `botwire.json`，配置日志级别与落盘目录
 * - 按配置创建 HttpTransport + Dispatcher
 * - 加载 `entry` 模块并调用其默认导出完成 handler / middleware 注册
 * - 开始轮询；收到 SIGINT / SIGTERM 时 stop，等待在途 handler 完成后退出
 */

import path from "path";
import { pathToFileURL } from "node:url";
import { createBotFromConfig, isBotSetup } from "../bot.js";
import { BotwireError, ConfigError, describeError } from "../errors.js";
import {
  loadBotwireConfig,
} from "../process/project/config.js";
import { getConfigPath, resolveProjectPath } from "../process/project/paths.js";
import { logger } from "../telemetry/index.js";

export async function runCommand(cwd: string = "."): Promise<void> {
  try {
    await runBot(path.resolve(cwd));
  } catch (error) {
    logger.error("botwire run failed", { error: describeError(error) });
    await logger.flush();
    process.exit(1);
  }
}

async function runBot(projectRoot: string): Promise<void> {
  const config = await loadBotwireConfig(projectRoot);
  logger.setLevel(config.logging.level);
  if (config.logging.dir) {
    logger.bindLogsDir(resolveProjectPath(projectRoot, config.logging.dir));
  }
  if (!config.entry) {
    throw new ConfigError(getConfigPath(projectRoot), [
      "entry: Required to run a bot",
    ]);
  }

  const bot = createBotFromConfig(config, { logger });
  const entryPath = resolveProjectPath(projectRoot, config.entry);
  const entryModule: unknown = await import(pathToFileURL(entryPath).href);
  const setup =
    typeof entryModule === "object" && entryModule !== null && "default" in entryModule
      ? entryModule.default
      : undefined;
  if (!isBotSetup(setup)) {
    throw new BotwireError(
      `Entry module ${entryPath} must default-export a setup function`,
    );
  }
  await setup(bot);

  // 处理进程信号：stop 后等待在途 handler 完成，start() 随之返回
  const shutdown = (signal: string) => {
    logger.info(`Received ${signal} signal, shutting down...`);
    bot.dispatcher.stop();
  };
  process.once("SIGINT", () => shutdown("SIGINT"));
  process.once("SIGTERM", () => shutdown("SIGTERM"));

  logger.info("Bot starting", { entry: entryPath, api: config.api.url });
  await bot.dispatcher.start();
  await logger.flush();
}
