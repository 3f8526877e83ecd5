import { Dispatcher } from "./dispatcher/dispatcher.js";
import type { BotwireConfig } from "./process/project/config.js";
import { logger as defaultLogger, type Logger } from "./telemetry/index.js";
import { HttpTransport } from "./transport/http-transport.js";
import type { DispatcherHooks } from "./types/dispatcher.js";

/**
 * Bot entry contract used by `botwire run`.
 *
 * An entry module default-exports a setup function; the CLI builds the
 * dispatcher from `botwire.json`, hands it over for registration, then starts it.
 */

export type BotContext = {
  dispatcher: Dispatcher;
  config: BotwireConfig;
  logger: Logger;
};

export type BotSetup = (bot: BotContext) => void | Promise<void>;

/** Identity helper that gives entry modules the `BotSetup` type. */
export function defineBot(setup: BotSetup): BotSetup {
  return setup;
}

export function isBotSetup(value: unknown): value is BotSetup {
  return typeof value === "function";
}

export type CreateBotOptions = {
  logger?: Logger;
  hooks?: DispatcherHooks;
  fetch?: typeof fetch;
};

export function createBotFromConfig(
  config: BotwireConfig,
  options: CreateBotOptions = {},
): BotContext {
  const logger = options.logger ?? defaultLogger;
  const transport = new HttpTransport({
    token: config.token,
    url: config.api.url,
    basePath: config.api.basePath,
    requestTimeoutMs: config.polling.requestTimeoutMs,
    fetch: options.fetch,
    logger,
  });
  const dispatcher = new Dispatcher({
    transport,
    pollTimeSeconds: config.polling.pollTimeSeconds,
    initialCursor: config.polling.initialCursor,
    concurrency: config.dispatch.concurrency,
    retry: config.retry,
    logger,
    hooks: options.hooks,
  });
  return { dispatcher, config, logger };
}
