/**
 * botwire public API.
 */

export * from "./errors.js";

export type {
  BotEvent,
  CallbackQueryEvent,
  ChangedChatInfoEvent,
  ChatInfo,
  ChatType,
  DeletedMessageEvent,
  EditedMessageEvent,
  EventOf,
  EventType,
  LeftChatMembersEvent,
  MessageEvent,
  MessagePart,
  MessagePartType,
  NewChatMembersEvent,
  NewMessageEvent,
  PinnedMessageEvent,
  UnpinnedMessageEvent,
  UserInfo,
} from "./types/event.js";
export { EVENT_TYPES, isEventOf, isEventType, isMessageEvent } from "./types/event.js";
export type {
  Cursor,
  PollResult,
  SendParams,
  Transport,
  TransportResponse,
} from "./types/transport.js";
export type {
  DispatchContext,
  DispatcherHooks,
  DispatcherOptions,
  DispatcherState,
  RetryPolicy,
} from "./types/dispatcher.js";

export { decodeEvent, type DecodeResult } from "./events/decoder.js";
export {
  Filters,
  and,
  any,
  callbackData,
  callbackDataRegexp,
  chatIn,
  command,
  eventType,
  extractCommand,
  file,
  forward,
  matchesFilter,
  not,
  or,
  regexp,
  reply,
  state,
  tag,
  text,
  textContains,
  type Filter,
} from "./filters/filter.js";

export {
  abort,
  defineMiddleware,
  next,
  runMiddlewareChain,
  type ChainOutcome,
  type Middleware,
  type MiddlewareFn,
  type MiddlewareResult,
} from "./dispatcher/middleware.js";
export {
  HandlerRegistry,
  type HandlerCallback,
  type HandlerDefinition,
  type HandlerRegistration,
} from "./dispatcher/handler-registry.js";
export {
  onCallbackQuery,
  onCommand,
  onEvent,
  onMessage,
} from "./dispatcher/handlers.js";
export {
  Dependency,
  DependencyScope,
  defineDependency,
  type DependencyFactory,
  type DependencyOptions,
} from "./dispatcher/dependencies.js";
export { WorkerPool, type WorkerPoolOptions, type WorkerTask } from "./dispatcher/worker-pool.js";
export {
  DEFAULT_RETRY_POLICY,
  Dispatcher,
  normalizeRetryPolicy,
} from "./dispatcher/dispatcher.js";

export {
  UserStateStore,
  type SetUserStateParams,
  type UserStateEntry,
  type UserStateReader,
  type UserStateStoreOptions,
} from "./state/user-state.js";

export { HttpTransport, type HttpTransportOptions } from "./transport/http-transport.js";

export {
  botwireConfigSchema,
  loadBotwireConfig,
  parseBotwireConfig,
  type BotwireConfig,
  type BotwireConfigInput,
} from "./process/project/config.js";

export {
  createBotFromConfig,
  defineBot,
  type BotContext,
  type BotSetup,
  type CreateBotOptions,
} from "./bot.js";

export {
  Logger,
  createLogger,
  logger,
  type LogEntry,
  type LogLevel,
  type LoggerOptions,
} from "./telemetry/index.js";
