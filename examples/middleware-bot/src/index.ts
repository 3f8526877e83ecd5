/**
 * Example bot: access control + role tagging middleware, a /start command,
 * a small state-driven survey and an inline button callback.
 *
 * From the repository root: `npm run build` (library, then this example),
 * copy `.env.example` to `.env`, then `npm start --workspace=botwire-example-middleware-bot`.
 * `botwire run` loads the compiled `dist/index.js` named by `entry` in botwire.json.
 */

import {
  Filters,
  UserStateStore,
  abort,
  defineBot,
  defineDependency,
  defineMiddleware,
  next,
  onCallbackQuery,
  onCommand,
  onMessage,
  type Logger,
} from "botwire";

const ALLOWED_CHATS = new Set(["admin@chat.example", "team@chat.example"]);
const ROLES: Record<string, string> = { "admin@chat.example": "admin" };

const accessMiddleware = defineMiddleware("access", async (event, ctx) => {
  if (ALLOWED_CHATS.has(event.chat.chatId)) return next(event);
  await ctx.send("messages/sendText", {
    chatId: event.chat.chatId,
    text: `Does not have rights to use the bot - ${event.chat.chatId}`,
  });
  return abort("chat not allowed");
});

const roleMiddleware = defineMiddleware("role", (event, ctx) => {
  const role = ROLES[event.chat.chatId] ?? "member";
  event.middlewareData.set("role", role);
  ctx.logger.debug("Role resolved", { chatId: event.chat.chatId, role });
  return next(event);
});

const surveyState = new UserStateStore({ sessionTtlMs: 10 * 60 * 1000 });

// Per-dispatch audit trail, flushed once the handler is done.
type AuditTrail = { dispatchId: string; logger: Logger; lines: string[] };

const auditTrail = defineDependency(
  "auditTrail",
  (ctx): AuditTrail => ({ dispatchId: ctx.dispatchId, logger: ctx.logger, lines: [] }),
  {
    dispose: (trail) => {
      if (trail.lines.length === 0) return;
      trail.logger.info("Audit", { dispatchId: trail.dispatchId, lines: trail.lines });
    },
  },
);

export default defineBot(({ dispatcher, logger }) => {
  dispatcher.registerMiddleware(accessMiddleware);
  dispatcher.registerMiddleware(roleMiddleware);

  dispatcher.addHandler(
    onCommand("/start", async (event, ctx) => {
      const role = event.middlewareData.get("role");
      await ctx.send("messages/sendText", {
        chatId: event.chat.chatId,
        text: `Hello! Your role: ${String(role)}`,
        inlineKeyboardMarkup: [[{ text: "Take survey", callbackData: "survey" }]],
      });
    }),
  );

  dispatcher.addHandler(
    onCallbackQuery(async (event, ctx) => {
      surveyState.set({ user: event.chat.chatId, state: "awaiting_name" });
      await ctx.send("messages/answerCallbackQuery", { queryId: event.queryId });
      await ctx.send("messages/sendText", {
        chatId: event.chat.chatId,
        text: "What is your name?",
      });
    }, Filters.callbackData("survey")),
  );

  dispatcher.addHandler(
    onMessage(async (event, ctx) => {
      const trail = await ctx.use(auditTrail);
      trail.lines.push(`name=${event.text ?? ""}`);
      surveyState.delete(event.chat.chatId);
      await ctx.send("messages/sendText", {
        chatId: event.chat.chatId,
        text: `Nice to meet you, ${event.text ?? "stranger"}!`,
      });
    }, Filters.state(surveyState, "awaiting_name")),
  );

  dispatcher.addHandler(
    onMessage(async (event, ctx) => {
      await ctx.send("messages/sendText", {
        chatId: event.chat.chatId,
        text: event.text ?? "",
      });
    }, Filters.not(Filters.regexp(/^\//))),
  );

  logger.info("middleware-bot registered", { handlers: dispatcher.handlers.size() });
});
