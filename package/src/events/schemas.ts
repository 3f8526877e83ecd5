import { z } from "zod";

/**
 * zod schemas for raw `events/get` items.
 *
 * Ids arrive as strings or numbers depending on the server build; both are
 * normalised to strings. Unknown keys are dropped here and kept on `raw`.
 */

export const idSchema = z
  .union([z.string().min(1), z.number()])
  .transform((value) => String(value));

export const rawUpdateSchema = z.object({
  eventId: idSchema,
  type: z.string(),
  payload: z.record(z.unknown()),
});

export const chatSchema = z.object({
  chatId: idSchema,
  type: z.string(),
  title: z.string().optional(),
});

export const userSchema = z.object({
  userId: idSchema,
  firstName: z.string().optional(),
  lastName: z.string().optional(),
  nick: z.string().optional(),
});

export const partSchema = z.object({
  type: z.string(),
  payload: z.record(z.unknown()).optional(),
});

export const messagePayloadSchema = z.object({
  msgId: idSchema,
  chat: chatSchema,
  from: userSchema.optional(),
  text: z.string().optional(),
  timestamp: z.number().optional(),
  parts: z.array(partSchema).optional(),
  format: z.record(z.unknown()).optional(),
});

export const msgRefPayloadSchema = z.object({
  msgId: idSchema,
  chat: chatSchema,
  timestamp: z.number().optional(),
});

export const newMembersPayloadSchema = z.object({
  chat: chatSchema,
  newMembers: z.array(userSchema).optional(),
  addedBy: userSchema.optional(),
});

export const leftMembersPayloadSchema = z.object({
  chat: chatSchema,
  leftMembers: z.array(userSchema).optional(),
  removedBy: userSchema.optional(),
});

export const changedChatInfoPayloadSchema = z.object({
  chat: chatSchema,
  title: z.string().optional(),
  about: z.string().optional(),
  rules: z.string().optional(),
});

export const callbackQueryPayloadSchema = z.object({
  queryId: idSchema,
  from: userSchema,
  callbackData: z.string(),
  message: messagePayloadSchema,
});

export type RawUpdate = z.infer<typeof rawUpdateSchema>;
export type MessagePayload = z.infer<typeof messagePayloadSchema>;
