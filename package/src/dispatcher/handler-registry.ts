import { HandlerError, RegistryLockedError } from "../errors.js";
import { matchesFilter, type Filter } from "../filters/filter.js";
import type { BotEvent } from "../types/event.js";
import type { DispatchContext } from "../types/dispatcher.js";

export type HandlerCallback<E extends BotEvent = BotEvent> = (
  event: E,
  ctx: DispatchContext,
) => void | Promise<void>;

export type HandlerRegistration = {
  readonly id: number;
  readonly name: string;
  readonly filter: Filter;
  readonly callback: HandlerCallback;
};

export type HandlerDefinition = {
  filter: Filter;
  callback: HandlerCallback;
  name?: string;
};

/**
 * Ordered `(filter, callback)` list; the first matching registration wins.
 *
 * 关键点（中文）
 * - 注册顺序即匹配优先级
 * - dispatcher start() 时 lock，之后再注册直接抛 RegistryLockedError
 */
export class HandlerRegistry {
  private readonly registrations: HandlerRegistration[] = [];
  private locked = false;

  register(
    filter: Filter,
    callback: HandlerCallback,
    options?: { name?: string },
  ): HandlerRegistration {
    if (this.locked) throw new RegistryLockedError("handler");
    const id = this.registrations.length;
    const registration: HandlerRegistration = Object.freeze({
      id,
      name: options?.name?.trim() || callback.name || `handler#${id}`,
      filter,
      callback,
    });
    this.registrations.push(registration);
    return registration;
  }

  add(definition: HandlerDefinition): HandlerRegistration {
    return this.register(definition.filter, definition.callback, {
      name: definition.name,
    });
  }

  /** Throws `HandlerError` naming the registration whose filter threw. */
  match(event: BotEvent): HandlerRegistration | undefined {
    for (const registration of this.registrations) {
      let matched: boolean;
      try {
        matched = matchesFilter(registration.filter, event);
      } catch (cause) {
        throw new HandlerError({ handler: registration.name, eventId: event.eventId, cause });
      }
      if (matched) return registration;
    }
    return undefined;
  }

  lock(): void {
    this.locked = true;
  }

  isLocked(): boolean {
    return this.locked;
  }

  list(): readonly HandlerRegistration[] {
    return [...this.registrations];
  }

  size(): number {
    return this.registrations.length;
  }
}
