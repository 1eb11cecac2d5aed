import type { ConfigStore } from "../config/store.js";
import type { Writer } from "../connection/writer.js";
import type { Correlator } from "../correlation/correlator.js";
import type { Logger } from "../logging/logger.js";
import { MessageView, postType, type BotStatus, type OneBotEvent } from "../protocol/event.js";
import type { OutboundPacket } from "../protocol/packet.js";
import type { Scheduler } from "../scheduler/scheduler.js";
import type { BotDatabase } from "../storage/db.js";
import type { Pipeline } from "./pipeline.js";

export type PipelineEvent =
  | { readonly kind: "inbound"; readonly event: OneBotEvent }
  /** A packet about to be sent; plugins may replace it or stop it. */
  | { readonly kind: "outbound"; readonly packet: OutboundPacket; readonly original?: OneBotEvent }
  | { readonly kind: "startup" };

/** Process-wide handles every context carries. */
export interface BotServices {
  readonly config: ConfigStore;
  readonly db: BotDatabase;
  readonly scheduler: Scheduler;
  readonly pipeline: Pipeline;
  readonly logger: Logger;
}

/**
 * One pipeline run's view of the world. A fresh context is built for every
 * inbound frame and every send attempt, and dropped when the run ends.
 */
export interface Context extends BotServices {
  readonly event: PipelineEvent;
  readonly correlator: Correlator;
  readonly bot: BotStatus;
  readonly apiTimeoutMs: number;
}

/**
 * Hands out fresh contexts for work that outlives one pipeline run, such as a
 * schedule. A bot connection is one; its writer stays valid across reconnects.
 */
export interface ContextSource {
  readonly id: string;
  readonly writer: Writer;
  createContext(event?: PipelineEvent): Context;
}

export function withEvent(ctx: Context, event: PipelineEvent): Context {
  return { ...ctx, event };
}

export function inboundEvent(ctx: Context): OneBotEvent | undefined {
  return ctx.event.kind === "inbound" ? ctx.event.event : undefined;
}

export function messageOf(ctx: Context): MessageView | null {
  const event = inboundEvent(ctx);
  return event ? MessageView.from(event) : null;
}

export function postTypeOf(ctx: Context): string | undefined {
  const event = inboundEvent(ctx);
  return event ? postType(event) : undefined;
}

/** The inbound event a send was triggered by, followed through nested sends. */
export function originatingEvent(ctx: Context): OneBotEvent | undefined {
  switch (ctx.event.kind) {
    case "inbound":
      return ctx.event.event;
    case "outbound":
      return ctx.event.original;
    case "startup":
      return undefined;
  }
}
