import type { Correlator } from "../correlation/correlator.js";
import type { Logger } from "../logging/logger.js";
import type { BotServices, Context, ContextSource, PipelineEvent } from "../pipeline/context.js";
import { groupIdOf, postType, type BotStatus, type InboundFrame } from "../protocol/event.js";
import { isEventAllowed } from "../security/group-filter.js";
import type { Writer } from "./writer.js";

export type ConnectionState = "disconnected" | "connecting" | "connected";

/** What the health endpoint and lifecycle need from any bot connection. */
export interface BotConnection extends ContextSource {
  readonly state: ConnectionState;
  readonly bot: BotStatus;
  readonly pendingWaiters: number;
  /** Milliseconds the longest-waiting correlator entry has been waiting. */
  readonly oldestWaiterAgeMs: number;
  start(): void;
  stop(): Promise<void>;
}

/** Per-connection pieces a frame is processed against. */
export interface FrameScope {
  readonly services: BotServices;
  readonly correlator: Correlator;
  readonly writer: Writer;
  readonly bot: BotStatus;
  readonly apiTimeoutMs: number;
  readonly logger: Logger;
}

export function contextFor(scope: FrameScope, event: PipelineEvent): Context {
  return {
    ...scope.services,
    event,
    correlator: scope.correlator,
    bot: scope.bot,
    apiTimeoutMs: scope.apiTimeoutMs,
  };
}

/**
 * Claims the frame for a waiter if one matches, otherwise runs it through the
 * group filter and the pipeline. Errors are logged here and go no further.
 */
export async function processFrame(frame: InboundFrame, scope: FrameScope): Promise<void> {
  const unclaimed = scope.correlator.dispatch(frame);
  if (!unclaimed) return;

  const { event } = unclaimed;
  if (!isEventAllowed(scope.services.config.snapshot().groupFilter, event)) return;

  try {
    await scope.services.pipeline.run(contextFor(scope, { kind: "inbound", event }), scope.writer);
  } catch (err) {
    scope.logger.error(
      { err, postType: postType(event), groupId: groupIdOf(event) },
      "Event processing failed",
    );
  }
}
