import { PipelineBuilder, type Pipeline } from "../../pipeline/pipeline.js";
import type { PluginDefinition } from "../../pipeline/types.js";
import { echoPlugin } from "./echo.js";
import { filterMetaEventPlugin } from "./filter-meta-event.js";
import { loggerPlugin } from "./logger.js";
import { pingPongPlugin } from "./ping-pong.js";
import { recallPlugin } from "./recall.js";
import { repeaterPlugin } from "./repeater.js";
import { selfTitlePlugin } from "./self-title.js";

/** Registration order is processing order. */
export const BUILTIN_PLUGINS: readonly PluginDefinition[] = [
  filterMetaEventPlugin,
  loggerPlugin,
  selfTitlePlugin,
  pingPongPlugin,
  recallPlugin,
  echoPlugin,
  repeaterPlugin,
];

export function buildDefaultPipeline(extra: Iterable<PluginDefinition> = []): Pipeline {
  return new PipelineBuilder().addAll(BUILTIN_PLUGINS).addAll(extra).build();
}
