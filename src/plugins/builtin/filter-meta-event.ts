import { postTypeOf } from "../../pipeline/context.js";
import type { PluginDefinition } from "../../pipeline/types.js";

/** Heartbeats and lifecycle notices stop here so later plugins only see real traffic. */
export const filterMetaEventPlugin: PluginDefinition = {
  name: "filter_meta_event",
  defaultConfig: { enabled: true },
  handle: (ctx) => (postTypeOf(ctx) === "meta_event" ? null : ctx),
};
