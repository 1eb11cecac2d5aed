import type { GroupFilterConfig } from "../config/types.js";
import { groupIdOf, type OneBotEvent } from "../protocol/event.js";

/** A non-empty allowlist decides alone; otherwise the blocklist drops its groups. */
export function isGroupAllowed(filter: GroupFilterConfig, groupId: number): boolean {
  if (filter.allowlist.length > 0) return filter.allowlist.includes(groupId);
  if (filter.blocklist.length > 0) return !filter.blocklist.includes(groupId);
  return true;
}

/** Events without a group id are never filtered. */
export function isEventAllowed(filter: GroupFilterConfig, event: OneBotEvent): boolean {
  const groupId = groupIdOf(event);
  return groupId === undefined || isGroupAllowed(filter, groupId);
}
