import type { LinkStatus } from "../types/link";

/**
 * Project a node's resolution state to a display status
 * Only progress output reads this; resolution never does
 */
export function getLinkStatus(
  url: string | undefined,
  resolved: boolean,
): LinkStatus {
  if (resolved) return "done";
  if (url === undefined) return "creating";
  return "updating";
}
