import { ActionRegistry } from "./registry";
import type { ActionDescriptor } from "./types";

/**
 * Actions whose names or docs mention the query, as help topics.
 */
export function apropos(registry: ActionRegistry, query: string): string[] {
  return registry.search(query).map((d: ActionDescriptor) => (d.kind === "keyed" ? d.key : d.usage));
}
