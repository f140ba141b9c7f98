import type { MacroTable } from "../core/macro/table";
import { ActionRegistry } from "./registry";
import type { ActionDescriptor } from "./types";

const LINE_WIDTH = 78;

function usageOf(d: ActionDescriptor): string {
  return d.kind === "keyed" ? d.key : d.usage;
}

function aliasNote(d: ActionDescriptor): string | undefined {
  if (d.kind !== "keyed" || d.aliases.length === 0) return undefined;
  return `${d.aliases.length > 1 ? "aliases" : "alias"}: ${d.aliases.join(",")}`;
}

/**
 * One line per action, grouped under category headers in registration order.
 */
export function generateSummary(registry: ActionRegistry): string {
  const lines: string[] = [];

  for (const category of registry.categories()) {
    if (lines.length > 0) lines.push("");
    lines.push(category);
    for (const d of registry.getByCategory(category)) {
      const aliases = aliasNote(d);
      lines.push(`    ${usageOf(d)}: ${d.doc.summary}${aliases ? ` (${aliases})` : ""}`);
    }
  }

  return lines.join("\n");
}

/**
 * Detailed help for an action (by key, alias, name or usage) or a macro.
 * Undefined when nothing goes by that name.
 */
export function describeTopic(registry: ActionRegistry, macros: MacroTable, topic: string): string[] | undefined {
  const d = registry.find(topic);
  if (d) {
    const lines = [`${usageOf(d)}: ${d.doc.summary}`];
    if (d.doc.detail) lines.push("", d.doc.detail);
    const aliases = aliasNote(d);
    if (d.doc.synopsis || aliases) lines.push("");
    if (d.doc.synopsis) lines.push(`stack: ${d.doc.synopsis}`);
    if (aliases) lines.push(aliases);
    return lines;
  }

  const definition = macros.render(topic);
  if (definition !== undefined) {
    return [`${topic}: user-defined function`, "", `definition: ${definition}`];
  }
  return undefined;
}

/**
 * Every topic name, sorted and laid out in columns.
 */
export function listTopics(registry: ActionRegistry, width = LINE_WIDTH): string[] {
  const topics = registry.getAll().map(usageOf).sort();
  const colWidth = Math.max(...topics.map(t => t.length)) + 3;
  const numCols = Math.max(1, Math.floor(width / colWidth));
  const numRows = Math.ceil(topics.length / numCols);

  const rows: string[] = [];
  for (let r = 0; r < numRows; r++) {
    let row = "";
    for (let c = 0; c < numCols; c++) {
      const topic = topics[c * numRows + r];
      if (topic !== undefined) row += topic.padEnd(colWidth);
    }
    rows.push(row.trimEnd());
  }

  return [
    "For summary of all topics, use 'help'.",
    "For help on a particular topic, use '?topic'.",
    "",
    "Available topics:",
    ...rows,
  ];
}
