import TurndownService from "turndown";
import type { ResourceLink } from "../site/types.js";

// Initialize Turndown for HTML to Markdown conversion
const turndown = new TurndownService({
  headingStyle: "atx",
  codeBlockStyle: "fenced",
  bulletListMarker: "-",
});

/**
 * Renders a unit summary as a Markdown document headed by the unit title.
 */
export function renderSummary(title: string, html: string): string {
  return `# ${title}\n\n${turndown.turndown(html)}\n`;
}

/**
 * Renders reading links as a Markdown list.
 */
export function renderReadings(readings: ResourceLink[]): string {
  const lines = readings.map((reading) => `- [${reading.title}](${reading.url})`);
  return `# Readings\n\n${lines.join("\n")}\n`;
}
