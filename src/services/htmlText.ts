import type { Cheerio, CheerioAPI } from "cheerio";
import { hasChildren, isTag, isText, type AnyNode, type Element } from "domhandler";

const SKIPPED_TAGS = new Set(["script", "style", "noscript"]);

/**
 * Text of a node with every text fragment trimmed and glued together without
 * separators, e.g. `<td>SMA / Criticality 1 Index</td><td> Approved </td>`
 * becomes `SMA / Criticality 1 IndexApproved`. The regexes in the rule tables
 * are written against this form.
 */
export function flattenText(node: AnyNode): string {
  if (isText(node)) return node.data.trim();
  if (isTag(node) && SKIPPED_TAGS.has(node.name)) return "";
  if (!hasChildren(node)) return "";
  return node.children
    .map((child) => flattenText(child))
    .filter((part) => part.length > 0)
    .join("");
}

export function flattenSelection(selection: Cheerio<Element>): string | null {
  const first = selection.get(0);
  return first ? flattenText(first) : null;
}

/** Rating cells (`div.SSColorRating`) in the table row that carries a `<strong>` label */
export function ratingCellsForLabel(
  $: CheerioAPI,
  label: string
): string[] {
  const strong = $("strong")
    .filter((_, el) => $(el).text().trim() === label)
    .first();
  if (strong.length === 0) return [];

  const row = strong.closest("tr");
  if (row.length === 0) return [];

  return row
    .find("div.SSColorRating")
    .toArray()
    .map((cell) => flattenText(cell));
}

export function firstMatch(text: string, pattern: RegExp): string | null {
  const m = text.match(pattern);
  return m ? m[1] : null;
}
