// A list marker such as "3." at the start of the text or of a line.
// Matching at ^ strips the "1." of the first answer too, not only the markers after a newline.
const LIST_MARKER = /(?:^|\n)[ \t]*\d+\.(?!\d)[ \t]*/;

/**
 * Split a numbered-list reply into its items, in order.
 * Blank items are dropped; text before the first marker counts as an item.
 */
export function parseNumberedAnswers(text: string): string[] {
  return text
    .split(LIST_MARKER)
    .map((answer) => answer.trim())
    .filter((answer) => answer.length > 0);
}
