const H1 = /^#([^#\n]*)$/gm;
const H2 = /^##([^#\n]*)$/gm;

/**
 * Demote h1 and h2 lines to h3 so an embedded comment nests under the
 * per-issue h2 heading of the summary body. h2 runs first so a `##` line is
 * never seen by the h1 pattern.
 */
export function normalizeHeadings(text: string): string {
  return text.replace(H2, '###$1').replace(H1, '###$1');
}
