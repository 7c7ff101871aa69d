export const SUMMARY_LABEL = 'summary';

export function hasLabel(labels: string[] = [], name: string): boolean {
  return labels.some(l => l === name);
}

// Everything but the reserved marker, in the order the tracker returned it.
export function nonSummaryLabels(labels: string[] = []): string[] {
  return labels.filter(l => l !== SUMMARY_LABEL);
}

// Search filter matching any of the non-summary labels, e.g. label:"bug","ui".
export function queryFilter(labels: string[] = []): string {
  const quoted = nonSummaryLabels(labels).map(quoteLabel);
  if (quoted.length === 0) return '';
  return `label:${quoted.join(',')}`;
}

function quoteLabel(name: string): string {
  return `"${name.replace(/\\/g, '\\\\').replace(/"/g, '\\"')}"`;
}
