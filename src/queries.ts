import { SUMMARY_LABEL, queryFilter } from './labels';

// Open summary issues sharing at least one of `labels`.
export function summaryIssueQuery(owner: string, labels: string[]): string {
  return `is:open user:${owner} label:${SUMMARY_LABEL} ${queryFilter(labels)}`;
}

// Every issue sharing at least one of the summary issue's labels, open or not.
// Undefined when there is nothing to match on.
export function sourceIssueQuery(owner: string, labels: string[]): string | undefined {
  const filter = queryFilter(labels);
  if (!filter) return undefined;
  return `user:${owner} ${filter}`;
}

// Link to the same set of issues in the web search UI.
export function issueSearchUrl(serverUrl: string, owner: string, labels: string[]): string | undefined {
  const filter = queryFilter(labels);
  if (!filter) return undefined;
  const params = new URLSearchParams({ q: `type:issue user:${owner} ${filter}` });
  return `${serverUrl.replace(/\/+$/, '')}/search?${params.toString()}`;
}
