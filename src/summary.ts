import { formatTimestamp, selectComment } from './comments';
import { normalizeHeadings } from './headings';
import { issueSearchUrl } from './queries';
import type { Issue } from './types';

export interface RenderOptions {
  owner: string;
  serverUrl: string;
  commentPattern?: RegExp;
  commentPatternText?: string;
}

export type SummaryTarget = Pick<Issue, 'id' | 'labels'>;

/**
 * Build the body of a summary issue from the newest relevant comment of each
 * source issue, in the order the search returned them. The summary issue
 * never includes itself even when it matches its own filter.
 */
export function renderSummary(options: RenderOptions, summary: SummaryTarget, sources: Issue[]): string {
  const lines: string[] = [preamble(options, summary)];
  let content = false;

  for (const issue of sources) {
    if (issue.id === summary.id) continue;
    content = true;
    lines.push(`## [${issue.title}](${issue.url})\n`);

    const comment = selectComment(issue.comments, options.commentPattern);
    if (comment) {
      lines.push(`${normalizeHeadings(comment.body)}\n`);
      lines.push(`\n\n_Updated ${formatTimestamp(comment.updatedAt)} by @${comment.author}_\n\n`);
    } else {
      lines.push('_No update_\n');
    }
  }

  if (!content) lines.push('\nNo matching issues.\n');
  return lines.join('');
}

function preamble(options: RenderOptions, summary: SummaryTarget): string {
  const phrase = 'issues with matching labels';
  const url = issueSearchUrl(options.serverUrl, options.owner, summary.labels);
  const target = url ? `[${phrase}](${url})` : phrase;

  const pattern = options.commentPatternText ?? options.commentPattern?.source;
  if (!pattern) return `_This is generated from the newest comment on ${target}._\n`;
  return `_This is generated from the newest comment that matches the regular expression \`${pattern}\` on ${target}._\n`;
}
