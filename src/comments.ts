import type { Comment } from './types';

// Newest comment whose body matches; an earlier match wins over a newer unrelated comment.
export function selectComment(comments: Comment[] = [], pattern?: RegExp): Comment | undefined {
  for (let i = comments.length - 1; i >= 0; i--) {
    const comment = comments[i];
    if (comment && (!pattern || pattern.test(comment.body))) return comment;
  }
  return undefined;
}

export function formatTimestamp(iso: string): string {
  const ms = Date.parse(iso);
  if (!Number.isFinite(ms)) return iso;

  const d = new Date(ms);
  const pad = (n: number) => String(n).padStart(2, '0');
  const date = `${d.getUTCFullYear()}-${pad(d.getUTCMonth() + 1)}-${pad(d.getUTCDate())}`;
  const time = `${pad(d.getUTCHours())}:${pad(d.getUTCMinutes())}:${pad(d.getUTCSeconds())}`;
  return `${date} ${time} UTC`;
}
