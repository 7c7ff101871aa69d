export type Comment = {
  author: string;
  body: string;
  // ISO timestamp of the last edit
  updatedAt: string;
};

// Canonical issue shape; webhook and search payloads are both normalized into it.
export type Issue = {
  id: string;
  title: string;
  url: string;
  body: string;
  author: string;
  labels: string[];
  // Oldest first
  comments: Comment[];
};

export type SummaryEvent = {
  name: string;
  action: string;
  issue?: Issue;
  // Label added or removed by a labeled / unlabeled action
  label?: string;
  comment?: Comment;
};

export type Config = {
  owner: string;
  token: string;
  apiUrl: string;
  serverUrl: string;
  // Newest comment matching this is surfaced; undefined means the newest comment.
  commentPattern?: RegExp;
  // The pattern as configured, for display
  commentPatternText?: string;
  dryRun: boolean;
};
