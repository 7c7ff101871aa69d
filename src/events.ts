import { z } from 'zod';
import { ConfigError } from './errors';
import type { Comment, Issue, SummaryEvent } from './types';

const LabelSchema = z.object({ name: z.string() });
const ActorSchema = z.object({ login: z.string() }).nullish();

// Issue as delivered in a webhook payload (REST shape).
export const WebhookIssueSchema = z.object({
  node_id: z.string(),
  title: z.string().default(''),
  html_url: z.string().default(''),
  body: z.string().nullish(),
  user: ActorSchema,
  labels: z.array(LabelSchema).default([]),
});

export const WebhookCommentSchema = z.object({
  body: z.string().nullish(),
  user: ActorSchema,
  updated_at: z.string().default(''),
});

const EventPayloadSchema = z.object({
  action: z.string().default(''),
  issue: WebhookIssueSchema.optional(),
  label: LabelSchema.optional(),
  comment: WebhookCommentSchema.optional(),
});

export const SearchCommentSchema = z.object({
  author: ActorSchema,
  body: z.string().default(''),
  updatedAt: z.string().default(''),
});

// Issue as returned by the GraphQL search; labels or comments depending on the query.
export const SearchIssueSchema = z.object({
  id: z.string(),
  url: z.string().default(''),
  title: z.string().default(''),
  body: z.string().nullish(),
  author: ActorSchema,
  labels: z.object({ nodes: z.array(LabelSchema).default([]) }).nullish(),
  comments: z.object({ nodes: z.array(SearchCommentSchema).default([]) }).nullish(),
});

export type WebhookIssue = z.infer<typeof WebhookIssueSchema>;
export type SearchIssue = z.infer<typeof SearchIssueSchema>;

export function fromWebhookIssue(raw: WebhookIssue): Issue {
  return {
    id: raw.node_id,
    title: raw.title,
    url: raw.html_url,
    body: raw.body ?? '',
    author: raw.user?.login ?? '',
    labels: raw.labels.map(l => l.name),
    comments: [],
  };
}

export function fromSearchIssue(raw: SearchIssue): Issue {
  return {
    id: raw.id,
    title: raw.title,
    url: raw.url,
    body: raw.body ?? '',
    author: raw.author?.login ?? '',
    labels: (raw.labels?.nodes ?? []).map(l => l.name),
    comments: (raw.comments?.nodes ?? []).map(c => ({
      author: c.author?.login ?? '',
      body: c.body,
      updatedAt: c.updatedAt,
    })),
  };
}

// Search nodes for pull requests come back as `{}` from the `... on Issue` fragment; drop them.
export function parseSearchNodes(nodes: unknown[] = []): Issue[] {
  const issues: Issue[] = [];
  for (const node of nodes) {
    const parsed = SearchIssueSchema.safeParse(node);
    if (parsed.success) issues.push(fromSearchIssue(parsed.data));
  }
  return issues;
}

const ISSUE_EVENTS = new Set(['issues', 'issue_comment']);

export function parseEvent(name: string, payload: unknown): SummaryEvent {
  const parsed = EventPayloadSchema.safeParse(payload ?? {});
  if (!parsed.success) {
    throw new ConfigError(`Unable to decode ${name} event: ${parsed.error.message}`);
  }

  const { action, issue, label, comment } = parsed.data;
  if (ISSUE_EVENTS.has(name) && !issue) {
    throw new ConfigError(`${name} event payload has no issue`);
  }
  if (name === 'issues' && (action === 'labeled' || action === 'unlabeled') && !label) {
    throw new ConfigError(`issues/${action} event payload has no label`);
  }

  const event: SummaryEvent = { name, action };
  if (issue) event.issue = fromWebhookIssue(issue);
  if (label) event.label = label.name;
  if (comment) event.comment = toComment(comment);
  return event;
}

function toComment(raw: z.infer<typeof WebhookCommentSchema>): Comment {
  return {
    author: raw.user?.login ?? '',
    body: raw.body ?? '',
    updatedAt: raw.updated_at,
  };
}
