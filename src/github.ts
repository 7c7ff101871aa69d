import * as core from '@actions/core';
import * as github from '@actions/github';
import { GraphqlResponseError } from '@octokit/graphql';
import { RequestError } from '@octokit/request-error';
import { ConfigError, QueryError, TransportError, getErrorMessage } from './errors';
import type { GraphqlRequest } from './errors';
import { parseSearchNodes } from './events';
import type { Issue } from './types';

const SUMMARY_ISSUES_QUERY = `
  query SummaryIssues($query: String!) {
    search(type: ISSUE, first: 100, query: $query) {
      nodes {
        ... on Issue {
          id
          url
          title
          body
          author {
            login
          }
          labels(first: 100) {
            nodes {
              name
            }
          }
        }
      }
    }
  }
`;

const SOURCE_ISSUES_QUERY = `
  query SearchIssues($query: String!) {
    search(type: ISSUE, first: 100, query: $query) {
      nodes {
        ... on Issue {
          id
          url
          title
          body
          author {
            login
          }
          comments(last: 100) {
            nodes {
              author {
                login
              }
              body
              updatedAt
            }
          }
        }
      }
    }
  }
`;

const UPDATE_ISSUE_MUTATION = `
  mutation UpdateIssue($id: ID!, $body: String!) {
    updateIssue(input: { id: $id, body: $body }) {
      clientMutationId
    }
  }
`;

type SearchResponse = { search?: { nodes?: unknown[] } | null };
type Variables = { query: string } | { id: string; body: string };

// Read/write surface the updater needs; GitHubClient is the real one.
export interface SummaryApi {
  searchSummaryIssues(query: string): Promise<Issue[]>;
  searchSourceIssues(query: string): Promise<Issue[]>;
  updateIssueBody(id: string, body: string): Promise<void>;
}

export class GitHubClient implements SummaryApi {
  private octokit?: ReturnType<typeof github.getOctokit>;
  private apiCalls = 0;

  constructor(private token: string, private baseUrl?: string) { }

  getApiCallCount(): number {
    return this.apiCalls;
  }

  // Summary issues come back with their labels so each can be rendered from its own filter.
  async searchSummaryIssues(query: string): Promise<Issue[]> {
    core.info(`🔎 Searching summary issues: ${query}`);
    const data = await this.request<SearchResponse>(SUMMARY_ISSUES_QUERY, { query });
    return parseSearchNodes(data.search?.nodes ?? []);
  }

  // Source issues come back with their last 100 comments, oldest first.
  async searchSourceIssues(query: string): Promise<Issue[]> {
    core.info(`🔎 Searching issues: ${query}`);
    const data = await this.request<SearchResponse>(SOURCE_ISSUES_QUERY, { query });
    return parseSearchNodes(data.search?.nodes ?? []);
  }

  async updateIssueBody(id: string, body: string): Promise<void> {
    await this.request<unknown>(UPDATE_ISSUE_MUTATION, { id, body });
  }

  // Built on first use; events that need no API call never require a token.
  private client(): ReturnType<typeof github.getOctokit> {
    if (!this.token) throw new ConfigError('GITHUB_TOKEN missing (add: env.GITHUB_TOKEN: secrets.GITHUB_TOKEN).');
    if (!this.octokit) this.octokit = github.getOctokit(this.token, this.baseUrl ? { baseUrl: this.baseUrl } : {});
    return this.octokit;
  }

  private async request<T>(query: string, variables: Variables): Promise<T> {
    const sent: GraphqlRequest = { query, variables };
    const octokit = this.client();
    this.apiCalls++;
    try {
      return await octokit.graphql<T>(query, variables);
    } catch (err) {
      if (err instanceof GraphqlResponseError) {
        const first = err.errors?.[0]?.message ?? err.message;
        throw new QueryError(first, sent, err.data);
      }
      if (err instanceof RequestError) {
        throw new TransportError(
          `GitHub API request failed with status ${err.status}: ${err.message}`,
          sent,
          err.status,
          err.response?.data
        );
      }
      throw new TransportError(`GitHub API request failed: ${getErrorMessage(err)}`, sent);
    }
  }
}
