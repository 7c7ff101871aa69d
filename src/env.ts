import * as core from '@actions/core';
import * as github from '@actions/github';
import { ConfigError, getErrorMessage } from './errors';
import { parseEvent } from './events';
import type { Config, SummaryEvent } from './types';

const DEFAULT_API_URL = 'https://api.github.com';
const DEFAULT_SERVER_URL = 'https://github.com';

/**
 * Resolve runtime config from the Action environment. Throws a ConfigError
 * before any API call if the owner or comment pattern is unusable. The token
 * is only checked once a request is made, so no-op events succeed without it.
 */
export function getConfig(): Config {
  const repository = process.env.GITHUB_REPOSITORY || '';
  const slash = repository.indexOf('/');
  if (slash < 1) {
    throw new ConfigError(`Invalid value for GITHUB_REPOSITORY env var: "${repository}" (expected owner/repo).`);
  }
  const owner = repository.slice(0, slash);

  const token = process.env.GITHUB_TOKEN || '';

  const pattern = core.getInput('summary-comment-regex');
  const dryRun = (core.getInput('dry-run') || 'false').toLowerCase() === 'true';

  return {
    owner,
    token,
    apiUrl: github.context.apiUrl || DEFAULT_API_URL,
    serverUrl: github.context.serverUrl || DEFAULT_SERVER_URL,
    ...(pattern ? { commentPattern: compilePattern(pattern), commentPatternText: pattern } : {}),
    dryRun,
  };
}

// The triggering event, decoded from the payload the runner wrote to GITHUB_EVENT_PATH.
export function getEvent(): SummaryEvent {
  if (!process.env.GITHUB_EVENT_PATH) throw new ConfigError('GITHUB_EVENT_PATH env var not set.');
  const name = github.context.eventName;
  if (!name) throw new ConfigError('GITHUB_EVENT_NAME env var not set.');
  return parseEvent(name, github.context.payload);
}

function compilePattern(pattern: string): RegExp {
  try {
    return new RegExp(pattern);
  } catch (err) {
    throw new ConfigError(`Invalid summary-comment-regex ${pattern}: ${getErrorMessage(err)}`);
  }
}
