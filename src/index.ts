import * as core from '@actions/core';
import chalk from 'chalk';
import { getConfig, getEvent } from './env';
import { QueryError, TransportError, getErrorMessage } from './errors';
import { GitHubClient } from './github';
import { RunStatistics } from './stats';
import { SummaryUpdater } from './updater';

chalk.level = 3;

const stats = new RunStatistics();

async function run(): Promise<void> {
  const cfg = getConfig();
  const event = getEvent();
  const gh = new GitHubClient(cfg.token, cfg.apiUrl);

  console.log(`⚙️ Dry run: ${cfg.dryRun ? 'yes' : 'no'}`);
  console.log(`▶️ Summaries for ${cfg.owner} (${cfg.commentPattern ? `comments matching ${cfg.commentPatternText}` : 'newest comment'})`);

  try {
    await new SummaryUpdater(gh, cfg, stats).handleEvent(event);
  } finally {
    stats.setGithubApiCalls(gh.getApiCallCount());
  }
}

run()
  .catch((err: unknown) => {
    if (err instanceof TransportError || err instanceof QueryError) {
      core.error(`Request:\n${JSON.stringify(err.request, null, 2)}`);
      if (err.response !== undefined) core.error(`Response:\n${JSON.stringify(err.response, null, 2)}`);
    }
    core.setFailed(getErrorMessage(err));
  })
  .finally(() => stats.printSummary());
