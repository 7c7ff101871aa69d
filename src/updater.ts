import * as core from '@actions/core';
import chalk from 'chalk';
import type { SummaryApi } from './github';
import { SUMMARY_LABEL, hasLabel, nonSummaryLabels } from './labels';
import { sourceIssueQuery, summaryIssueQuery } from './queries';
import { RunStatistics } from './stats';
import { renderSummary } from './summary';
import type { SummaryTarget } from './summary';
import type { Config, Issue, SummaryEvent } from './types';

const DIRECT_ACTIONS = new Set(['edited', 'labeled', 'unlabeled', 'opened']);

type SummaryIssue = SummaryTarget & Pick<Issue, 'title'>;

/**
 * Decides which summary issues one event affects and regenerates them, one
 * at a time. The first failing call aborts the run; issues written before it
 * stay written.
 */
export class SummaryUpdater {
  // Summary issues already regenerated during this run.
  private done = new Set<string>();

  constructor(
    private api: SummaryApi,
    private cfg: Config,
    private stats: RunStatistics = new RunStatistics()
  ) { }

  async handleEvent(event: SummaryEvent): Promise<void> {
    core.info(`⚙️ Event: ${event.name}${event.action ? `/${event.action}` : ''}`);
    const issue = event.issue;

    switch (event.name) {
      case 'issues': {
        if (!issue) return;
        // An edited summary issue is regenerated from its own current labels first.
        if (hasLabel(issue.labels, SUMMARY_LABEL) && DIRECT_ACTIONS.has(event.action)) {
          await this.updateSummaryIssue(issue);
        }

        if (event.action === 'labeled' || event.action === 'unlabeled') {
          // Adding or removing the marker itself does not cascade.
          if (!event.label || event.label === SUMMARY_LABEL) return;
          await this.updateSummaryIssues([event.label]);
        } else if (event.action === 'opened') {
          const labels = nonSummaryLabels(issue.labels);
          if (labels.length === 0) return;
          await this.updateSummaryIssues(labels);
        }
        return;
      }
      case 'issue_comment': {
        const labels = nonSummaryLabels(issue?.labels);
        if (labels.length === 0) {
          core.info('⏭️ Commented issue has no labels to match; nothing to update.');
          return;
        }
        await this.updateSummaryIssues(labels);
        return;
      }
      default:
        core.info('⏭️ Nothing to update.');
    }
  }

  // Regenerate every open summary issue sharing at least one of `labels`.
  async updateSummaryIssues(labels: string[]): Promise<void> {
    this.stats.trackSearch();
    const summaries = await this.api.searchSummaryIssues(summaryIssueQuery(this.cfg.owner, labels));
    if (summaries.length === 0) {
      core.info('⏭️ No summary issues match.');
      return;
    }
    for (const summary of summaries) {
      await this.updateSummaryIssue(summary);
    }
  }

  async updateSummaryIssue(summary: SummaryIssue): Promise<void> {
    if (this.done.has(summary.id)) {
      core.info(`⏭️ ${summary.title} (${summary.id}) already updated in this run.`);
      this.stats.incrementSkipped();
      return;
    }
    this.done.add(summary.id);

    await core.group(`📝 ${summary.title} (${summary.id})`, async () => {
      const sources = await this.findSources(summary);
      const body = renderSummary(this.cfg, summary, sources);
      const count = sources.filter(s => s.id !== summary.id).length;

      if (this.cfg.dryRun) {
        core.info(chalk.yellow(`🧪 [dry-run] Skipping update of ${summary.id}:`));
        core.info(body);
      } else {
        await this.api.updateIssueBody(summary.id, body);
        core.info(chalk.green(`✅ Updated from ${count} source issue(s).`));
      }
      this.stats.trackUpdate({ id: summary.id, title: summary.title, sources: count, dryRun: this.cfg.dryRun });
    });
  }

  // No non-summary labels means nothing can match, so there is no search to run.
  private async findSources(summary: SummaryTarget): Promise<Issue[]> {
    const query = sourceIssueQuery(this.cfg.owner, summary.labels);
    if (!query) return [];
    this.stats.trackSearch();
    return this.api.searchSourceIssues(query);
  }
}
