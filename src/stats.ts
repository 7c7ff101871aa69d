import chalk from 'chalk';

export interface UpdateDetail {
  id: string;
  title: string;
  sources: number;
  dryRun: boolean;
}

export class RunStatistics {
  private updates: UpdateDetail[] = [];
  private searches = 0;
  private skipped = 0;
  private githubApiCalls = 0;
  private readonly startTime = Date.now();

  trackSearch(): void {
    this.searches++;
  }

  trackUpdate(detail: UpdateDetail): void {
    this.updates.push(detail);
  }

  // Summary issue already regenerated earlier in the same run.
  incrementSkipped(): void {
    this.skipped++;
  }

  setGithubApiCalls(count: number): void {
    this.githubApiCalls = count;
  }

  getUpdatedIds(): string[] {
    return this.updates.map(u => u.id);
  }

  private formatDuration(ms: number): string {
    if (ms < 1000) return `${ms.toFixed(0)}ms`;
    if (ms < 60000) return `${(ms / 1000).toFixed(1)}s`;
    const minutes = Math.floor(ms / 60000);
    const seconds = Math.floor((ms % 60000) / 1000);
    return `${minutes}m${seconds}s`;
  }

  summaryLines(): string[] {
    const lines: string[] = [];
    const written = this.updates.filter(u => !u.dryRun).length;
    const dryRuns = this.updates.length - written;

    const parts: string[] = [];
    if (written > 0) parts.push(`✅ ${written} updated`);
    if (dryRuns > 0) parts.push(`🧪 ${dryRuns} dry-run`);
    if (this.skipped > 0) parts.push(`ℹ️ ${this.skipped} skipped`);
    if (parts.length > 0) lines.push(`Summary issues: ${parts.join(', ')}`);

    if (this.searches > 0) lines.push(`Searches: ${this.searches}`);
    if (this.githubApiCalls > 0) lines.push(`GitHub API calls: ${this.githubApiCalls}`);

    for (const u of this.updates) {
      const suffix = u.dryRun ? ' (dry-run)' : '';
      lines.push(`${u.title} [${u.id}]: ${u.sources} source issue(s)${suffix}`);
    }
    return lines;
  }

  printSummary(): void {
    console.log('\n' + chalk.bold(`📊 Run Statistics (${this.formatDuration(Date.now() - this.startTime)}):`));
    const lines = this.summaryLines();
    if (lines.length === 0) {
      console.log(`  ${chalk.yellow('No summary issues touched')}`);
      return;
    }
    for (const line of lines) console.log(`  ${line}`);
  }
}
