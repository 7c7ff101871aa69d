import { beforeEach, describe, expect, it, vi } from 'vitest';
import { RunStatistics } from '../src/stats';

describe('RunStatistics', () => {
  let stats: RunStatistics;

  beforeEach(() => {
    stats = new RunStatistics();
  });

  it('reports nothing for an idle run', () => {
    expect(stats.summaryLines()).toEqual([]);
  });

  it('counts updates, dry-runs, skips, searches and API calls', () => {
    stats.trackSearch();
    stats.trackSearch();
    stats.trackUpdate({ id: 'I_1', title: 'Bugs', sources: 3, dryRun: false });
    stats.trackUpdate({ id: 'I_2', title: 'UI', sources: 0, dryRun: true });
    stats.incrementSkipped();
    stats.setGithubApiCalls(4);

    expect(stats.summaryLines()).toEqual([
      'Summary issues: ✅ 1 updated, 🧪 1 dry-run, ℹ️ 1 skipped',
      'Searches: 2',
      'GitHub API calls: 4',
      'Bugs [I_1]: 3 source issue(s)',
      'UI [I_2]: 0 source issue(s) (dry-run)',
    ]);
    expect(stats.getUpdatedIds()).toEqual(['I_1', 'I_2']);
  });

  it('prints without throwing', () => {
    const log = vi.spyOn(console, 'log').mockImplementation(() => undefined);
    try {
      stats.trackUpdate({ id: 'I_1', title: 'Bugs', sources: 1, dryRun: false });
      expect(() => stats.printSummary()).not.toThrow();
      expect(log).toHaveBeenCalledWith('  Bugs [I_1]: 1 source issue(s)');
    } finally {
      log.mockRestore();
    }
  });
});
