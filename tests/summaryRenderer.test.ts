import { describe, expect, it } from 'vitest';
import { renderSummary } from '../src/summary';
import type { RenderOptions } from '../src/summary';
import type { Comment, Issue } from '../src/types';

const options: RenderOptions = { owner: 'acme', serverUrl: 'https://github.com' };
const summary = { id: 'S1', labels: ['summary', 'topic-x'] };
const link = '[issues with matching labels](https://github.com/search?q=type%3Aissue+user%3Aacme+label%3A%22topic-x%22)';
const preamble = `_This is generated from the newest comment on ${link}._\n`;

function issue(id: string, title: string, comments: Comment[] = []): Issue {
  return {
    id,
    title,
    url: `https://github.com/acme/app/issues/${id}`,
    body: '',
    author: 'octocat',
    labels: ['topic-x'],
    comments,
  };
}

describe('renderSummary', () => {
  it('renders the preamble and a placeholder when nothing matches', () => {
    expect(renderSummary(options, summary, [])).toBe(`${preamble}\nNo matching issues.\n`);
  });

  it('renders one section per source issue in search order', () => {
    const sources = [
      issue('1', 'Login fails', [
        { author: 'alice', body: 'old news', updatedAt: '2024-01-31T09:00:00Z' },
        { author: 'bob', body: '# Status\nAll good', updatedAt: '2024-02-01T10:00:00Z' },
      ]),
      issue('2', 'Crash on start'),
    ];

    expect(renderSummary(options, summary, sources)).toBe(
      preamble +
      '## [Login fails](https://github.com/acme/app/issues/1)\n' +
      '### Status\nAll good\n' +
      '\n\n_Updated 2024-02-01 10:00:00 UTC by @bob_\n\n' +
      '## [Crash on start](https://github.com/acme/app/issues/2)\n' +
      '_No update_\n'
    );
  });

  it('never includes the summary issue itself', () => {
    const self = issue('S1', 'Topic X summary', [{ author: 'bot', body: 'previous body', updatedAt: '2024-01-01T00:00:00Z' }]);
    expect(renderSummary(options, summary, [self])).toBe(`${preamble}\nNo matching issues.\n`);

    const body = renderSummary(options, summary, [self, issue('3', 'Other')]);
    expect(body).not.toContain('Topic X summary');
    expect(body).toBe(`${preamble}## [Other](https://github.com/acme/app/issues/3)\n_No update_\n`);
  });

  it('names the comment pattern and skips non-matching comments', () => {
    const withPattern: RenderOptions = { ...options, commentPattern: /^Status:/m };
    const sources = [
      issue('1', 'Login fails', [
        { author: 'alice', body: 'Status: investigating', updatedAt: '2024-01-02T00:00:00Z' },
        { author: 'bob', body: '+1', updatedAt: '2024-01-03T00:00:00Z' },
      ]),
      issue('2', 'Crash on start', [{ author: 'carol', body: 'me too', updatedAt: '2024-01-04T00:00:00Z' }]),
    ];

    expect(renderSummary(withPattern, summary, sources)).toBe(
      `_This is generated from the newest comment that matches the regular expression \`^Status:\` on ${link}._\n` +
      '## [Login fails](https://github.com/acme/app/issues/1)\n' +
      'Status: investigating\n' +
      '\n\n_Updated 2024-01-02 00:00:00 UTC by @alice_\n\n' +
      '## [Crash on start](https://github.com/acme/app/issues/2)\n' +
      '_No update_\n'
    );
  });

  it('shows the pattern as configured, without escaping slashes', () => {
    const pattern = 'fixed in https://example.com/';
    const withPattern: RenderOptions = { ...options, commentPattern: new RegExp(pattern), commentPatternText: pattern };

    expect(renderSummary(withPattern, { id: 'S2', labels: ['summary'] }, [])).toBe(
      '_This is generated from the newest comment that matches the regular expression `fixed in https://example.com/` on issues with matching labels._\n' +
      '\nNo matching issues.\n'
    );
  });

  it('omits the search link when the summary issue has no other labels', () => {
    expect(renderSummary(options, { id: 'S2', labels: ['summary'] }, [])).toBe(
      '_This is generated from the newest comment on issues with matching labels._\n\nNo matching issues.\n'
    );
  });

  it('produces identical output for identical input', () => {
    const sources = [issue('1', 'Login fails', [{ author: 'bob', body: '## Update\ndone', updatedAt: '2024-02-01T10:00:00Z' }])];
    expect(renderSummary(options, summary, sources)).toBe(renderSummary(options, summary, sources));
  });
});
