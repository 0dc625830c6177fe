import { describe, it, expect } from 'vitest';
import { NotificationBuilder, escapeHtml } from '../src/notification.js';

const change = {
  repository: 'demo',
  url: 'https://example.test/demo.git',
  branch: 'main',
  from: 'aaaa1111bbbbccccdddd',
  to: 'eeee2222ffff33334444',
  changes: [
    { changeType: 'Added' as const, path: 'src/app.ts' },
    { changeType: 'Deleted' as const, path: 'docs/<old>.md' },
  ],
};

describe('NotificationBuilder', () => {
  it('builds the title from short commits', () => {
    expect(new NotificationBuilder(change).title()).toBe('demo (aaaa1111 .. eeee2222)');
  });

  it('renders one line per change', () => {
    expect(new NotificationBuilder(change).lines()).toEqual(['Added - src/app.ts', 'Deleted - docs/<old>.md']);
  });

  it('brackets the escaped change list with the full commits', () => {
    expect(new NotificationBuilder(change).body()).toBe(
      'Changes in demo (<a href="https://example.test/demo.git">https://example.test/demo.git</a>)<br><br>' +
        '<b>aaaa1111bbbbccccdddd</b><br>' +
        'Added - src/app.ts<br>' +
        'Deleted - docs/&lt;old&gt;.md<br>' +
        '<b>eeee2222ffff33334444</b>',
    );
  });

  it('links the payload to the repository URL', () => {
    const payload = new NotificationBuilder({ ...change, changes: [] }).toPayload();

    expect(payload.id).toBe('demo@eeee2222ffff33334444');
    expect(payload.link).toBe('https://example.test/demo.git');
    expect(payload.body).toBe(
      'Changes in demo (<a href="https://example.test/demo.git">https://example.test/demo.git</a>)<br><br>' +
        '<b>aaaa1111bbbbccccdddd</b><br><b>eeee2222ffff33334444</b>',
    );
  });
});

describe('escapeHtml', () => {
  it('escapes markup characters', () => {
    expect(escapeHtml(`a & b <c> "d" 'e'`)).toBe('a &amp; b &lt;c&gt; &quot;d&quot; &#39;e&#39;');
  });
});
