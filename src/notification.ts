import type { ChangeRecord, NotificationPayload } from './types.js';

export interface DetectedChange {
  repository: string;
  url: string;
  branch: string;
  from: string;
  to: string;
  changes: ChangeRecord[];
}

const HTML_ESCAPES: Record<string, string> = {
  '&': '&amp;',
  '<': '&lt;',
  '>': '&gt;',
  '"': '&quot;',
  "'": '&#39;',
};

export function escapeHtml(text: string): string {
  return text.replace(/[&<>"']/g, (char) => HTML_ESCAPES[char] ?? char);
}

export function shortCommit(commit: string): string {
  return commit.slice(0, 8);
}

/**
 * Renders a detected change as a feed-ready payload. The change data stays
 * structured until one of the render methods is called.
 */
export class NotificationBuilder {
  constructor(private readonly change: DetectedChange) {}

  title(): string {
    const { repository, from, to } = this.change;
    return `${repository} (${shortCommit(from)} .. ${shortCommit(to)})`;
  }

  lines(): string[] {
    return this.change.changes.map((record) => `${record.changeType} - ${record.path}`);
  }

  body(): string {
    const { repository, url, from, to } = this.change;
    const link = `<a href="${escapeHtml(url)}">${escapeHtml(url)}</a>`;
    const list = this.lines().map((line) => `${escapeHtml(line)}<br>`);

    return [
      `Changes in ${escapeHtml(repository)} (${link})<br><br>`,
      `<b>${escapeHtml(from)}</b><br>`,
      ...list,
      `<b>${escapeHtml(to)}</b>`,
    ].join('');
  }

  toPayload(): NotificationPayload {
    return {
      id: `${this.change.repository}@${this.change.to}`,
      title: this.title(),
      body: this.body(),
      link: this.change.url,
    };
  }
}
