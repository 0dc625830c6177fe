import type { ChangeRecord, ChangeType } from './types.js';

const STATUS_CODES: Record<string, ChangeType> = {
  A: 'Added',
  M: 'Modified',
  D: 'Deleted',
  R: 'Renamed',
  C: 'Copied',
};

function parseStatus(code: string): ChangeType | undefined {
  // R100, C075: similarity score is ignored
  return STATUS_CODES[code.charAt(0)];
}

function splitFields(line: string): string[] {
  const fields = line.includes('\t') ? line.split('\t') : line.split(/\s+/);
  return fields.filter((field) => field !== '');
}

/**
 * Parses `git diff --name-status` output into change records, in input order.
 * Renames and copies keep only their destination path; unknown status codes
 * are skipped.
 */
export function parseNameStatus(output: string): ChangeRecord[] {
  const records: ChangeRecord[] = [];

  for (const rawLine of output.split('\n')) {
    const line = rawLine.trimEnd();
    if (line.trim() === '') continue;

    const [code = '', ...paths] = splitFields(line.trimStart());
    const changeType = parseStatus(code);
    const path = paths[paths.length - 1];
    if (!changeType || path === undefined) continue;

    records.push({ changeType, path });
  }

  return records;
}
