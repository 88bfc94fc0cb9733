// Console output helpers shared by both CLIs.

export const STATUS_SYMBOL = {
  success: '✅',
  warning: '⚠️ ',
  error: '❌',
  info: 'ℹ️ '
} as const;

export type StatusKind = keyof typeof STATUS_SYMBOL;

export function statusLine(kind: StatusKind, message: string): string {
  return `${STATUS_SYMBOL[kind]} ${message}`;
}

export function printStatus(kind: StatusKind, message: string): void {
  if (kind === 'error') console.error(statusLine(kind, message));
  else console.log(statusLine(kind, message));
}

export function bulletList(items: string[], indent = 2): string[] {
  return items.map(item => `${' '.repeat(indent)}• ${item}`);
}

export function banner(title: string): string[] {
  return ['='.repeat(60), title, '='.repeat(60)];
}

// Join provided (string | false) parts into a comma separated list; falsy entries are skipped.
export function missingList(parts: Array<string | false>): string {
  return parts.filter(Boolean).join(', ');
}
