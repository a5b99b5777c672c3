/**
 * CLI Output Formatting
 *
 * Provides JSON and table output formatting for CLI commands.
 */

export type OutputFormat = 'json' | 'table';

/**
 * Format result based on output mode
 */
export function formatOutput(result: unknown, format: OutputFormat = 'json'): string {
  if (format === 'json') {
    return JSON.stringify(result, null, 2);
  }

  return formatAsTable(result);
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function formatAsTable(result: unknown): string {
  if (Array.isArray(result)) {
    return formatArrayAsTable(result);
  }
  if (isRecord(result)) {
    return formatObjectAsKeyValue(result);
  }
  return String(result);
}

function formatArrayAsTable(items: unknown[]): string {
  if (items.length === 0) return '(no results)';

  const rows = items.filter(isRecord);
  const first = rows[0];
  if (!first || rows.length !== items.length) {
    return items.map(formatValue).join('\n');
  }

  const keys = Object.keys(first).slice(0, 8);
  const widths = keys.map((key) =>
    Math.max(key.length, Math.min(Math.max(...rows.map((row) => formatValue(row[key]).length)), 40))
  );

  const header = keys.map((key, i) => key.padEnd(widths[i] ?? key.length)).join(' | ');
  const separator = keys.map((key, i) => '-'.repeat(widths[i] ?? key.length)).join('-+-');
  const lines = rows.map((row) =>
    keys
      .map((key, i) => {
        const width = widths[i] ?? key.length;
        return formatValue(row[key]).slice(0, width).padEnd(width);
      })
      .join(' | ')
  );

  return [header, separator, ...lines].join('\n');
}

function formatValue(value: unknown): string {
  if (value === null || value === undefined) return '';
  if (typeof value === 'boolean') return value ? 'true' : 'false';
  if (typeof value === 'object') {
    const str = JSON.stringify(value);
    return str.length > 40 ? str.slice(0, 37) + '...' : str;
  }
  return String(value);
}

function formatObjectAsKeyValue(obj: Record<string, unknown>): string {
  const lines: string[] = [];
  for (const [key, value] of Object.entries(obj)) {
    if (value === undefined) continue;
    const formatted =
      typeof value === 'object' && value !== null ? JSON.stringify(value, null, 2) : String(value);
    lines.push(`${key}: ${formatted}`);
  }
  return lines.join('\n');
}
