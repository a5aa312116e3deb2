export interface EnvFileEntry {
  key: string;
  value: string;
}

const NEEDS_QUOTING = /[\n"' ]/;

/**
 * UTC timestamp with second precision, e.g. `2024-05-01T12:30:00Z`
 */
export function formatGeneratedAt(date: Date): string {
  return date.toISOString().replace(/\.\d{3}Z$/, 'Z');
}

/**
 * Renders a single `KEY=value` line, double-quoting values that contain a
 * newline, a quote or a space. Backslashes are escaped before quotes.
 */
export function formatEnvLine(key: string, value: string): string {
  if (!NEEDS_QUOTING.test(value)) {
    return `${key}=${value}`;
  }

  const escaped = value.replace(/\\/g, '\\\\').replace(/"/g, '\\"');
  return `${key}="${escaped}"`;
}

/**
 * Renders `.env` file content with a generation header.
 * The caller is responsible for writing it anywhere.
 */
export function serializeEnvFile(
  entries: Iterable<EnvFileEntry>,
  environment: string,
  generatedAt: Date = new Date()
): string {
  const lines = [
    '# Generated by KeyEnv',
    `# Environment: ${environment}`,
    `# Generated at: ${formatGeneratedAt(generatedAt)}`,
    '',
  ];

  for (const entry of entries) {
    lines.push(formatEnvLine(entry.key, entry.value));
  }

  return lines.join('\n') + '\n';
}
