/**
 * A command line split into its dot-separated segments.
 * `stops.A.routes.list` becomes `['stops', 'A', 'routes', 'list']`.
 */
export type CommandPath = readonly string[];

/**
 * Parse one input line. Surrounding whitespace and a single trailing dot
 * are dropped; a blank line is the empty path.
 */
export function parseCommand(line: string): CommandPath {
  const trimmed = line.trim();
  if (trimmed === '') {
    return [];
  }

  const segments = trimmed.split('.');
  if (segments.length > 1 && segments[segments.length - 1] === '') {
    segments.pop();
  }
  return segments;
}

export function formatCommand(path: CommandPath): string {
  return path.join('.');
}
