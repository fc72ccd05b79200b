const UNIT_MS: Record<string, number> = {
  us: 0.001,
  ms: 1,
  s: 1000,
  m: 60_000,
  h: 3_600_000,
};

const SEGMENT = /(\d+(?:\.\d+)?)(us|ms|s|m|h)/y;

/**
 * Parse a compose duration such as `10s`, `1m30s` or `500ms` into
 * milliseconds. Returns `undefined` when the text is not a duration.
 */
export const parseDuration = (text: string): number | undefined => {
  const input = text.trim();
  if (input.length === 0) return undefined;

  let total = 0;
  SEGMENT.lastIndex = 0;
  while (SEGMENT.lastIndex < input.length) {
    const match = SEGMENT.exec(input);
    if (match === null) return undefined;
    total += Number(match[1]) * UNIT_MS[match[2]];
  }

  return Math.round(total);
};

export const formatDuration = (ms: number): string => {
  if (ms % 3_600_000 === 0 && ms > 0) return `${ms / 3_600_000}h`;
  if (ms % 60_000 === 0 && ms > 0) return `${ms / 60_000}m`;
  if (ms % 1000 === 0 && ms > 0) return `${ms / 1000}s`;
  return `${ms}ms`;
};
