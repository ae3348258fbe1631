import prettyBytes from 'pretty-bytes';

/**
 * Format a count with grouped digits
 * @example formatCount(12345) // "12,345"
 */
export function formatCount(value: number): string {
  return value.toLocaleString('en-US');
}

/**
 * Format bytes to a human-readable string
 * @example formatBytes(1500) // "1.5 kB"
 */
export function formatBytes(bytes: number): string {
  return prettyBytes(bytes);
}

export function formatImage(repository: string, digest: string, tags: readonly string[]): string {
  const tagList = tags.length > 0 ? tags.join(',') : '<untagged>';
  return `${repository}:${tagList}@${digest}`;
}
