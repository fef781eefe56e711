import type { IssueComment, UpdatedIssue } from '../github/types.js';
import type { Resolution, SourceItem } from '../tracking/types.js';

export const DEFAULT_RESOLUTION_PREFIX = 'RESOLVED: ';

/**
 * Extract the resolutions recorded in a comment.
 * Only lines that start with the prefix count; the prefix is removed.
 */
export function extractResolutions(bodyText: string, prefix: string = DEFAULT_RESOLUTION_PREFIX): string[] {
  return bodyText
    .split(/\r?\n/)
    .filter((line) => line.startsWith(prefix))
    .map((line) => line.slice(prefix.length).trim())
    .filter((text) => text.length > 0);
}

/**
 * Collect the resolutions of all comments, in comment order
 */
export function collectResolutions(
  comments: IssueComment[],
  prefix: string = DEFAULT_RESOLUTION_PREFIX
): Resolution[] {
  const resolutions: Resolution[] = [];
  for (const comment of comments) {
    for (const text of extractResolutions(comment.bodyText, prefix)) {
      resolutions.push({ commentUrl: comment.url, text, createdAt: comment.createdAt });
    }
  }
  return resolutions;
}

/**
 * Build the source item for an issue
 *
 * @returns The item, or null when no comment carries a resolution
 */
export function buildSourceItem(
  issue: UpdatedIssue,
  comments: IssueComment[],
  prefix: string = DEFAULT_RESOLUTION_PREFIX
): SourceItem | null {
  const resolutions = collectResolutions(comments, prefix);
  if (resolutions.length === 0) {
    return null;
  }

  return {
    number: issue.number,
    title: issue.title,
    body: resolutions.map((resolution) => resolution.text).join('\n'),
    updatedAt: issue.updatedAt,
    url: issue.url,
    labels: issue.labels,
    resolutions,
  };
}
