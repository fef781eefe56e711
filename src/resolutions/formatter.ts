/**
 * Markdown for tracking issues and their update comments
 *
 * Issue body format:
 * A resolution was made for [repo/#N](url).
 *
 * **[escaped title]**
 *
 * * RESOLVED: [escaped resolution]
 *
 * [Discussion.](comment url)
 *
 * ----
 * [triage footer]
 */

import { escapeMarkdown } from './markdown.js';
import type { RepoRef } from '../types/config.js';
import type { Resolution, SourceItem } from '../tracking/types.js';

const TRIAGE_FOOTER = 'If no follow-up work is needed, the issue can be closed.';

/**
 * Title and body of a tracking issue
 */
export interface FormattedIssue {
  title: string;
  body: string;
}

/**
 * Markdown reference to the source issue, e.g. [drafts/#42](https://github.com/...)
 */
export function formatSourceReference(item: Pick<SourceItem, 'number' | 'url'>, sourceRepo: RepoRef): string {
  return `[${sourceRepo.name}/#${item.number}](${item.url})`;
}

/**
 * Group resolutions by the comment that recorded them, each group followed by its discussion link
 */
export function formatResolutionList(resolutions: Resolution[]): string {
  const groups: Array<{ commentUrl: string; lines: string[] }> = [];

  for (const resolution of resolutions) {
    let group = groups.find((g) => g.commentUrl === resolution.commentUrl);
    if (!group) {
      group = { commentUrl: resolution.commentUrl, lines: [] };
      groups.push(group);
    }
    group.lines.push(`* RESOLVED: ${escapeMarkdown(resolution.text)}`);
  }

  return groups
    .map((group) => `${group.lines.join('\n')}\n\n[Discussion.](${group.commentUrl})`)
    .join('\n\n');
}

/**
 * Format the tracking issue filed for a new source item
 */
export function formatTrackingIssue(item: SourceItem, sourceRepo: RepoRef): FormattedIssue {
  const lead = item.resolutions.length === 1 ? 'A resolution was' : 'Resolutions were';

  const body = [
    `${lead} made for ${formatSourceReference(item, sourceRepo)}.`,
    '',
    `**${escapeMarkdown(item.title)}**`,
    '',
    formatResolutionList(item.resolutions),
    '',
    '----',
    '',
    TRIAGE_FOOTER,
  ].join('\n');

  return { title: item.title, body };
}

/**
 * Format the comment posted when a tracked source item changed
 *
 * @param newResolutions - Resolutions from comments not yet reported on the tracking issue
 */
export function formatUpdateComment(
  item: SourceItem,
  newResolutions: Resolution[],
  sourceRepo: RepoRef
): string {
  const reference = formatSourceReference(item, sourceRepo);

  if (newResolutions.length > 0) {
    const lead = newResolutions.length === 1 ? 'A new resolution was' : 'New resolutions were';
    return [
      `${lead} made for ${reference}.`,
      '',
      formatResolutionList(newResolutions),
    ].join('\n');
  }

  return [
    `${reference} changed since it was last synced.`,
    '',
    `**${escapeMarkdown(item.title)}**`,
    '',
    'Current resolutions:',
    '',
    formatResolutionList(item.resolutions),
  ].join('\n');
}
