import type { IssueLabel } from '../github/types.js';
import type { RepoConfig } from '../types/config.js';
import type { DestinationLabel } from '../tracking/types.js';

/**
 * Choose which source labels are mirrored on the tracking issue.
 * A label is kept when its color matches the configured color or its name
 * starts with one of the configured prefixes.
 */
export function selectLabels(labels: IssueLabel[], repoConfig: RepoConfig): DestinationLabel[] {
  const { color, prefixes, namePrefix } = repoConfig.labels;
  const selected: DestinationLabel[] = [];

  for (const label of labels) {
    const colorMatches = color !== undefined && label.color.toLowerCase() === color;
    const prefixMatches = prefixes.some((prefix) => label.name.startsWith(prefix));
    if (colorMatches || prefixMatches) {
      selected.push({ name: `${namePrefix}${label.name}`, color: label.color.toLowerCase() });
    }
  }

  return selected;
}
