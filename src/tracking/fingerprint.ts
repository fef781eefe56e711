import { createHash } from 'node:crypto';
import type { SourceItem } from './types.js';

/**
 * Fingerprint of the content synced for a source item: its title and resolution text.
 * Labels and update timestamps are left out, so relabelling an issue or commenting
 * without a resolution does not count as a change.
 */
export function computeFingerprint(item: Pick<SourceItem, 'title' | 'body'>): string {
  const normalized = {
    title: item.title.trim(),
    body: item.body.replace(/\r\n/g, '\n').trim(),
  };

  return createHash('sha256')
    .update(JSON.stringify(normalized))
    .digest('hex');
}
