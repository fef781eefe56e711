/**
 * Resolution module: reading resolutions from the source repository
 * and rendering them for the destination repository.
 */

export { escapeMarkdown } from './markdown.js';

export {
  DEFAULT_RESOLUTION_PREFIX,
  extractResolutions,
  collectResolutions,
  buildSourceItem,
} from './extractor.js';

export { selectLabels } from './labels.js';

export {
  formatSourceReference,
  formatResolutionList,
  formatTrackingIssue,
  formatUpdateComment,
  type FormattedIssue,
} from './formatter.js';

export {
  ResolutionSource,
  type SourceClient,
  type ResolutionSourceOptions,
  type SourceFetchResult,
} from './source.js';
