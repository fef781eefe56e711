export {
  parseConfigString,
  parseConfigFile,
  parseRepoConfigString,
  defaultRepoConfig,
  parseRepoRef,
  DEFAULT_REPO_CONFIG_PATH,
} from './parser.js';

export type {
  Config,
  GitHubConfig,
  SourceConfig,
  RawRepoConfig,
  NormalizedConfig,
  RepoConfig,
  RepoRef,
  IssueState,
} from '../types/config.js';

export {
  ConfigSchema,
  GitHubConfigSchema,
  SourceConfigSchema,
  RepoConfigSchema,
  RepoNameSchema,
  ConfigError,
} from '../types/config.js';
