import * as yaml from 'js-yaml';
import * as fs from 'node:fs';
import * as path from 'node:path';
import {
  ConfigSchema,
  ConfigError,
  RepoConfigSchema,
  Config,
  NormalizedConfig,
  RawRepoConfig,
  RepoConfig,
  RepoRef,
} from '../types/config.js';

// Default values for optional config fields
const DEFAULT_SOURCE = {
  labels: [],
  states: ['OPEN', 'CLOSED'],
  resolutionPrefix: 'RESOLVED: ',
} as const;

export const DEFAULT_REPO_CONFIG_PATH = 'tracker.yml';

const DEFAULT_LABEL_NAME_PREFIX = '[spec] ';

/**
 * Parse and validate YAML configuration string
 *
 * @param env - Environment used for the GITHUB_TOKEN fallback
 */
export function parseConfigString(
  yamlContent: string,
  env: NodeJS.ProcessEnv = process.env
): NormalizedConfig {
  const rawConfig = loadYaml(yamlContent, 'Configuration');

  const validationResult = ConfigSchema.safeParse(transformConfig(rawConfig));

  if (!validationResult.success) {
    throw new ConfigError(`Configuration validation failed:\n${formatIssues(validationResult.error.issues)}`);
  }

  return normalizeConfig(validationResult.data, env);
}

/**
 * Parse configuration from a file path
 */
export function parseConfigFile(filePath: string, env: NodeJS.ProcessEnv = process.env): NormalizedConfig {
  const absolutePath = path.resolve(filePath);

  if (!fs.existsSync(absolutePath)) {
    throw new ConfigError(`Configuration file not found: ${absolutePath}`);
  }

  const content = fs.readFileSync(absolutePath, 'utf-8');
  return parseConfigString(content, env);
}

/**
 * Parse the config file kept in the destination repository.
 * An empty document yields the default (no label mirroring).
 */
export function parseRepoConfigString(yamlContent: string): RepoConfig {
  const rawConfig = yaml.load(yamlContent);
  if (rawConfig === undefined || rawConfig === null) {
    return normalizeRepoConfig({});
  }
  if (typeof rawConfig !== 'object') {
    throw new ConfigError('Repo configuration must be a valid YAML object');
  }

  const validationResult = RepoConfigSchema.safeParse(rawConfig);
  if (!validationResult.success) {
    throw new ConfigError(`Repo configuration validation failed:\n${formatIssues(validationResult.error.issues)}`);
  }

  return normalizeRepoConfig(validationResult.data);
}

/**
 * Repo config used when the destination repository has no config file
 */
export function defaultRepoConfig(): RepoConfig {
  return normalizeRepoConfig({});
}

/**
 * Split an 'owner/repo' string
 */
export function parseRepoRef(fullName: string): RepoRef {
  const [owner, name, ...rest] = fullName.split('/');
  if (!owner || !name || rest.length > 0) {
    throw new ConfigError(`Invalid repository "${fullName}": expected "owner/repo"`);
  }
  return { owner, name };
}

function loadYaml(content: string, what: string): Record<string, unknown> {
  let parsed: unknown;
  try {
    parsed = yaml.load(content);
  } catch (error) {
    throw new ConfigError(`${what} is not valid YAML: ${error instanceof Error ? error.message : String(error)}`);
  }

  if (typeof parsed !== 'object' || parsed === null || Array.isArray(parsed)) {
    throw new ConfigError(`${what} must be a valid YAML object`);
  }

  return { ...parsed };
}

function formatIssues(issues: Array<{ path: Array<string | number>; message: string }>): string {
  return issues
    .map((issue) => `  - ${issue.path.join('.')}: ${issue.message}`)
    .join('\n');
}

/**
 * YAML reads an unquoted start_date as a timestamp; turn it back into 'YYYY-MM-DD'
 */
function transformConfig(raw: Record<string, unknown>): Record<string, unknown> {
  const result: Record<string, unknown> = { ...raw };

  if (raw.start_date instanceof Date && !Number.isNaN(raw.start_date.getTime())) {
    result.start_date = raw.start_date.toISOString().slice(0, 10);
  }

  return result;
}

/**
 * Normalize validated config to consistent format
 */
function normalizeConfig(config: Config, env: NodeJS.ProcessEnv): NormalizedConfig {
  const token = config.github?.token || env.GITHUB_TOKEN;
  if (!token) {
    throw new ConfigError('GitHub token is required: set github.token or the GITHUB_TOKEN environment variable');
  }

  if (Number.isNaN(Date.parse(`${config.start_date}T00:00:00Z`))) {
    throw new ConfigError(`Configuration validation failed:\n  - start_date: "${config.start_date}" is not a valid date`);
  }

  return {
    github: { token },
    sourceRepo: parseRepoRef(config.source_repo),
    destinationRepo: parseRepoRef(config.destination_repo),
    stateDirectory: config.state_directory,
    startDate: config.start_date,
    source: {
      labels: config.source?.labels ?? [...DEFAULT_SOURCE.labels],
      states: config.source?.states ?? [...DEFAULT_SOURCE.states],
      resolutionPrefix: config.source?.resolution_prefix ?? DEFAULT_SOURCE.resolutionPrefix,
    },
    repoConfigPath: config.repo_config_path ?? DEFAULT_REPO_CONFIG_PATH,
  };
}

function normalizeRepoConfig(config: RawRepoConfig): RepoConfig {
  return {
    labels: {
      color: config.labels?.color?.toLowerCase(),
      prefixes: config.labels?.prefixes ?? [],
      namePrefix: config.labels?.name_prefix ?? DEFAULT_LABEL_NAME_PREFIX,
    },
  };
}
