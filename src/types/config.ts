import { z } from 'zod';

const REPO_PATTERN = /^[^/\s]+\/[^/\s]+$/;
const DATE_PATTERN = /^\d{4}-\d{2}-\d{2}$/;

// Zod schema for an 'owner/repo' reference
export const RepoNameSchema = z.string().regex(REPO_PATTERN, 'Repo must be in format "owner/repo"');

// Zod schema for GitHub configuration
export const GitHubConfigSchema = z.object({
  token: z.string().optional(),
}).partial();

// Zod schema for the source repository query
export const SourceConfigSchema = z.object({
  labels: z.array(z.string().min(1)).default([]),
  states: z.array(z.enum(['OPEN', 'CLOSED'])).min(1, 'At least one issue state is required').default(['OPEN', 'CLOSED']),
  resolution_prefix: z.string().min(1, 'Resolution prefix must not be empty').default('RESOLVED: '),
});

// Complete tracker configuration schema
export const ConfigSchema = z.object({
  github: GitHubConfigSchema.optional(),
  source_repo: RepoNameSchema,
  destination_repo: RepoNameSchema,
  state_directory: z.string().min(1, 'State directory is required'),
  start_date: z.string().regex(DATE_PATTERN, 'Start date must be in format "YYYY-MM-DD"'),
  source: SourceConfigSchema.optional(),
  repo_config_path: z.string().min(1).optional(),
});

// Zod schema for the config file kept in the destination repository
export const RepoConfigSchema = z.object({
  labels: z.object({
    color: z.string().regex(/^[0-9a-fA-F]{6}$/, 'Label color must be a 6-digit hex value').optional(),
    prefixes: z.array(z.string().min(1)).optional(),
    name_prefix: z.string().optional(),
  }).optional(),
});

// TypeScript types derived from Zod schemas
export type GitHubConfig = z.infer<typeof GitHubConfigSchema>;
export type SourceConfig = z.infer<typeof SourceConfigSchema>;
export type Config = z.infer<typeof ConfigSchema>;
export type RawRepoConfig = z.infer<typeof RepoConfigSchema>;

export type IssueState = 'OPEN' | 'CLOSED';

// A repository split into its parts
export interface RepoRef {
  owner: string;
  name: string;
}

// Normalized tracker config
export interface NormalizedConfig {
  github: {
    token: string;
  };
  sourceRepo: RepoRef;
  destinationRepo: RepoRef;
  stateDirectory: string;
  startDate: string;
  source: {
    labels: string[];
    states: IssueState[];
    resolutionPrefix: string;
  };
  repoConfigPath: string;
}

// Normalized destination repo config
export interface RepoConfig {
  labels: {
    color: string | undefined;
    prefixes: string[];
    namePrefix: string;
  };
}

/**
 * Error thrown when a config file is missing or invalid
 */
export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}
