import { z } from 'zod';
import type { IssueLabel } from '../github/types.js';

export const STATE_VERSION = 1;

/**
 * A resolution line found in a source issue comment
 */
export interface Resolution {
  /** URL of the comment that recorded the resolution */
  commentUrl: string;
  /** Resolution text without the "RESOLVED: " prefix */
  text: string;
  /** Creation time of the comment */
  createdAt: string;
}

/**
 * A resolution-bearing issue in the source repository
 */
export interface SourceItem {
  /** Source issue number (the identifier) */
  number: number;
  title: string;
  /** Resolution text synced to the destination, one resolution per line */
  body: string;
  updatedAt: string;
  url: string;
  labels: IssueLabel[];
  resolutions: Resolution[];
}

/**
 * Link between a source issue and its destination tracking issue
 */
export const TrackingRecordSchema = z.object({
  sourceNumber: z.number().int().positive(),
  destinationNumber: z.number().int().positive(),
  destinationUrl: z.string(),
  fingerprint: z.string(),
  handledComments: z.array(z.string()).default([]),
  createdAt: z.string(),
  updatedAt: z.string(),
});

export type TrackingRecord = z.infer<typeof TrackingRecordSchema>;

/**
 * Persisted tracker state: the source cursor and every tracking record, keyed by source number
 */
export const TrackingStateSchema = z.object({
  version: z.literal(STATE_VERSION),
  since: z.string(),
  records: z.record(z.string(), TrackingRecordSchema),
  lastSyncAt: z.string().optional(),
});

export type TrackingState = z.infer<typeof TrackingStateSchema>;

/**
 * Label to create in the destination repository
 */
export interface DestinationLabel {
  name: string;
  color: string;
}

/**
 * Issue created in the destination repository
 */
export interface TrackingIssue {
  number: number;
  url: string;
}

/**
 * Write operations the sync engine needs from the destination repository
 */
export interface TrackingDestination {
  ensureLabels(labels: DestinationLabel[]): Promise<void>;
  createIssue(input: { title: string; body: string; labels: string[] }): Promise<TrackingIssue>;
  commentOnIssue(issueNumber: number, body: string): Promise<void>;
}

/**
 * What happened to one source item during a run
 */
export type SyncAction =
  | 'created'
  | 'updated'
  | 'recreated'
  | 'unchanged'
  | 'failed'
  | 'would-create'
  | 'would-update';

/**
 * Result of syncing a single source item
 */
export interface SyncLogEntry {
  sourceNumber: number;
  action: SyncAction;
  destinationNumber?: number;
  destinationUrl?: string;
  error?: string;
}

/**
 * Summary of a full sync run
 */
export interface SyncSummary {
  totalItems: number;
  created: number;
  updated: number;
  unchanged: number;
  failed: number;
  results: SyncLogEntry[];
}

/**
 * Error thrown when the state file cannot be read or is invalid
 */
export class StateFileError extends Error {
  constructor(
    message: string,
    public readonly statePath: string
  ) {
    super(message);
    this.name = 'StateFileError';
  }
}

/**
 * Error thrown when a run must stop (e.g. the token lost write access).
 * Carries the state reached so far so issues already filed are not forgotten.
 */
export class SyncAbortedError extends Error {
  constructor(
    message: string,
    public readonly state: TrackingState,
    public readonly summary: SyncSummary,
    public readonly originalError?: unknown
  ) {
    super(message);
    this.name = 'SyncAbortedError';
  }
}
