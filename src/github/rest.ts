/**
 * Thin wrapper over fetch for the GitHub REST API.
 * Non-2xx responses become GitHubClientError with the HTTP status attached.
 */

import { GitHubClientError, GITHUB_REST_ENDPOINT } from './client.js';

export const GITHUB_API_VERSION = '2022-11-28';

export interface RestRequestOptions {
  method?: 'GET' | 'POST' | 'PATCH';
  body?: unknown;
  /** Accept header (default: application/vnd.github+json) */
  accept?: string;
  /** Human-readable subject used in error messages, e.g. "issue #12 in owner/repo" */
  subject?: string;
}

/**
 * Perform a REST request and return the successful response
 */
export async function restRequest(
  token: string,
  path: string,
  options: RestRequestOptions = {}
): Promise<Response> {
  const { method = 'GET', body, accept = 'application/vnd.github+json', subject = path } = options;

  const headers: Record<string, string> = {
    Authorization: `Bearer ${token}`,
    Accept: accept,
    'X-GitHub-Api-Version': GITHUB_API_VERSION,
  };
  if (body !== undefined) {
    headers['Content-Type'] = 'application/json';
  }

  let response: Response;
  try {
    response = await fetch(`${GITHUB_REST_ENDPOINT}${path}`, {
      method,
      headers,
      body: body === undefined ? undefined : JSON.stringify(body),
    });
  } catch (error) {
    throw new GitHubClientError(
      `Network request failed for ${subject}: ${error instanceof Error ? error.message : String(error)}`,
      undefined,
      true
    );
  }

  if (!response.ok) {
    throw await toRestError(response, subject);
  }

  return response;
}

/**
 * Map a failed REST response to a GitHubClientError
 */
export async function toRestError(response: Response, subject: string): Promise<GitHubClientError> {
  const errorBody = await response.text();

  if (response.status === 401) {
    return new GitHubClientError('Authentication failed. Check your GitHub token.', 401);
  }
  if (response.status === 403 || response.status === 429) {
    if (isRateLimited(response)) {
      return new GitHubClientError('Rate limited. Please wait and try again.', response.status, true);
    }
    return new GitHubClientError(
      'Access denied. Ensure your token has write access to the repository.',
      response.status
    );
  }
  if (response.status === 404) {
    return new GitHubClientError(`Not found: ${subject}.`, 404);
  }
  if (response.status === 410) {
    return new GitHubClientError(`Gone: ${subject} was deleted.`, 410);
  }
  if (response.status === 422) {
    return new GitHubClientError(`Invalid data for ${subject}: ${errorBody}`, 422);
  }

  return new GitHubClientError(
    `Request for ${subject} failed: ${response.statusText} - ${errorBody}`,
    response.status,
    response.status >= 500
  );
}

function isRateLimited(response: Response): boolean {
  return response.status === 429
    || response.headers.get('x-ratelimit-remaining') === '0'
    || response.headers.get('retry-after') !== null;
}
