import { ReleaseResponseSchema } from '@agentos/schemas';
import { createLogger, type Settings, VersionCheckError } from '@agentos/core';
import type { IReleaseClient } from './types/index.js';

const logger = createLogger('release-client');

export type FetchFn = (input: string, init?: RequestInit) => Promise<Response>;

/**
 * Configuration options for ReleaseClient
 */
export interface ReleaseClientOptions {
  /** Replaces the global fetch, e.g. in tests */
  fetchImpl?: FetchFn;
}

/**
 * Looks up the latest published release. No retry and no cache: every call
 * queries the endpoint again.
 */
export class ReleaseClient implements IReleaseClient {
  private readonly fetchImpl: FetchFn;

  public constructor(
    private readonly settings: Settings,
    options: ReleaseClientOptions = {},
  ) {
    this.fetchImpl = options.fetchImpl ?? fetch;
  }

  /**
   * @returns Version string with one leading `v` removed, e.g. `1.4.3`
   * @throws {VersionCheckError} On transport failure or timeout, non-2xx status, malformed JSON, or a missing tag
   */
  public async getLatestVersion(): Promise<string> {
    const { latestReleaseUrl, timeoutMs } = this.settings.release;

    let response: Response;
    try {
      response = await this.fetchImpl(latestReleaseUrl, {
        headers: { Accept: 'application/vnd.github+json' },
        signal: AbortSignal.timeout(timeoutMs),
      });
    } catch (error) {
      const reason =
        error instanceof Error && (error.name === 'TimeoutError' || error.name === 'AbortError')
          ? `request timed out after ${timeoutMs}ms`
          : error instanceof Error
            ? error.message
            : String(error);
      throw new VersionCheckError(
        `Failed to check latest version from GitHub: ${reason}`,
        undefined,
        error instanceof Error ? error : undefined,
      );
    }

    if (!response.ok) {
      throw new VersionCheckError(
        `GitHub API returned ${response.status}: ${response.statusText}`,
        response.status,
      );
    }

    let body: unknown;
    try {
      body = await response.json();
    } catch (error) {
      throw new VersionCheckError(
        `Invalid JSON response from GitHub API: ${error instanceof Error ? error.message : String(error)}`,
        response.status,
        error instanceof Error ? error : undefined,
      );
    }

    const parsed = ReleaseResponseSchema.safeParse(body);
    if (!parsed.success) {
      throw new VersionCheckError('Unexpected response format from GitHub API: missing tag_name');
    }

    const version = parsed.data.tag_name.startsWith('v')
      ? parsed.data.tag_name.slice(1)
      : parsed.data.tag_name;
    if (!version) {
      throw new VersionCheckError('Invalid release tag from GitHub API');
    }

    logger.debug({ version }, 'Latest release');
    return version;
  }
}
