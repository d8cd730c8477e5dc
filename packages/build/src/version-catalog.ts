/**
 * Upstream release listing and version selection
 */

import pRetry from 'p-retry';
import { z } from 'zod';
import { DEFAULT_CONFIG } from './config';
import { BuildErrorCode, BuildError } from './errors';
import type { TargetDefinition } from './types';
import { createLogger } from './utils/logger';
import { resolveLatestPatches, takeLatestReleases } from './version';

const logger = createLogger('catalog');

/** Minimal response surface the catalog needs */
export interface FetchResponse {
  ok: boolean;
  status: number;
  statusText: string;
  json(): Promise<unknown>;
}

export type FetchLike = (
  url: string,
  init: { headers: Record<string, string>; signal: AbortSignal }
) => Promise<FetchResponse>;

const releaseListingSchema = z.array(
  z.object({
    tag_name: z.string()
  }).passthrough()
);

export interface VersionCatalogOptions {
  fetch: FetchLike;
  /** Request timeout in milliseconds */
  timeout: number;
  /** Retries after the first failed attempt */
  retries: number;
  /** Delay before the first retry in milliseconds */
  retryDelay: number;
}

const DEFAULT_CATALOG_OPTIONS: VersionCatalogOptions = {
  fetch: (url, init) => fetch(url, init),
  timeout: DEFAULT_CONFIG.CATALOG_TIMEOUT,
  retries: DEFAULT_CONFIG.CATALOG_RETRIES,
  retryDelay: DEFAULT_CONFIG.RETRY_DELAY
};

/**
 * Release catalog for one upstream project.
 *
 * Listing failures never throw: a failed fetch yields an empty list and a
 * warning, and the caller treats that as "versions unavailable".
 */
export class VersionCatalog {
  private readonly options: VersionCatalogOptions;

  constructor(
    private readonly target: TargetDefinition,
    options: Partial<VersionCatalogOptions> = {}
  ) {
    this.options = { ...DEFAULT_CATALOG_OPTIONS, ...options };
  }

  /**
   * Selectable versions, newest first, per the target's catalog policy
   */
  async listVersions(): Promise<string[]> {
    const policy = this.target.catalog;
    const versions = policy.mode === 'grouped'
      ? await this.resolve(policy.maxGroups, policy.scanLimit)
      : await this.latest(policy.count);

    if (versions.length > 0) {
      logger.debug(`Found ${versions.length} ${this.target.displayName} versions`);
    }
    return versions;
  }

  /**
   * Newest patch per `(major, minor)` line, capped at `maxGroups`
   */
  async resolve(maxGroups: number, scanLimit?: number): Promise<string[]> {
    const tags = await this.fetchTags();
    return resolveLatestPatches(tags, maxGroups, scanLimit);
  }

  /**
   * First `count` non-candidate tags in upstream order
   */
  async latest(count: number): Promise<string[]> {
    const tags = await this.fetchTags();
    return takeLatestReleases(tags, count);
  }

  /**
   * Tag names in upstream order, or an empty list when the listing is unavailable
   */
  async fetchTags(): Promise<string[]> {
    try {
      return await pRetry(() => this.requestTags(), {
        retries: this.options.retries,
        minTimeout: this.options.retryDelay,
        onFailedAttempt: (error) => {
          logger.debug(`Release listing attempt ${error.attemptNumber} failed: ${error.message}`);
        }
      });
    } catch (error) {
      logger.warn(
        `Failed to fetch ${this.target.displayName} versions: ${error instanceof Error ? error.message : String(error)}`
      );
      return [];
    }
  }

  private async requestTags(): Promise<string[]> {
    const response = await this.options.fetch(this.target.releasesUrl, {
      headers: {
        Accept: 'application/vnd.github+json',
        'User-Agent': 'binforge'
      },
      signal: AbortSignal.timeout(this.options.timeout)
    });

    if (!response.ok) {
      throw new BuildError(
        BuildErrorCode.CatalogFetchFailed,
        `${this.target.releasesUrl} responded ${response.status} ${response.statusText}`
      );
    }

    const parsed = releaseListingSchema.safeParse(await response.json());
    if (!parsed.success) {
      // A malformed body will not improve on retry
      throw new pRetry.AbortError(
        new BuildError(BuildErrorCode.CatalogParseFailed, parsed.error.message)
      );
    }

    return parsed.data.map(release => release.tag_name);
  }
}
