/**
 * crates.io client
 *
 * Looks up the latest stable release of a crate through the public
 * crates.io API.
 */

import semver from "semver";
import { z } from "zod";

import { logger } from "../../lib/logger.js";
import { ok, err, tryCatchAsync } from "../../lib/result.js";
import { RegistryFetchError } from "../findings/degraded.js";
import { VERSION } from "../version.js";

import type { Result } from "../../lib/result.js";

export const DEFAULT_REGISTRY_URL = "https://crates.io/api/v1/crates";

/** Environment variable overriding the registry base URL */
export const REGISTRY_URL_ENV = "CARGO_VITALS_REGISTRY_URL";

export const DEFAULT_REGISTRY_TIMEOUT_MS = 30000;

/**
 * Source of latest-version information for crates
 */
export interface RegistryClient {
  getLatestVersion(crateName: string): Promise<Result<string, RegistryFetchError>>;
}

export interface CratesIoClientConfig {
  baseUrl: string;
  timeoutMs: number;
  userAgent: string;
  fetch: typeof fetch;
}

const CrateVersionSchema = z.object({
  num: z.string(),
  yanked: z.boolean().default(false),
});

export const CrateResponseSchema = z.object({
  crate: z.object({
    max_version: z.string(),
    max_stable_version: z.string().nullish(),
  }),
  versions: z.array(CrateVersionSchema).default([]),
});

export type CrateResponse = z.infer<typeof CrateResponseSchema>;

/**
 * Latest stable version of a crate response: `max_stable_version`, else the
 * highest non-yanked release version, else `max_version`
 */
export function selectLatestStable(response: CrateResponse): string {
  const { max_stable_version: maxStable, max_version: maxVersion } = response.crate;
  if (maxStable) {
    return maxStable;
  }

  const releases = response.versions
    .filter((v) => !v.yanked && semver.valid(v.num) !== null && semver.prerelease(v.num) === null)
    .map((v) => v.num)
    .sort(semver.rcompare);

  return releases[0] ?? maxVersion;
}

/**
 * Base URL from an explicit value, the environment, or the default
 */
export function resolveRegistryUrl(explicit?: string, env: NodeJS.ProcessEnv = process.env): string {
  const url = explicit ?? env[REGISTRY_URL_ENV] ?? DEFAULT_REGISTRY_URL;
  return url.replace(/\/+$/, "");
}

export class CratesIoClient implements RegistryClient {
  private readonly config: CratesIoClientConfig;
  private readonly log = logger.child("Registry");

  constructor(config: Partial<CratesIoClientConfig> = {}) {
    this.config = {
      baseUrl: resolveRegistryUrl(config.baseUrl),
      timeoutMs: config.timeoutMs ?? DEFAULT_REGISTRY_TIMEOUT_MS,
      userAgent: config.userAgent ?? `cargo-vitals/${VERSION} (Rust project health checker)`,
      fetch: config.fetch ?? globalThis.fetch,
    };
  }

  get baseUrl(): string {
    return this.config.baseUrl;
  }

  async getLatestVersion(crateName: string): Promise<Result<string, RegistryFetchError>> {
    const url = `${this.config.baseUrl}/${encodeURIComponent(crateName)}`;
    this.log.debug(`GET ${url}`);

    const controller = new AbortController();
    const timeout = setTimeout(() => controller.abort(), this.config.timeoutMs);

    try {
      const response = await tryCatchAsync(() =>
        this.config.fetch(url, {
          headers: { "User-Agent": this.config.userAgent, Accept: "application/json" },
          signal: controller.signal,
        })
      );
      if (!response.success) {
        const reason = controller.signal.aborted
          ? `request timed out after ${this.config.timeoutMs}ms`
          : response.error.message;
        return err(new RegistryFetchError(crateName, reason));
      }

      if (!response.data.ok) {
        return err(new RegistryFetchError(crateName, `HTTP ${response.data.status}`, response.data.status));
      }

      const body = await tryCatchAsync((): Promise<unknown> => response.data.json());
      if (!body.success) {
        return err(new RegistryFetchError(crateName, `invalid JSON response: ${body.error.message}`));
      }

      const parsed = CrateResponseSchema.safeParse(body.data);
      if (!parsed.success) {
        return err(new RegistryFetchError(crateName, "unexpected response shape"));
      }

      return ok(selectLatestStable(parsed.data));
    } finally {
      clearTimeout(timeout);
    }
  }
}

export function createCratesIoClient(config?: Partial<CratesIoClientConfig>): CratesIoClient {
  return new CratesIoClient(config);
}
