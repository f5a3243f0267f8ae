/**
 * HTTP client for the monster catalog API
 */

import { API_CONSTANTS } from "../constants";
import { FetchError, toError } from "../errors";
import { joinUrl, resolveLocation } from "../utils/url";

export type FetchLike = (url: string, init?: RequestInit) => Promise<Response>;

export interface ApiClientOptions {
  /** Scheme and host, e.g. "https://www.dnd5eapi.co" */
  origin: string;
  /** Path prefix of the catalog resources, e.g. "/api/2014" */
  basePath: string;
  timeoutMs?: number;
  userAgent?: string;
  /** Defaults to the global fetch */
  fetchImpl?: FetchLike;
}

/**
 * Owns the request settings shared by every catalog call.
 * Construct one per run and hand it to each stage.
 */
export class ApiClient {
  readonly origin: string;
  readonly basePath: string;
  readonly timeoutMs: number;
  private readonly userAgent: string;
  private readonly fetchImpl: FetchLike;

  constructor(options: ApiClientOptions) {
    this.origin = options.origin.replace(/\/+$/, "");
    this.basePath = options.basePath;
    this.timeoutMs = options.timeoutMs ?? API_CONSTANTS.DEFAULT_TIMEOUT_MS;
    this.userAgent = options.userAgent ?? API_CONSTANTS.USER_AGENT;
    this.fetchImpl = options.fetchImpl ?? ((url, init) => fetch(url, init));
  }

  /**
   * Absolute URL of a catalog resource, e.g. "monsters"
   */
  catalogUrl(resource: string): string {
    return joinUrl(this.origin, this.basePath, resource);
  }

  /**
   * Resolves an absolute URL or a root-relative path against the origin
   * @throws FetchError if the reference is neither
   */
  resolve(reference: string): string {
    const url = resolveLocation(this.origin, reference);
    if (!url) {
      throw new FetchError(`Cannot resolve reference: ${reference}`, reference);
    }
    return url;
  }

  /**
   * Issues one GET and parses the body as JSON
   * @param reference - Absolute URL or root-relative path
   * @throws FetchError on transport failure, timeout, non-2xx status or invalid JSON
   */
  async getJson(reference: string): Promise<unknown> {
    const url = this.resolve(reference);

    let r: Response;
    try {
      r = await this.fetchImpl(url, {
        redirect: "follow",
        headers: {
          "user-agent": this.userAgent,
          accept: API_CONSTANTS.ACCEPT_HEADER,
        },
        signal: AbortSignal.timeout(this.timeoutMs),
      });
    } catch (e) {
      const err = toError(e);
      throw new FetchError(
        `Request failed for ${url}: ${err.message}`,
        url,
        undefined,
        err,
      );
    }

    if (!r.ok) {
      throw new FetchError(`HTTP ${r.status} for ${url}`, url, r.status);
    }

    try {
      const body = await r.text();
      return JSON.parse(body);
    } catch (e) {
      throw new FetchError(
        `Malformed JSON from ${url}`,
        url,
        r.status,
        toError(e),
      );
    }
  }
}
