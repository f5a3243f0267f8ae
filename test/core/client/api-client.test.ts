/**
 * Tests for the catalog API client
 */

import { describe, expect, it } from "vitest";
import { ApiClient, type FetchLike } from "../../../src/core/client";
import { FetchError } from "../../../src/core/errors";
import { BASE_PATH, CATALOG_URL, ORIGIN, createTestClient } from "../../helpers/fakeFetch";

describe("ApiClient", () => {
  const client = new ApiClient({ origin: `${ORIGIN}/`, basePath: BASE_PATH });

  it("builds catalog urls from origin and base path", () => {
    expect(client.catalogUrl("monsters")).toBe(CATALOG_URL);
  });

  it("prefixes root-relative references with the origin", () => {
    expect(client.resolve("/api/2014/monsters/goblin")).toBe(
      `${ORIGIN}/api/2014/monsters/goblin`,
    );
  });

  it("keeps absolute references", () => {
    expect(client.resolve("https://other.test/x")).toBe("https://other.test/x");
  });

  it("rejects references that are neither absolute nor root-relative", () => {
    expect(() => client.resolve("monsters/goblin")).toThrow(FetchError);
  });

  it("defaults the timeout to 30 seconds", () => {
    expect(client.timeoutMs).toBe(30000);
  });

  it("sends a GET with json accept header and a timeout signal", async () => {
    let seen: RequestInit | undefined;
    const fetchImpl: FetchLike = async (_url, init) => {
      seen = init;
      return new Response("{}", { status: 200 });
    };
    const c = new ApiClient({ origin: ORIGIN, basePath: BASE_PATH, fetchImpl });

    await c.getJson("/api/2014/monsters");

    expect(seen?.method).toBeUndefined();
    expect(seen?.headers).toMatchObject({
      accept: "application/json",
      "user-agent": "monster-pipeline/1.0",
    });
    expect(seen?.signal).toBeInstanceOf(AbortSignal);
  });

  it("parses the body as JSON", async () => {
    const { client: c } = createTestClient({ [CATALOG_URL]: { json: { count: 0, results: [] } } });
    expect(await c.getJson(CATALOG_URL)).toEqual({ count: 0, results: [] });
  });

  it("fails with FetchError on malformed JSON", async () => {
    const { client: c } = createTestClient({ [CATALOG_URL]: { status: 200, body: "<html>" } });
    await expect(c.getJson(CATALOG_URL)).rejects.toThrow(`Malformed JSON from ${CATALOG_URL}`);
  });

  it("fails with FetchError on a 404", async () => {
    const { client: c } = createTestClient({});
    await expect(c.getJson(CATALOG_URL)).rejects.toThrow(`HTTP 404 for ${CATALOG_URL}`);
  });

  it("fails with FetchError when the request times out", async () => {
    const fetchImpl: FetchLike = (_url, init) =>
      new Promise((_resolve, reject) => {
        init?.signal?.addEventListener("abort", () => reject(init?.signal?.reason));
      });
    const c = new ApiClient({ origin: ORIGIN, basePath: BASE_PATH, timeoutMs: 20, fetchImpl });

    await expect(c.getJson(CATALOG_URL)).rejects.toBeInstanceOf(FetchError);
  });
});
