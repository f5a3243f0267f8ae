/**
 * In-process stand-in for the catalog API
 */

import { ApiClient, type FetchLike } from "../../src/core/client";

export const ORIGIN = "https://catalog.test";
export const BASE_PATH = "/api/2014";
export const CATALOG_URL = `${ORIGIN}${BASE_PATH}/monsters`;

/** A route answers with JSON (status 200), a status/body pair, or a thrown error */
export type Route =
  | { json: unknown }
  | { status: number; body: string }
  | { error: Error };

export interface FakeFetch {
  fetch: FetchLike;
  calls: string[];
}

export function createFakeFetch(routes: Record<string, Route>): FakeFetch {
  const calls: string[] = [];
  const fetch: FetchLike = async (url) => {
    calls.push(url);
    const route = routes[url];
    if (!route) {
      return new Response("not found", { status: 404 });
    }
    if ("error" in route) throw route.error;
    if ("json" in route) {
      return new Response(JSON.stringify(route.json), {
        status: 200,
        headers: { "content-type": "application/json" },
      });
    }
    return new Response(route.body, { status: route.status });
  };
  return { fetch, calls };
}

export function createTestClient(routes: Record<string, Route>) {
  const fake = createFakeFetch(routes);
  const client = new ApiClient({
    origin: ORIGIN,
    basePath: BASE_PATH,
    timeoutMs: 1000,
    fetchImpl: fake.fetch,
  });
  return { client, calls: fake.calls };
}

export function summary(index: string, name: string) {
  return { index, name, url: `/api/2014/monsters/${index}` };
}

export function detailUrl(index: string) {
  return `${ORIGIN}/api/2014/monsters/${index}`;
}
