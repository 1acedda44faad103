// CHANGE: Confirm manual redirect handling bounds hops and protects the credential.
// WHY: Asset downloads are redirected to a storage host that must never see the token.

import { AxiosInstance, InternalAxiosRequestConfig } from "axios";
import { describe, expect, it } from "vitest";
import { PermanentError, TooManyRedirectsError } from "../src/errors.js";
import { RedirectPolicy, createHttpClient, followRedirects, normaliseHeaders } from "../src/utils/http.js";

interface Seen {
  readonly method: string;
  readonly url: string;
  readonly authorization?: string;
  readonly data?: unknown;
}

type Reply = { readonly status: number; readonly location?: string; readonly data?: unknown };

const call = { operation: "downloadArchive", resource: "acme/widgets/assets/7" };
const policy: RedirectPolicy = { maxRedirects: 5, forwardCredentialAcrossHosts: false };

function scriptedClient(replies: Record<string, Reply>): { client: AxiosInstance; seen: Seen[] } {
  const seen: Seen[] = [];
  const client = createHttpClient({ connectTimeoutMs: 1000, readTimeoutMs: 1000 });
  client.defaults.adapter = async (config: InternalAxiosRequestConfig) => {
    const url = config.url ?? "";
    const authorization = config.headers.get("Authorization");
    seen.push({
      method: (config.method ?? "get").toUpperCase(),
      url,
      authorization: typeof authorization === "string" ? authorization : undefined,
      data: config.data
    });
    const reply = replies[url] ?? { status: 404 };
    return {
      status: reply.status,
      statusText: String(reply.status),
      headers: reply.location ? { location: reply.location } : {},
      data: reply.data ?? "",
      config,
      request: {}
    };
  };
  return { client, seen };
}

function chain(length: number): Record<string, Reply> {
  const replies: Record<string, Reply> = {};
  for (let hop = 0; hop < length; hop += 1) {
    replies[`https://api.test/hop/${hop}`] = { status: 302, location: `/hop/${hop + 1}` };
  }
  replies[`https://api.test/hop/${length}`] = { status: 200, data: "done" };
  return replies;
}

const request = {
  method: "GET" as const,
  url: "https://api.test/hop/0",
  headers: { Authorization: "Bearer test-secret" }
};

describe("followRedirects", () => {
  it("follows relative redirects up to the limit", async () => {
    const { client, seen } = scriptedClient(chain(5));
    const response = await followRedirects<string>(client, request, policy, call);
    expect(response.status).toBe(200);
    expect(response.data).toBe("done");
    expect(seen.map(entry => entry.url)).toEqual([0, 1, 2, 3, 4, 5].map(hop => `https://api.test/hop/${hop}`));
  });

  it("fails with TooManyRedirectsError when the chain is longer than the limit", async () => {
    const { client, seen } = scriptedClient(chain(6));
    await expect(followRedirects(client, request, policy, call)).rejects.toBeInstanceOf(TooManyRedirectsError);
    expect(seen).toHaveLength(6);
  });

  it("drops the credential when the redirect leaves the host", async () => {
    const { client, seen } = scriptedClient({
      "https://api.test/hop/0": { status: 302, location: "https://api.test/hop/1" },
      "https://api.test/hop/1": { status: 307, location: "https://storage.test/blob/1" },
      "https://storage.test/blob/1": { status: 200, data: "bytes" }
    });
    await followRedirects(client, request, policy, call);
    expect(seen.map(entry => entry.authorization)).toEqual(["Bearer test-secret", "Bearer test-secret", undefined]);
  });

  it("forwards the credential across hosts when configured", async () => {
    const { client, seen } = scriptedClient({
      "https://api.test/hop/0": { status: 302, location: "https://storage.test/blob/1" },
      "https://storage.test/blob/1": { status: 200 }
    });
    await followRedirects(client, request, { maxRedirects: 5, forwardCredentialAcrossHosts: true }, call);
    expect(seen[1]?.authorization).toBe("Bearer test-secret");
  });

  it("switches to GET without a body on 303", async () => {
    const { client, seen } = scriptedClient({
      "https://api.test/submit": { status: 303, location: "/result" },
      "https://api.test/result": { status: 200 }
    });
    await followRedirects(client, { method: "POST", url: "https://api.test/submit", headers: {}, data: "payload" }, policy, call);
    expect(seen.map(entry => [entry.method, entry.data])).toEqual([
      ["POST", "payload"],
      ["GET", undefined]
    ]);
  });

  it("rejects a redirect without Location", async () => {
    const { client } = scriptedClient({ "https://api.test/hop/0": { status: 301 } });
    const failure = followRedirects(client, request, policy, call);
    await expect(failure).rejects.toBeInstanceOf(PermanentError);
    await expect(failure).rejects.toMatchObject({ status: 301 });
  });
});

describe("normaliseHeaders", () => {
  it("lower-cases names and joins multi-valued headers", () => {
    expect(normaliseHeaders({ "X-RateLimit-Remaining": "10", "Set-Cookie": ["a=1", "b=2"] })).toEqual({
      "x-ratelimit-remaining": "10",
      "set-cookie": "a=1, b=2"
    });
  });
});
