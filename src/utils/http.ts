// CHANGE: Provide the HTTP client and the single manual redirect follower.
// WHY: Redirects are followed by hand so the hop bound and credential forwarding stay under our control.

import axios, { AxiosInstance, AxiosResponse, Method, ResponseType } from "axios";
import http from "http";
import https from "https";
import { NET } from "../config.js";
import { CallDescriptor, PermanentError, TooManyRedirectsError } from "../errors.js";
import { debug } from "../logger.js";

export const REDIRECT_STATUSES: ReadonlySet<number> = new Set([301, 302, 303, 307, 308]);

/**
 * @property connectTimeoutMs - Socket inactivity bound, covering connection establishment.
 * @property readTimeoutMs - Whole-request bound enforced by axios.
 */
export interface HttpClientOptions {
  readonly connectTimeoutMs: number;
  readonly readTimeoutMs: number;
}

/**
 * @property forwardCredentialAcrossHosts - Keep `Authorization` when a redirect leaves the original host.
 */
export interface RedirectPolicy {
  readonly maxRedirects: number;
  readonly forwardCredentialAcrossHosts: boolean;
}

export interface HttpRequest {
  readonly method: Method;
  readonly url: string;
  readonly headers: Readonly<Record<string, string>>;
  readonly data?: unknown;
  readonly responseType?: ResponseType;
}

/**
 * Create an axios instance that never follows redirects and never rejects on status.
 *
 * Keep-alive agents reuse connections; axios releases sockets on error paths.
 */
export function createHttpClient(
  options: HttpClientOptions = { connectTimeoutMs: NET.CONNECT_TIMEOUT, readTimeoutMs: NET.READ_TIMEOUT }
): AxiosInstance {
  return axios.create({
    timeout: options.readTimeoutMs,
    maxRedirects: 0,
    validateStatus: () => true,
    maxBodyLength: Infinity,
    maxContentLength: Infinity,
    httpAgent: new http.Agent({ keepAlive: true, timeout: options.connectTimeoutMs }),
    httpsAgent: new https.Agent({ keepAlive: true, timeout: options.connectTimeoutMs }),
    headers: {
      "User-Agent": "release-asset-repository/1.0"
    }
  });
}

export function defaultRedirectPolicy(): RedirectPolicy {
  return {
    maxRedirects: NET.MAX_REDIRECTS,
    forwardCredentialAcrossHosts: NET.FORWARD_AUTH_ON_REDIRECT
  };
}

/**
 * Lower-case header names and flatten multi-valued headers.
 */
export function normaliseHeaders(headers: AxiosResponse["headers"]): Record<string, string> {
  const out: Record<string, string> = {};
  for (const [key, value] of Object.entries(headers)) {
    if (Array.isArray(value)) {
      out[key.toLowerCase()] = value.join(", ");
    } else if (typeof value === "string") {
      out[key.toLowerCase()] = value;
    } else if (typeof value === "number") {
      out[key.toLowerCase()] = String(value);
    }
  }
  return out;
}

function withoutAuthorization(headers: Readonly<Record<string, string>>): Record<string, string> {
  return Object.fromEntries(Object.entries(headers).filter(([name]) => name.toLowerCase() !== "authorization"));
}

function nextRequest(current: HttpRequest, status: number, location: string, policy: RedirectPolicy): HttpRequest {
  const target = new URL(location, current.url);
  const crossHost = target.host !== new URL(current.url).host;
  const headers = crossHost && !policy.forwardCredentialAcrossHosts ? withoutAuthorization(current.headers) : current.headers;
  if (crossHost) {
    debug(`Redirect to foreign host ${target.host}${headers === current.headers ? "" : " (credential dropped)"}.`);
  }
  if (status === 303) {
    return { method: "GET", url: target.toString(), headers, responseType: current.responseType };
  }
  return { ...current, url: target.toString(), headers };
}

/**
 * Issue `request` and follow redirects manually.
 *
 * @returns First non-redirect response.
 * @throws TooManyRedirectsError when more than `maxRedirects` hops are required.
 * @throws PermanentError when a redirect has no `Location` header.
 */
export async function followRedirects<T>(
  client: AxiosInstance,
  request: HttpRequest,
  policy: RedirectPolicy,
  call: CallDescriptor
): Promise<AxiosResponse<T>> {
  let current = request;
  for (let hops = 0; ; hops += 1) {
    const response = await client.request<T>({
      method: current.method,
      url: current.url,
      headers: { ...current.headers },
      data: current.data,
      responseType: current.responseType
    });
    if (!REDIRECT_STATUSES.has(response.status)) {
      return response;
    }
    if (hops >= policy.maxRedirects) {
      throw new TooManyRedirectsError(call, policy.maxRedirects);
    }
    const location = normaliseHeaders(response.headers).location;
    if (!location) {
      throw new PermanentError(call, `redirect ${response.status} without Location header`, { status: response.status });
    }
    debug(`${call.operation}: ${response.status} redirect to ${location}`);
    current = nextRequest(current, response.status, location, policy);
  }
}
