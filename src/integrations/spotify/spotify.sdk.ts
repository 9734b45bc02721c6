import { z } from "zod";

import { logger as defaultLogger, type Logger } from "../../config/logger";
import { retryWithBackoff } from "../../utils/retry";

export interface SpotifyCredentials {
  clientId: string;
  clientSecret: string;
}

export type FetchLike = (url: string, init?: RequestInit) => Promise<Response>;

export class HttpStatusError extends Error {
  constructor(
    message: string,
    public readonly status: number,
    public readonly retryAfterMs?: number
  ) {
    super(message);
    this.name = "HttpStatusError";
  }
}

const tokenResponse = z.object({
  access_token: z.string().min(1),
  expires_in: z.number().optional(),
});

function parseRetryAfter(header: string | null): number | undefined {
  if (!header) return undefined;
  const seconds = Number(header);
  return Number.isFinite(seconds) && seconds >= 0 ? seconds * 1000 : undefined;
}

async function toHttpError(res: Response, what: string): Promise<HttpStatusError> {
  const txt = await res.text().catch(() => "<no body>");
  return new HttpStatusError(
    `${what} failed: ${res.status} ${res.statusText} ${txt}`.trim(),
    res.status,
    parseRetryAfter(res.headers.get("retry-after"))
  );
}

// Rate limits, server errors and network failures (fetch rejects with TypeError)
export function isRetryable(err: unknown): boolean {
  if (err instanceof HttpStatusError) return err.status === 429 || err.status >= 500;
  return err instanceof TypeError;
}

export interface AccessToken {
  token: string;
  expiresAt: number; // epoch ms
}

export async function getAccessToken(
  creds: SpotifyCredentials,
  authUrl: string,
  fetchImpl: FetchLike = fetch,
  now: () => number = Date.now
): Promise<AccessToken> {
  const basic = Buffer.from(`${creds.clientId}:${creds.clientSecret}`).toString("base64");
  const res = await fetchImpl(authUrl, {
    method: "POST",
    headers: {
      Authorization: `Basic ${basic}`,
      "Content-Type": "application/x-www-form-urlencoded",
    },
    body: new URLSearchParams({ grant_type: "client_credentials" }).toString(),
  });
  if (!res.ok) throw await toHttpError(res, "Spotify token request");
  const json = tokenResponse.parse(await res.json());
  // Refresh a minute early
  const ttlMs = (json.expires_in ?? 3600) * 1000 - 60_000;
  return { token: json.access_token, expiresAt: now() + ttlMs };
}

export interface SpotifyApiClientOptions {
  credentials: () => Promise<SpotifyCredentials>;
  baseUrl: string;
  authUrl: string;
  maxRetries: number;
  retryDelayMs: number;
  fetchImpl?: FetchLike;
  logger?: Logger;
  sleep?: (ms: number) => Promise<void>;
  now?: () => number;
}

export class SpotifyApiClient {
  private token: AccessToken | null = null;
  private readonly fetchImpl: FetchLike;
  private readonly logger: Logger;
  private readonly now: () => number;

  constructor(private readonly options: SpotifyApiClientOptions) {
    this.fetchImpl = options.fetchImpl ?? fetch;
    this.logger = options.logger ?? defaultLogger;
    this.now = options.now ?? Date.now;
  }

  /** GET a path under the API base (or an absolute `next` link) and validate the body. */
  async get<T>(pathOrUrl: string, schema: z.ZodType<T, z.ZodTypeDef, unknown>): Promise<T> {
    const url = /^https?:\/\//.test(pathOrUrl) ? pathOrUrl : `${this.options.baseUrl}${pathOrUrl}`;
    return retryWithBackoff(() => this.getOnce(url, schema), {
      maxRetries: this.options.maxRetries,
      initialDelayMs: this.options.retryDelayMs,
      shouldRetry: isRetryable,
      delayHintMs: (err) => (err instanceof HttpStatusError ? err.retryAfterMs : undefined),
      context: { url },
      logger: this.logger,
      sleep: this.options.sleep,
    });
  }

  private async getOnce<T>(url: string, schema: z.ZodType<T, z.ZodTypeDef, unknown>, refreshed = false): Promise<T> {
    const token = await this.accessToken();
    const res = await this.fetchImpl(url, { headers: { Authorization: `Bearer ${token}` } });

    if (res.status === 401 && !refreshed) {
      this.logger.debug("spotify:token:rejected", { url });
      this.token = null;
      return this.getOnce(url, schema, true);
    }
    if (!res.ok) throw await toHttpError(res, `GET ${url}`);
    return schema.parse(await res.json());
  }

  private async accessToken(): Promise<string> {
    if (this.token && this.token.expiresAt > this.now()) return this.token.token;
    const creds = await this.options.credentials();
    this.token = await getAccessToken(creds, this.options.authUrl, this.fetchImpl, this.now);
    return this.token.token;
  }
}
