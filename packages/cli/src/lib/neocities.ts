import { z } from "zod";
import {
  API_ROUTES,
  AuthError,
  DEFAULT_API_URL,
  NetworkError,
  REQUEST_TIMEOUT_MS,
  RemoteError,
  toError,
} from "@neocities-sync/shared";
import type { RemoteEntry, RemoteSiteApi } from "@neocities-sync/shared";

export type FetchLike = (url: string, init: RequestInit) => Promise<Response>;

export interface NeocitiesClientOptions {
  baseUrl?: string;
  timeoutMs?: number;
  fetch?: FetchLike;
}

const listedEntrySchema = z.object({
  path: z.string().min(1),
  is_directory: z.boolean(),
  size: z.number().int().nonnegative().optional(),
  updated_at: z.string().optional(),
  sha1_hash: z.string().nullable().optional(),
});

const listResponseSchema = z.object({
  result: z.literal("success"),
  files: z.array(listedEntrySchema),
});

const errorResponseSchema = z.object({
  result: z.literal("error"),
  error_type: z.string().optional(),
  message: z.string().optional(),
});

function parseJson(text: string): unknown {
  try {
    return JSON.parse(text);
  } catch {
    return undefined;
  }
}

/**
 * HTTP client for the Neocities site API. One instance per site: the API
 * key is fixed at construction.
 */
export class NeocitiesClient implements RemoteSiteApi {
  private baseUrl: string;
  private timeoutMs: number;
  private fetchImpl: FetchLike;

  constructor(
    private apiKey: string,
    options: NeocitiesClientOptions = {},
  ) {
    this.baseUrl = (options.baseUrl ?? DEFAULT_API_URL).replace(/\/+$/, "");
    this.timeoutMs = options.timeoutMs ?? REQUEST_TIMEOUT_MS;
    this.fetchImpl = options.fetch ?? fetch;
  }

  async listRemoteEntries(): Promise<RemoteEntry[]> {
    const body = await this.request("GET", API_ROUTES.LIST, "listing files");
    const parsed = listResponseSchema.safeParse(body);
    if (!parsed.success) {
      throw new RemoteError(`Unexpected response when listing files: ${parsed.error.issues[0]?.message ?? "invalid body"}`, false);
    }

    return parsed.data.files.map((file) =>
      file.is_directory
        ? { path: file.path, isDirectory: true, fingerprint: null, updatedAt: file.updated_at }
        : {
            path: file.path,
            isDirectory: false,
            size: file.size,
            fingerprint: file.sha1_hash ?? null,
            updatedAt: file.updated_at,
          },
    );
  }

  async uploadFile(path: string, bytes: Uint8Array): Promise<void> {
    const form = new FormData();
    form.append(path, new Blob([bytes]), path);
    await this.request("POST", API_ROUTES.UPLOAD, `uploading "${path}"`, form);
  }

  async deleteEntry(path: string): Promise<void> {
    const form = new URLSearchParams();
    form.append("filenames[]", path);
    await this.request("POST", API_ROUTES.DELETE, `deleting "${path}"`, form);
  }

  private async request(
    method: "GET" | "POST",
    route: string,
    doing: string,
    body?: FormData | URLSearchParams,
  ): Promise<unknown> {
    const url = `${this.baseUrl}${route}`;

    let response: Response;
    let text: string;
    try {
      response = await this.fetchImpl(url, {
        method,
        headers: { Authorization: `Bearer ${this.apiKey}` },
        body,
        signal: AbortSignal.timeout(this.timeoutMs),
      });
      text = await response.text();
    } catch (error) {
      const cause = toError(error);
      if (cause.name === "TimeoutError") {
        throw new NetworkError(`Timed out after ${this.timeoutMs}ms when ${doing}`, { cause });
      }
      throw new NetworkError(`Request failed when ${doing}: ${cause.message}`, { cause });
    }

    const json = parseJson(text);
    const failure = errorResponseSchema.safeParse(json);
    const detail = failure.success ? (failure.data.message ?? failure.data.error_type ?? "") : "";
    const status = `${response.status} ${response.statusText}`.trim();
    const suffix = detail ? `: ${detail}` : "";

    if (response.status === 401 || response.status === 403 || (failure.success && failure.data.error_type === "invalid_auth")) {
      throw new AuthError(`Server rejected the API key when ${doing}${suffix}`, response.status);
    }

    if (!response.ok) {
      const transient = response.status === 429 || response.status >= 500;
      throw new RemoteError(`Server returned "${status}" when ${doing}${suffix}`, transient, response.status);
    }

    if (failure.success) {
      throw new RemoteError(`Server reported an error when ${doing}${suffix}`, false, response.status);
    }

    if (json === undefined) {
      throw new RemoteError(`Server returned a malformed body when ${doing}`, false, response.status);
    }

    return json;
  }
}
