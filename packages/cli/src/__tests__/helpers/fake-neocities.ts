/**
 * In-memory stand-in for the Neocities site API, exposed as a `fetch`
 * implementation. Like the real service, storing a file creates its parent
 * directories and deleting it leaves them behind.
 */
import { createHash } from "node:crypto";
import type { FetchLike } from "../../lib/neocities.js";

export const TEST_API_URL = "https://neocities.test/api";
export const TEST_API_KEY = "test-secret";

const UPDATED_AT = "Sat, 13 Feb 2016 03:04:00 -0000";

export interface RecordedRequest {
  method: string;
  route: string;
  /** Upload field names or delete filenames */
  paths: string[];
}

type Failure = { kind: "status"; status: number; body: unknown } | { kind: "network"; error: Error };

function json(status: number, body: unknown): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { "Content-Type": "application/json" },
  });
}

function parents(path: string): string[] {
  const segments = path.split("/");
  return segments.slice(0, -1).map((_, index) => segments.slice(0, index + 1).join("/"));
}

export class FakeNeocities {
  readonly files = new Map<string, Uint8Array>();
  readonly directories = new Set<string>();
  readonly requests: RecordedRequest[] = [];
  private failures = new Map<string, Failure[]>();

  constructor(private apiKey = TEST_API_KEY) {}

  seedFile(path: string, content: string): this {
    this.store(path, new TextEncoder().encode(content));
    return this;
  }

  seedDirectory(path: string): this {
    this.directories.add(path);
    return this;
  }

  /** Contents of a stored file as text */
  text(path: string): string | undefined {
    const bytes = this.files.get(path);
    return bytes ? new TextDecoder().decode(bytes) : undefined;
  }

  /** Make the next `count` calls to a route fail with the given status */
  failNext(route: string, status: number, body: unknown = { result: "error", message: "failure" }, count = 1): this {
    const queue = this.failures.get(route) ?? [];
    for (let i = 0; i < count; i++) queue.push({ kind: "status", status, body });
    this.failures.set(route, queue);
    return this;
  }

  /** Make the next call to a route throw like a dropped connection */
  dropNext(route: string, error: Error = new TypeError("fetch failed")): this {
    const queue = this.failures.get(route) ?? [];
    queue.push({ kind: "network", error });
    this.failures.set(route, queue);
    return this;
  }

  allDirectories(): string[] {
    return [...this.directories].sort();
  }

  readonly fetch: FetchLike = async (url, init) => {
    const route = new URL(url).pathname.replace(/^\/api/, "");
    const request: RecordedRequest = { method: init.method ?? "GET", route, paths: [] };
    this.requests.push(request);

    const failure = this.failures.get(route)?.shift();
    if (failure?.kind === "network") throw failure.error;
    if (failure?.kind === "status") return json(failure.status, failure.body);

    if (new Headers(init.headers).get("Authorization") !== `Bearer ${this.apiKey}`) {
      return json(403, { result: "error", error_type: "invalid_auth", message: "invalid credentials" });
    }

    if (route === "/list" && request.method === "GET") {
      return json(200, { result: "success", files: this.listing() });
    }

    if (route === "/upload" && request.method === "POST" && init.body instanceof FormData) {
      for (const [name, value] of init.body) {
        if (typeof value === "string") continue;
        request.paths.push(name);
        this.store(name, new Uint8Array(await value.arrayBuffer()));
      }
      return json(200, { result: "success", message: "your file(s) have been successfully uploaded" });
    }

    if (route === "/delete" && request.method === "POST" && init.body instanceof URLSearchParams) {
      const paths = init.body.getAll("filenames[]");
      request.paths.push(...paths);
      for (const path of paths) {
        if (!this.remove(path)) {
          return json(400, { result: "error", error_type: "missing_files", message: `${path} was not found on your site` });
        }
      }
      return json(200, { result: "success", message: "file(s) have been deleted" });
    }

    return json(404, { result: "error", error_type: "not_found", message: "not found" });
  };

  private store(path: string, bytes: Uint8Array): void {
    for (const parent of parents(path)) this.directories.add(parent);
    this.files.set(path, bytes);
  }

  private remove(path: string): boolean {
    if (this.files.delete(path)) return true;
    if (!this.directories.has(path)) return false;

    for (const file of [...this.files.keys()]) {
      if (file.startsWith(`${path}/`)) this.files.delete(file);
    }
    for (const dir of [...this.directories]) {
      if (dir === path || dir.startsWith(`${path}/`)) this.directories.delete(dir);
    }
    return true;
  }

  private listing(): unknown[] {
    const dirs = this.allDirectories().map((path) => ({ path, is_directory: true, updated_at: UPDATED_AT }));
    const files = [...this.files.entries()].map(([path, bytes]) => ({
      path,
      is_directory: false,
      size: bytes.byteLength,
      updated_at: UPDATED_AT,
      sha1_hash: createHash("sha1").update(bytes).digest("hex"),
    }));
    return [...dirs, ...files].sort((a, b) => (a.path < b.path ? -1 : a.path > b.path ? 1 : 0));
  }
}
