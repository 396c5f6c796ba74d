import { TransportError } from "./errors";

export type HttpMethod = "GET" | "POST";

export interface MultipartFile {
  field: string;
  filename: string;
  data: Uint8Array;
  contentType?: string;
}

export type RequestBody =
  | { kind: "json"; data: unknown }
  | { kind: "form"; fields: Record<string, string> }
  | { kind: "multipart"; fields: Record<string, string>; files: MultipartFile[] };

export interface TransportRequest {
  method: HttpMethod;
  path: string;
  query?: Record<string, string>;
  headers: Record<string, string>;
  body?: RequestBody;
}

export interface TransportResponse {
  status: number;
  body: Uint8Array;
  contentType?: string;
}

/**
 * Performs one HTTP exchange. Implementations throw {@link TransportError}
 * when no response was received and otherwise return every status code
 * untouched.
 */
export interface Transport {
  request(req: TransportRequest): Promise<TransportResponse>;
}

export interface FetchTransportOptions {
  baseUrl: string;
  timeoutMs?: number;
  /** Applies to multipart uploads in place of `timeoutMs`. Unset means no limit. */
  uploadTimeoutMs?: number;
  fetch?: typeof fetch;
}

const DEFAULT_TIMEOUT_MS = 10 * 60_000;

export function buildUrl(baseUrl: string, path: string, query?: Record<string, string>): string {
  const url = new URL(`${baseUrl.replace(/\/+$/, "")}/${path.replace(/^\/+/, "")}`);
  for (const [key, value] of Object.entries(query ?? {})) {
    url.searchParams.set(key, value);
  }
  return url.toString();
}

function encodeBody(body: RequestBody): { payload: string | URLSearchParams | FormData; contentType?: string } {
  switch (body.kind) {
    case "json":
      return { payload: JSON.stringify(body.data), contentType: "application/json" };
    case "form":
      return { payload: new URLSearchParams(body.fields) };
    case "multipart": {
      const formData = new FormData();
      for (const [key, value] of Object.entries(body.fields)) {
        formData.append(key, value);
      }
      for (const file of body.files) {
        const blob = new Blob([file.data], { type: file.contentType ?? "application/octet-stream" });
        formData.append(file.field, blob, file.filename);
      }
      return { payload: formData };
    }
  }
}

export class FetchTransport implements Transport {
  private readonly baseUrl: string;
  private readonly timeoutMs: number;
  private readonly uploadTimeoutMs?: number;
  private readonly fetchImpl: typeof fetch;

  constructor(options: FetchTransportOptions) {
    this.baseUrl = options.baseUrl;
    this.timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    this.uploadTimeoutMs = options.uploadTimeoutMs;
    this.fetchImpl = options.fetch ?? ((input, init) => fetch(input, init));
  }

  async request(req: TransportRequest): Promise<TransportResponse> {
    const url = buildUrl(this.baseUrl, req.path, req.query);
    const headers: Record<string, string> = { ...req.headers };
    let payload: string | URLSearchParams | FormData | undefined;
    if (req.body) {
      const encoded = encodeBody(req.body);
      payload = encoded.payload;
      if (encoded.contentType) headers["Content-Type"] = encoded.contentType;
    }

    // An upload takes as long as the file needs.
    const timeoutMs = req.body?.kind === "multipart" ? this.uploadTimeoutMs : this.timeoutMs;
    const controller = new AbortController();
    const timeoutId = timeoutMs === undefined ? undefined : setTimeout(() => controller.abort(), timeoutMs);
    try {
      const res = await this.fetchImpl(url, {
        method: req.method,
        headers,
        body: payload,
        signal: controller.signal,
      });
      const body = new Uint8Array(await res.arrayBuffer());
      return { status: res.status, body, contentType: res.headers.get("content-type") ?? undefined };
    } catch (err: unknown) {
      if (err instanceof Error && err.name === "AbortError") {
        throw new TransportError(`${req.method} ${req.path} timed out after ${timeoutMs} ms`, err);
      }
      const reason = err instanceof Error ? err.message : String(err);
      throw new TransportError(`${req.method} ${req.path} failed: ${reason}`, err);
    } finally {
      clearTimeout(timeoutId);
    }
  }
}

export function decodeText(res: TransportResponse): string {
  return new TextDecoder().decode(res.body);
}

/** Parses the body as JSON, or returns undefined when it is not JSON. */
export function decodeJson(res: TransportResponse): unknown {
  const text = decodeText(res);
  if (!text) return undefined;
  try {
    return JSON.parse(text);
  } catch {
    return undefined;
  }
}
