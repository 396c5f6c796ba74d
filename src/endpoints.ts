import {
  ApiError,
  AuthenticationError,
  ConfigurationError,
  NotFoundError,
  ResponseError,
  SessionLimitError,
} from "./errors";
import { decodeJson, decodeText } from "./transport";
import type { HttpMethod, MultipartFile, RequestBody, TransportResponse } from "./transport";
import type {
  ChannelGroup,
  ConfigurationOptions,
  Hypnogram,
  HypnogramFileType,
  PredictionLog,
  ResourceKind,
} from "./types";

/**
 * Where the service mounts its routes. Older deployments used `info` in place
 * of `get` for the read-only routes, so both namespaces are configurable.
 */
export interface RouteLayout {
  prefix: string;
  infoNamespace: string;
  stagerNamespace: string;
}

export const DEFAULT_ROUTES: RouteLayout = {
  prefix: "/api/v1",
  infoNamespace: "get",
  stagerNamespace: "sleep_stager",
};

export interface Endpoint {
  method: HttpMethod;
  path: string;
  body?: RequestBody;
}

export const HYPNOGRAM_FILE_TYPES: readonly HypnogramFileType[] = ["tsv", "hyp", "npy"];

function joinPath(...parts: string[]): string {
  return "/" + parts.map((p) => p.replace(/^\/+|\/+$/g, "")).filter(Boolean).join("/");
}

export class ResourceEndpoints {
  constructor(private readonly routes: RouteLayout = DEFAULT_ROUTES) {}

  private info(name: string): string {
    return joinPath(this.routes.prefix, this.routes.infoNamespace, name);
  }

  private stager(name: string): string {
    return joinPath(this.routes.prefix, this.routes.stagerNamespace, name);
  }

  private plain(...parts: string[]): string {
    return joinPath(this.routes.prefix, ...parts);
  }

  /** Login page carrying the CSRF token; served outside the API prefix. */
  login(): Endpoint {
    return { method: "GET", path: "/login" };
  }

  modelNames(): Endpoint {
    return { method: "GET", path: this.info("model_names") };
  }

  configurationOptions(): Endpoint {
    return { method: "GET", path: this.info("configuration_options") };
  }

  predictionStatus(): Endpoint {
    return { method: "GET", path: this.info("prediction_status") };
  }

  hypnogram(): Endpoint {
    return { method: "GET", path: this.info("hypnogram") };
  }

  predictionLog(): Endpoint {
    return { method: "GET", path: this.info("prediction_log") };
  }

  validateToken(): Endpoint {
    return { method: "GET", path: this.plain("token", "validate") };
  }

  sessionNames(): Endpoint {
    return { method: "GET", path: this.stager("get_session_names") };
  }

  upload(file: MultipartFile): Endpoint {
    return {
      method: "POST",
      path: this.plain("file", "upload"),
      body: { kind: "multipart", fields: {}, files: [file] },
    };
  }

  deleteFile(): Endpoint {
    return { method: "POST", path: this.plain("file", "delete") };
  }

  setModel(name: string): Endpoint {
    return { method: "POST", path: this.stager("set_model"), body: { kind: "form", fields: { model: name } } };
  }

  deleteSession(): Endpoint {
    return { method: "POST", path: this.stager("delete_session") };
  }

  predict(channelGroups: readonly ChannelGroup[], dataPerPrediction: number): Endpoint {
    return {
      method: "POST",
      path: this.stager("predict"),
      body: { kind: "form", fields: encodeChannelGroups(channelGroups, dataPerPrediction) },
    };
  }

  download(resource: string): Endpoint {
    return { method: "GET", path: this.plain("download", resource) };
  }

  deleteAccount(): Endpoint {
    return { method: "POST", path: this.plain("account", "delete") };
  }
}

/**
 * Flattens channel groups into the indexed form fields the predict route
 * reads: `channels-<n>` carries the channel and `channel_group_idx-<n>` the
 * group it belongs to, with `n` counting across all groups.
 */
export function encodeChannelGroups(
  channelGroups: readonly ChannelGroup[],
  dataPerPrediction: number
): Record<string, string> {
  const fields: Record<string, string> = { data_per_prediction: String(dataPerPrediction) };
  let entry = 0;
  channelGroups.forEach((group, groupIdx) => {
    for (const channel of group) {
      fields[`channels-${entry}`] = channel;
      fields[`channel_group_idx-${entry}`] = String(groupIdx);
      entry++;
    }
  });
  return fields;
}

export function normalizeFileType(fileType: string): HypnogramFileType {
  const stripped = fileType.replace(/^\./, "").toLowerCase();
  const match = HYPNOGRAM_FILE_TYPES.find((t) => t === stripped);
  if (!match) {
    throw new ConfigurationError(`Invalid hypnogram file type '${fileType}', expected one of ${HYPNOGRAM_FILE_TYPES.join(", ")}`);
  }
  return match;
}

export function downloadResource(kind: ResourceKind, fileType: HypnogramFileType = "tsv"): string {
  switch (kind) {
    case "hypnogram":
      return `hypnogram_${fileType}`;
    case "log":
      return "prediction_log";
    case "file":
      return "file";
  }
}

// Response handling

export function isOk(res: TransportResponse): boolean {
  return res.status >= 200 && res.status < 300;
}

/** Best human-readable message a failed response carries. */
export function errorMessage(res: TransportResponse): string {
  const body = decodeJson(res);
  if (isRecord(body)) {
    for (const key of ["detail", "message", "error"]) {
      const value = body[key];
      if (typeof value === "string" && value) return value;
    }
  }
  const text = decodeText(res).trim();
  if (text && text.length <= 300 && !text.startsWith("<")) return text;
  return `Server responded with ${res.status}`;
}

function defaultFailure(message: string, status: number): ApiError {
  return status === 404 ? new NotFoundError(message, status) : new ResponseError(message, status);
}

const SESSION_LIMIT_PATTERN = /session limit|maximum number of sessions|too many sessions|max(imum)? sessions/i;

/**
 * Maps a non-2xx response to an error. Authentication and session-cap
 * rejections are recognized on every route; everything else is built by the
 * route-specific `fallback`.
 */
export function classifyFailure(
  res: TransportResponse,
  fallback: (message: string, status: number) => ApiError = defaultFailure
): ApiError {
  const message = errorMessage(res);
  if (res.status === 401 || res.status === 403) {
    return new AuthenticationError(`Authentication rejected: ${message}`, res.status);
  }
  if (res.status === 429 || SESSION_LIMIT_PATTERN.test(message)) {
    return new SessionLimitError(message, res.status);
  }
  return fallback(message, res.status);
}

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function isStringArray(value: unknown): value is string[] {
  return Array.isArray(value) && value.every((v) => typeof v === "string");
}

function expectRecord(res: TransportResponse, route: string): Record<string, unknown> {
  const body = decodeJson(res);
  if (!isRecord(body)) throw new ResponseError(`Malformed ${route} response`, res.status);
  return body;
}

export function parseModelNames(res: TransportResponse): string[] {
  const body = expectRecord(res, "model_names");
  const models = body.models;
  if (!isStringArray(models)) throw new ResponseError("Malformed model_names response", res.status);
  return models;
}

export function parseSessionNames(res: TransportResponse): string[] {
  const body = expectRecord(res, "session_names");
  const names = body.session_names;
  if (!isStringArray(names)) throw new ResponseError("Malformed session_names response", res.status);
  return names;
}

export function parseStatusLabel(res: TransportResponse): string {
  const body = expectRecord(res, "prediction_status");
  const label = body.label ?? body.status;
  if (typeof label !== "string") throw new ResponseError("Malformed prediction_status response", res.status);
  return label;
}

export function splitLogLines(raw: string): string[] {
  const lines = raw.replace(/<br\s*\/?>/gi, "\n").replace(/\r\n/g, "\n").split("\n");
  while (lines.length > 0 && lines[lines.length - 1].trim() === "") lines.pop();
  return lines;
}

export function parsePredictionLog(res: TransportResponse): PredictionLog {
  const body = expectRecord(res, "prediction_log");
  const { lines, finished } = body;
  let parsed: string[];
  if (typeof lines === "string") parsed = splitLogLines(lines);
  else if (isStringArray(lines)) parsed = lines;
  else throw new ResponseError("Malformed prediction_log response", res.status);
  return { lines: parsed, finished: finished === true };
}

export function parseHypnogram(res: TransportResponse): Hypnogram {
  const body = expectRecord(res, "hypnogram");
  const stages = body.hypnogram;
  if (!Array.isArray(stages) || !stages.every((s) => typeof s === "string" || typeof s === "number")) {
    throw new ResponseError("Malformed hypnogram response", res.status);
  }
  const classes: Record<string, string> = {};
  const rawClasses = body.classes;
  if (isRecord(rawClasses)) {
    for (const [code, label] of Object.entries(rawClasses)) {
      if (typeof label === "string") classes[code] = label;
    }
  }
  const epochs = stages.map((stage, index) => {
    const code = String(stage);
    return { index, label: Object.hasOwn(classes, code) ? classes[code] : code };
  });
  return { epochs, classes };
}

function parseChannelGroup(value: unknown): ChannelGroup | undefined {
  if (typeof value === "string") return value.split("++");
  if (isStringArray(value)) return value;
  return undefined;
}

export function parseConfigurationOptions(res: TransportResponse): ConfigurationOptions {
  const body = expectRecord(res, "configuration_options");
  const channelGroups: ChannelGroup[] = [];
  const rawGroups: unknown = body.channel_groups;
  if (Array.isArray(rawGroups)) {
    for (const group of rawGroups) {
      const parsed = parseChannelGroup(group);
      if (!parsed) throw new ResponseError("Malformed channel group in configuration_options", res.status);
      channelGroups.push(parsed);
    }
  }
  const model = [body.model, body.default_model].find((m): m is string => typeof m === "string" && m !== "");
  return { channelGroups, model, raw: body };
}
