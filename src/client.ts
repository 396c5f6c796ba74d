import { readFile, writeFile } from "node:fs/promises";
import path from "node:path";

import { parse } from "node-html-parser";

import { randomHexString } from "./anonymize";
import { DEFAULT_AUTH_SCHEME, DEFAULT_BASE_URL } from "./config";
import {
  DEFAULT_ROUTES,
  ResourceEndpoints,
  classifyFailure,
  isOk,
  parseModelNames,
  parseSessionNames,
} from "./endpoints";
import type { Endpoint, RouteLayout } from "./endpoints";
import {
  AuthenticationError,
  ConfigurationError,
  DownloadError,
  JobFailedError,
  ResponseError,
  UploadError,
} from "./errors";
import { silentLogger } from "./logger";
import type { Logger } from "./logger";
import { CompletionPoller } from "./poller";
import type { PollerOptions } from "./poller";
import { DEFAULT_SESSION_NAME, Session } from "./session";
import type { SessionContext } from "./session";
import { FetchTransport, decodeText } from "./transport";
import type { HttpMethod, Transport, TransportResponse } from "./transport";
import type { ChannelGroup, Hypnogram, HypnogramFileType, PredictionLog } from "./types";

/** Input samples per scored epoch: 30 s at 128 Hz. */
export const DEFAULT_DATA_PER_PREDICTION = 128 * 30;

export interface ApiClientOptions {
  token: string;
  baseUrl?: string;
  /** Replaces the fetch-based transport, e.g. with an in-process fake. */
  transport?: Transport;
  requestTimeoutMs?: number;
  /** Limit for a single upload request; unlimited by default. */
  uploadTimeoutMs?: number;
  /** Scheme in `Authorization: <scheme> <token>`. */
  authScheme?: string;
  routes?: Partial<RouteLayout>;
  /** Send the login page's CSRF token with every POST. */
  csrf?: boolean;
  logger?: Logger;
  poller?: CompletionPoller | PollerOptions;
}

export interface QuickPredictOptions {
  inputFile: string;
  outputFile: string;
  anonymize: boolean;
  model?: string;
  channelGroups?: readonly ChannelGroup[];
  dataPerPrediction?: number;
  /** Defaults to the type implied by the output file's extension. */
  fileType?: HypnogramFileType;
  /** Where to save the prediction log, if anywhere. */
  logFile?: string;
  sessionName?: string;
  pollIntervalMs?: number;
  timeoutMs?: number;
  onLogLines?: (lines: string[]) => void;
}

export interface QuickPredictResult {
  sessionName: string;
  hypnogram: Hypnogram;
  log: PredictionLog;
}

const EXTENSION_FILE_TYPES: Record<string, HypnogramFileType> = {
  ".tsv": "tsv",
  ".txt": "hyp",
  ".hyp": "hyp",
  ".npy": "npy",
};

export function fileTypeForPath(filePath: string): HypnogramFileType {
  const ext = path.extname(filePath).toLowerCase();
  if (!Object.hasOwn(EXTENSION_FILE_TYPES, ext)) {
    throw new ConfigurationError(
      `Output file must have one of the extensions ${Object.keys(EXTENSION_FILE_TYPES).join(", ")}, got '${ext}'`
    );
  }
  return EXTENSION_FILE_TYPES[ext];
}

export class ApiClient {
  readonly endpoints: ResourceEndpoints;
  readonly poller: CompletionPoller;

  private readonly token: string;
  private readonly authScheme: string;
  private readonly transport: Transport;
  private readonly csrf: boolean;
  private readonly logger: Logger;
  private readonly sessions = new Map<string, Session>();
  private readonly context: SessionContext;
  private csrfToken?: Promise<string>;

  constructor(options: ApiClientOptions) {
    if (!options.token) throw new ConfigurationError("An API token is required");
    this.token = options.token;
    this.authScheme = options.authScheme ?? DEFAULT_AUTH_SCHEME;
    this.transport =
      options.transport ??
      new FetchTransport({
        baseUrl: options.baseUrl ?? DEFAULT_BASE_URL,
        timeoutMs: options.requestTimeoutMs,
        uploadTimeoutMs: options.uploadTimeoutMs,
      });
    this.csrf = options.csrf ?? true;
    this.logger = options.logger ?? silentLogger;
    this.endpoints = new ResourceEndpoints({ ...DEFAULT_ROUTES, ...options.routes });
    this.poller =
      options.poller instanceof CompletionPoller
        ? options.poller
        : new CompletionPoller({ logger: this.logger, ...options.poller });
    this.context = {
      endpoints: this.endpoints,
      logger: this.logger,
      send: (endpoint, sessionName) => this.send(endpoint, sessionName),
      forget: (session) => {
        if (this.sessions.get(session.name) === session) this.sessions.delete(session.name);
      },
    };
  }

  private async headersFor(method: HttpMethod): Promise<Record<string, string>> {
    const headers: Record<string, string> = { Authorization: `${this.authScheme} ${this.token}` };
    if (method === "POST" && this.csrf) headers["X-CSRFToken"] = await this.getCsrfToken();
    return headers;
  }

  private async send(endpoint: Endpoint, sessionName: string = DEFAULT_SESSION_NAME): Promise<TransportResponse> {
    const headers = await this.headersFor(endpoint.method);
    const res = await this.transport.request({
      method: endpoint.method,
      path: endpoint.path,
      query: { session_name: sessionName },
      headers,
      body: endpoint.body,
    });
    const line = `${endpoint.method} ${endpoint.path} [${sessionName}] -> ${res.status}`;
    if (isOk(res)) this.logger.debug(line);
    else this.logger.warn(line);
    return res;
  }

  private getCsrfToken(): Promise<string> {
    if (!this.csrfToken) {
      this.csrfToken = this.fetchCsrfToken().catch((err: unknown) => {
        this.csrfToken = undefined;
        throw err;
      });
    }
    return this.csrfToken;
  }

  private async fetchCsrfToken(): Promise<string> {
    const login = this.endpoints.login();
    const res = await this.transport.request({ method: login.method, path: login.path, headers: {} });
    if (!isOk(res)) throw classifyFailure(res);
    const value = parse(decodeText(res)).querySelector("input#csrf_token")?.getAttribute("value");
    if (!value) throw new ResponseError("Login page did not contain a CSRF token", res.status);
    return value;
  }

  /** Returns a handle for `name` without contacting the server. */
  session(name: string = DEFAULT_SESSION_NAME): Session {
    const known = this.sessions.get(name);
    if (known) return known;
    const session = new Session(name, this.context);
    this.sessions.set(name, session);
    return session;
  }

  /** Names of the sessions this client currently holds handles for. */
  knownSessions(): string[] {
    return [...this.sessions.keys()];
  }

  /**
   * Registers `name` with the server, or attaches to it if it already exists.
   * Fails with a SessionLimitError once the account holds as many sessions
   * as the server allows.
   */
  async newSession(name: string = DEFAULT_SESSION_NAME): Promise<Session> {
    const existed = this.sessions.has(name);
    const session = this.session(name);
    try {
      await session.status();
    } catch (err: unknown) {
      if (!existed) this.context.forget(session);
      throw err;
    }
    return session;
  }

  async getSessionNames(): Promise<string[]> {
    const res = await this.send(this.endpoints.sessionNames());
    if (!isOk(res)) throw classifyFailure(res);
    return parseSessionNames(res);
  }

  async listModels(): Promise<string[]> {
    const res = await this.send(this.endpoints.modelNames());
    if (!isOk(res)) throw classifyFailure(res);
    return parseModelNames(res);
  }

  async validateToken(): Promise<void> {
    this.logger.info("Validating auth token...");
    const res = await this.send(this.endpoints.validateToken());
    if (res.status !== 200 || !decodeText(res).startsWith("OK")) {
      throw new AuthenticationError("Invalid authentication token specified.", res.status);
    }
  }

  /**
   * Attempts every session of the account. Failures are logged as they
   * happen and the first one is rethrown once all deletes were tried.
   */
  async deleteAllSessions(): Promise<void> {
    const failures: unknown[] = [];
    for (const name of await this.getSessionNames()) {
      try {
        await this.session(name).delete();
      } catch (err: unknown) {
        this.logger.warn(`Could not delete session '${name}': ${String(err)}`);
        failures.push(err);
      }
    }
    if (failures.length > 0) throw failures[0];
  }

  /** Deletes the account and everything stored under it. */
  async deleteAccount(): Promise<void> {
    const res = await this.send(this.endpoints.deleteAccount());
    if (!isOk(res)) throw classifyFailure(res);
    this.sessions.clear();
  }

  /**
   * Scores one recording end to end in a fresh session: upload, configure,
   * predict, wait, fetch the hypnogram and log. The session is deleted on the
   * way out whether or not a step failed.
   */
  async quickPredict(options: QuickPredictOptions): Promise<QuickPredictResult> {
    const fileType = options.fileType ?? fileTypeForPath(options.outputFile);
    const data = await readFile(options.inputFile).catch((err: unknown) => {
      const reason = err instanceof Error ? err.message : String(err);
      throw new UploadError(`Could not read '${options.inputFile}': ${reason}`, { cause: err });
    });

    const session = await this.newSession(options.sessionName ?? `quick-${randomHexString()}`);
    try {
      await session.upload(data, path.basename(options.inputFile), options.anonymize);

      const needsConfig = options.model === undefined || options.channelGroups === undefined;
      const config = needsConfig ? await session.getConfigurationOptions() : undefined;
      const model = options.model ?? config?.model ?? (await this.listModels())[0];
      if (!model) throw new ConfigurationError("No model given and the server offers none");
      await session.setModel(model);

      const channelGroups = options.channelGroups ?? config?.channelGroups ?? [];
      if (channelGroups.length === 0) {
        throw new ConfigurationError("No channel groups given and none could be inferred from the recording");
      }
      await session.predict(channelGroups, options.dataPerPrediction ?? DEFAULT_DATA_PER_PREDICTION);

      const succeeded = await this.poller.wait(session, {
        pollIntervalMs: options.pollIntervalMs,
        timeoutMs: options.timeoutMs,
        onLogLines: options.onLogLines,
      });
      if (!succeeded) throw new JobFailedError(session.name, await this.failureLog(session));

      const hypnogram = await session.getHypnogram();
      await session.download("hypnogram", options.outputFile, fileType);
      const log = await session.getLog();
      if (options.logFile) await this.saveLog(log, options.logFile);
      return { sessionName: session.name, hypnogram, log };
    } finally {
      await this.release(session);
    }
  }

  private async failureLog(session: Session): Promise<string[]> {
    try {
      return (await session.getLog()).lines;
    } catch (err: unknown) {
      this.logger.warn(`Could not fetch the log of failed session '${session.name}': ${String(err)}`);
      return [];
    }
  }

  private async saveLog(log: PredictionLog, logFile: string): Promise<void> {
    this.logger.info(`Saving prediction log to ${logFile}`);
    try {
      await writeFile(logFile, log.lines.join("\n") + "\n");
    } catch (err: unknown) {
      const reason = err instanceof Error ? err.message : String(err);
      throw new DownloadError(`Could not write ${logFile}: ${reason}`, { cause: err });
    }
  }

  // Best effort: a failed delete must not hide the error that got us here.
  private async release(session: Session): Promise<void> {
    try {
      await session.delete();
    } catch (err: unknown) {
      this.logger.warn(`Could not delete session '${session.name}': ${String(err)}`);
    }
  }
}
