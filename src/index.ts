export { ApiClient, DEFAULT_DATA_PER_PREDICTION, fileTypeForPath } from "./client";
export type { ApiClientOptions, QuickPredictOptions, QuickPredictResult } from "./client";
export { Session, DEFAULT_SESSION_NAME } from "./session";
export type { SessionContext } from "./session";
export { CompletionPoller, DEFAULT_MAX_TRANSPORT_RETRIES, DEFAULT_POLL_INTERVAL_MS } from "./poller";
export type { PollTarget, PollerOptions, WaitOptions } from "./poller";
export {
  DEFAULT_ROUTES,
  HYPNOGRAM_FILE_TYPES,
  ResourceEndpoints,
  classifyFailure,
  downloadResource,
  encodeChannelGroups,
} from "./endpoints";
export type { Endpoint, RouteLayout } from "./endpoints";
export { FetchTransport } from "./transport";
export type { HttpMethod, MultipartFile, RequestBody, Transport, TransportRequest, TransportResponse } from "./transport";
export { isTerminal, parseJobStatus } from "./status";
export { anonymizeEdf, isEdfHeader } from "./anonymize";
export { DEFAULT_AUTH_SCHEME, DEFAULT_BASE_URL, DEFAULT_TOKEN_ENV_NAME, loadConfig } from "./config";
export type { ClientConfig, ConfigOverrides } from "./config";
export { createConsoleLogger, silentLogger } from "./logger";
export type { LogLevel, Logger } from "./logger";
export * from "./errors";
export type * from "./types";
