import { writeFile } from "node:fs/promises";

import { anonymizeEdf, anonymousFilename } from "./anonymize";
import {
  classifyFailure,
  downloadResource,
  isOk,
  normalizeFileType,
  parseConfigurationOptions,
  parseHypnogram,
  parsePredictionLog,
  parseStatusLabel,
} from "./endpoints";
import type { Endpoint, ResourceEndpoints } from "./endpoints";
import {
  ConfigurationError,
  DownloadError,
  JobAlreadyRunningError,
  JobStartError,
  NotFoundError,
  ResultNotReadyError,
  TransportError,
  UploadError,
} from "./errors";
import type { Logger } from "./logger";
import { parseJobStatus } from "./status";
import type { TransportResponse } from "./transport";
import type {
  ChannelGroup,
  ConfigurationOptions,
  Hypnogram,
  JobStatus,
  PredictionLog,
  ResourceKind,
  UploadResult,
} from "./types";

export const DEFAULT_SESSION_NAME = "default";

/** What a {@link Session} needs from the client that owns it. */
export interface SessionContext {
  endpoints: ResourceEndpoints;
  logger: Logger;
  send(endpoint: Endpoint, sessionName: string): Promise<TransportResponse>;
  forget(session: Session): void;
}

/**
 * Handle on one server-side session: one uploaded recording, one prediction
 * job, its log and its result. The handle only carries the session name; all
 * state lives on the server.
 */
export class Session {
  private deleted = false;
  private uploading = false;

  constructor(
    readonly name: string,
    private readonly ctx: SessionContext
  ) {}

  get isDeleted(): boolean {
    return this.deleted;
  }

  private async call(endpoint: Endpoint): Promise<TransportResponse> {
    if (this.deleted) throw new NotFoundError(`Session '${this.name}' has been deleted`);
    return this.ctx.send(endpoint, this.name);
  }

  async upload(fileBytes: Uint8Array, filename: string, anonymize: boolean): Promise<UploadResult> {
    if (this.uploading) {
      throw new UploadError(`An upload is already in progress for session '${this.name}'`);
    }
    let data = fileBytes;
    let uploadName = filename;
    if (anonymize) {
      this.ctx.logger.info(`Anonymizing '${filename}' before upload`);
      data = anonymizeEdf(fileBytes);
      uploadName = anonymousFilename(filename);
    }

    this.ctx.logger.info(`Uploading ${data.length} bytes to session '${this.name}'. Please wait.`);
    this.uploading = true;
    const res = await this.call(this.ctx.endpoints.upload({ field: "PSG", filename: uploadName, data }))
      .catch((err: unknown) => {
        if (err instanceof TransportError) {
          throw new UploadError(`Upload of '${filename}' failed: ${err.message}`, { cause: err });
        }
        throw err;
      })
      .finally(() => {
        this.uploading = false;
      });

    if (!isOk(res)) {
      throw classifyFailure(res, (message, status) =>
        status === 413
          ? new UploadError(`File too large: ${message}`, { status })
          : new UploadError(`Upload failed: ${message}`, { status })
      );
    }
    return { sessionName: this.name, filename: uploadName, anonymized: anonymize, bytes: data.length };
  }

  /**
   * Selects the scoring model. The name is not checked locally; the server
   * decides which models exist.
   */
  async setModel(name: string): Promise<void> {
    this.ctx.logger.info(`Setting model '${name}'`);
    const res = await this.call(this.ctx.endpoints.setModel(name));
    if (!isOk(res)) {
      throw classifyFailure(res, (message, status) => new ConfigurationError(`Model '${name}' rejected: ${message}`, status));
    }
  }

  async predict(channelGroups: readonly ChannelGroup[], dataPerPrediction: number): Promise<void> {
    if (!Number.isInteger(dataPerPrediction) || dataPerPrediction <= 0) {
      throw new ConfigurationError(`dataPerPrediction must be a positive integer, got ${dataPerPrediction}`);
    }
    const current = await this.status();
    if (current === "QUEUED" || current === "RUNNING") {
      throw new JobAlreadyRunningError(this.name);
    }

    const groups = channelGroups.map((g) => g.join("++")).join(" ");
    this.ctx.logger.info(`Starting prediction on session '${this.name}' (channel groups: ${groups || "server default"})`);
    const res = await this.call(this.ctx.endpoints.predict(channelGroups, dataPerPrediction));
    if (!isOk(res)) {
      throw classifyFailure(res, (message, status) => {
        if (status === 409) return new JobAlreadyRunningError(this.name, status);
        if (status === 400 || status === 422) return new ConfigurationError(message, status);
        return new JobStartError(`Prediction could not be started: ${message}`, status);
      });
    }
  }

  async status(): Promise<JobStatus> {
    const res = await this.call(this.ctx.endpoints.predictionStatus());
    if (!isOk(res)) throw classifyFailure(res);
    return parseJobStatus(parseStatusLabel(res));
  }

  /** Only valid once the job has succeeded; the status is checked first. */
  async getHypnogram(): Promise<Hypnogram> {
    const current = await this.status();
    if (current !== "SUCCESS") throw new ResultNotReadyError(this.name, current);
    const res = await this.call(this.ctx.endpoints.hypnogram());
    if (!isOk(res)) throw classifyFailure(res);
    return parseHypnogram(res);
  }

  async getLog(): Promise<PredictionLog> {
    const res = await this.call(this.ctx.endpoints.predictionLog());
    if (!isOk(res)) throw classifyFailure(res);
    return parsePredictionLog(res);
  }

  async getConfigurationOptions(): Promise<ConfigurationOptions> {
    const res = await this.call(this.ctx.endpoints.configurationOptions());
    if (!isOk(res)) throw classifyFailure(res, (message, status) => new ConfigurationError(message, status));
    return parseConfigurationOptions(res);
  }

  async deleteFile(): Promise<void> {
    const res = await this.call(this.ctx.endpoints.deleteFile());
    if (!isOk(res)) throw classifyFailure(res);
  }

  async download(kind: ResourceKind, outPath: string, fileType = "tsv"): Promise<void> {
    const type = normalizeFileType(fileType);
    const res = await this.call(this.ctx.endpoints.download(downloadResource(kind, type)));
    if (!isOk(res)) {
      throw classifyFailure(res, (message, status) =>
        status === 404
          ? new DownloadError(`No ${kind} available for session '${this.name}': ${message}`, { status })
          : new DownloadError(`Download of ${kind} failed: ${message}`, { status })
      );
    }
    this.ctx.logger.info(`Saving ${kind} to ${outPath}`);
    try {
      await writeFile(outPath, res.body);
    } catch (err: unknown) {
      const reason = err instanceof Error ? err.message : String(err);
      throw new DownloadError(`Could not write ${outPath}: ${reason}`, { cause: err });
    }
  }

  /**
   * Deletes the session with its file, job, log and result. The handle is
   * dropped from the owning client before the request is sent, whatever the
   * server answers.
   */
  async delete(): Promise<void> {
    this.deleted = true;
    this.ctx.forget(this);
    this.ctx.logger.info(`Deleting session '${this.name}'`);
    const res = await this.ctx.send(this.ctx.endpoints.deleteSession(), this.name);
    if (!isOk(res)) throw classifyFailure(res);
  }
}
