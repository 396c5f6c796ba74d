export type ChannelGroup = readonly string[];

export type JobStatus = "NOT_STARTED" | "QUEUED" | "RUNNING" | "SUCCESS" | "FAILED";

export type HypnogramFileType = "tsv" | "hyp" | "npy";

export type ResourceKind = "hypnogram" | "log" | "file";

export interface Epoch {
  index: number;
  label: string;
}

export interface Hypnogram {
  epochs: Epoch[];
  classes: Record<string, string>;
}

export interface PredictionLog {
  lines: string[];
  finished: boolean;
}

export interface UploadResult {
  sessionName: string;
  filename: string;
  anonymized: boolean;
  bytes: number;
}

export interface ConfigurationOptions {
  channelGroups: ChannelGroup[];
  model?: string;
  raw: Record<string, unknown>;
}
