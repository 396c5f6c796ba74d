import { existsSync } from "node:fs";
import path from "node:path";

import { Command, CommanderError, InvalidArgumentError } from "commander";

import { ApiClient, DEFAULT_DATA_PER_PREDICTION, fileTypeForPath } from "./client";
import { DEFAULT_TOKEN_ENV_NAME, loadConfig } from "./config";
import { ConfigurationError } from "./errors";
import { createConsoleLogger, parseLogLevel } from "./logger";
import type { LogLevel } from "./logger";
import type { ChannelGroup, Hypnogram } from "./types";

export interface CliArgs {
  input: string;
  output: string;
  logFilePath?: string;
  printHypnogram: boolean;
  overwriteFile: boolean;
  model?: string;
  dataPerPrediction: number;
  anonymize: boolean;
  channelGroups?: ChannelGroup[];
  apiTokenEnvName: string;
  token?: string;
  url?: string;
  streamLog: boolean;
  logLevel: LogLevel;
  pollIntervalSeconds: number;
  timeoutSeconds?: number;
}

type RawOptions = {
  logFilePath?: string;
  printHypnogram?: boolean;
  overwriteFile?: boolean;
  model?: string;
  dataPerPrediction: number;
  anonymizeBeforeUpload?: boolean;
  channelGroups?: string[];
  apiTokenEnvName: string;
  token?: string;
  url?: string;
  streamLog?: boolean;
  logLevel: LogLevel;
  pollInterval: number;
  timeout?: number;
};

function parsePositiveInt(value: string): number {
  const n = Number(value);
  if (!Number.isInteger(n) || n <= 0) throw new InvalidArgumentError("Must be a positive integer.");
  return n;
}

function parseLevel(value: string): LogLevel {
  const level = parseLogLevel(value);
  if (!level) {
    throw new InvalidArgumentError("Must be one of debug, info, warn(ing), error, critical or silent.");
  }
  return level;
}

function parsePositiveNumber(value: string): number {
  const n = Number(value);
  if (!Number.isFinite(n) || n <= 0) throw new InvalidArgumentError("Must be a positive number.");
  return n;
}

export function createProgram(): Command {
  return new Command()
    .name("sleep-score")
    .description(
      "Score the sleep stages of an EDF(+) recording with the remote sleep-staging service.\n\n" +
        `Authentication: store an API token in the environment variable named by --api-token-env-name ` +
        `(default ${DEFAULT_TOKEN_ENV_NAME}) or pass it with --token (not recommended).`
    )
    .argument("<input>", "path to the EDF(+) (.edf) file to score")
    .argument("<output>", "path to the output hypnogram (.tsv, .txt, .hyp or .npy)")
    .option("-l, --log-file-path <path>", "save the prediction log to this path")
    .option("--print-hypnogram", "print the scored hypnogram to stdout")
    .option("--overwrite-file", "overwrite existing output and log files")
    .option("--model <name>", "model to score with (default: chosen by the server)")
    .option(
      "--data-per-prediction <n>",
      "samples of the resampled signal per predicted epoch",
      parsePositiveInt,
      DEFAULT_DATA_PER_PREDICTION
    )
    .option("--anonymize-before-upload", "strip patient and recording identification from the EDF header before upload")
    .option(
      "--channel-groups <groups...>",
      "channel groups to score, each written as channel1++channel2 (default: inferred by the server)"
    )
    .option("--api-token-env-name <name>", "environment variable holding the API token", DEFAULT_TOKEN_ENV_NAME)
    .option("--token <token>", "API token (visible in shell history)")
    .option("--url <url>", "base URL of the scoring service")
    .option("--stream-log", "print the prediction log while the job runs")
    .option("--log-level <level>", "logging level, e.g. DEBUG, INFO, WARNING, ERROR", parseLevel, "info")
    .option("--poll-interval <seconds>", "seconds between status checks", parsePositiveNumber, 2)
    .option("--timeout <seconds>", "give up waiting after this many seconds", parsePositiveNumber);
}

/** Parses command-line arguments (without the node and script entries). */
export function parseCliArgs(argv: readonly string[]): CliArgs {
  const result: { args?: CliArgs } = {};
  const program = createProgram()
    .exitOverride()
    .action((input: string, output: string) => {
      const opts = program.opts<RawOptions>();
      result.args = {
        input,
        output,
        logFilePath: opts.logFilePath,
        printHypnogram: opts.printHypnogram ?? false,
        overwriteFile: opts.overwriteFile ?? false,
        model: opts.model,
        dataPerPrediction: opts.dataPerPrediction,
        anonymize: opts.anonymizeBeforeUpload ?? false,
        channelGroups: opts.channelGroups?.map((group) => group.split("++")),
        apiTokenEnvName: opts.apiTokenEnvName,
        token: opts.token,
        url: opts.url,
        streamLog: opts.streamLog ?? false,
        logLevel: opts.logLevel,
        pollIntervalSeconds: opts.pollInterval,
        timeoutSeconds: opts.timeout,
      };
    });
  program.parse([...argv], { from: "user" });
  if (!result.args) throw new ConfigurationError("No arguments were parsed");
  return result.args;
}

export function checkPaths(args: CliArgs, exists: (p: string) => boolean = existsSync): void {
  if (path.extname(args.input).toLowerCase() !== ".edf" || !exists(args.input)) {
    throw new ConfigurationError(`Input file '${args.input}' does not exist or is not a '.edf' file`);
  }
  fileTypeForPath(args.output);
  if (exists(args.output) && !args.overwriteFile) {
    throw new ConfigurationError(`Output file '${args.output}' already exists and --overwrite-file was not set`);
  }
  if (args.logFilePath && exists(args.logFilePath) && !args.overwriteFile) {
    throw new ConfigurationError(`Log file '${args.logFilePath}' already exists and --overwrite-file was not set`);
  }
}

export function formatHypnogram(hypnogram: Hypnogram): string {
  return hypnogram.epochs.map((e) => `${e.index}\t${e.label}`).join("\n");
}

function tryParse(argv: readonly string[]): CliArgs | CommanderError {
  try {
    return parseCliArgs(argv);
  } catch (err: unknown) {
    if (err instanceof CommanderError) return err;
    throw err;
  }
}

/** Runs the tool and resolves to the process exit code. */
export async function main(
  argv: readonly string[] = process.argv.slice(2),
  env: Record<string, string | undefined> = process.env
): Promise<number> {
  const args = tryParse(argv);
  if (args instanceof CommanderError) return args.exitCode;

  const logger = createConsoleLogger(args.logLevel);
  try {
    checkPaths(args);
    const input = path.resolve(args.input);
    const output = path.resolve(args.output);
    const logFile = args.logFilePath ? path.resolve(args.logFilePath) : undefined;
    logger.info(`Input file:          ${input}`);
    logger.info(`Output file:         ${output}`);
    logger.info(`Prediction log file: ${logFile ?? "-"}`);

    const config = loadConfig(env, { token: args.token, tokenEnvName: args.apiTokenEnvName, baseUrl: args.url });
    const client = new ApiClient({ ...config, logger });
    await client.validateToken();
    const { hypnogram } = await client.quickPredict({
      inputFile: input,
      outputFile: output,
      anonymize: args.anonymize,
      model: args.model,
      channelGroups: args.channelGroups,
      dataPerPrediction: args.dataPerPrediction,
      logFile,
      pollIntervalMs: args.pollIntervalSeconds * 1000,
      timeoutMs: args.timeoutSeconds === undefined ? undefined : args.timeoutSeconds * 1000,
      onLogLines: args.streamLog ? (lines) => lines.forEach((line) => console.log(line)) : undefined,
    });
    if (args.printHypnogram) console.log(formatHypnogram(hypnogram));
    return 0;
  } catch (err: unknown) {
    logger.error(err instanceof Error ? `${err.name}: ${err.message}` : String(err));
    return 1;
  }
}
