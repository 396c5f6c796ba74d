import { ConfigurationError } from "./errors";

export const DEFAULT_BASE_URL = "https://sleep.ai.ku.dk";
export const DEFAULT_AUTH_SCHEME = "JWT";
export const DEFAULT_TOKEN_ENV_NAME = "SLEEP_API_TOKEN";

export interface ClientConfig {
  token: string;
  baseUrl: string;
  authScheme: string;
}

export interface ConfigOverrides {
  token?: string;
  tokenEnvName?: string;
  baseUrl?: string;
}

type Env = Record<string, string | undefined>;

/**
 * Resolves connection settings for the command-line tool. An explicit token
 * wins over the environment variable named by `tokenEnvName`.
 */
export function loadConfig(env: Env = process.env, overrides: ConfigOverrides = {}): ClientConfig {
  const tokenEnvName = overrides.tokenEnvName ?? DEFAULT_TOKEN_ENV_NAME;
  const token = overrides.token || env[tokenEnvName];
  if (!token) {
    throw new ConfigurationError(
      `No API token found. Set the ${tokenEnvName} environment variable or pass --token.`
    );
  }
  return {
    token,
    baseUrl: overrides.baseUrl || env.SLEEP_API_URL || DEFAULT_BASE_URL,
    authScheme: env.SLEEP_API_AUTH_SCHEME || DEFAULT_AUTH_SCHEME,
  };
}
