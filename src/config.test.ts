import { describe, it, expect } from "vitest";
import { DEFAULT_AUTH_SCHEME, DEFAULT_BASE_URL, loadConfig } from "./config";
import { ConfigurationError } from "./errors";

describe("loadConfig", () => {
  it("reads the token from the default environment variable", () => {
    expect(loadConfig({ SLEEP_API_TOKEN: "test-token" })).toEqual({
      token: "test-token",
      baseUrl: DEFAULT_BASE_URL,
      authScheme: DEFAULT_AUTH_SCHEME,
    });
  });

  it("reads the token from a custom variable", () => {
    const config = loadConfig({ MY_TOKEN: "test-token" }, { tokenEnvName: "MY_TOKEN" });
    expect(config.token).toBe("test-token");
  });

  it("prefers an explicit token and url", () => {
    const config = loadConfig(
      { SLEEP_API_TOKEN: "env-token", SLEEP_API_URL: "https://env.test" },
      { token: "test-token", baseUrl: "https://flag.test" }
    );
    expect(config.token).toBe("test-token");
    expect(config.baseUrl).toBe("https://flag.test");
  });

  it("takes url and auth scheme from the environment", () => {
    const config = loadConfig({
      SLEEP_API_TOKEN: "test-token",
      SLEEP_API_URL: "https://env.test",
      SLEEP_API_AUTH_SCHEME: "Bearer",
    });
    expect(config.baseUrl).toBe("https://env.test");
    expect(config.authScheme).toBe("Bearer");
  });

  it("names the variable when no token is found", () => {
    expect(() => loadConfig({}, { tokenEnvName: "MY_TOKEN" })).toThrow(ConfigurationError);
    expect(() => loadConfig({}, { tokenEnvName: "MY_TOKEN" })).toThrow(
      "No API token found. Set the MY_TOKEN environment variable or pass --token."
    );
  });
});
