import { ConfigError } from "@importline/core";
import { describe, expect, test } from "vitest";
import { getConfig, parseKeyList } from "./config";

describe("parseKeyList", () => {
  test("splits, trims and drops empty keys", () => {
    expect(parseKeyList(" steam_1, ,gog_2,")).toEqual(["steam_1", "gog_2"]);
    expect(parseKeyList(undefined)).toEqual([]);
  });
});

describe("getConfig", () => {
  test("falls back to defaults", () => {
    expect(getConfig({})).toEqual({ logLevel: "info", excludedKeys: [], removedKeys: [] });
  });

  test("reads every variable", () => {
    const config = getConfig({
      IMPORTLINE_LOG_LEVEL: "debug",
      IMPORTLINE_EXCLUDE: "steam_1,steam_2",
      IMPORTLINE_REMOVED: "gog_3",
    });

    expect(config).toEqual({
      logLevel: "debug",
      excludedKeys: ["steam_1", "steam_2"],
      removedKeys: ["gog_3"],
    });
  });

  test("rejects an unknown log level", () => {
    expect(() => getConfig({ IMPORTLINE_LOG_LEVEL: "verbose" })).toThrow(ConfigError);
    expect(() => getConfig({ IMPORTLINE_LOG_LEVEL: "verbose" })).toThrow(
      /^Invalid configuration: logLevel: /
    );
  });
});
