import { describe, expect, test } from "vitest";
import { loadEnv } from "../src/config/env.js";

describe("loadEnv", () => {
  test("applies defaults", () => {
    expect(loadEnv({})).toEqual({
      FEEDTREE_ITEMS_FILENAME: "rss_items.json",
      FEEDTREE_ROOT_FILENAME: "rss_root.json",
      FEEDTREE_OUTPUT_FILENAME: "rss.xml",
      LOG_LEVEL: "warn",
      NO_COLOR: false,
      FORCE_COLOR: undefined,
    });
  });

  test("reads color switches", () => {
    const config = loadEnv({ NO_COLOR: "1", FORCE_COLOR: "0", LOG_LEVEL: "debug" });
    expect(config.NO_COLOR).toBe(true);
    expect(config.FORCE_COLOR).toBe(false);
    expect(config.LOG_LEVEL).toBe("debug");
    expect(loadEnv({ NO_COLOR: "" }).NO_COLOR).toBe(false);
  });

  test("rejects unknown log levels", () => {
    expect(() => loadEnv({ LOG_LEVEL: "loud" })).toThrow();
  });
});
