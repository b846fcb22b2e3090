import { describe, it, expect } from "vitest";
import { loadConfig } from "../../server/lib/config.js";

describe("loadConfig", () => {
  it("falls back to defaults", () => {
    expect(loadConfig({})).toEqual({
      port: 1900,
      host: "0.0.0.0",
      redirect: true,
      status: 308,
    });
  });

  it("reads every variable", () => {
    expect(
      loadConfig({
        CLEAN_PATH_PORT: "8080",
        CLEAN_PATH_HOST: "127.0.0.1",
        CLEAN_PATH_REDIRECT: "off",
        CLEAN_PATH_STATUS: "301",
      })
    ).toEqual({ port: 8080, host: "127.0.0.1", redirect: false, status: 301 });
  });

  it.each(["80a", "70000", "-1", ""])("rejects port %j", (value) => {
    expect(() => loadConfig({ CLEAN_PATH_PORT: value })).toThrow(/CLEAN_PATH_PORT/);
  });

  it("rejects an unknown switch value", () => {
    expect(() => loadConfig({ CLEAN_PATH_REDIRECT: "maybe" })).toThrow(
      /CLEAN_PATH_REDIRECT/
    );
  });

  it("rejects a non-permanent status", () => {
    expect(() => loadConfig({ CLEAN_PATH_STATUS: "302" })).toThrow(
      /CLEAN_PATH_STATUS/
    );
  });
});
