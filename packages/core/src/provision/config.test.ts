import path from "node:path";
import { describe, expect, it } from "vitest";
import { resolveProvisionConfig } from "./config.js";

describe("resolveProvisionConfig", () => {
  it("uses defaults relative to the working directory", () => {
    expect(resolveProvisionConfig("linux", {}, "/work")).toEqual({
      envRoot: path.resolve("/work", "Chatterbox_TTS"),
      modelDir: path.resolve("/work", "Model"),
      hostPython: "python3",
      carriedStatePath: null,
    });
  });

  it("picks python on Windows", () => {
    expect(resolveProvisionConfig("windows", {}, "/work").hostPython).toBe("python");
  });

  it("honours overrides and ignores blank values", () => {
    const config = resolveProvisionConfig(
      "linux",
      {
        TTS_PROVISION_ENV_DIR: "/opt/tts-env",
        TTS_PROVISION_MODEL_DIR: "  ",
        TTS_PROVISION_PYTHON: "python3.11",
        TTS_PROVISION_CARRIED_STATE: "/opt/tts-env/.tts-provision-state.json",
      },
      "/work",
    );

    expect(config).toEqual({
      envRoot: "/opt/tts-env",
      modelDir: path.resolve("/work", "Model"),
      hostPython: "python3.11",
      carriedStatePath: "/opt/tts-env/.tts-provision-state.json",
    });
  });
});
