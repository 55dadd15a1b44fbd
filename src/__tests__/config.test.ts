import { describe, expect, it } from "vitest";
import { envVarName, getModel, loadConfig } from "../config.js";
import { ConfigurationError } from "../errors.js";

describe("loadConfig", () => {
  it("starts from the schema defaults", () => {
    const config = loadConfig({}, {});

    expect(config.defaultModel).toBe("openai:gpt-4o");
    expect(config.defaultSplittingStrategy).toBe("whole_document");
    expect(config.defaultConfidenceThreshold).toBe(0.7);
    expect(config.maxFileSizeMb).toBe(100);
    expect(config.supportedMimeTypes).toContain("application/pdf");
  });

  it("reads PAGEWISE_* variables by the type of each default", () => {
    const config = loadConfig(
      {},
      {
        PAGEWISE_MAX_FILE_SIZE_MB: "25",
        PAGEWISE_AUTO_ROTATE: "false",
        PAGEWISE_AUTO_ENHANCE: "0",
        PAGEWISE_SUPPORTED_MIME_TYPES: "image/png, application/pdf,",
        PAGEWISE_DEFAULT_MODEL: "anthropic:claude-3-haiku",
        PAGEWISE_DEFAULT_DPI: "",
      },
    );

    expect(config.maxFileSizeMb).toBe(25);
    expect(config.autoRotate).toBe(false);
    expect(config.autoEnhance).toBe(false);
    expect(config.supportedMimeTypes).toEqual(["image/png", "application/pdf"]);
    expect(config.defaultModel).toBe("anthropic:claude-3-haiku");
    expect(config.defaultDpi).toBe(300);
  });

  it("lets explicit overrides win over the environment", () => {
    const config = loadConfig({ maxFileSizeMb: 5 }, { PAGEWISE_MAX_FILE_SIZE_MB: "25" });
    expect(config.maxFileSizeMb).toBe(5);
  });

  it("rejects invalid values with the offending key", () => {
    expect(() => loadConfig({ defaultConfidenceThreshold: 1.5 }, {})).toThrow(ConfigurationError);
    expect(() => loadConfig({ defaultConfidenceThreshold: 1.5 }, {})).toThrow(
      "Invalid configuration: defaultConfidenceThreshold: Number must be less than or equal to 1",
    );
    expect(() => loadConfig({}, { PAGEWISE_MAX_FILE_SIZE_MB: "lots" })).toThrow(
      "Invalid configuration: maxFileSizeMb: Expected number, received nan",
    );
  });
});

describe("envVarName", () => {
  it("converts camelCase keys", () => {
    expect(envVarName("maxFileSizeMb")).toBe("PAGEWISE_MAX_FILE_SIZE_MB");
    expect(envVarName("defaultDpi")).toBe("PAGEWISE_DEFAULT_DPI");
  });
});

describe("getModel", () => {
  it("uses the stage model when set, else the default", () => {
    const config = loadConfig({ defaultModel: "openai:gpt-4o", extractionModel: "anthropic:claude-3-haiku" }, {});

    expect(getModel(config, "extraction")).toBe("anthropic:claude-3-haiku");
    expect(getModel(config, "classification")).toBe("openai:gpt-4o");
  });
});
