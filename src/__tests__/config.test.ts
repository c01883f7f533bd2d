import fs from "fs";
import path from "path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { describeError } from "../types/errors";
import {
  parseIntegerOption,
  resolveConfig,
  toOptionName,
} from "../utils/config";
import { makeTempDir } from "./helpers/fake-maven";

describe("resolveConfig", () => {
  let outputDir: string;

  beforeEach(() => {
    outputDir = makeTempDir();
  });

  afterEach(() => {
    fs.rmSync(outputDir, { recursive: true, force: true });
  });

  it("applies defaults", () => {
    const result = resolveConfig({ output: outputDir }, {});

    expect(result).toEqual({
      ok: true,
      data: {
        outputDir,
        minComponents: 10,
        concurrency: 5,
        versionPolicy: "allQualifying",
        pageSize: 150,
        maxPages: 1000,
        retries: 3,
        searchUrl: "https://search.maven.org/solrsearch/select",
        repositoryUrl: "https://repo1.maven.org/maven2",
        verbose: false,
        progress: true,
      },
    });
  });

  it("resolves the default output directory against the working directory", () => {
    const result = resolveConfig({}, {});

    expect(result.ok && result.data.outputDir).toBe(process.cwd());
  });

  it("parses numeric flags given as strings", () => {
    const result = resolveConfig(
      {
        output: outputDir,
        minComponents: "25",
        concurrency: "8",
        pageSize: "50",
        latestOnly: true,
        progress: false,
      },
      {},
    );

    expect(result.ok).toBe(true);
    if (!result.ok) return;
    expect(result.data).toMatchObject({
      minComponents: 25,
      concurrency: 8,
      pageSize: 50,
      versionPolicy: "latestOnly",
      progress: false,
    });
  });

  it("accepts a zero component threshold", () => {
    const result = resolveConfig({ output: outputDir, minComponents: "0" }, {});

    expect(result.ok && result.data.minComponents).toBe(0);
  });

  it.each([
    [{ concurrency: "0" }, "concurrency", "Number must be greater than or equal to 1"],
    [{ concurrency: "33" }, "concurrency", "Number must be less than or equal to 32"],
    [{ minComponents: "-1" }, "min-components", "Number must be greater than or equal to 0"],
    [{ minComponents: "lots" }, "min-components", "Expected an integer"],
    [{ minComponents: "" }, "min-components", "Expected an integer"],
    [{ concurrency: "12abc" }, "concurrency", "Expected an integer"],
    [{ retries: "1.5" }, "retries", "Expected an integer"],
    [{ pageSize: "0" }, "page-size", "Number must be greater than or equal to 1"],
    [{ searchUrl: "not a url" }, "search-url", "Invalid url"],
  ])("rejects %o", (raw, option, message) => {
    const result = resolveConfig({ output: outputDir, ...raw }, {});

    expect(result).toEqual({
      ok: false,
      error: { type: "invalid-option", option, message },
    });
  });

  it("rejects an output directory that does not exist", () => {
    const missing = path.join(outputDir, "nope");

    const result = resolveConfig({ output: missing }, {});

    expect(result).toEqual({
      ok: false,
      error: { type: "missing-output-directory", path: missing },
    });
  });

  it("rejects an output path that is a file", () => {
    const file = path.join(outputDir, "file.txt");
    fs.writeFileSync(file, "");

    const result = resolveConfig({ output: file }, {});

    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error.type).toBe("missing-output-directory");
  });

  it("falls back to endpoint URLs from the environment", () => {
    const env = {
      SBOM_HARVESTER_SEARCH_URL: "https://mirror.test/select",
      SBOM_HARVESTER_REPOSITORY_URL: "https://mirror.test/repo",
    };

    const fromEnv = resolveConfig({ output: outputDir }, env);
    expect(fromEnv.ok && fromEnv.data.searchUrl).toBe("https://mirror.test/select");
    expect(fromEnv.ok && fromEnv.data.repositoryUrl).toBe("https://mirror.test/repo");

    const fromFlag = resolveConfig(
      { output: outputDir, searchUrl: "https://flag.test/select" },
      env,
    );
    expect(fromFlag.ok && fromFlag.data.searchUrl).toBe("https://flag.test/select");
  });
});

describe("parseIntegerOption", () => {
  it("accepts whole numbers only", () => {
    expect(parseIntegerOption("12")).toBe(12);
    expect(parseIntegerOption(" 7 ")).toBe(7);
    expect(parseIntegerOption("-3")).toBe(-3);
    expect(parseIntegerOption("12abc")).toBeUndefined();
    expect(parseIntegerOption("")).toBeUndefined();
    expect(parseIntegerOption("1.5")).toBeUndefined();
  });
});

describe("toOptionName", () => {
  it("converts camel case to flag names", () => {
    expect(toOptionName("minComponents")).toBe("min-components");
    expect(toOptionName("repositoryUrl")).toBe("repository-url");
    expect(toOptionName("retries")).toBe("retries");
  });
});

describe("describeError", () => {
  it("names the flag of an invalid option", () => {
    expect(
      describeError({
        type: "invalid-option",
        option: "concurrency",
        message: "Number must be greater than or equal to 1",
      }),
    ).toBe(
      "invalid value for --concurrency: Number must be greater than or equal to 1",
    );
  });

  it("includes the status code and URL of a failed request", () => {
    expect(
      describeError({
        type: "invalid-status",
        url: "https://repo.test/maven2/a.json",
        status: 404,
      }),
    ).toBe("unexpected status code 404 from https://repo.test/maven2/a.json");
  });
});
