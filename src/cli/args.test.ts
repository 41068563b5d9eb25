import { describe, expect, it } from "vitest";
import { ConfigurationError } from "../errors.js";
import { parseCliArgs } from "./args.js";

function configError(fn: () => unknown): ConfigurationError {
  try {
    fn();
  } catch (err) {
    if (err instanceof ConfigurationError) return err;
    throw err;
  }
  throw new Error("expected a ConfigurationError");
}

describe("parseCliArgs", () => {
  it("parses options and coerces numbers", () => {
    const parsed = parseCliArgs([
      "--institution",
      "Example School of Medicine",
      "--web",
      "web.json",
      "--budget",
      "500",
      "--aggregation",
      "confidence",
      "--offline",
    ]);

    expect(parsed).toEqual({
      help: false,
      options: {
        institution: "Example School of Medicine",
        web: "web.json",
        budget: 500,
        aggregation: "confidence",
        offline: true,
        raw: false,
      },
    });
  });

  it("reads the log directory", () => {
    const parsed = parseCliArgs(["--institution", "Example", "--pdf", "pdf.json", "--log-dir", " logs "]);
    expect(parsed.help ? undefined : parsed.options.logDir).toBe("logs");
  });

  it("returns help without validating the rest", () => {
    expect(parseCliArgs(["-h"])).toEqual({ help: true });
  });

  it("requires an institution", () => {
    expect(configError(() => parseCliArgs(["--pdf", "pdf.json"])).issues).toEqual(["--institution: required"]);
  });

  it("requires at least one input file", () => {
    expect(configError(() => parseCliArgs(["--institution", "Example"])).issues).toEqual([
      "--web: at least one of --web or --pdf is required",
    ]);
  });

  it("rejects unknown flags and bad values", () => {
    expect(() => parseCliArgs(["--institution", "Example", "--web", "w.json", "--verbose"])).toThrow(
      ConfigurationError
    );
    expect(() => parseCliArgs(["--institution", "Example", "--web", "w.json", "--aggregation", "median"])).toThrow(
      ConfigurationError
    );
    expect(() => parseCliArgs(["--institution", "Example", "--web", "w.json", "--concurrency", "0"])).toThrow(
      ConfigurationError
    );
  });
});
