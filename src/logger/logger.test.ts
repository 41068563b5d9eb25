import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import winston from "winston";
import { describe, expect, it } from "vitest";
import { createAppLogger } from "./logger.js";

describe("createAppLogger", () => {
  it("logs to the console only by default", () => {
    const logger = createAppLogger({ silent: true });
    expect(logger.transports).toHaveLength(1);
    expect(logger.transports[0]).toBeInstanceOf(winston.transports.Console);
    logger.close();
  });

  it("adds a file transport when a log file is given", () => {
    const dir = fs.mkdtempSync(path.join(os.tmpdir(), "logs-"));
    const logger = createAppLogger({ silent: true, logFile: path.join(dir, "validation_example_20260101_000000.log") });

    const files = logger.transports.filter((t) => t instanceof winston.transports.File);
    expect(logger.transports).toHaveLength(2);
    expect(files).toHaveLength(1);
    expect(files[0]).toMatchObject({ dirname: dir, filename: "validation_example_20260101_000000.log" });
    logger.close();
  });

  it("takes an explicit level", () => {
    const logger = createAppLogger({ silent: true, level: "warn" });
    expect(logger.level).toBe("warn");
    logger.close();
  });
});
