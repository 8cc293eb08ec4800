import { describe, it, expect, vi, afterEach } from "vitest";
import { Logger } from "./logger";

describe("Logger", () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("calls beforeWrite before writing a line", () => {
    const order: string[] = [];
    vi.spyOn(console, "log").mockImplementation(() => order.push("log"));
    const logger = new Logger("info", { beforeWrite: () => order.push("clear") });

    logger.info("Call process: /tools/build/console");

    expect(order).toEqual(["clear", "log"]);
  });

  it("does not call beforeWrite for suppressed levels", () => {
    const log = vi.spyOn(console, "log").mockImplementation(() => {});
    const beforeWrite = vi.fn();
    const logger = new Logger("warn", { beforeWrite });

    logger.debug("hidden");
    logger.info("hidden");

    expect(beforeWrite).not.toHaveBeenCalled();
    expect(log).not.toHaveBeenCalled();
  });

  it("calls beforeWrite for warnings", () => {
    const warn = vi.spyOn(console, "warn").mockImplementation(() => {});
    const beforeWrite = vi.fn();
    const logger = new Logger("info", { beforeWrite });

    logger.warn("continuing");

    expect(beforeWrite).toHaveBeenCalledTimes(1);
    expect(warn).toHaveBeenCalledWith("[WARN] continuing");
  });

  it("filters lines below the configured level", () => {
    const log = vi.spyOn(console, "log").mockImplementation(() => {});
    const logger = new Logger("info");

    logger.debug("hidden");
    logger.info("shown");

    expect(log).toHaveBeenCalledTimes(1);
    expect(log).toHaveBeenCalledWith("[INFO] shown");
  });
});
