import { describe, it, expect, vi, afterEach } from "vitest";

import { Logger } from "@/lib/logger.js";

describe("Logger", () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("filters messages below the configured level", () => {
    const info = vi.spyOn(console, "info").mockImplementation(() => undefined);
    const warn = vi.spyOn(console, "warn").mockImplementation(() => undefined);
    const log = new Logger();
    log.configure({ level: "warn" });

    log.info("hidden");
    log.warn("shown");

    expect(info).not.toHaveBeenCalled();
    expect(warn).toHaveBeenCalledTimes(1);
  });

  it("prints nothing when silent", () => {
    const error = vi.spyOn(console, "error").mockImplementation(() => undefined);
    const log = new Logger();
    log.configure({ level: "silent" });

    log.error("hidden");

    expect(error).not.toHaveBeenCalled();
  });

  it("prefixes messages", () => {
    const info = vi.spyOn(console, "info").mockImplementation(() => undefined);
    const log = new Logger();
    log.configure({ prefix: "[app]" });

    log.info("ready");

    expect(info).toHaveBeenCalledWith("[app] ready");
  });

  it("creates children with nested prefixes and their own level", () => {
    const info = vi.spyOn(console, "info").mockImplementation(() => undefined);
    const parent = new Logger();
    parent.configure({ prefix: "[app]", level: "error" });

    const inherited = parent.child("[format]");
    const verbose = parent.child("[format]", "debug");

    parent.info("parent");
    inherited.info("inherited");
    verbose.info("hello");

    expect(info).toHaveBeenCalledTimes(1);
    expect(info).toHaveBeenCalledWith("[app] [format] hello");
  });
});
