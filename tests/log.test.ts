import { ConsoleLogger, InMemoryLogger, isLogLevel } from "../src/log.js";

describe("ConsoleLogger", () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("prefixes lines and routes warnings to stderr", () => {
    const out = vi.spyOn(console, "log").mockImplementation(() => {});
    const err = vi.spyOn(console, "error").mockImplementation(() => {});
    const logger = new ConsoleLogger("info");
    logger.debug("hidden");
    logger.info("policy loaded");
    logger.warn("slow");
    logger.error("failed");
    expect(out.mock.calls).toEqual([["approval-gate: policy loaded"]]);
    expect(err.mock.calls).toEqual([["approval-gate: warning: slow"], ["approval-gate: error: failed"]]);
  });

  it("writes debug lines at debug level", () => {
    const out = vi.spyOn(console, "log").mockImplementation(() => {});
    new ConsoleLogger("debug").debug("GET /repos/acme/widgets/pulls/7 - 200");
    expect(out.mock.calls).toEqual([["approval-gate: [debug] GET /repos/acme/widgets/pulls/7 - 200"]]);
  });

  it("always writes errors, even at the error level", () => {
    vi.spyOn(console, "log").mockImplementation(() => {});
    const err = vi.spyOn(console, "error").mockImplementation(() => {});
    const logger = new ConsoleLogger("error");
    logger.warn("quiet");
    logger.error("loud");
    expect(err.mock.calls).toEqual([["approval-gate: error: loud"]]);
  });
});

describe("InMemoryLogger", () => {
  it("records entries by level", () => {
    const logger = new InMemoryLogger();
    logger.info("a");
    logger.warn("b");
    logger.info("c");
    expect(logger.messages("info")).toEqual(["a", "c"]);
    expect(logger.getEntries()).toHaveLength(3);
  });
});

describe("isLogLevel", () => {
  it("accepts only known levels", () => {
    expect(isLogLevel("warn")).toBe(true);
    expect(isLogLevel("trace")).toBe(false);
    expect(isLogLevel("toString")).toBe(false);
  });
});
