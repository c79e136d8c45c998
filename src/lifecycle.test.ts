import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import pino from "pino";
import { registerShutdownHandlers } from "./lifecycle";

type SignalHandler = () => void;

describe("registerShutdownHandlers", () => {
  const logger = pino({ level: "silent" });
  let handlers: Map<string, SignalHandler>;

  beforeEach(() => {
    handlers = new Map();
    vi.spyOn(process, "on").mockImplementation(((event: string, handler: SignalHandler) => {
      handlers.set(event, handler);
      return process;
    }) as typeof process.on);
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("should register SIGTERM and SIGINT handlers", () => {
    registerShutdownHandlers({ schedulers: [], logger, exit: vi.fn() });

    expect([...handlers.keys()].sort()).toEqual(["SIGINT", "SIGTERM"]);
  });

  it.each(["SIGTERM", "SIGINT"])("should stop every scheduler and exit 0 on %s", (signal) => {
    const first = { stop: vi.fn() };
    const second = { stop: vi.fn() };
    const exit = vi.fn();
    registerShutdownHandlers({ schedulers: [first, second], logger, exit });

    handlers.get(signal)?.();

    expect(first.stop).toHaveBeenCalledOnce();
    expect(second.stop).toHaveBeenCalledOnce();
    expect(exit).toHaveBeenCalledWith(0);
  });

  it("should ignore a second signal during shutdown", () => {
    const scheduler = { stop: vi.fn() };
    const exit = vi.fn();
    registerShutdownHandlers({ schedulers: [scheduler], logger, exit });

    handlers.get("SIGTERM")?.();
    handlers.get("SIGINT")?.();

    expect(scheduler.stop).toHaveBeenCalledOnce();
    expect(exit).toHaveBeenCalledOnce();
  });

  it("should keep stopping schedulers when one throws", () => {
    const failing = {
      stop: vi.fn(() => {
        throw new Error("already stopped");
      }),
    };
    const healthy = { stop: vi.fn() };
    const exit = vi.fn();
    const mockLogger = pino({ level: "silent" });
    const errorSpy = vi.spyOn(mockLogger, "error");
    registerShutdownHandlers({ schedulers: [failing, healthy], logger: mockLogger, exit });

    handlers.get("SIGTERM")?.();

    expect(healthy.stop).toHaveBeenCalledOnce();
    expect(errorSpy).toHaveBeenCalledWith({ error: "already stopped" }, "error stopping scheduler");
    expect(exit).toHaveBeenCalledWith(0);
  });
});
