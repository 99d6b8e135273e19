import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import pino from "pino";
import { registerShutdownHandlers } from "./lifecycle";
import type { ShutdownDeps } from "./lifecycle";

type Handler = () => void;

describe("registerShutdownHandlers", () => {
  let mockLogger: pino.Logger;
  const exitSpy = () => vi.mocked(process.exit);
  const onSpy = () => vi.mocked(process.on);

  function handlerFor(signal: string): Handler {
    const call = onSpy().mock.calls.find((args) => args[0] === signal);
    const handler: unknown = call?.[1];
    if (typeof handler !== "function") {
      throw new Error(`no handler registered for ${signal}`);
    }
    return () => handler();
  }

  async function shutdownWith(signal: string): Promise<void> {
    handlerFor(signal)();
    await vi.waitFor(() => expect(exitSpy()).toHaveBeenCalled());
  }

  beforeEach(() => {
    vi.clearAllMocks();
    mockLogger = pino({ level: "silent" });
    vi.spyOn(process, "exit").mockImplementation(() => undefined as never);
    vi.spyOn(process, "on").mockImplementation(() => process);
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("should register SIGTERM and SIGINT handlers on process", () => {
    registerShutdownHandlers({
      schedulers: [{ stop: vi.fn() }],
      closeDb: vi.fn(),
      logger: mockLogger,
    });

    expect(onSpy()).toHaveBeenCalledWith("SIGTERM", expect.any(Function));
    expect(onSpy()).toHaveBeenCalledWith("SIGINT", expect.any(Function));
  });

  it.each(["SIGTERM", "SIGINT"])(
    "should stop schedulers, close the database and exit on %s",
    async (signal) => {
      const stop1 = vi.fn();
      const stop2 = vi.fn();
      const closeDb = vi.fn();

      registerShutdownHandlers({
        schedulers: [{ stop: stop1 }, { stop: stop2 }],
        closeDb,
        logger: mockLogger,
      });
      await shutdownWith(signal);

      expect(stop1).toHaveBeenCalled();
      expect(stop2).toHaveBeenCalled();
      expect(closeDb).toHaveBeenCalled();
      expect(exitSpy()).toHaveBeenCalledWith(0);
    },
  );

  it("should abort pending work before stopping schedulers and closing the database", async () => {
    const callOrder: Array<string> = [];
    const abortController = new AbortController();
    abortController.signal.addEventListener("abort", () => callOrder.push("abort"));

    const deps: ShutdownDeps = {
      schedulers: [{ stop: () => void callOrder.push("scheduler.stop") }],
      closeDb: () => void callOrder.push("closeDb"),
      logger: mockLogger,
      abortController,
    };

    registerShutdownHandlers(deps);
    await shutdownWith("SIGTERM");

    expect(abortController.signal.aborted).toBe(true);
    expect(callOrder).toEqual(["abort", "scheduler.stop", "closeDb"]);
  });

  it("should wait for an asynchronous stop before closing the database", async () => {
    let release: () => void = () => undefined;
    const closeDb = vi.fn();

    registerShutdownHandlers({
      schedulers: [
        {
          stop: () =>
            new Promise<void>((resolve) => {
              release = resolve;
            }),
        },
      ],
      closeDb,
      logger: mockLogger,
    });

    handlerFor("SIGTERM")();
    await Promise.resolve();
    expect(closeDb).not.toHaveBeenCalled();

    release();
    await vi.waitFor(() => expect(exitSpy()).toHaveBeenCalledWith(0));
    expect(closeDb).toHaveBeenCalledTimes(1);
  });

  it("should prevent double shutdown (re-entrant guard)", async () => {
    const stop = vi.fn();
    const closeDb = vi.fn();

    registerShutdownHandlers({ schedulers: [{ stop }], closeDb, logger: mockLogger });

    await shutdownWith("SIGTERM");
    handlerFor("SIGINT")();
    await Promise.resolve();

    expect(stop).toHaveBeenCalledTimes(1);
    expect(closeDb).toHaveBeenCalledTimes(1);
  });

  it("should continue shutting down if a scheduler stop fails", async () => {
    const throwing = vi.fn(() => {
      throw new Error("Scheduler stop failed");
    });
    const rejecting = vi.fn().mockRejectedValue(new Error("cycle failed"));
    const working = vi.fn();
    const closeDb = vi.fn();

    registerShutdownHandlers({
      schedulers: [{ stop: throwing }, { stop: rejecting }, { stop: working }],
      closeDb,
      logger: mockLogger,
    });
    await shutdownWith("SIGTERM");

    expect(working).toHaveBeenCalled();
    expect(closeDb).toHaveBeenCalled();
    expect(exitSpy()).toHaveBeenCalledWith(0);
  });

  it("should continue shutting down if closeDb throws", async () => {
    registerShutdownHandlers({
      schedulers: [{ stop: vi.fn() }],
      closeDb: () => {
        throw new Error("Database close failed");
      },
      logger: mockLogger,
    });
    await shutdownWith("SIGTERM");

    expect(exitSpy()).toHaveBeenCalledWith(0);
  });

  it("should log shutdown phases", async () => {
    const messages: Array<{ level: string; msg: string }> = [];
    const testLogger = pino(
      {
        level: "info",
        formatters: {
          level(label: string) {
            return { level: label };
          },
        },
      },
      {
        write: (line: string) => {
          const parsed: { level: string; msg: string } = JSON.parse(line);
          messages.push({ level: parsed.level, msg: parsed.msg });
        },
      },
    );

    registerShutdownHandlers({
      schedulers: [
        {
          stop: () => {
            throw new Error("Scheduler error message");
          },
        },
      ],
      closeDb: vi.fn(),
      logger: testLogger,
    });
    await shutdownWith("SIGTERM");

    expect(messages.map((m) => m.msg)).toEqual([
      "shutdown signal received",
      "error stopping scheduler",
      "database connection closed",
      "shutdown complete",
    ]);
    expect(messages[1]?.level).toBe("error");
  });
});
