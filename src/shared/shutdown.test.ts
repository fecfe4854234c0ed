import { describe, expect, it, vi } from "vitest";
import type { Logger } from "./logger.js";
import { createShutdownManager, type SignalTarget } from "./shutdown.js";

function fakeProcess(): { target: SignalTarget; handlers: Map<string, () => void>; exits: number[] } {
  const handlers = new Map<string, () => void>();
  const exits: number[] = [];
  return {
    handlers,
    exits,
    target: {
      on: (signal, handler) => {
        handlers.set(signal, handler);
      },
      exit: (code) => {
        exits.push(code);
      },
    },
  };
}

describe("shutdown", () => {
  describe("setup", () => {
    it("registers SIGINT and SIGTERM handlers", () => {
      const { target, handlers } = fakeProcess();
      createShutdownManager({ target }).setup();

      expect([...handlers.keys()]).toEqual(["SIGINT", "SIGTERM"]);
    });

    it("shuts down when a signal arrives", async () => {
      const { target, handlers, exits } = fakeProcess();
      const manager = createShutdownManager({ target });
      manager.setup();

      handlers.get("SIGINT")?.();

      expect(manager.shouldContinue()).toBe(false);
      await vi.waitFor(() => expect(exits).toEqual([0]));
    });
  });

  describe("shouldContinue", () => {
    it("returns true until shutdown is requested", async () => {
      const { target } = fakeProcess();
      const manager = createShutdownManager({ target });

      expect(manager.shouldContinue()).toBe(true);
      expect(manager.isShuttingDown()).toBe(false);

      await manager.shutdown("SIGTERM");

      expect(manager.shouldContinue()).toBe(false);
      expect(manager.isShuttingDown()).toBe(true);
    });
  });

  describe("cleanup", () => {
    it("runs cleanups in reverse order and closes browsers last", async () => {
      const { target } = fakeProcess();
      const manager = createShutdownManager({ target });
      const order: string[] = [];

      manager.registerBrowser({
        close: async () => {
          order.push("browser");
        },
      });
      manager.registerCleanup(() => {
        order.push("first");
      });
      manager.registerCleanup(async () => {
        order.push("second");
      });

      await manager.shutdown("SIGINT");

      expect(order).toEqual(["second", "first", "browser"]);
    });

    it("keeps cleaning up when a step fails", async () => {
      const { target, exits } = fakeProcess();
      const warn = vi.fn();
      const logger: Logger = { debug: vi.fn(), info: vi.fn(), success: vi.fn(), warn, error: vi.fn() };
      const manager = createShutdownManager({ target, logger });
      const close = vi.fn(async () => undefined);

      manager.registerBrowser({ close });
      manager.registerCleanup(() => {
        throw new Error("disk full");
      });

      await manager.shutdown("SIGINT");

      expect(close).toHaveBeenCalledTimes(1);
      expect(warn).toHaveBeenCalledWith("Cleanup step failed: disk full");
      expect(exits).toEqual([0]);
    });
  });

  describe("second signal", () => {
    it("forces exit with code 1", async () => {
      const { target, exits } = fakeProcess();
      const manager = createShutdownManager({ target });
      let release: () => void = () => undefined;
      manager.registerCleanup(
        () =>
          new Promise<void>((resolve) => {
            release = resolve;
          })
      );

      const first = manager.shutdown("SIGINT");
      await manager.shutdown("SIGINT");
      expect(exits).toEqual([1]);

      release();
      await first;
      expect(exits).toEqual([1, 0]);
    });
  });
});
