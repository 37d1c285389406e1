/**
 * Unit tests for SubscriptionRegistry routing and lifecycle.
 */

import {
  NotificationChannel,
  SubscriptionRegistry,
  type KeyedNotification,
} from "@homesync/adapter-sdk";
import { flushMicrotasks } from "../setup.js";

interface Reading extends KeyedNotification {
  value: number;
}

describe("SubscriptionRegistry", () => {
  let channel: NotificationChannel<Reading>;
  let registry: SubscriptionRegistry<Reading>;
  let log: jest.SpyInstance;
  let error: jest.SpyInstance;

  beforeEach(() => {
    log = jest.spyOn(console, "log").mockImplementation(() => undefined);
    error = jest.spyOn(console, "error").mockImplementation(() => undefined);
    channel = new NotificationChannel<Reading>();
    registry = new SubscriptionRegistry(channel, "test");
  });

  afterEach(async () => {
    await registry.stop();
    jest.restoreAllMocks();
  });

  describe("register", () => {
    it("keeps the first subscriber for a key", () => {
      const first = jest.fn();
      const second = jest.fn();

      expect(registry.register("a", first)).toBe(true);
      expect(registry.register("a", second)).toBe(false);
      expect(registry.size).toBe(1);

      registry.dispatch({ key: "a", value: 1 });
      expect(first).toHaveBeenCalledWith({ key: "a", value: 1 });
      expect(second).not.toHaveBeenCalled();
    });
  });

  describe("dispatch", () => {
    it("routes by key only", () => {
      const a = jest.fn();
      const b = jest.fn();
      registry.register("a", a);
      registry.register("b", b);

      registry.dispatch({ key: "b", value: 2 });
      expect(a).not.toHaveBeenCalled();
      expect(b).toHaveBeenCalledTimes(1);
    });

    it("ignores unknown keys without logging", () => {
      expect(registry.dispatch({ key: "nobody", value: 0 })).toBe(false);
      expect(error).not.toHaveBeenCalled();
    });

    it("logs a failing subscriber and keeps routing", () => {
      const failure = new Error("boom");
      const ok = jest.fn();
      registry.register("bad", () => {
        throw failure;
      });
      registry.register("good", ok);

      expect(registry.dispatch({ key: "bad", value: 1 })).toBe(true);
      registry.dispatch({ key: "good", value: 2 });

      expect(error).toHaveBeenCalledWith("[SubscriptionRegistry:test] Handler for bad failed:", failure);
      expect(ok).toHaveBeenCalledWith({ key: "good", value: 2 });
    });
  });

  describe("lifecycle", () => {
    it("consumes the channel once started", async () => {
      const cb = jest.fn();
      registry.register("a", cb);
      channel.send({ key: "a", value: 1 });
      await flushMicrotasks();
      expect(cb).not.toHaveBeenCalled();

      registry.start();
      registry.start();
      await flushMicrotasks();

      expect(cb).toHaveBeenCalledTimes(1);
      expect(registry.running).toBe(true);
      expect(log).toHaveBeenCalledTimes(1);
      expect(log).toHaveBeenCalledWith("[SubscriptionRegistry:test] Started");
    });

    it("stops exactly once", async () => {
      registry.register("a", jest.fn());
      registry.start();

      const first = registry.stop();
      const second = registry.stop();
      expect(second).toBe(first);
      await first;

      const shutdownLogs = log.mock.calls.filter(
        (args) => args[0] === "[SubscriptionRegistry:test] Shutting down subscriptions",
      );
      expect(shutdownLogs).toHaveLength(1);
      expect(registry.size).toBe(0);
      expect(registry.running).toBe(false);
      expect(channel.isClosed).toBe(true);
    });

    it("cannot be restarted after stopping", async () => {
      await registry.stop();
      registry.start();
      expect(registry.running).toBe(false);
    });
  });
});
