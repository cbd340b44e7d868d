import { describe, it, expect, vi, beforeEach } from "vitest";
import { EventEmitter } from "events";
import { createProcessSignalHandler, INTERRUPTED_EXIT_CODE } from "./process-signals.js";
import type { SignalHandler } from "../ports/signal-handler.js";

describe("createProcessSignalHandler", () => {
  let source: EventEmitter;
  let handler: SignalHandler;

  beforeEach(() => {
    source = new EventEmitter();
  });

  it("runs every callback, then exits with 130", async () => {
    const exit = vi.fn();
    handler = createProcessSignalHandler(exit, source);
    const order: string[] = [];

    handler.onShutdown(async () => {
      order.push("first");
    });
    handler.onShutdown(async () => {
      throw new Error("cleanup failed");
    });

    source.emit("SIGINT");
    await vi.waitFor(() => expect(exit).toHaveBeenCalled());

    expect(order).toEqual(["first"]);
    expect(exit).toHaveBeenCalledWith(INTERRUPTED_EXIT_CODE);
  });

  it("handles a repeated signal once", async () => {
    const exit = vi.fn();
    const callback = vi.fn(async () => {});
    handler = createProcessSignalHandler(exit, source);
    handler.onShutdown(callback);

    source.emit("SIGTERM");
    source.emit("SIGINT");
    await vi.waitFor(() => expect(exit).toHaveBeenCalled());

    expect(callback).toHaveBeenCalledTimes(1);
    expect(exit).toHaveBeenCalledTimes(1);
  });

  it("stops listening after removeAll", () => {
    handler = createProcessSignalHandler(vi.fn(), source);
    handler.onShutdown(async () => {});

    expect(source.listenerCount("SIGINT")).toBe(1);
    expect(source.listenerCount("SIGTERM")).toBe(1);
    handler.removeAll();
    expect(source.listenerCount("SIGINT")).toBe(0);
    expect(source.listenerCount("SIGTERM")).toBe(0);
  });
});
