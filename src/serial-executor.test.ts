/**
 * Unit tests for serial-executor.ts
 */

import { describe, it, expect } from "vitest";
import { SerialExecutor } from "./serial-executor.js";

describe("SerialExecutor", () => {
  it("runs tasks one at a time in submission order", async () => {
    const executor = new SerialExecutor();
    const log: string[] = [];
    let running = 0;
    let maxRunning = 0;

    const task = (name: string) => async () => {
      running++;
      maxRunning = Math.max(maxRunning, running);
      log.push(`start ${name}`);
      await Promise.resolve();
      log.push(`end ${name}`);
      running--;
      return name;
    };

    const results = await Promise.all([executor.run(task("a")), executor.run(task("b")), executor.run(task("c"))]);

    expect(results).toEqual(["a", "b", "c"]);
    expect(log).toEqual(["start a", "end a", "start b", "end b", "start c", "end c"]);
    expect(maxRunning).toBe(1);
  });

  it("keeps going after a rejected task", async () => {
    const executor = new SerialExecutor();

    const failed = executor.run(async () => {
      throw new Error("boom");
    });
    const next = executor.run(async () => 42);

    await expect(failed).rejects.toThrow("boom");
    await expect(next).resolves.toBe(42);
  });

  it("counts pending tasks", async () => {
    const executor = new SerialExecutor();
    const first = executor.run(async () => 1);
    const second = executor.run(async () => 2);
    expect(executor.pending).toBe(2);

    await Promise.all([first, second]);
    expect(executor.pending).toBe(0);
  });
});
