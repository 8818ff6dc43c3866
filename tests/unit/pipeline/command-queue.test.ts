import { CommandQueue } from "../../../src/pipeline/command-queue";
import type { PendingCommand } from "../../../src/pipeline/types";

const cmd = (n: number): PendingCommand => ({ type: "media", parameters: { action: "volume", volume: n } });

describe("CommandQueue", () => {
  it("runs commands one at a time in FIFO order", async () => {
    const order: number[] = [];
    let running = 0;
    let maxRunning = 0;
    const queue = new CommandQueue(async (c) => {
      running++;
      maxRunning = Math.max(maxRunning, running);
      await new Promise((r) => setTimeout(r, 1));
      order.push(Number(c.parameters.volume));
      running--;
      return true;
    });
    const results = await Promise.all([queue.enqueue(cmd(1)), queue.enqueueAll([cmd(2), cmd(3)])]);
    expect(order).toEqual([1, 2, 3]);
    expect(maxRunning).toBe(1);
    expect(results[0].success).toBe(true);
    expect(results[1].map((r) => r.success)).toEqual([true, true]);
  });

  it("reports executor errors as failed results", async () => {
    const queue = new CommandQueue(async () => {
      throw new Error("gateway down");
    });
    const result = await queue.enqueue(cmd(1));
    expect(result).toEqual({ command: cmd(1), success: false, error: "gateway down" });
  });

  it("finishes queued commands on close and refuses new ones", async () => {
    const seen: number[] = [];
    const queue = new CommandQueue(async (c) => {
      seen.push(Number(c.parameters.volume));
      return true;
    });
    const pending = queue.enqueueAll([cmd(1), cmd(2)]);
    await queue.close();
    expect(seen).toEqual([1, 2]);
    expect((await pending).every((r) => r.success)).toBe(true);
    const late = await queue.enqueue(cmd(3));
    expect(late).toEqual({ command: cmd(3), success: false, error: "command queue closed" });
    expect(seen).toEqual([1, 2]);
  });
});
