/**
 * CommandQueue: many producers (dialogue turns, proactive notifications), one consumer.
 * Each enqueue is delivered to the executor at most once, in FIFO order.
 */

import type { PendingCommand } from "./types";
import { errorMessage, logger } from "../logging";

export interface CommandResult {
  command: PendingCommand;
  success: boolean;
  error?: string;
}

export type CommandExecutor = (command: PendingCommand) => Promise<boolean>;

interface Entry {
  command: PendingCommand;
  resolve: (result: CommandResult) => void;
}

export class CommandQueue {
  private readonly items: Entry[] = [];
  private consuming = false;
  private closed = false;
  private idleWaiters: Array<() => void> = [];

  constructor(private readonly execute: CommandExecutor) {}

  /** Resolves with the command's result once the consumer has run it. Never rejects. */
  enqueue(command: PendingCommand): Promise<CommandResult> {
    if (this.closed) {
      return Promise.resolve({ command, success: false, error: "command queue closed" });
    }
    return new Promise<CommandResult>((resolve) => {
      this.items.push({ command, resolve });
      logger.debug({ event: "COMMAND_ENQUEUED", type: command.type, depth: this.items.length }, "Command enqueued");
      void this.consume();
    });
  }

  /** Enqueue several commands and wait for all of them; results keep the input order. */
  enqueueAll(commands: PendingCommand[]): Promise<CommandResult[]> {
    return Promise.all(commands.map((c) => this.enqueue(c)));
  }

  get size(): number {
    return this.items.length;
  }

  private async consume(): Promise<void> {
    if (this.consuming) return;
    this.consuming = true;
    try {
      let entry = this.items.shift();
      while (entry) {
        entry.resolve(await this.run(entry.command));
        entry = this.items.shift();
      }
    } finally {
      this.consuming = false;
      const waiters = this.idleWaiters;
      this.idleWaiters = [];
      for (const w of waiters) w();
    }
  }

  private async run(command: PendingCommand): Promise<CommandResult> {
    try {
      const success = await this.execute(command);
      return { command, success };
    } catch (err) {
      logger.warn({ event: "COMMAND_FAILED", type: command.type, err: errorMessage(err) }, "Command execution failed");
      return { command, success: false, error: errorMessage(err) };
    }
  }

  /** Refuse new commands, let the consumer finish what is queued, then resolve. */
  async close(): Promise<void> {
    this.closed = true;
    if (!this.consuming && this.items.length === 0) return;
    await new Promise<void>((resolve) => this.idleWaiters.push(resolve));
  }
}
