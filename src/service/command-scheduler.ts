/**
 * Fire-and-forget delayed actions, cancellable as a group.
 */

import { errorMessage } from '../exceptions';

const TAG = 'CommandScheduler';

interface PendingCommand {
  handle: ReturnType<typeof setTimeout>;
  done: boolean;
}

export class CommandScheduler {
  private pending: PendingCommand[] = [];

  schedule(delayMs: number, command: () => Promise<void> | void): void {
    const entry: PendingCommand = {
      handle: setTimeout(() => {
        void this.run(entry, command);
      }, Math.max(0, delayMs)),
      done: false,
    };
    this.pending.push(entry);
    this.pending = this.pending.filter((p) => !p.done);
  }

  cancelAll(): void {
    for (const entry of this.pending) {
      clearTimeout(entry.handle);
      entry.done = true;
    }
    this.pending = [];
  }

  pendingCount(): number {
    return this.pending.filter((p) => !p.done).length;
  }

  private async run(entry: PendingCommand, command: () => Promise<void> | void): Promise<void> {
    entry.done = true;
    try {
      await command();
    } catch (error) {
      console.error(`[${TAG}] Scheduled command failed: ${errorMessage(error)}`);
    }
  }
}
