import { ChannelClosedError } from "./errors.ts";

type Receiver<T> = {
  resolve: (value: T) => void;
  reject: (reason: Error) => void;
};

/**
 * FIFO hand-off between producers and waiting receivers.
 *
 * Values sent while nobody waits are queued. Closing rejects every waiting
 * receiver and hands the undelivered values back to the caller.
 */
export class Channel<T> {
  private values: T[] = [];
  private receivers: Receiver<T>[] = [];
  private closed = false;

  get isClosed(): boolean {
    return this.closed;
  }

  // values waiting for a receiver
  get pending(): number {
    return this.values.length;
  }

  // returns false once the channel is closed
  send(value: T): boolean {
    if (this.closed) {
      return false;
    }
    const receiver = this.receivers.shift();
    if (receiver) {
      receiver.resolve(value);
    } else {
      this.values.push(value);
    }
    return true;
  }

  receive(): Promise<T> {
    return new Promise((resolve, reject) => {
      if (this.closed) {
        reject(new ChannelClosedError());
        return;
      }
      const value = this.values.shift();
      if (value !== undefined) {
        resolve(value);
        return;
      }
      this.receivers.push({ resolve, reject });
    });
  }

  close(): T[] {
    if (this.closed) {
      return [];
    }
    this.closed = true;
    for (const receiver of this.receivers.splice(0)) {
      receiver.reject(new ChannelClosedError());
    }
    return this.values.splice(0);
  }
}
