/**
 * Reads logical keys from a raw-mode input stream.
 *
 * Keys parsed from each `data` chunk are queued; `readKey` resolves with the
 * oldest queued key or waits for the next one. When the stream ends, every
 * pending and future read rejects with TerminalIOError.
 */

import type { Readable } from "node:stream";
import { TerminalIOError } from "../errors.js";
import type { Key } from "../ui/key.js";
import { parseKeys } from "./key-parser.js";
import type { InputReader } from "./terminal.js";

interface Waiter {
  resolve: (key: Key) => void;
  reject: (err: Error) => void;
}

export class StreamKeyReader implements InputReader {
  private readonly queue: Key[] = [];
  private readonly waiters: Waiter[] = [];
  private closedError: TerminalIOError | null = null;

  private readonly onData = (data: Buffer | string) => {
    for (const key of parseKeys(data)) {
      const waiter = this.waiters.shift();
      if (waiter) {
        waiter.resolve(key);
      } else {
        this.queue.push(key);
      }
    }
  };

  private readonly onEnd = () => {
    this.fail(new TerminalIOError("Input stream closed before a key was read"));
  };

  private readonly onError = (err: Error) => {
    this.fail(new TerminalIOError("Failed to read from the terminal", err));
  };

  constructor(private readonly input: Readable) {
    input.on("data", this.onData);
    input.on("end", this.onEnd);
    input.on("error", this.onError);
  }

  readKey(): Promise<Key> {
    const queued = this.queue.shift();
    if (queued) return Promise.resolve(queued);
    if (this.closedError) return Promise.reject(this.closedError);

    return new Promise((resolve, reject) => {
      this.waiters.push({ resolve, reject });
    });
  }

  pause(): void {
    this.input.pause();
  }

  resume(): void {
    this.input.resume();
  }

  /** Stops listening; pending reads reject. */
  dispose(): void {
    this.input.removeListener("data", this.onData);
    this.input.removeListener("end", this.onEnd);
    this.input.removeListener("error", this.onError);
    this.fail(new TerminalIOError("Key reader was disposed"));
  }

  private fail(err: TerminalIOError): void {
    if (!this.closedError) this.closedError = err;
    for (const waiter of this.waiters.splice(0)) {
      waiter.reject(err);
    }
  }
}
