import { timeoutController } from '../http/fetch';
import { log } from '../log';
import { BoundedQueue } from '../queue/boundedQueue';

export type OutboundFrame = string | Buffer;

export type FrameWriter = (frame: OutboundFrame) => Promise<void>;

export const DEFAULT_DRAIN_TIMEOUT_MS = 10_000;

/**
 * Bounded send buffer with a single write pump. Frames leave in the order
 * they were pushed.
 *
 * `push` never waits and is meant for control messages. `send` waits until
 * the queue is below half its capacity, leaving the other half for control
 * messages while a long reply streams. The device counts as a slow consumer
 * when a `push` finds the queue full or a `send` waits longer than
 * `drainTimeoutMs`; either calls `onOverflow` and closes the queue. A failed
 * write closes it too.
 */
export class OutboundQueue {
  private readonly queue: BoundedQueue<OutboundFrame>;
  private readonly highWaterMark: number;
  private readonly controller = new AbortController();
  private readonly pump: Promise<void>;
  private closed = false;

  constructor(
    capacity: number,
    private readonly write: FrameWriter,
    private readonly onOverflow: () => void,
    private readonly logContext: Record<string, unknown> = {},
    private readonly drainTimeoutMs: number = DEFAULT_DRAIN_TIMEOUT_MS,
  ) {
    this.queue = new BoundedQueue(capacity);
    this.highWaterMark = Math.max(1, Math.floor(capacity / 2));
    this.pump = this.drain();
  }

  public push(frame: OutboundFrame): boolean {
    if (this.closed) {
      return false;
    }
    if (this.queue.offer(frame)) {
      return true;
    }

    this.overflow('outbound queue full');
    return false;
  }

  /** Queues `frame` once there is room. Resolves false if the queue closed first. */
  public async send(frame: OutboundFrame): Promise<boolean> {
    if (this.closed) {
      return false;
    }

    if (this.queue.size() >= this.highWaterMark) {
      const wait = timeoutController(this.drainTimeoutMs, this.controller.signal);
      try {
        await this.queue.whenBelow(this.highWaterMark, wait.signal);
      } finally {
        wait.dispose();
      }

      if (this.closed) {
        return false;
      }
      if (this.queue.size() >= this.highWaterMark) {
        this.overflow(`outbound queue did not drain within ${this.drainTimeoutMs}ms`);
        return false;
      }
    }

    return this.push(frame);
  }

  public close(): void {
    if (this.closed) {
      return;
    }
    this.closed = true;
    this.controller.abort();
  }

  public isClosed(): boolean {
    return this.closed;
  }

  /** Resolves once the pump has stopped. */
  public done(): Promise<void> {
    return this.pump;
  }

  private overflow(message: string): void {
    log.warn({ event: 'outbound_queue_overflow', ...this.logContext }, message);
    this.close();
    this.onOverflow();
  }

  private async drain(): Promise<void> {
    while (!this.closed) {
      const frame = await this.queue.take(this.controller.signal);
      if (frame === undefined || this.closed) {
        return;
      }

      try {
        await this.write(frame);
      } catch (error) {
        log.warn({ err: error, event: 'outbound_write_failed', ...this.logContext }, 'outbound write failed');
        this.close();
      }
    }
  }
}
