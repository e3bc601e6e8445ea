/**
 * Event Bus
 *
 * Publishes per-job notifications to any number of subscribers without
 * letting a slow subscriber hold up the publisher. Every event carries a
 * monotonic per-job sequence number; the last events of each job are kept
 * in a ring buffer so late subscribers can catch up.
 */

import type { JobOutcome } from '@encodeq/core';
import { createLogger, type Logger } from '@encodeq/utils';
import type { ProgressEvent } from './outputParser.js';

export interface JobEventPayloads {
  queued: {
    source: string;
    destination: string;
    profileId: string;
  };
  started: {
    pid: number | undefined;
    command: readonly string[];
  };
  progress: ProgressEvent;
  succeeded: {
    progress: ProgressEvent;
    parseWarningCount: number;
  };
  failed: Extract<JobOutcome, { status: 'failed' }> & {
    parseWarningCount: number;
  };
  canceled: {
    reason: string;
  };
}

export type JobEventKind = keyof JobEventPayloads;

/**
 * What a publisher hands in; the bus adds job id, sequence and timestamp
 */
export type JobEventDraft = {
  [K in JobEventKind]: { kind: K; payload: JobEventPayloads[K] };
}[JobEventKind];

export type JobEvent = JobEventDraft & {
  readonly jobId: string;
  readonly seq: number;
  readonly timestamp: Date;
};

export type JobEventHandler = (event: JobEvent) => void | Promise<void>;

export interface SubscribeOptions {
  /** Only deliver events of this job */
  jobId?: string;
  /** Replay buffered events with a sequence number above this one */
  afterSeq?: number;
  /** Replay everything still buffered */
  replay?: boolean;
}

export interface Subscription {
  unsubscribe(): void;
  /** Deliveries queued but not yet handled */
  readonly pending: number;
}

export interface EventBusOptions {
  replayBufferSize?: number;
  logger?: Logger;
}

interface Subscriber {
  handler: JobEventHandler;
  jobId: string | undefined;
  active: boolean;
  pending: number;
  chain: Promise<void>;
}

export class EventBus {
  private readonly bufferSize: number;
  private readonly log: Logger;

  private readonly subscribers = new Set<Subscriber>();
  private readonly buffers = new Map<string, JobEvent[]>();
  private readonly sequences = new Map<string, number>();

  constructor(options: EventBusOptions = {}) {
    this.bufferSize = Math.max(0, options.replayBufferSize ?? 50);
    this.log = options.logger ?? createLogger({ module: 'event-bus' });
  }

  get subscriberCount(): number {
    return this.subscribers.size;
  }

  /**
   * Highest sequence number published for a job (0 if none)
   */
  lastSeq(jobId: string): number {
    return this.sequences.get(jobId) ?? 0;
  }

  publish(jobId: string, draft: JobEventDraft): JobEvent {
    const seq = this.lastSeq(jobId) + 1;
    this.sequences.set(jobId, seq);

    const event: JobEvent = Object.freeze({ ...draft, jobId, seq, timestamp: new Date() });

    if (this.bufferSize > 0) {
      let buffer = this.buffers.get(jobId);
      if (!buffer) {
        buffer = [];
        this.buffers.set(jobId, buffer);
      }
      buffer.push(event);
      if (buffer.length > this.bufferSize) {
        buffer.shift();
      }
    }

    for (const subscriber of this.subscribers) {
      if (subscriber.jobId === undefined || subscriber.jobId === jobId) {
        this.deliver(subscriber, event);
      }
    }

    this.log.trace({ jobId, kind: event.kind, seq }, 'Event published');
    return event;
  }

  subscribe(handler: JobEventHandler, options: SubscribeOptions = {}): Subscription {
    const subscriber: Subscriber = {
      handler,
      jobId: options.jobId,
      active: true,
      pending: 0,
      chain: Promise.resolve(),
    };
    this.subscribers.add(subscriber);

    if (options.replay || options.afterSeq !== undefined) {
      const afterSeq = options.afterSeq ?? 0;
      for (const event of this.buffered(options.jobId)) {
        if (event.seq > afterSeq) {
          this.deliver(subscriber, event);
        }
      }
    }

    return {
      unsubscribe: () => {
        subscriber.active = false;
        this.subscribers.delete(subscriber);
      },
      get pending() {
        return subscriber.pending;
      },
    };
  }

  /**
   * Buffered events, oldest first per job
   */
  buffered(jobId?: string): JobEvent[] {
    if (jobId !== undefined) {
      return [...(this.buffers.get(jobId) ?? [])];
    }
    return Array.from(this.buffers.values()).flat();
  }

  /**
   * Resolves once every queued delivery has been handled
   */
  async drain(): Promise<void> {
    const chains = Array.from(this.subscribers, s => s.chain);
    await Promise.all(chains);
    if (Array.from(this.subscribers).some(s => s.pending > 0)) {
      await this.drain();
    }
  }

  /**
   * Drop the replay buffer and sequence counter of a finished job
   */
  forget(jobId: string): void {
    this.buffers.delete(jobId);
    this.sequences.delete(jobId);
  }

  private deliver(subscriber: Subscriber, event: JobEvent): void {
    subscriber.pending += 1;
    subscriber.chain = subscriber.chain
      .then(async () => {
        if (subscriber.active) {
          await subscriber.handler(event);
        }
      })
      .catch((error: unknown) => {
        this.log.error(
          { jobId: event.jobId, kind: event.kind, seq: event.seq, error: error instanceof Error ? error.message : String(error) },
          'Event subscriber failed'
        );
      })
      .finally(() => {
        subscriber.pending -= 1;
      });
  }
}
