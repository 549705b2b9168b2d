import { Enricher } from "./enricher.js";
import { describeError, logger } from "./logger.js";
import { OutboundMessage, UrgentSender } from "./types.js";

export const UI_MESSAGE_LABEL = "voice-relay";

export function makeUiMessage(type: string, data?: Record<string, unknown>): OutboundMessage {
  return data === undefined
    ? { label: UI_MESSAGE_LABEL, type }
    : { label: UI_MESSAGE_LABEL, type, data };
}

export function botReady(): OutboundMessage {
  return makeUiMessage("bot-ready", { version: "1.0.0" });
}

export function userTranscription(text: string, final: boolean): OutboundMessage {
  return makeUiMessage("user-transcription", {
    text,
    final,
    timestamp: new Date().toISOString(),
  });
}

export function userStartedSpeaking(): OutboundMessage {
  return makeUiMessage("user-started-speaking");
}

export function userStoppedSpeaking(): OutboundMessage {
  return makeUiMessage("user-stopped-speaking");
}

export function botTurnStarted(turnId: number): OutboundMessage {
  return makeUiMessage("bot-llm-started", { turn_id: turnId });
}

export function botText(turnId: number, sequence: number, text: string): OutboundMessage {
  return makeUiMessage("bot-llm-text", { text, turn_id: turnId, sequence });
}

export function botTurnStopped(turnId: number): OutboundMessage {
  return makeUiMessage("bot-llm-stopped", { turn_id: turnId });
}

export interface UiEventPublisherOptions {
  sessionId: string;
  enricher: Enricher;
  send: UrgentSender;
  capacity: number;
}

/**
 * Enriches UI messages and hands them to the urgent channel in publish order.
 * `publish` never waits on the channel; when the queue is full the oldest
 * queued message is dropped.
 */
export class UiEventPublisher {
  private readonly sessionId: string;
  private readonly enricher: Enricher;
  private readonly send: UrgentSender;
  private readonly capacity: number;
  private readonly queue: OutboundMessage[] = [];
  private draining: Promise<void> | null = null;
  private closed = false;
  private droppedCount = 0;

  constructor(options: UiEventPublisherOptions) {
    this.sessionId = options.sessionId;
    this.enricher = options.enricher;
    this.send = options.send;
    this.capacity = Math.max(1, options.capacity);
  }

  get dropped(): number {
    return this.droppedCount;
  }

  get pending(): number {
    return this.queue.length;
  }

  publish(message: OutboundMessage): void {
    if (this.closed) {
      logger.debug(`ui message after close ignored: ${String(message.type)}`, {
        sessionId: this.sessionId,
      });
      return;
    }

    if (this.queue.length >= this.capacity) {
      const evicted = this.queue.shift();
      this.droppedCount += 1;
      logger.warn(`urgent queue full, dropped ${String(evicted?.type)}`, {
        sessionId: this.sessionId,
      });
    }

    this.queue.push(this.enricher.enrich(message));
    if (!this.draining) {
      this.draining = this.drain();
    }
  }

  /** Resolves once every message published so far has been handed to the channel. */
  async flush(): Promise<void> {
    while (this.draining) {
      await this.draining;
    }
  }

  /** Stops accepting messages and delivers whatever is already queued. */
  async close(): Promise<void> {
    this.closed = true;
    await this.flush();
  }

  private async drain(): Promise<void> {
    // Yield once so a burst of publishes from one tick is queued before sending.
    await Promise.resolve();

    let message = this.queue.shift();
    while (message) {
      try {
        await this.send(message);
      } catch (error) {
        logger.warn(`urgent send failed: ${describeError(error)}`, {
          sessionId: this.sessionId,
        });
      }
      message = this.queue.shift();
    }

    this.draining = null;
  }
}
