import { ConversationState } from "./conversationState.js";
import { createEnricher, Enricher, EnrichmentPolicy } from "./enricher.js";
import { logger } from "./logger.js";
import { TurnController } from "./turnController.js";
import {
  ConversationEntry,
  ResponseGenerator,
  SpeechOutput,
  TurnOutcome,
  TurnPhase,
  UrgentSender,
  UtterancePolicy,
} from "./types.js";
import {
  botReady,
  UiEventPublisher,
  userStartedSpeaking,
  userStoppedSpeaking,
  userTranscription,
} from "./uiEvents.js";

export interface SessionOptions {
  sessionId: string;
  metadata: Record<string, unknown>;
  generator: ResponseGenerator;
  speech: SpeechOutput;
  sendUrgent: UrgentSender;
  enrichmentPolicy: EnrichmentPolicy;
  utterancePolicy: UtterancePolicy;
  historyLimit: number;
  urgentQueueCapacity: number;
}

/**
 * One live connection's conversation: its history, its turn controller and its
 * enriched UI channel. Closing the session cancels the turn in flight.
 */
export class Session {
  readonly sessionId: string;
  readonly enricher: Enricher;

  private readonly events: UiEventPublisher;
  private readonly turns: TurnController;
  // Set at connection time; client context updates may not replace them.
  private readonly reservedKeys: ReadonlySet<string>;
  private closing: Promise<void> | null = null;

  constructor(options: SessionOptions) {
    this.sessionId = options.sessionId;
    this.reservedKeys = new Set(["session_id", ...Object.keys(options.metadata)]);
    this.enricher = createEnricher({
      policy: options.enrichmentPolicy,
      sessionId: options.sessionId,
      metadata: options.metadata,
    });
    this.events = new UiEventPublisher({
      sessionId: options.sessionId,
      enricher: this.enricher,
      send: options.sendUrgent,
      capacity: options.urgentQueueCapacity,
    });
    this.turns = new TurnController({
      sessionId: options.sessionId,
      conversation: new ConversationState(),
      generator: options.generator,
      speech: options.speech,
      publish: (message) => this.events.publish(message),
      historyLimit: options.historyLimit,
      utterancePolicy: options.utterancePolicy,
    });
  }

  get phase(): TurnPhase {
    return this.turns.phase;
  }

  get isClosed(): boolean {
    return this.closing !== null;
  }

  history(): readonly ConversationEntry[] {
    return this.turns.history();
  }

  markClientReady(): void {
    this.events.publish(botReady());
  }

  async handleFinalTranscript(text: string): Promise<TurnOutcome | null> {
    this.events.publish(userTranscription(text, true));
    return this.turns.submitUtterance(text);
  }

  handleInterimTranscript(text: string): void {
    this.events.publish(userTranscription(text, false));
  }

  /** Barge-in: the user started talking over the assistant. */
  handleUserSpeechStarted(): void {
    this.events.publish(userStartedSpeaking());
    if (this.turns.cancel("interrupted")) {
      logger.info("barge-in interrupted the active turn", { sessionId: this.sessionId });
    }
  }

  handleUserSpeechStopped(): void {
    this.events.publish(userStoppedSpeaking());
  }

  /**
   * Merges client-supplied context into later UI messages. Keys fixed at
   * connection time are left untouched; their names are returned.
   */
  updateContext(fields: Record<string, unknown>): string[] {
    const accepted: Record<string, unknown> = {};
    const rejected: string[] = [];
    for (const [key, value] of Object.entries(fields)) {
      if (this.reservedKeys.has(key)) {
        rejected.push(key);
      } else {
        accepted[key] = value;
      }
    }

    if (rejected.length > 0) {
      logger.warn(`context update tried to replace reserved keys: ${rejected.join(",")}`, {
        sessionId: this.sessionId,
      });
    }
    if (Object.keys(accepted).length > 0) {
      this.enricher.applyContext(accepted);
    }
    return rejected;
  }

  /** Resolves once queued UI messages have been handed to the channel. */
  flushEvents(): Promise<void> {
    return this.events.flush();
  }

  close(): Promise<void> {
    if (!this.closing) {
      this.closing = this.teardown();
    }
    return this.closing;
  }

  private async teardown(): Promise<void> {
    await this.turns.close();
    await this.events.close();
    logger.info("session closed", { sessionId: this.sessionId });
  }
}
