import { EnrichmentPolicy } from "./enricher.js";
import { asRecord, asString, makeEvent } from "./events.js";
import { logger } from "./logger.js";
import { SlidingWindowRateLimiter } from "./rateLimiter.js";
import { Session } from "./session.js";
import { SessionStore } from "./sessionStore.js";
import {
  EventEnvelope,
  InboundEnvelope,
  ResponseGenerator,
  SpeechOutput,
  UrgentSender,
  UtterancePolicy,
} from "./types.js";

export interface RelayServiceConfig {
  rateLimitPerMinute: number;
  historyLimit: number;
  utterancePolicy: UtterancePolicy;
  enrichmentPolicy: EnrichmentPolicy;
  urgentQueueCapacity: number;
}

export interface ConnectionBinding {
  sessionId: string;
  metadata: Record<string, unknown>;
  speech: SpeechOutput;
  sendUrgent: UrgentSender;
}

export class RelayService {
  private readonly generator: ResponseGenerator;
  private readonly config: RelayServiceConfig;
  private readonly sessions: SessionStore;

  constructor(generator: ResponseGenerator, config: RelayServiceConfig) {
    this.generator = generator;
    this.config = config;
    this.sessions = new SessionStore(config.rateLimitPerMinute);
  }

  get openSessions(): number {
    return this.sessions.size;
  }

  createRateLimiter(): SlidingWindowRateLimiter {
    return this.sessions.createRateLimiter();
  }

  openSession(binding: ConnectionBinding): Session {
    const session = this.sessions.open({
      sessionId: binding.sessionId,
      metadata: binding.metadata,
      generator: this.generator,
      speech: binding.speech,
      sendUrgent: binding.sendUrgent,
      enrichmentPolicy: this.config.enrichmentPolicy,
      utterancePolicy: this.config.utterancePolicy,
      historyLimit: this.config.historyLimit,
      urgentQueueCapacity: this.config.urgentQueueCapacity,
    });

    logger.info(
      `session opened (generator=${this.generator.name} enrichment=${session.enricher.policy})`,
      { sessionId: binding.sessionId },
    );
    return session;
  }

  closeSession(sessionId: string): Promise<void> {
    return this.sessions.close(sessionId);
  }

  closeAll(): Promise<void> {
    return this.sessions.closeAll();
  }

  async handleEvent(
    session: Session,
    event: InboundEnvelope,
    emit: (event: EventEnvelope) => void,
  ): Promise<void> {
    const context = { sessionId: session.sessionId, eventId: event.id };

    switch (event.type) {
      case "client.ready": {
        logger.info("client ready", context);
        session.markClientReady();
        return;
      }

      case "user.transcript.final": {
        const text = asString(event.payload.text)?.trim();
        if (!text) {
          emit(makeEvent("error", session.sessionId, {
            code: "invalid_transcript",
            message: "user.transcript.final must include payload.text",
          }));
          return;
        }

        await session.handleFinalTranscript(text);
        return;
      }

      case "user.transcript.partial": {
        const text = asString(event.payload.text);
        if (text) {
          session.handleInterimTranscript(text);
        }
        return;
      }

      case "user.speech.started": {
        session.handleUserSpeechStarted();
        return;
      }

      case "user.speech.stopped": {
        session.handleUserSpeechStopped();
        return;
      }

      case "session.context.update": {
        const fields = asRecord(event.payload.fields);
        if (!fields) {
          emit(makeEvent("error", session.sessionId, {
            code: "invalid_context",
            message: "session.context.update must include payload.fields",
          }));
          return;
        }

        const rejected = session.updateContext(fields);
        if (rejected.length > 0) {
          emit(makeEvent("error", session.sessionId, {
            code: "reserved_context_field",
            message: `session.context.update cannot change: ${rejected.join(", ")}`,
          }));
        }
        const applied = Object.keys(fields).filter((key) => !rejected.includes(key));
        logger.info(`context updated: ${applied.join(",") || "(nothing)"}`, context);
        return;
      }

      default:
        logger.info(`ignored event type: ${event.type}`, context);
        return;
    }
  }
}
