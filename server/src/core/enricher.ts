import { isRecord } from "./events.js";
import { OutboundMessage } from "./types.js";

export type EnrichmentPolicy = "selective" | "global";

/**
 * Injects session-scoped context into the `data` section of outbound UI messages.
 *
 * `enrich` never mutates its argument. Messages without a plain-object `data`
 * member are returned as-is (same reference). Reapplying `enrich` with the same
 * configuration yields an equal message.
 */
export interface Enricher {
  readonly policy: EnrichmentPolicy;
  enrich(message: OutboundMessage): OutboundMessage;
  /** Merges `fields` into the injected context; later calls win per key. */
  applyContext(fields: Record<string, unknown>): void;
}

interface SelectiveSnapshot {
  readonly sessionId: string | undefined;
  readonly metadata: Readonly<Record<string, unknown>>;
}

export interface SelectiveEnricherOptions {
  sessionId?: string;
  metadata?: Record<string, unknown>;
}

/** Adds `session_id` and one `metadata` mapping, both only when non-empty. */
export class SelectiveEnricher implements Enricher {
  readonly policy = "selective";

  // Replaced wholesale on every update so one enrich call sees one snapshot.
  private snapshot: SelectiveSnapshot;

  constructor(options: SelectiveEnricherOptions = {}) {
    this.snapshot = freezeSelective(options.sessionId, options.metadata ?? {});
  }

  get sessionId(): string | undefined {
    return this.snapshot.sessionId;
  }

  get metadata(): Readonly<Record<string, unknown>> {
    return this.snapshot.metadata;
  }

  enrich(message: OutboundMessage): OutboundMessage {
    const data = message.data;
    if (!isRecord(data)) {
      return message;
    }

    const { sessionId, metadata } = this.snapshot;
    const injected: Record<string, unknown> = {};
    if (sessionId) {
      injected.session_id = sessionId;
    }
    if (Object.keys(metadata).length > 0) {
      injected.metadata = { ...metadata };
    }

    return { ...message, data: { ...data, ...injected } };
  }

  updateSessionId(sessionId: string): void {
    this.snapshot = freezeSelective(sessionId, this.snapshot.metadata);
  }

  updateMetadata(metadata: Record<string, unknown>): void {
    this.snapshot = freezeSelective(this.snapshot.sessionId, metadata);
  }

  addMetadataField(key: string, value: unknown): void {
    this.updateMetadata({ ...this.snapshot.metadata, [key]: value });
  }

  applyContext(fields: Record<string, unknown>): void {
    this.updateMetadata({ ...this.snapshot.metadata, ...fields });
  }
}

/** Merges an arbitrary mapping into every matching message; injected keys override. */
export class GlobalEnricher implements Enricher {
  readonly policy = "global";

  private fields: Readonly<Record<string, unknown>>;

  constructor(injectFields: Record<string, unknown> = {}) {
    this.fields = Object.freeze({ ...injectFields });
  }

  get injectFields(): Readonly<Record<string, unknown>> {
    return this.fields;
  }

  enrich(message: OutboundMessage): OutboundMessage {
    const data = message.data;
    if (!isRecord(data)) {
      return message;
    }

    const fields = this.fields;
    return { ...message, data: { ...data, ...fields } };
  }

  updateInjectFields(fields: Record<string, unknown>): void {
    this.fields = Object.freeze({ ...fields });
  }

  applyContext(fields: Record<string, unknown>): void {
    this.updateInjectFields({ ...this.fields, ...fields });
  }
}

export interface EnricherConfig {
  policy: EnrichmentPolicy;
  sessionId: string;
  metadata: Record<string, unknown>;
}

export function createEnricher(config: EnricherConfig): Enricher {
  if (config.policy === "global") {
    return new GlobalEnricher({ session_id: config.sessionId, ...config.metadata });
  }

  return new SelectiveEnricher({
    sessionId: config.sessionId,
    metadata: config.metadata,
  });
}

function freezeSelective(
  sessionId: string | undefined,
  metadata: Record<string, unknown>,
): SelectiveSnapshot {
  return Object.freeze({
    sessionId: sessionId || undefined,
    metadata: Object.freeze({ ...metadata }),
  });
}
