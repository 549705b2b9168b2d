export interface EventEnvelope {
  id: string;
  type: string;
  timestamp: string;
  sessionId: string;
  payload: Record<string, unknown>;
}

/** Inbound frames may omit the session id; the connection already owns one. */
export interface InboundEnvelope extends Omit<EventEnvelope, "sessionId"> {
  sessionId?: string;
}

export type ConversationRole = "user" | "assistant";

export interface ConversationEntry {
  readonly role: ConversationRole;
  readonly text: string;
}

/** Outbound UI/telemetry message. Only its `data` member is ever touched by enrichment. */
export type OutboundMessage = Record<string, unknown>;

export type TurnStatus = "pending" | "streaming" | "complete" | "cancelled";

export type TurnPhase = "idle" | "pending" | "streaming" | "committing" | "cancelled";

export type CancelReason = "interrupted" | "superseded" | "session_closed";

export type TurnEndReason = CancelReason | "completed" | "generation_failed" | "output_failed";

export interface Turn {
  readonly id: number;
  status: TurnStatus;
  accumulatedText: string;
  fragmentCount: number;
}

export interface Fragment {
  readonly turnId: number;
  readonly sequence: number;
  readonly text: string;
}

export interface TurnOutcome {
  turnId: number;
  status: "complete" | "cancelled";
  reason: TurnEndReason;
  fragmentCount: number;
}

export type UtterancePolicy = "interrupt" | "drop";

export interface ResponseGenerator {
  readonly name: string;
  /**
   * Lazily produces the reply to `utterance` as non-empty text fragments.
   * The consumer may stop pulling after any fragment; `signal` fires when it does.
   */
  generate(
    history: readonly ConversationEntry[],
    utterance: string,
    signal: AbortSignal,
  ): AsyncIterable<string>;
}

/** Downstream speech-synthesis collaborator. */
export interface SpeechOutput {
  /** When true, a pending `speak` is abandoned as soon as the turn is cancelled. */
  readonly supportsAbort: boolean;
  /** Called once per turn, before any fragment. `signal` fires if the turn is cancelled meanwhile. */
  beginTurn(turnId: number, signal: AbortSignal): Promise<void>;
  speak(fragment: Fragment, signal: AbortSignal): Promise<void>;
  endTurn(outcome: TurnOutcome): Promise<void>;
}

/** Out-of-band channel for UI messages. */
export type UrgentSender = (message: OutboundMessage) => Promise<void> | void;
