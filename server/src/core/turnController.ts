import { ConversationState } from "./conversationState.js";
import { describeError, logger } from "./logger.js";
import {
  CancelReason,
  ConversationEntry,
  OutboundMessage,
  ResponseGenerator,
  SpeechOutput,
  Turn,
  TurnEndReason,
  TurnOutcome,
  TurnPhase,
  UtterancePolicy,
} from "./types.js";
import { botText, botTurnStarted, botTurnStopped } from "./uiEvents.js";

export interface TurnControllerOptions {
  sessionId: string;
  conversation: ConversationState;
  generator: ResponseGenerator;
  speech: SpeechOutput;
  publish: (message: OutboundMessage) => void;
  historyLimit: number;
  utterancePolicy: UtterancePolicy;
}

interface ActiveTurn {
  turn: Turn;
  controller: AbortController;
  cancelReason: CancelReason | null;
}

const ABORTED = Symbol("aborted");

/**
 * Drives one conversation turn at a time:
 * idle -> pending -> streaming -> committing -> idle, with cancelled reachable
 * from pending and streaming. Every turn that emitted a turn-start also emits
 * exactly one turn-end, whatever happens in between.
 */
export class TurnController {
  private readonly sessionId: string;
  private readonly conversation: ConversationState;
  private readonly generator: ResponseGenerator;
  private readonly speech: SpeechOutput;
  private readonly publish: (message: OutboundMessage) => void;
  private readonly historyLimit: number;
  private readonly utterancePolicy: UtterancePolicy;

  private currentPhase: TurnPhase = "idle";
  private nextTurnId = 1;
  private active: ActiveTurn | null = null;
  private inFlight: Promise<TurnOutcome> | null = null;
  private utteranceSeq = 0;
  private closed = false;
  // Fires on close; bounds the wait for a turn-end on outputs that support abort.
  private readonly teardown = new AbortController();

  constructor(options: TurnControllerOptions) {
    this.sessionId = options.sessionId;
    this.conversation = options.conversation;
    this.generator = options.generator;
    this.speech = options.speech;
    this.publish = options.publish;
    this.historyLimit = options.historyLimit;
    this.utterancePolicy = options.utterancePolicy;
  }

  get phase(): TurnPhase {
    return this.currentPhase;
  }

  get activeTurn(): Readonly<Turn> | null {
    return this.active ? { ...this.active.turn } : null;
  }

  history(): readonly ConversationEntry[] {
    return this.conversation.entries();
  }

  /**
   * Starts a turn for a final user utterance. Resolves with the turn's outcome,
   * or null when the utterance did not start a turn (empty, dropped, superseded
   * or the controller is closed).
   */
  async submitUtterance(utterance: string): Promise<TurnOutcome | null> {
    const text = utterance.trim();
    if (!text) {
      logger.debug("empty utterance ignored", { sessionId: this.sessionId });
      return null;
    }
    if (this.closed) {
      logger.debug("utterance after close ignored", { sessionId: this.sessionId });
      return null;
    }

    const seq = ++this.utteranceSeq;

    if (this.active) {
      if (this.utterancePolicy === "drop") {
        logger.warn("utterance dropped: a turn is already in flight", {
          sessionId: this.sessionId,
          turnId: this.active.turn.id,
        });
        return null;
      }

      this.cancel("superseded");
      await this.settled();

      if (seq !== this.utteranceSeq || this.active || this.closed) {
        logger.info("utterance superseded before its turn started", { sessionId: this.sessionId });
        return null;
      }
    }

    return this.startTurn(text);
  }

  /**
   * Requests cancellation of the turn in flight. Returns false when there is
   * nothing to cancel (idle, already cancelling, or committing).
   */
  cancel(reason: CancelReason = "interrupted"): boolean {
    const active = this.active;
    if (!active || active.cancelReason || this.currentPhase === "committing") {
      return false;
    }

    active.cancelReason = reason;
    this.currentPhase = "cancelled";
    logger.info(`turn cancellation requested: ${reason}`, {
      sessionId: this.sessionId,
      turnId: active.turn.id,
    });
    active.controller.abort();
    return true;
  }

  /** Resolves once no turn is in flight. */
  async settled(): Promise<void> {
    while (this.inFlight) {
      await this.inFlight;
    }
  }

  /** Cancels any turn in flight, waits for its turn-end, and refuses further utterances. */
  async close(): Promise<void> {
    this.closed = true;
    this.cancel("session_closed");
    this.teardown.abort();
    await this.settled();
  }

  private startTurn(utterance: string): Promise<TurnOutcome> {
    const active: ActiveTurn = {
      turn: { id: this.nextTurnId++, status: "pending", accumulatedText: "", fragmentCount: 0 },
      controller: new AbortController(),
      cancelReason: null,
    };

    this.active = active;
    this.currentPhase = "pending";

    const history = this.conversation.recent(this.historyLimit);
    this.conversation.append("user", utterance);

    const run = this.runTurn(active, history, utterance).finally(() => {
      if (this.active === active) {
        this.active = null;
        this.currentPhase = "idle";
      }
      if (this.inFlight === run) {
        this.inFlight = null;
      }
    });
    this.inFlight = run;
    return run;
  }

  private async runTurn(
    active: ActiveTurn,
    history: readonly ConversationEntry[],
    utterance: string,
  ): Promise<TurnOutcome> {
    const { turn, controller } = active;
    const { signal } = controller;
    const context = { sessionId: this.sessionId, turnId: turn.id };

    let reason: TurnEndReason = "completed";

    try {
      const starting = this.speech.beginTurn(turn.id, signal);
      const started = await (this.speech.supportsAbort ? untilAborted(starting, signal) : starting);
      if (started !== ABORTED) {
        this.publish(botTurnStarted(turn.id));
      }
    } catch (error) {
      logger.error(`turn start failed: ${describeError(error)}`, context);
      reason = signal.aborted ? active.cancelReason ?? "interrupted" : "output_failed";
    }

    if (reason === "completed" && !signal.aborted) {
      turn.status = "streaming";
      this.currentPhase = "streaming";
      reason = await this.streamFragments(active, history, utterance);
    }

    if (reason === "completed" && signal.aborted) {
      reason = active.cancelReason ?? "interrupted";
    }

    if (reason === "completed") {
      this.currentPhase = "committing";
      if (turn.fragmentCount > 0) {
        this.conversation.append("assistant", turn.accumulatedText);
      } else {
        logger.warn("generator produced no fragments", context);
      }
      turn.status = "complete";
    } else {
      turn.status = "cancelled";
      if (!signal.aborted) {
        controller.abort();
      }
    }

    const outcome: TurnOutcome = {
      turnId: turn.id,
      status: turn.status === "complete" ? "complete" : "cancelled",
      reason,
      fragmentCount: turn.fragmentCount,
    };

    try {
      const ending = this.speech.endTurn(outcome);
      await (this.speech.supportsAbort ? untilAborted(ending, this.teardown.signal) : ending);
    } catch (error) {
      logger.warn(`turn end delivery failed: ${describeError(error)}`, context);
    }

    if (outcome.status === "complete") {
      this.publish(botTurnStopped(turn.id));
    }

    logger.info(
      `turn ${outcome.status} (${outcome.reason}) after ${outcome.fragmentCount} fragment(s)`,
      context,
    );
    return outcome;
  }

  private async streamFragments(
    active: ActiveTurn,
    history: readonly ConversationEntry[],
    utterance: string,
  ): Promise<TurnEndReason> {
    const { turn, controller } = active;
    const { signal } = controller;
    const context = { sessionId: this.sessionId, turnId: turn.id };

    let iterator: AsyncIterator<string>;
    try {
      iterator = this.generator.generate(history, utterance, signal)[Symbol.asyncIterator]();
    } catch (error) {
      logger.error(`generator ${this.generator.name} failed to start: ${describeError(error)}`, context);
      return "generation_failed";
    }

    let exhausted = false;

    try {
      while (!signal.aborted) {
        let next: IteratorResult<string> | typeof ABORTED;
        try {
          next = await untilAborted(iterator.next(), signal);
        } catch (error) {
          exhausted = true;
          const message = `generator ${this.generator.name} failed: ${describeError(error)}`;
          if (turn.fragmentCount === 0) {
            logger.error(message, context);
          } else {
            logger.warn(`${message} (after ${turn.fragmentCount} fragment(s))`, context);
          }
          return "generation_failed";
        }

        if (next === ABORTED) {
          break;
        }
        if (next.done) {
          exhausted = true;
          break;
        }
        if (!next.value) {
          continue;
        }

        const fragment = { turnId: turn.id, sequence: turn.fragmentCount, text: next.value };
        turn.accumulatedText += fragment.text;
        turn.fragmentCount += 1;
        this.publish(botText(turn.id, fragment.sequence, fragment.text));

        try {
          const speaking = this.speech.speak(fragment, signal);
          await (this.speech.supportsAbort ? untilAborted(speaking, signal) : speaking);
        } catch (error) {
          if (signal.aborted) {
            logger.warn(`fragment ${fragment.sequence} failed after cancellation: ${describeError(error)}`, context);
            return active.cancelReason ?? "interrupted";
          }
          logger.error(`fragment ${fragment.sequence} not delivered: ${describeError(error)}`, context);
          return "output_failed";
        }
      }
    } finally {
      if (!exhausted) {
        releaseIterator(iterator, context);
      }
    }

    return "completed";
  }
}

/**
 * Settles with the work's value, or with ABORTED as soon as `signal` fires.
 * A rejection arriving after the abort is only logged.
 */
function untilAborted<T>(work: Promise<T>, signal: AbortSignal): Promise<T | typeof ABORTED> {
  return new Promise((resolve, reject) => {
    const onAbort = (): void => resolve(ABORTED);
    if (signal.aborted) {
      onAbort();
    } else {
      signal.addEventListener("abort", onAbort, { once: true });
    }

    work.then(
      (value) => {
        signal.removeEventListener("abort", onAbort);
        resolve(value);
      },
      (error: unknown) => {
        signal.removeEventListener("abort", onAbort);
        if (signal.aborted) {
          logger.debug(`rejection after abort: ${describeError(error)}`);
          return;
        }
        reject(error);
      },
    );
  });
}

function releaseIterator(
  iterator: AsyncIterator<string>,
  context: { sessionId: string; turnId: number },
): void {
  if (!iterator.return) {
    return;
  }

  iterator.return().then(
    () => logger.debug("generator released", context),
    (error: unknown) => logger.debug(`generator release failed: ${describeError(error)}`, context),
  );
}
