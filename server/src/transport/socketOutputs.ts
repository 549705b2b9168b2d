import { WebSocket } from "ws";
import { makeEvent } from "../core/events.js";
import { describeError, logger } from "../core/logger.js";
import { Fragment, OutboundMessage, SpeechOutput, TurnOutcome } from "../core/types.js";

/** The part of a ws socket the relay writes to. */
export interface SocketLike {
  readonly readyState: number;
  send(data: string, cb?: (err?: Error) => void): void;
}

/**
 * Serializes `event` onto the socket and resolves once the write is flushed.
 * Resolves false without sending when the socket is not open.
 */
export function sendJson(socket: SocketLike, event: object): Promise<boolean> {
  if (socket.readyState !== WebSocket.OPEN) {
    return Promise.resolve(false);
  }

  return new Promise((resolve, reject) => {
    socket.send(JSON.stringify(event), (error) => {
      if (error) {
        reject(error);
      } else {
        resolve(true);
      }
    });
  });
}

/** Fire-and-forget variant for protocol replies; failures are logged. */
export function safeSend(socket: SocketLike, event: object): void {
  sendJson(socket, event).catch((error: unknown) => {
    logger.warn(`failed to send websocket event: ${describeError(error)}`);
  });
}

/**
 * Speech path to the client's synthesizer. Each fragment waits for its socket
 * write, so a slow client applies backpressure to the turn.
 */
export class SocketSpeechOutput implements SpeechOutput {
  readonly supportsAbort = false;

  private readonly socket: SocketLike;
  private readonly sessionId: string;

  constructor(socket: SocketLike, sessionId: string) {
    this.socket = socket;
    this.sessionId = sessionId;
  }

  async beginTurn(turnId: number): Promise<void> {
    await this.write("tts.turn.started", { turnId });
  }

  async speak(fragment: Fragment): Promise<void> {
    await this.write("tts.speak", {
      turnId: fragment.turnId,
      sequence: fragment.sequence,
      text: fragment.text,
    });
  }

  async endTurn(outcome: TurnOutcome): Promise<void> {
    // Best effort: the socket is usually already gone when a session closes.
    if (this.socket.readyState !== WebSocket.OPEN) {
      return;
    }
    await this.write("tts.turn.ended", {
      turnId: outcome.turnId,
      status: outcome.status,
      reason: outcome.reason,
      fragmentCount: outcome.fragmentCount,
    });
  }

  private async write(type: string, payload: Record<string, unknown>): Promise<void> {
    const sent = await sendJson(this.socket, makeEvent(type, this.sessionId, payload));
    if (!sent) {
      throw new Error(`socket_not_open:${type}`);
    }
  }
}

/** Urgent channel: each enriched UI message travels as its own `ui.message` event. */
export function socketUrgentSender(socket: SocketLike, sessionId: string): (message: OutboundMessage) => Promise<void> {
  return async (message) => {
    const sent = await sendJson(socket, makeEvent("ui.message", sessionId, message));
    if (!sent) {
      logger.debug(`ui message not sent, socket closed: ${String(message.type)}`, { sessionId });
    }
  };
}
