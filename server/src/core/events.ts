import crypto from "node:crypto";
import { EventEnvelope, InboundEnvelope } from "./types.js";

export interface ParseResult {
  event?: InboundEnvelope;
  error?: string;
}

export function parseIncomingEvent(raw: string, maxBytes: number): ParseResult {
  const size = Buffer.byteLength(raw, "utf8");
  if (size > maxBytes) {
    return { error: `event_too_large:${size}` };
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch {
    return { error: "invalid_json" };
  }

  const value = asRecord(parsed);
  if (!value) {
    return { error: "invalid_event_envelope" };
  }

  const { id, type, timestamp, sessionId } = value;
  const payload = value.payload === undefined ? {} : asRecord(value.payload);

  if (typeof id !== "string" || !id.trim()) {
    return { error: "missing_id" };
  }
  if (typeof type !== "string" || !type.trim()) {
    return { error: "missing_type" };
  }
  if (typeof timestamp !== "string" || !timestamp.trim()) {
    return { error: "missing_timestamp" };
  }
  if (sessionId !== undefined && (typeof sessionId !== "string" || !sessionId.trim())) {
    return { error: "invalid_session_id" };
  }
  if (!payload) {
    return { error: "invalid_payload" };
  }

  return {
    event: {
      id,
      type,
      timestamp,
      sessionId,
      payload,
    },
  };
}

export function makeEvent(
  type: string,
  sessionId: string,
  payload: Record<string, unknown>,
  id: string = crypto.randomUUID(),
  timestamp: string = new Date().toISOString(),
): EventEnvelope {
  return {
    id,
    type,
    timestamp,
    sessionId,
    payload,
  };
}

export function asString(value: unknown): string | undefined {
  return typeof value === "string" ? value : undefined;
}

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

export function asRecord(value: unknown): Record<string, unknown> | undefined {
  return isRecord(value) ? value : undefined;
}
