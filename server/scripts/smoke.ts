import crypto from "node:crypto";
import { WebSocket } from "ws";

const baseURL = process.env.SMOKE_WS_URL ?? "ws://localhost:8080/ws";
const transcript = process.env.SMOKE_TEXT ?? "hello";

const socket = new WebSocket(baseURL);

socket.on("open", () => {
  console.log(`connected to ${baseURL}`);

  sendEvent("client.ready", {});
  sendEvent("user.transcript.final", { text: transcript });
});

socket.on("message", (raw) => {
  const text = Buffer.isBuffer(raw) ? raw.toString("utf8") : String(raw);
  let event: unknown;
  try {
    event = JSON.parse(text);
  } catch {
    console.log(text);
    return;
  }

  console.log(describe(event));

  if (isTurnEnd(event)) {
    socket.close();
  }
});

socket.on("close", () => {
  console.log("socket closed");
  process.exit(0);
});

socket.on("error", (error) => {
  console.error(`socket error: ${error.message}`);
  process.exit(1);
});

function sendEvent(type: string, payload: Record<string, unknown>): void {
  socket.send(JSON.stringify({
    id: crypto.randomUUID(),
    type,
    timestamp: new Date().toISOString(),
    payload,
  }));
}

function describe(event: unknown): string {
  if (!event || typeof event !== "object") {
    return String(event);
  }
  const type = "type" in event ? String(event.type) : "?";
  const payload = "payload" in event ? JSON.stringify(event.payload) : "";
  return `${type} ${payload}`;
}

function isTurnEnd(event: unknown): boolean {
  return !!event && typeof event === "object" && "type" in event && event.type === "tts.turn.ended";
}
