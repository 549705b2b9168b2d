import "dotenv/config";

import crypto from "node:crypto";
import http from "node:http";
import { WebSocketServer } from "ws";
import { loadConfig } from "./config.js";
import { makeEvent, parseIncomingEvent } from "./core/events.js";
import { describeError, logger } from "./core/logger.js";
import { RelayService } from "./core/relayService.js";
import { buildGenerator } from "./providers/index.js";
import { safeSend, SocketSpeechOutput, socketUrgentSender } from "./transport/socketOutputs.js";

const config = loadConfig();
const generator = buildGenerator(config.generator);

const relay = new RelayService(generator, {
  rateLimitPerMinute: config.rateLimitPerMinute,
  historyLimit: config.historyLimit,
  utterancePolicy: config.utterancePolicy,
  enrichmentPolicy: config.enrichmentPolicy,
  urgentQueueCapacity: config.urgentQueueCapacity,
});

const httpServer = http.createServer((req, res) => {
  if (req.method === "GET" && req.url === "/health") {
    res.writeHead(200, { "Content-Type": "application/json" });
    res.end(JSON.stringify({ status: "healthy", sessions: relay.openSessions }));
    return;
  }
  res.writeHead(404, { "Content-Type": "application/json" });
  res.end(JSON.stringify({ error: "not_found" }));
});

const wss = new WebSocketServer({
  server: httpServer,
  path: "/ws",
  maxPayload: config.maxEventBytes,
});

httpServer.listen(config.port, () => {
  logger.info(
    `voice relay listening on port ${config.port} using generator=${generator.name} ` +
      `utterances=${config.utterancePolicy} enrichment=${config.enrichmentPolicy}`,
  );
});

wss.on("connection", (socket, request) => {
  const limiter = relay.createRateLimiter();
  const sessionId = crypto.randomUUID();
  const userAgent = request.headers["user-agent"];

  const session = relay.openSession({
    sessionId,
    metadata: {
      connection_time: Date.now() / 1000,
      user_agent: typeof userAgent === "string" && userAgent ? userAgent : config.agentName,
    },
    speech: new SocketSpeechOutput(socket, sessionId),
    sendUrgent: socketUrgentSender(socket, sessionId),
  });

  logger.info("client connected", {
    sessionId,
    trace: request.socket.remoteAddress ?? "unknown",
  });
  safeSend(socket, makeEvent("session.started", sessionId, { sessionId }));

  socket.on("message", async (raw) => {
    const text = Buffer.isBuffer(raw) ? raw.toString("utf8") : String(raw);

    if (!limiter.tryAcquire()) {
      safeSend(socket, makeEvent("error", sessionId, {
        code: "rate_limited",
        message: `Too many events in the last minute; retry in ${limiter.retryAfterMs()}ms.`,
      }));
      logger.warn("rate limit hit", { sessionId });
      return;
    }

    const parsed = parseIncomingEvent(text, config.maxEventBytes);
    if (!parsed.event) {
      safeSend(socket, makeEvent("error", sessionId, {
        code: "invalid_event",
        message: parsed.error ?? "Invalid event envelope",
      }));
      return;
    }

    const event = parsed.event;
    if (event.sessionId && event.sessionId !== sessionId) {
      safeSend(socket, makeEvent("error", sessionId, {
        code: "session_mismatch",
        message: "Each connection may only use the sessionId it was given.",
      }));
      return;
    }

    logger.debug(`inbound ${event.type}`, { sessionId, eventId: event.id });

    try {
      await relay.handleEvent(session, event, (outbound) => safeSend(socket, outbound));
    } catch (error) {
      logger.error(`event handling failed: ${describeError(error)}`, { sessionId, eventId: event.id });
    }
  });

  socket.on("close", () => {
    logger.info("client disconnected", { sessionId });
    relay.closeSession(sessionId).catch((error: unknown) => {
      logger.error(`session teardown failed: ${describeError(error)}`, { sessionId });
    });
  });

  socket.on("error", (error) => {
    logger.warn(`socket error: ${error.message}`, { sessionId });
  });
});

function shutdown(signal: string): void {
  logger.info(`received ${signal}, closing ${relay.openSessions} session(s)`);
  wss.close();
  relay
    .closeAll()
    .catch((error: unknown) => logger.error(`shutdown failed: ${describeError(error)}`))
    .finally(() => httpServer.close(() => process.exit(0)));
}

process.on("SIGINT", () => shutdown("SIGINT"));
process.on("SIGTERM", () => shutdown("SIGTERM"));
