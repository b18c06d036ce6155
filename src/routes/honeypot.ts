import { Router, Request, Response } from "express";
import type { HoneypotAgent } from "../core/agent";
import { isRecord } from "../core/providers/types";
import type { MessageMetadata } from "../utils/types";
import { describeError, maskDigits, safeLog, safeStringify, sanitizeHeaders } from "../utils/logging";

type ParsedTurn = {
  sessionId: string;
  text: string;
  timestamp?: string;
  metadata: MessageMetadata;
};

function logIncoming(req: Request, body: unknown) {
  safeLog(`[INCOMING] headers: ${safeStringify(sanitizeHeaders(req.headers), 2000)}`);
  safeLog(`[INCOMING] body: ${safeStringify(body, 2000)}`);
}

function logOutgoing(status: number, responseJson: unknown) {
  safeLog(`[OUTGOING] status: ${status} response_json: ${safeStringify(responseJson, 5000)}`);
}

function readString(value: unknown): string | undefined {
  return typeof value === "string" ? value : undefined;
}

export function parseTurnBody(body: unknown, now: () => number = Date.now): ParsedTurn {
  const record = isRecord(body) ? body : {};
  const message = record.message;
  let text = "";
  let timestamp: string | undefined;
  if (typeof message === "string") {
    text = message;
  } else if (isRecord(message)) {
    text = readString(message.text) ?? "";
    timestamp = readString(message.timestamp);
  } else {
    text = readString(record.text) ?? "";
  }
  const rawMeta = isRecord(record.metadata) ? record.metadata : {};
  return {
    sessionId: readString(record.sessionId) || `sess-${now()}`,
    text,
    timestamp,
    metadata: {
      channel: readString(rawMeta.channel),
      language: readString(rawMeta.language),
      locale: readString(rawMeta.locale)
    }
  };
}

export function createHoneypotRouter(agent: HoneypotAgent, apiKey: string = process.env.API_KEY || ""): Router {
  const router = Router();

  router.post("/honeypot", async (req: Request, res: Response) => {
    const body: unknown = req.body ?? {};
    logIncoming(req, body);

    const provided = req.header("x-api-key");
    if (apiKey && provided !== apiKey) {
      const responseJson = { status: "error", message: "Invalid API key" };
      logOutgoing(401, responseJson);
      return res.status(401).json(responseJson);
    }

    const turn = parseTurnBody(body);
    if (turn.text.trim().length === 0) {
      const responseJson = { status: "success", reply: "OK" };
      logOutgoing(200, responseJson);
      return res.status(200).json(responseJson);
    }

    safeLog(`[SCAMMER] ${maskDigits(turn.text)}`);
    try {
      const result = await agent.handleTurn({
        sessionId: turn.sessionId,
        message: turn.text,
        metadata: turn.metadata,
        timestamp: turn.timestamp
      });
      safeLog(`[HONEYPOT] ${maskDigits(result.reply)}`);
      const responseJson = { status: "success", ...result };
      logOutgoing(200, responseJson);
      return res.status(200).json(responseJson);
    } catch (err) {
      safeLog(`[ERROR] ${turn.sessionId} turn failed: ${describeError(err)}`);
      const responseJson = { status: "error" };
      logOutgoing(500, responseJson);
      return res.status(500).json(responseJson);
    }
  });

  return router;
}
