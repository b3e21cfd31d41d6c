import type { IncomingMessage, ServerResponse } from "node:http";
import { z } from "zod";
import { describeError, NotFoundError } from "../domain/errors.js";
import { APOLOGY_MESSAGE, type Orchestrator } from "../services/orchestrator.js";

export type MessageProcessor = Pick<Orchestrator, "processMessage">;

export interface ApiResponse {
  status: number;
  payload: Record<string, unknown>;
}

export const messageBodySchema = z.object({
  telegram_id: z.number().int().default(0),
  session_id: z.number().int().default(0),
  query: z.string().trim().min(1, "query must not be empty"),
});

export class InvalidJsonError extends Error {
  constructor() {
    super("Invalid JSON body");
    this.name = "InvalidJsonError";
  }
}

/** Transport-free routing for `/message` and `/health`. */
export async function routeRequest(
  processor: MessageProcessor,
  method: string,
  path: string,
  body: unknown,
): Promise<ApiResponse> {
  if (path === "/health" && method === "GET") {
    return { status: 200, payload: { status: "ok" } };
  }

  if (path !== "/message") {
    return { status: 404, payload: { error: "Not found" } };
  }
  if (method !== "POST") {
    return { status: 405, payload: { error: "Method not allowed" } };
  }

  const parsed = messageBodySchema.safeParse(body);
  if (!parsed.success) {
    return {
      status: 400,
      payload: { error: "Invalid request body", details: parsed.error.flatten().fieldErrors },
    };
  }

  const request = parsed.data;
  try {
    const result = await processor.processMessage({
      telegramId: request.telegram_id,
      sessionId: request.session_id,
      query: request.query,
    });
    if (result.failed) {
      return { status: 500, payload: { error: APOLOGY_MESSAGE } };
    }
    return {
      status: 200,
      payload: {
        response: result.response,
        session_id: request.session_id ? String(request.session_id) : "new_session",
      },
    };
  } catch (error) {
    if (error instanceof NotFoundError) {
      return { status: 404, payload: { error: error.message } };
    }
    console.error(`[api] Error processing message: ${describeError(error)}`);
    return { status: 500, payload: { error: APOLOGY_MESSAGE } };
  }
}

/** Node adapter around {@link routeRequest}. */
export async function handleApiRequest(
  processor: MessageProcessor,
  req: IncomingMessage,
  res: ServerResponse,
  pathname: string,
): Promise<void> {
  let body: unknown = {};
  if (req.method === "POST") {
    try {
      body = await readJsonBody(req);
    } catch (error) {
      if (!(error instanceof InvalidJsonError)) {
        throw error;
      }
      writeJson(res, 400, { error: error.message });
      return;
    }
  }

  const response = await routeRequest(processor, req.method ?? "GET", pathname, body);
  writeJson(res, response.status, response.payload);
}

export async function readJsonBody(req: IncomingMessage): Promise<unknown> {
  const chunks: Buffer[] = [];
  for await (const chunk of req) {
    chunks.push(Buffer.isBuffer(chunk) ? chunk : Buffer.from(chunk));
  }

  const raw = Buffer.concat(chunks).toString("utf-8").trim();
  if (!raw) {
    return {};
  }

  try {
    return JSON.parse(raw);
  } catch {
    throw new InvalidJsonError();
  }
}

export function writeJson(res: ServerResponse, status: number, payload: unknown): void {
  res.writeHead(status, { "Content-Type": "application/json" });
  res.end(JSON.stringify(payload));
}
