import { BackendError, errorMessage } from "../errors.js";
import { MessageResponseSchema } from "../schemas.js";
import { createLogger } from "../utils/logger.js";
import type { DirectBackend } from "./types.js";

const log = createLogger("direct");

type MessageRequest = {
  model: string;
  max_tokens: number;
  system?: string;
  messages: Array<{ role: "user"; content: string }>;
};

export function buildMessageRequest(
  backend: DirectBackend,
  prompt: string,
  systemContext?: string,
): MessageRequest {
  return {
    model: backend.model,
    max_tokens: backend.maxTokens,
    ...(systemContext !== undefined ? { system: systemContext } : {}),
    messages: [{ role: "user", content: prompt }],
  };
}

/** One request to the provider's messages endpoint; resolves to the first text block. */
export async function sendDirect(
  backend: DirectBackend,
  prompt: string,
  systemContext?: string,
): Promise<string> {
  const request = buildMessageRequest(backend, prompt, systemContext);
  log.debug(`POST ${backend.apiUrl}`, { model: backend.model });

  let res: Response;
  try {
    res = await fetch(backend.apiUrl, {
      method: "POST",
      headers: {
        "x-api-key": backend.apiKey,
        "anthropic-version": backend.apiVersion,
        "content-type": "application/json",
      },
      body: JSON.stringify(request),
    });
  } catch (err) {
    throw new BackendError("TRANSPORT", `Failed to send request to provider: ${errorMessage(err)}`, {
      cause: err,
    });
  }

  if (!res.ok) {
    const body = await res.text().catch(() => "");
    throw new BackendError("PROVIDER", `Provider request failed with status ${res.status}: ${body}`, {
      status: res.status,
      body,
    });
  }

  let payload: unknown;
  try {
    payload = await res.json();
  } catch (err) {
    throw new BackendError("DECODE", `Failed to parse provider response: ${errorMessage(err)}`, {
      cause: err,
    });
  }

  const parsed = MessageResponseSchema.safeParse(payload);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((i) => `${i.path.join(".") || "body"}: ${i.message}`).join("; ");
    throw new BackendError("DECODE", `Failed to parse provider response: ${issues}`, {
      cause: parsed.error,
    });
  }

  return parsed.data.content.find((block) => typeof block.text === "string")?.text ?? "";
}
