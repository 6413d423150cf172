import { sendDirect } from "./direct.js";
import { sendHybrid } from "./hybrid.js";
import { sendSubprocess, sendTeamSubprocess } from "./subprocess.js";
import type { Backend } from "./types.js";

/** The single entry point for every backend variant. */
export function sendPrompt(backend: Backend, prompt: string, systemContext?: string): Promise<string> {
  switch (backend.kind) {
    case "direct":
      return sendDirect(backend, prompt, systemContext);
    case "subprocess":
      return sendSubprocess(backend, prompt, systemContext);
    case "hybrid":
      return sendHybrid(backend, prompt, systemContext);
    case "team-subprocess":
      return sendTeamSubprocess(backend, prompt, systemContext);
    default: {
      const unreachable: never = backend;
      throw new Error(`Unhandled backend: ${JSON.stringify(unreachable)}`);
    }
  }
}
