import { BackendError, errorMessage } from "../errors.js";
import { createLogger } from "../utils/logger.js";
import { sendDirect } from "./direct.js";
import { sendSubprocess } from "./subprocess.js";
import type { HybridBackend } from "./types.js";

const log = createLogger("hybrid");

function asError(err: unknown): Error {
  return err instanceof Error ? err : new Error(String(err));
}

/**
 * Direct first; any Direct failure falls through to the subprocess leg with the same
 * prompt and context. When both legs fail the rejection keeps both errors.
 */
export async function sendHybrid(
  backend: HybridBackend,
  prompt: string,
  systemContext?: string,
): Promise<string> {
  let directError: Error;
  try {
    const response = await sendDirect(backend.direct, prompt, systemContext);
    log.info("Direct call succeeded");
    return response;
  } catch (err) {
    directError = asError(err);
    log.warn("Direct call failed, falling back to subprocess", { error: directError.message });
  }

  try {
    return await sendSubprocess(backend.subprocess, prompt, systemContext);
  } catch (err) {
    throw new BackendError(
      "HYBRID_FAILED",
      `Hybrid: both direct and subprocess calls failed (direct: ${directError.message}; subprocess: ${errorMessage(err)})`,
      { directError, cause: err },
    );
  }
}
