import { beforeEach, describe, expect, it, vi } from "vitest";
import { sendDirect } from "../../src/backends/direct.js";
import { sendHybrid } from "../../src/backends/hybrid.js";
import { sendSubprocess } from "../../src/backends/subprocess.js";
import type { HybridBackend } from "../../src/backends/types.js";
import { BackendError } from "../../src/errors.js";

vi.mock("../../src/backends/direct.js", () => ({ sendDirect: vi.fn() }));
vi.mock("../../src/backends/subprocess.js", () => ({ sendSubprocess: vi.fn() }));

const directMock = vi.mocked(sendDirect);
const subprocessMock = vi.mocked(sendSubprocess);

const backend: HybridBackend = {
  kind: "hybrid",
  direct: {
    kind: "direct",
    apiKey: "test-secret",
    apiUrl: "https://provider.test/v1/messages",
    apiVersion: "2023-06-01",
    model: "test-model",
    maxTokens: 16,
  },
  subprocess: {
    kind: "subprocess",
    executable: "/bin/agent",
    environment: {},
    credentialEnvVar: "ANTHROPIC_API_KEY",
  },
};

beforeEach(() => {
  directMock.mockReset();
  subprocessMock.mockReset();
});

describe("sendHybrid", () => {
  it("returns the direct response without touching the subprocess", async () => {
    directMock.mockResolvedValue("from api");

    await expect(sendHybrid(backend, "hi", "ctx")).resolves.toBe("from api");
    expect(directMock).toHaveBeenCalledWith(backend.direct, "hi", "ctx");
    expect(subprocessMock).not.toHaveBeenCalled();
  });

  it("falls back to the subprocess with the same prompt and context", async () => {
    directMock.mockRejectedValue(new BackendError("PROVIDER", "Provider request failed with status 500: oops"));
    subprocessMock.mockResolvedValue("from cli");

    await expect(sendHybrid(backend, "hi", "ctx")).resolves.toBe("from cli");
    expect(subprocessMock).toHaveBeenCalledWith(backend.subprocess, "hi", "ctx");
  });

  it("keeps both errors when both legs fail", async () => {
    const directError = new BackendError("TRANSPORT", "Failed to send request to provider: offline");
    const subprocessError = new BackendError("PROCESS_FAILED", "/bin/agent exited with 1: nope");
    directMock.mockRejectedValue(directError);
    subprocessMock.mockRejectedValue(subprocessError);

    const err = await sendHybrid(backend, "hi").catch((e: unknown) => e);
    expect(err).toBeInstanceOf(BackendError);
    if (!(err instanceof BackendError)) return;
    expect(err.code).toBe("HYBRID_FAILED");
    expect(err.message).toBe(
      "Hybrid: both direct and subprocess calls failed " +
        "(direct: Failed to send request to provider: offline; subprocess: /bin/agent exited with 1: nope)",
    );
    expect(err.directError).toBe(directError);
    expect(err.cause).toBe(subprocessError);
  });
});
