/**
 * Ollama vision adapter.
 *
 * This module is an adapter:
 * - It talks to an Ollama-compatible server over HTTP (/api/generate, /api/tags).
 * - It returns the model's raw reply text; parsing belongs to the TaggingService.
 *
 * Architectural boundaries:
 * - No retries here. Every failure is classified as transient or permanent
 *   and thrown; `withRetry` decides what to do with it.
 * - No catalog, sidecar or checkpoint access.
 */

import {
  isTransientStatus,
  PermanentTaggingError,
  TransientTaggingError,
} from "~/server/ai/errors";

export type VisionTaggerOptions = {
  baseUrl: string;
  model: string;
  timeoutMs: number;
};

export type InferenceRequest = {
  image: Buffer; // bounded JPEG bytes
  instruction: string;
  generation: { temperature: number; num_predict: number };
};

// The inference boundary the session depends on.
export interface VisionTagger {
  readonly model: string;
  infer(request: InferenceRequest): Promise<string>;
}

// Is a value a plain object (record)?
function isRecord(v: unknown): v is Record<string, unknown> {
  return typeof v === "object" && v !== null;
}

// Safe property read from an unknown record.
function getProp(obj: Record<string, unknown>, key: string): unknown {
  return obj[key];
}

function endpoint(baseUrl: string, pathname: string): string {
  return `${baseUrl.replace(/\/+$/, "")}${pathname}`;
}

// fetch() rejections: aborts/timeouts and socket errors are all retryable.
function classifyFetchError(err: unknown, url: string): TransientTaggingError {
  const name = err instanceof Error ? err.name : "";
  if (name === "TimeoutError" || name === "AbortError") {
    return new TransientTaggingError(`Inference request timed out: ${url}`, { cause: err });
  }
  const message = err instanceof Error ? err.message : String(err);
  return new TransientTaggingError(`Inference server unreachable (${url}): ${message}`, {
    cause: err,
  });
}

async function httpError(res: Response, what: string): Promise<Error> {
  const text = await res.text().catch(() => "");
  const message = `${what} error: ${res.status} ${res.statusText}${text ? ` - ${text}` : ""}`;

  return isTransientStatus(res.status)
    ? new TransientTaggingError(message)
    : new PermanentTaggingError(message);
}

async function readJson(res: Response, what: string, url: string): Promise<unknown> {
  try {
    return (await res.json()) as unknown;
  } catch (err) {
    if (err instanceof SyntaxError) {
      throw new PermanentTaggingError(`${what} returned invalid JSON.`, { cause: err });
    }
    // The body is still streaming when the timeout fires or the socket drops.
    throw classifyFetchError(err, url);
  }
}

// Extract `response` from a non-streaming /api/generate reply.
function extractResponseText(json: unknown): string {
  if (!isRecord(json)) {
    throw new PermanentTaggingError("Inference response was not an object.");
  }

  const error = getProp(json, "error");
  if (typeof error === "string") {
    throw new PermanentTaggingError(`Inference server error: ${error}`);
  }

  const response = getProp(json, "response");
  if (typeof response !== "string") {
    throw new PermanentTaggingError("Inference response missing response text.");
  }

  return response;
}

export class OllamaVisionTagger implements VisionTagger {
  constructor(private readonly options: VisionTaggerOptions) {}

  get model(): string {
    return this.options.model;
  }

  async infer(request: InferenceRequest): Promise<string> {
    const url = endpoint(this.options.baseUrl, "/api/generate");

    const body = {
      model: this.options.model,
      prompt: request.instruction,
      images: [request.image.toString("base64")],
      stream: false,
      options: request.generation,
    };

    let res: Response;
    try {
      res = await fetch(url, {
        method: "POST",
        headers: { "Content-Type": "application/json" },
        body: JSON.stringify(body),
        signal: AbortSignal.timeout(this.options.timeoutMs),
      });
    } catch (err) {
      throw classifyFetchError(err, url);
    }

    if (!res.ok) throw await httpError(res, "Inference API");

    return extractResponseText(await readJson(res, "Inference API", url));
  }

  // Installed model names, sorted.
  async listModels(): Promise<string[]> {
    const url = endpoint(this.options.baseUrl, "/api/tags");

    let res: Response;
    try {
      res = await fetch(url, { signal: AbortSignal.timeout(10_000) });
    } catch (err) {
      throw classifyFetchError(err, url);
    }

    if (!res.ok) throw await httpError(res, "Model list");

    const json = await readJson(res, "Model list", url);
    const models = isRecord(json) ? getProp(json, "models") : undefined;
    if (!Array.isArray(models)) {
      throw new PermanentTaggingError("Model list missing models array.");
    }

    const names: string[] = [];
    for (const m of models) {
      if (!isRecord(m)) continue;
      const name = getProp(m, "name");
      if (typeof name === "string" && name.length > 0) names.push(name);
    }

    return names.sort();
  }

  async isAvailable(): Promise<boolean> {
    try {
      const res = await fetch(endpoint(this.options.baseUrl, "/api/tags"), {
        signal: AbortSignal.timeout(5_000),
      });
      return res.ok;
    } catch {
      return false;
    }
  }
}
