import { GenerationUnavailableError } from "@citeqa/core";

export async function generateWithOllama(input: {
  baseUrl: string;
  model: string;
  system: string;
  prompt: string;
  temperature: number;
  timeoutMs: number;
}): Promise<string> {
  let res: Response;
  try {
    res = await fetch(`${input.baseUrl}/api/generate`, {
      method: "POST",
      headers: { "content-type": "application/json" },
      body: JSON.stringify({
        model: input.model,
        system: input.system,
        prompt: input.prompt,
        stream: false,
        options: { temperature: input.temperature },
      }),
      signal: AbortSignal.timeout(input.timeoutMs),
    });
  } catch (err) {
    if (err instanceof Error && err.name === "TimeoutError") {
      throw new GenerationUnavailableError(`Ollama generation timed out after ${input.timeoutMs}ms`, { cause: err });
    }
    throw new GenerationUnavailableError(`Ollama generation unreachable at ${input.baseUrl}`, { cause: err });
  }

  if (!res.ok) {
    const text = await res.text().catch(() => "");
    throw new GenerationUnavailableError(`Ollama error: ${res.status} ${res.statusText}\n${text.slice(0, 500)}`);
  }

  let data: { response?: unknown };
  try {
    data = (await res.json()) as { response?: unknown };
  } catch (err) {
    throw new GenerationUnavailableError("Ollama generation response is not JSON.", { cause: err });
  }

  const answer = typeof data.response === "string" ? data.response.trim() : "";
  if (!answer) throw new GenerationUnavailableError("Ollama returned an empty response.");
  return answer;
}
