import { EmbeddingUnavailableError } from "@citeqa/core";

type OllamaEmbeddingResponse = {
  embedding?: unknown;
};

function isVector(value: unknown): value is number[] {
  return (
    Array.isArray(value) &&
    value.length > 0 &&
    value.every((v) => typeof v === "number" && Number.isFinite(v))
  );
}

export async function ollamaEmbedOne(args: {
  baseUrl: string;
  model: string;
  text: string;
}): Promise<number[]> {
  const { baseUrl, text } = args;
  const model = args.model.trim();

  let res: Response;
  try {
    res = await fetch(`${baseUrl}/api/embeddings`, {
      method: "POST",
      headers: { "content-type": "application/json" },
      body: JSON.stringify({
        model,
        prompt: text,
      }),
    });
  } catch (err) {
    throw new EmbeddingUnavailableError(`Ollama embeddings unreachable at ${baseUrl}`, { cause: err });
  }

  if (!res.ok) {
    const body = await res.text().catch(() => "");
    throw new EmbeddingUnavailableError(
      `Ollama embeddings request failed: ${res.status} ${res.statusText}\n${body.slice(0, 500)}`
    );
  }

  let data: OllamaEmbeddingResponse;
  try {
    data = (await res.json()) as OllamaEmbeddingResponse;
  } catch (err) {
    throw new EmbeddingUnavailableError("Ollama embeddings response is not JSON.", { cause: err });
  }

  if (!isVector(data?.embedding)) {
    throw new EmbeddingUnavailableError("Ollama embeddings response missing `embedding` array.");
  }

  return data.embedding;
}
