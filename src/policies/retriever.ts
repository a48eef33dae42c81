import { readFile } from "node:fs/promises";
import { env } from "../env";
import { logger } from "../logger";

const log = logger.child({ module: "policies" });

export const DEFAULT_POLICY_DOCS = new URL(
  "./policy_docs.txt",
  import.meta.url
);

/** Chunks stay under this many characters unless one sentence is longer. */
export const CHUNK_SIZE = 500;

export function chunkDocuments(text: string, size = CHUNK_SIZE): string[] {
  const chunks: string[] = [];
  let current = "";
  for (const fragment of text.split(".")) {
    if (!fragment.trim()) continue;
    const sentence = `${fragment}.`;
    if (current.length + sentence.length < size) {
      current += sentence;
    } else {
      if (current.trim()) chunks.push(current.trim());
      current = sentence;
    }
  }
  if (current.trim()) chunks.push(current.trim());
  return chunks;
}

/** Keyword retrieval over a plain-text policy knowledge base. */
export class PolicyRetriever {
  readonly chunks: readonly string[];

  constructor(readonly documents: string, chunkSize = CHUNK_SIZE) {
    this.chunks = chunkDocuments(documents, chunkSize);
  }

  static async fromFile(
    file: string | URL = env.POLICY_DOCS_PATH ?? DEFAULT_POLICY_DOCS
  ) {
    try {
      return new PolicyRetriever(await readFile(file, "utf8"));
    } catch (err) {
      if (err instanceof Error && "code" in err && err.code === "ENOENT") {
        log.warn({ file: String(file) }, "policy knowledge base not found");
        return new PolicyRetriever("");
      }
      throw err;
    }
  }

  /**
   * Chunks ranked by how many query terms they contain; ties keep
   * document order.
   */
  retrieve(query: string, topK = 3): string[] {
    const terms = query.toLowerCase().split(/\s+/).filter(Boolean);
    return this.chunks
      .map((chunk) => {
        const lower = chunk.toLowerCase();
        return { chunk, score: terms.filter((t) => lower.includes(t)).length };
      })
      .filter((c) => c.score > 0)
      .sort((a, b) => b.score - a.score)
      .slice(0, topK)
      .map((c) => c.chunk);
  }

  augmentPrompt(prompt: string, retrievalQuery = prompt): string {
    const context = this.retrieve(retrievalQuery, 3);
    if (!context.length) return prompt;
    return [
      prompt,
      "",
      "RELEVANT SUSTAINABILITY GUIDELINES:",
      ...context.map((c) => `- ${c}`),
      "",
      "Please consider the above guidelines when formulating your response.",
    ].join("\n");
  }

  getPolicyContext(topic: string): string {
    const found = this.retrieve(topic, 5);
    if (!found.length) return `No specific policies found for '${topic}'`;
    return found.join("\n\n");
  }

  searchPolicies(keyword: string): string[] {
    const k = keyword.toLowerCase();
    return this.chunks.filter((c) => c.toLowerCase().includes(k)).slice(0, 10);
  }
}

export const POLICY_TOPICS = {
  electricity: "electricity efficiency energy consumption",
  water: "water conservation usage efficiency leak",
  combined: "sustainability efficiency conservation",
} as const;
