import { GoogleGenAI } from "@google/genai";
import { env } from "../env";
import { ConfigurationError } from "../errors";
import { logger } from "../logger";

const log = logger.child({ module: "llm" });

let ai: GoogleGenAI | null = null;

function client() {
  if (!env.GEMINI_API_KEY) {
    throw new ConfigurationError(
      "GEMINI_API_KEY is required to generate insights"
    );
  }
  ai ??= new GoogleGenAI({ apiKey: env.GEMINI_API_KEY });
  return ai;
}

export async function generateText({
  model = env.GEMINI_MODEL,
  prompt,
  systemPrompt,
  maxTokens = env.LLM_MAX_TOKENS,
  temperature = env.LLM_TEMPERATURE,
}: {
  model?: string;
  prompt: string;
  systemPrompt?: string;
  maxTokens?: number;
  temperature?: number;
}): Promise<string> {
  const started = Date.now();
  try {
    const resp = await client().models.generateContent({
      model,
      contents: prompt,
      config: {
        systemInstruction: systemPrompt,
        maxOutputTokens: maxTokens,
        temperature,
        topP: 1,
      },
    });
    log.info({ model, ms: Date.now() - started }, "insight generated");
    return resp.text ?? "";
  } catch (err) {
    log.error({ err, model }, "text generation failed");
    throw err;
  }
}
