import { beforeEach, describe, expect, it, vi } from "vitest";
import { generateText } from "../../src/llm/gemini-generate";

const mocks = vi.hoisted(() => ({
  generateContent: vi.fn(),
  created: vi.fn(),
}));

vi.mock("@google/genai", () => ({
  GoogleGenAI: class {
    models = { generateContent: mocks.generateContent };
    constructor(options: unknown) {
      mocks.created(options);
    }
  },
}));

vi.mock("../../src/env", async (importOriginal) => {
  const actual = await importOriginal<typeof import("../../src/env")>();
  return { env: { ...actual.env, GEMINI_API_KEY: "test-key" } };
});

beforeEach(() => {
  mocks.generateContent.mockReset();
});

describe("generateText", () => {
  it("sends the prompt with the generation settings", async () => {
    mocks.generateContent.mockResolvedValue({
      text: "Turn off hallway lighting.",
    });
    const text = await generateText({
      model: "test-model",
      prompt: "p",
      systemPrompt: "s",
      maxTokens: 64,
      temperature: 0.2,
    });

    expect(text).toBe("Turn off hallway lighting.");
    expect(mocks.created).toHaveBeenCalledWith({ apiKey: "test-key" });
    expect(mocks.generateContent).toHaveBeenCalledWith({
      model: "test-model",
      contents: "p",
      config: {
        systemInstruction: "s",
        maxOutputTokens: 64,
        temperature: 0.2,
        topP: 1,
      },
    });
  });

  it("reuses one client", async () => {
    mocks.generateContent.mockResolvedValue({ text: "ok" });
    await generateText({ prompt: "a" });
    await generateText({ prompt: "b" });
    expect(mocks.created).toHaveBeenCalledTimes(1);
  });

  it("returns an empty string when the model sends no text", async () => {
    mocks.generateContent.mockResolvedValue({ text: undefined });
    expect(await generateText({ prompt: "p" })).toBe("");
  });

  it("propagates client failures", async () => {
    mocks.generateContent.mockRejectedValue(new Error("quota exceeded"));
    await expect(generateText({ prompt: "p" })).rejects.toThrow(
      "quota exceeded"
    );
  });
});
