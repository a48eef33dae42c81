import { getAnomalies, type AnalysisResult } from "../analysis/engine";
import type { ElectricityReport, WaterReport } from "../analysis/resources";
import { generateText } from "../llm/gemini-generate";
import { PolicyRetriever, POLICY_TOPICS } from "../policies/retriever";
import {
  SYSTEM_PROMPT,
  anomalyExplanationPrompt,
  combinedPrompt,
  electricityPrompt,
  policyGroundedPrompt,
  waterPrompt,
} from "./prompts";

export async function recommendFromElectricity({
  result,
  policies,
  model,
}: {
  result: AnalysisResult<ElectricityReport>;
  policies?: PolicyRetriever;
  model?: string;
}) {
  const prompt = electricityPrompt(result, getAnomalies(result));
  return await generateText({
    model,
    systemPrompt: SYSTEM_PROMPT,
    prompt: policies
      ? policies.augmentPrompt(prompt, POLICY_TOPICS.electricity)
      : prompt,
  });
}

export async function recommendFromWater({
  result,
  policies,
  model,
}: {
  result: AnalysisResult<WaterReport>;
  policies?: PolicyRetriever;
  model?: string;
}) {
  const prompt = waterPrompt(result, getAnomalies(result));
  return await generateText({
    model,
    systemPrompt: SYSTEM_PROMPT,
    prompt: policies
      ? policies.augmentPrompt(prompt, POLICY_TOPICS.water)
      : prompt,
  });
}

export async function recommendCombined({
  electricity,
  water,
  model,
}: {
  electricity: ElectricityReport;
  water: WaterReport;
  model?: string;
}) {
  return await generateText({
    model,
    systemPrompt: SYSTEM_PROMPT,
    prompt: combinedPrompt(electricity, water),
  });
}

export async function explainAnomaly({
  description,
  context,
  model,
}: {
  description: string;
  context: string;
  model?: string;
}) {
  return await generateText({
    model,
    prompt: anomalyExplanationPrompt(description, context),
  });
}

export async function recommendFromPolicies({
  summary,
  topic,
  policies,
  model,
}: {
  summary: string;
  topic: string;
  policies: PolicyRetriever;
  model?: string;
}) {
  return await generateText({
    model,
    systemPrompt: SYSTEM_PROMPT,
    prompt: policyGroundedPrompt(summary, policies.getPolicyContext(topic)),
  });
}
