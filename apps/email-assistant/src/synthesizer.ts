import { generateObject } from "ai";
import type { CoreMessage, LanguageModel } from "ai";
import { z } from "zod";
import {
  DecisionSynthesizer,
  PreferenceSynthesisError,
  SynthesizeInput,
  namespaceKey
} from "@mailgate/core";
import { toErrorMessage } from "@mailgate/observability";
import { buildMemoryUpdatePrompt, toModelMessages } from "./prompts";

export const preferenceUpdateSchema = z.object({
  chain_of_thought: z.string().describe("Reasoning about which preferences to add or change"),
  user_preferences: z.string().describe("The complete updated preference profile")
});

export type PreferenceUpdate = z.infer<typeof preferenceUpdateSchema>;

export type GeneratePreferenceUpdate = (request: {
  system: string;
  messages: CoreMessage[];
}) => Promise<PreferenceUpdate>;

export function createPreferenceUpdateGenerator(model: LanguageModel, temperature: number): GeneratePreferenceUpdate {
  return async ({ system, messages }) => {
    const { object } = await generateObject({
      model,
      temperature,
      schema: preferenceUpdateSchema,
      system,
      messages
    });
    return object;
  };
}

/** Merges reviewer feedback into a profile through a structured model call. */
export class ModelDecisionSynthesizer implements DecisionSynthesizer {
  constructor(private readonly generate: GeneratePreferenceUpdate) {}

  async synthesize(input: SynthesizeInput): Promise<string> {
    const key = namespaceKey(input.namespace);

    let update: PreferenceUpdate;
    try {
      update = await this.generate({
        system: buildMemoryUpdatePrompt(input.currentProfile),
        messages: toModelMessages(input.feedbackMessages)
      });
    } catch (error) {
      throw new PreferenceSynthesisError(key, `Preference model call failed for ${key}: ${toErrorMessage(error)}`);
    }

    const profile = update.user_preferences.trim();
    if (profile.length === 0) {
      throw new PreferenceSynthesisError(key, `Preference model returned an empty profile for ${key}`);
    }
    return profile;
  }
}
