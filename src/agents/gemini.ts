import { GoogleGenerativeAI } from '@google/generative-ai';
import { AGENT_CONFIG, AGENT_MODELS, type AgentConfig } from './config';
import { withRetry } from '../utils/retry';

export interface GeneratedText {
  text: string;
  finishReason?: string;
  inputTokens?: number;
  outputTokens?: number;
}

/** Anything that turns a prompt into raw model text. */
export interface TextGenerator {
  readonly model: string;
  generate(prompt: string): Promise<GeneratedText>;
}

export function createGeminiGenerator(
  apiKey: string,
  modelName: string = AGENT_MODELS.extraction,
  config: AgentConfig = AGENT_CONFIG
): TextGenerator {
  if (!apiKey) {
    throw new Error('GOOGLE_API_KEY environment variable is not set');
  }
  const model = new GoogleGenerativeAI(apiKey).getGenerativeModel({ model: modelName });

  return {
    model: modelName,
    async generate(prompt: string): Promise<GeneratedText> {
      const result = await withRetry(() =>
        model.generateContent({
          contents: [{ role: 'user', parts: [{ text: prompt }] }],
          generationConfig: {
            maxOutputTokens: config.maxTokens,
            temperature: 0.0,
            responseMimeType: 'application/json',
          },
        })
      );
      const response = result.response;
      return {
        text: response.text(),
        finishReason: response.candidates?.[0]?.finishReason,
        inputTokens: response.usageMetadata?.promptTokenCount,
        outputTokens: response.usageMetadata?.candidatesTokenCount,
      };
    },
  };
}
