import OpenAI from 'openai';
import { GenerationError, errorMessage } from '../errors.js';

export interface CompletionRequest {
  system: string;
  prompt: string;
  maxTokens: number;
  temperature: number;
  topP: number;
}

/** Text-generation backend: instruction and prompt in, free text out. */
export interface GenerationService {
  complete(request: CompletionRequest): Promise<string>;
}

export interface OpenAIServiceConfig {
  apiKey: string;
  model: string;
}

export class OpenAIGenerationService implements GenerationService {
  private client: OpenAI;
  private model: string;

  constructor(config: OpenAIServiceConfig, client?: OpenAI) {
    this.client = client ?? new OpenAI({ apiKey: config.apiKey });
    this.model = config.model;
  }

  async complete(request: CompletionRequest): Promise<string> {
    let response: OpenAI.Chat.Completions.ChatCompletion;
    try {
      response = await this.client.chat.completions.create({
        model: this.model,
        messages: [
          { role: 'system', content: request.system },
          { role: 'user', content: request.prompt },
        ],
        max_tokens: request.maxTokens,
        temperature: request.temperature,
        top_p: request.topP,
      });
    } catch (e) {
      throw new GenerationError(`Completion request failed: ${errorMessage(e)}`, { cause: e });
    }

    const content = response.choices[0]?.message.content;
    if (!content) throw new GenerationError('Completion returned no content');
    return content.trim();
  }
}
