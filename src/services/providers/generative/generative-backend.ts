// src/services/providers/generative/generative-backend.ts: LLM backend for the last-resort tier

import OpenAI from 'openai';
import { GenerationError, errorMessage } from '@/services/errors';

export interface GenerateRequest {
  system: string;
  prompt: string;
  schemaName: string;
  /** JSON schema the output must satisfy; sent to the model as a hint. */
  jsonSchema: object;
  signal?: AbortSignal;
}

export interface GenerativeBackend {
  readonly name: string;
  generate(request: GenerateRequest): Promise<string>;
}

export interface OpenAiBackendOptions {
  apiKey: string;
  model: string;
  maxTokens?: number;
}

export class OpenAiGenerativeBackend implements GenerativeBackend {
  readonly name = 'openai';
  private readonly client: OpenAI;

  constructor(private readonly options: OpenAiBackendOptions) {
    this.client = new OpenAI({ apiKey: options.apiKey });
  }

  async generate(request: GenerateRequest): Promise<string> {
    const schemaHint = JSON.stringify(request.jsonSchema);
    try {
      const res = await this.client.chat.completions.create(
        {
          model: this.options.model,
          messages: [
            { role: 'system', content: request.system },
            {
              role: 'user',
              content: `${request.prompt}\n\nRespond with a single JSON object named "${request.schemaName}" matching this JSON schema:\n${schemaHint}`,
            },
          ],
          response_format: { type: 'json_object' },
          temperature: 0.4,
          max_tokens: this.options.maxTokens ?? 2048,
        },
        { signal: request.signal },
      );
      const content = res.choices[0]?.message?.content ?? '';
      if (!content.trim()) throw new GenerationError('malformed', 'Model returned an empty response');
      return content;
    } catch (err) {
      if (err instanceof GenerationError) throw err;
      throw new GenerationError('backend', `OpenAI request failed: ${errorMessage(err)}`);
    }
  }
}
