import type { LLMProvider, LLMMessage, LLMOptions, LLMResponse } from './types.js';
import { LLMError } from '../errors.js';

type GeminiContent = { role: 'user' | 'model'; parts: Array<{ text: string }> };

/**
 * Google Gemini LLM Provider
 *
 * Supports Gemini models including:
 * - gemini-2.5-flash-lite (fast, cheap)
 * - gemini-2.5-flash (balanced, default)
 * - gemini-2.5-pro (most capable)
 */
export class GoogleProvider implements LLMProvider {
  readonly name = 'google';
  readonly model: string;

  private apiKey: string;
  private baseUrl: string;
  private defaultTemperature: number;

  constructor(
    apiKey: string,
    model: string = 'gemini-2.5-flash',
    defaultTemperature: number = 0.2
  ) {
    this.apiKey = apiKey;
    this.model = model;
    this.defaultTemperature = defaultTemperature;
    this.baseUrl = 'https://generativelanguage.googleapis.com/v1beta';
  }

  async complete(messages: LLMMessage[], options?: LLMOptions): Promise<LLMResponse> {
    // Convert messages to Gemini format
    const contents = this.convertMessages(messages, options?.systemPrompt);

    const requestBody = {
      contents,
      generationConfig: {
        maxOutputTokens: options?.maxTokens ?? 8192,
        temperature: options?.temperature ?? this.defaultTemperature,
        stopSequences: options?.stopSequences,
      },
    };

    const url = `${this.baseUrl}/models/${this.model}:generateContent?key=${this.apiKey}`;

    const startTime = Date.now();
    const response = await fetch(url, {
      method: 'POST',
      headers: {
        'Content-Type': 'application/json',
      },
      body: JSON.stringify(requestBody),
    });

    if (!response.ok) {
      const error = await response.text();
      throw new LLMError(`Gemini API error: ${response.status} ${error}`, response.status);
    }

    const data = await response.json() as {
      candidates?: Array<{ content?: { parts?: Array<{ text?: string }> }; finishReason?: string }>;
      usageMetadata?: { promptTokenCount?: number; candidatesTokenCount?: number };
    };

    // Long answers can come back split across several parts
    const candidate = data.candidates?.[0];
    const content = (candidate?.content?.parts ?? []).map((part) => part.text ?? '').join('');

    const usage = data.usageMetadata
      ? {
          inputTokens: data.usageMetadata.promptTokenCount || 0,
          outputTokens: data.usageMetadata.candidatesTokenCount || 0,
        }
      : undefined;

    console.log(
      `[LLM] ${this.model} (${Date.now() - startTime}ms) ${usage ? `in=${usage.inputTokens} out=${usage.outputTokens}` : ''} → ${candidate?.finishReason || 'unknown'}`
    );

    return {
      content,
      usage,
      model: this.model,
      finishReason: candidate?.finishReason,
    };
  }

  private convertMessages(messages: LLMMessage[], systemPrompt?: string): GeminiContent[] {
    const contents: GeminiContent[] = [];

    const systemMessage = messages.find((m) => m.role === 'system');
    const effectiveSystemPrompt = systemPrompt || systemMessage?.content;

    // Gemini has no system role here, so the system prompt is prepended to the first user turn
    let systemPrepended = false;

    for (const msg of messages) {
      if (msg.role === 'system') {
        continue;
      }

      const role = msg.role === 'user' ? 'user' : 'model';
      let text = msg.content;

      if (!systemPrepended && role === 'user' && effectiveSystemPrompt) {
        text = `${effectiveSystemPrompt}\n\n${text}`;
        systemPrepended = true;
      }

      contents.push({ role, parts: [{ text }] });
    }

    return contents;
  }
}
