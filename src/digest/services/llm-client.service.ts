import { Inject, Injectable, Logger } from '@nestjs/common';
import { DIGEST_CONFIG, DigestConfig } from '../config/digest.config';
import { stripMarkup } from '../utils/text.util';

const RETRYABLE_STATUS = new Set([429, 500, 502, 503, 504]);

@Injectable()
export class LlmClientService {
  private readonly logger = new Logger(LlmClientService.name);
  private readonly unavailableLogged = new Set<string>();

  constructor(@Inject(DIGEST_CONFIG) private readonly config: DigestConfig) {}

  /**
   * Chat completion against an OpenAI-compatible endpoint. Resolves to `null`
   * when no key is configured or no usable text came back.
   */
  async generateText(
    systemPrompt: string,
    userPrompt: string,
  ): Promise<string | null> {
    const { apiKey, baseUrl, model, maxRetries, timeoutMs, temperature } =
      this.config.narrator;
    if (!apiKey) {
      this.logUnavailable('OPENAI_API_KEY not set');
      return null;
    }

    const payload = {
      model,
      messages: [
        { role: 'system', content: systemPrompt },
        { role: 'user', content: userPrompt },
      ],
      temperature,
    };

    for (let attempt = 1; attempt <= maxRetries + 1; attempt += 1) {
      const response = await this.safeFetchJson(
        `${baseUrl.replace(/\/+$/, '')}/chat/completions`,
        {
          method: 'POST',
          headers: {
            Authorization: `Bearer ${apiKey}`,
            'Content-Type': 'application/json',
          },
          body: JSON.stringify(payload),
          timeoutMs,
        },
      );

      if (!response.ok) {
        if (RETRYABLE_STATUS.has(response.status) && attempt <= maxRetries) {
          await this.sleep(1200 * 2 ** (attempt - 1));
          continue;
        }
        this.logUnavailable(
          'openai_generate_failed',
          `${response.status} ${response.raw.slice(0, 180)}`,
        );
        return null;
      }

      const text = this.extractChoiceText(response.json);
      if (text) {
        return text;
      }
    }

    this.logUnavailable('openai_empty_response');
    return null;
  }

  private extractChoiceText(json: Record<string, unknown> | null): string {
    const choices: unknown = json?.choices;
    const first = this.asRecord(Array.isArray(choices) ? choices[0] : null);
    const message = this.asRecord(first?.message);
    return typeof message?.content === 'string' ? message.content.trim() : '';
  }

  private asRecord(value: unknown): Record<string, unknown> | null {
    if (!value || typeof value !== 'object' || Array.isArray(value)) {
      return null;
    }
    return value as Record<string, unknown>;
  }

  private async safeFetchJson(
    url: string,
    params: {
      method: 'POST' | 'GET';
      headers: Record<string, string>;
      body?: string;
      timeoutMs: number;
    },
  ): Promise<{
    ok: boolean;
    status: number;
    raw: string;
    json: Record<string, unknown> | null;
  }> {
    const controller = new AbortController();
    const timeout = setTimeout(() => controller.abort(), params.timeoutMs);

    try {
      const res = await fetch(url, {
        method: params.method,
        headers: params.headers,
        body: params.body,
        signal: controller.signal,
      });
      const raw = await res.text();
      let json: Record<string, unknown> | null = null;
      try {
        json = this.asRecord(JSON.parse(raw));
      } catch {
        json = null;
      }
      return {
        ok: res.ok,
        status: res.status,
        raw,
        json,
      };
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      return {
        ok: false,
        status: 0,
        raw: message,
        json: null,
      };
    } finally {
      clearTimeout(timeout);
    }
  }

  private logUnavailable(reason: string, detail?: string): void {
    if (this.unavailableLogged.has(reason)) {
      return;
    }
    this.unavailableLogged.add(reason);
    const detailText = stripMarkup(detail || '');
    if (detailText) {
      this.logger.warn(`narrator unavailable: ${reason} (${detailText})`);
      return;
    }
    this.logger.warn(`narrator unavailable: ${reason}`);
  }

  private async sleep(ms: number): Promise<void> {
    await new Promise((resolve) => {
      setTimeout(resolve, ms);
    });
  }
}
