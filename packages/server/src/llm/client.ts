// ============================================================================
// TutorPath — LLM Client
// Multi-provider completion (Ollama → Anthropic), provider detection,
// one text prompt in, one completion out
// ============================================================================
import type { LlmConfig } from '../config.js';
import { UpstreamUnavailableError, errorMessage } from '../errors.js';

export type ProviderName = 'ollama' | 'anthropic' | 'none';

/** Opaque text-in / text-out model call. */
export interface TextModel {
  complete(prompt: string): Promise<string>;
}

type FetchFn = typeof fetch;

export class LlmClient implements TextModel {
  private ollamaAvailable = false;
  private anthropicAvailable = false;
  private ollamaModel: string;
  private activeProvider: ProviderName = 'none';
  private detection: Promise<void> | null = null;

  constructor(private readonly config: LlmConfig, private readonly fetchFn: FetchFn = fetch) {
    this.ollamaModel = config.ollamaModel;
  }

  // ── Provider Detection ────────────────────────────────────────────────────

  detectProviders(): Promise<void> {
    if (!this.detection) this.detection = this.runDetection();
    return this.detection;
  }

  private async runDetection(): Promise<void> {
    const { provider, anthropicApiKey } = this.config;

    if (provider !== 'anthropic') {
      this.ollamaAvailable = await this.probeOllama();
    }

    this.anthropicAvailable = provider !== 'ollama' && !!anthropicApiKey && anthropicApiKey.length > 10;

    if (this.ollamaAvailable) {
      this.activeProvider = 'ollama';
      console.log(`🤖 LLM: Ollama available, using model: ${this.ollamaModel}`);
    } else if (this.anthropicAvailable) {
      this.activeProvider = 'anthropic';
      console.log(`🤖 LLM: Anthropic API available, using model: ${this.config.anthropicModel}`);
    } else {
      this.activeProvider = 'none';
      console.warn('🤖 LLM: No provider available, tutorials will use fallback content');
    }
  }

  private async probeOllama(): Promise<boolean> {
    try {
      const res = await this.fetchFn(`${this.config.ollamaUrl}/api/tags`, { signal: AbortSignal.timeout(3000) });
      if (!res.ok) return false;
      const data = await res.json() as { models?: Array<{ name?: string }> };
      const models = (data.models ?? []).map(m => m.name).filter((n): n is string => !!n);
      if (models.length === 0) return false;
      // Keep the configured model when pulled, otherwise use whatever is there
      if (!models.some(name => name === this.config.ollamaModel)) {
        const llama = models.find(name => name.includes('llama3'));
        this.ollamaModel = llama ?? models[0];
      }
      return true;
    } catch {
      return false;
    }
  }

  getActiveProvider(): ProviderName {
    return this.activeProvider;
  }

  // ── Completion ────────────────────────────────────────────────────────────

  async complete(prompt: string): Promise<string> {
    await this.detectProviders();

    if (this.activeProvider === 'ollama') {
      try {
        return await this.completeWithOllama(prompt);
      } catch (err) {
        if (!this.anthropicAvailable) {
          throw new UpstreamUnavailableError(`Ollama request failed: ${errorMessage(err)}`, { cause: err });
        }
        console.warn(`🤖 LLM: Ollama failed (${errorMessage(err)}), falling back to Anthropic`);
      }
    }

    if (this.anthropicAvailable) {
      try {
        return await this.completeWithAnthropic(prompt);
      } catch (err) {
        throw new UpstreamUnavailableError(`Anthropic request failed: ${errorMessage(err)}`, { cause: err });
      }
    }

    throw new UpstreamUnavailableError('No LLM provider configured');
  }

  // ── Ollama ────────────────────────────────────────────────────────────────

  private async completeWithOllama(prompt: string): Promise<string> {
    const res = await this.fetchFn(`${this.config.ollamaUrl}/api/generate`, {
      method: 'POST',
      headers: { 'Content-Type': 'application/json' },
      body: JSON.stringify({
        model: this.ollamaModel,
        prompt,
        stream: false,
        options: { temperature: 0.3, num_predict: this.config.maxTokens },
      }),
      signal: AbortSignal.timeout(this.config.timeoutMs),
    });

    if (!res.ok) throw new Error(`Ollama error: ${res.status}`);
    const data = await res.json() as { response?: string };
    if (typeof data.response !== 'string') throw new Error('Ollama returned no text');
    return data.response.trim();
  }

  // ── Anthropic API ─────────────────────────────────────────────────────────

  private async completeWithAnthropic(prompt: string): Promise<string> {
    const apiKey = this.config.anthropicApiKey;
    if (!apiKey) throw new Error('No ANTHROPIC_API_KEY');

    const res = await this.fetchFn(this.config.anthropicUrl, {
      method: 'POST',
      headers: {
        'Content-Type': 'application/json',
        'x-api-key': apiKey,
        'anthropic-version': '2023-06-01',
      },
      body: JSON.stringify({
        model: this.config.anthropicModel,
        max_tokens: this.config.maxTokens,
        messages: [{ role: 'user', content: prompt }],
      }),
      signal: AbortSignal.timeout(this.config.timeoutMs),
    });

    if (!res.ok) throw new Error(`Anthropic error: ${res.status}`);
    const data = await res.json() as { content?: Array<{ type?: string; text?: string }> };
    const text = data.content?.find(block => typeof block.text === 'string')?.text;
    if (text === undefined) throw new Error('Anthropic returned no text');
    return text.trim();
  }
}
