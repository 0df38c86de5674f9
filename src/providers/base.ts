import { completeSimple, getModels, getProviders } from '@mariozechner/pi-ai';
import type { Api, KnownProvider, Model, SimpleStreamOptions } from '@mariozechner/pi-ai';
import type { GenerationContext, TextGenerator } from '../types.js';
import { withTimeout } from '../timeout.js';

export interface ProviderConfig {
  /** pi-ai provider key, e.g. "openai", "anthropic", "google", "groq" */
  provider: string;
  model: string;
  baseUrl?: string;
  /** Env var holding the API key; defaults to <PROVIDER>_API_KEY */
  apiKeyEnv?: string;
  /** Per-call timeout in seconds (default 120) */
  timeout?: number;
}

// ============================================================================
// Pi-ai model resolution
// ============================================================================

export function resolveKnownProvider(provider: string): KnownProvider | undefined {
  return getProviders().find((p) => p === provider);
}

/** Providers served through an OpenAI-compatible chat completions endpoint. */
const OPENAI_COMPATIBLE: Record<string, string> = {
  ollama: 'http://localhost:11434/v1',
  custom: '',
};

function isOpenAICompatible(provider: string): boolean {
  return Object.prototype.hasOwnProperty.call(OPENAI_COMPATIBLE, provider);
}

/**
 * Map our config to a pi-ai Model descriptor. Models missing from pi-ai's
 * registry borrow the provider's first registered model as a template.
 * Local providers (ollama, custom) ride on the OpenAI completions API.
 */
export function resolveModel(config: ProviderConfig): Model<Api> {
  if (isOpenAICompatible(config.provider)) {
    const template: Model<Api> | undefined = getModels('openai')[0];
    if (!template) throw new Error('pi-ai has no OpenAI model to use as a template');
    const baseUrl = config.baseUrl || OPENAI_COMPATIBLE[config.provider];
    if (!baseUrl) throw new Error(`Provider "${config.provider}" needs a baseUrl`);
    return {
      ...template,
      id: config.model,
      name: config.model,
      api: 'openai-completions',
      provider: 'openai',
      baseUrl,
    };
  }

  const provider = resolveKnownProvider(config.provider);
  if (!provider) {
    throw new Error(
      `Unknown provider "${config.provider}". Known providers: ${[...getProviders(), ...Object.keys(OPENAI_COMPATIBLE)].join(', ')}`,
    );
  }
  const models: Model<Api>[] = getModels(provider);
  const registered = models.find((m) => m.id === config.model);
  if (registered) {
    return { ...registered, baseUrl: config.baseUrl || registered.baseUrl };
  }
  const template = models[0];
  if (!template) {
    throw new Error(`Provider "${config.provider}" has no registered models to derive "${config.model}" from`);
  }
  return {
    ...template,
    id: config.model,
    name: config.model,
    baseUrl: config.baseUrl || template.baseUrl,
  };
}

/**
 * Priority: configured env var → <PROVIDER>_API_KEY → placeholder for local
 * endpoints → empty.
 */
export function resolveApiKey(config: ProviderConfig, env: NodeJS.ProcessEnv = process.env): string {
  if (config.apiKeyEnv && env[config.apiKeyEnv]) return env[config.apiKeyEnv] ?? '';
  const conventional = env[`${config.provider.toUpperCase().replace(/-/g, '_')}_API_KEY`];
  if (conventional) return conventional;
  // Local servers ignore the key but the OpenAI client insists on one
  return isOpenAICompatible(config.provider) ? 'ollama' : '';
}

// ============================================================================
// Generator creation
// ============================================================================

/**
 * Build a TextGenerator backed by pi-ai. `initialize` resolves the model and
 * credentials; nothing is fetched until the first `generate`.
 */
export function createGenerator(config: ProviderConfig, label = `${config.provider}/${config.model}`): TextGenerator {
  let model: Model<Api> | null = null;
  let apiKey = '';
  const timeoutMs = (config.timeout ?? 120) * 1000;

  const extractText = (result: {
    errorMessage?: string;
    content: ReadonlyArray<{ type: string; text?: string }>;
  }): string => {
    if (result.errorMessage) {
      throw new Error(`${label}: ${result.errorMessage.slice(0, 200)}`);
    }
    for (const block of result.content) {
      if (block.type === 'text' && block.text) return block.text;
    }
    return '';
  };

  return {
    name: label,
    async initialize() {
      model = resolveModel(config);
      apiKey = resolveApiKey(config);
      return true;
    },
    async generate(prompt: string, context: GenerationContext) {
      if (!model) {
        throw new Error(`${label} used before initialize()`);
      }
      const opts: SimpleStreamOptions = {
        apiKey,
        maxTokens: context.maxTokens ?? 512,
        temperature: context.temperature,
      };
      const result = await withTimeout(
        completeSimple(
          model,
          {
            systemPrompt: context.systemPrompt,
            messages: [{ role: 'user', content: prompt, timestamp: Date.now() }],
          },
          opts,
        ),
        timeoutMs,
        label,
      );
      return extractText(result).trim();
    },
    async cleanup() {
      model = null;
      apiKey = '';
      return true;
    },
  };
}
