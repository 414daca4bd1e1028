import { describe, it, expect } from 'vitest';
import { loadConfig } from '../lib/config.js';
import { createProvider } from '../lib/llm.js';

describe('loadConfig', () => {
  it('applies defaults to an empty environment', () => {
    const config = loadConfig({});

    expect(config.port).toBe(3001);
    expect(config.maxUploadBytes).toBe(10 * 1024 * 1024);
    expect(config.ocrFallbackMinChars).toBe(100);
    expect(config.ocrLanguage).toBe('eng');
    expect(config.inferenceTimeoutMs).toBe(180_000);
    expect(config.workerConcurrency).toBe(4);
    expect(config.llm.provider).toBeNull();
    expect(config.llm.zaiApiKey).toBeNull();
    expect(config.supabase).toBeNull();
    expect(config.redisUrl).toBeNull();
    expect(config.allowedOrigins).toEqual([]);
  });

  it('coerces numbers and splits the origin list', () => {
    const config = loadConfig({
      PORT: '8080',
      WORKER_CONCURRENCY: '2',
      ALLOWED_ORIGINS: 'http://localhost:5173, https://app.example.com,',
    });

    expect(config.port).toBe(8080);
    expect(config.workerConcurrency).toBe(2);
    expect(config.allowedOrigins).toEqual(['http://localhost:5173', 'https://app.example.com']);
  });

  it('treats empty strings as unset', () => {
    const config = loadConfig({ PORT: '', ZAI_API_KEY: '  ' });
    expect(config.port).toBe(3001);
    expect(config.llm.zaiApiKey).toBeNull();
  });

  it('enables Supabase only when both URL and key are set', () => {
    expect(loadConfig({ SUPABASE_URL: 'https://db.example.com' }).supabase).toBeNull();
    expect(
      loadConfig({ SUPABASE_URL: 'https://db.example.com', SUPABASE_SERVICE_ROLE_KEY: 'test-secret' }).supabase,
    ).toEqual({ url: 'https://db.example.com', serviceRoleKey: 'test-secret' });
  });

  it('throws on values that fail validation', () => {
    expect(() => loadConfig({ PORT: 'not-a-port' })).toThrow(/^Config: invalid environment \(PORT: /);
    expect(() => loadConfig({ LLM_PROVIDER: 'openai' })).toThrow('Config: invalid environment (LLM_PROVIDER:');
  });
});

describe('createProvider', () => {
  it('prefers Z.AI when its key is present and no provider is named', () => {
    const selection = createProvider(loadConfig({ ZAI_API_KEY: 'test-secret' }).llm);
    expect(selection?.provider.name).toBe('zai');
    expect(selection?.model).toBe('glm-4.7');
  });

  it('uses Anthropic when named', () => {
    const selection = createProvider(
      loadConfig({ LLM_PROVIDER: 'anthropic', ANTHROPIC_API_KEY: 'test-secret', ZAI_API_KEY: 'test-secret' }).llm,
    );
    expect(selection?.provider.name).toBe('anthropic');
    expect(selection?.model).toBe('claude-sonnet-4-5');
  });

  it('returns null when the chosen provider has no key', () => {
    expect(createProvider(loadConfig({}).llm)).toBeNull();
    expect(createProvider(loadConfig({ LLM_PROVIDER: 'zai', ANTHROPIC_API_KEY: 'test-secret' }).llm)).toBeNull();
  });
});
