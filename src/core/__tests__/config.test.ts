import { describe, it, expect } from 'vitest';
import { DEFAULT_ENDPOINT, maskSecret, resolveConfig, validateForServing } from '../config.js';
import { ConfigurationError } from '../../utils/errors.js';

describe('resolveConfig', () => {
  it('fills every section with defaults', () => {
    const config = resolveConfig({}, {});

    expect(config).toEqual({
      upstream: { endpoint: DEFAULT_ENDPOINT, apiKey: '', model: 'deepseek-reasoner' },
      server: { port: 8000, host: '0.0.0.0', allowedOrigins: ['*'] },
      toolLoop: { enabled: true, maxExecutions: 8, executionTimeoutMs: 5000 },
      client: { apiUrl: 'http://localhost:8000/v1/chat/completions' },
      debug: false,
    });
  });

  it('lets the environment override the stored values', () => {
    const config = resolveConfig(
      {
        upstream: { apiKey: 'stored-key', model: 'stored-model' },
        server: { port: 9000 },
        toolLoop: { maxExecutions: 3 },
      },
      {
        DEEPSEEK_API_KEY: 'test-secret',
        DEEPSEEK_BASE_URL: 'https://proxy.test/beta/',
        PORT: '8080',
        ALLOWED_ORIGINS: 'http://a.test, http://b.test',
        RUMINATE_TOOLS: 'off',
        LLM_API_URL: 'http://relay.test/v1/chat/completions',
        RUMINATE_DEBUG: '1',
      }
    );

    expect(config.upstream).toEqual({
      endpoint: 'https://proxy.test/beta/chat/completions',
      apiKey: 'test-secret',
      model: 'stored-model',
    });
    expect(config.server).toEqual({ port: 8080, host: '0.0.0.0', allowedOrigins: ['http://a.test', 'http://b.test'] });
    expect(config.toolLoop).toEqual({ enabled: false, maxExecutions: 3, executionTimeoutMs: 5000 });
    expect(config.client.apiUrl).toBe('http://relay.test/v1/chat/completions');
    expect(config.debug).toBe(true);
  });

  it('ignores empty environment values', () => {
    const config = resolveConfig({ toolLoop: { enabled: false } }, { PORT: '', RUMINATE_TOOLS: '' });

    expect(config.server.port).toBe(8000);
    expect(config.toolLoop.enabled).toBe(false);
  });

  it('rejects a non-numeric port', () => {
    expect(() => resolveConfig({}, { PORT: 'eighty' })).toThrow(ConfigurationError);
    expect(() => resolveConfig({}, { PORT: 'eighty' })).toThrow('PORT must be an integer, got "eighty"');
  });

  it('rejects values outside their schema', () => {
    expect(() => resolveConfig({ upstream: { endpoint: 'not a url' } }, {})).toThrow(/^Invalid configuration: upstream\.endpoint/);
    expect(() => resolveConfig({}, { PORT: '70000' })).toThrow(/server\.port/);
  });
});

describe('validateForServing', () => {
  it('requires an API key', () => {
    expect(() => validateForServing(resolveConfig({}, {}))).toThrow(ConfigurationError);
    expect(() => validateForServing(resolveConfig({}, { DEEPSEEK_API_KEY: 'test-secret' }))).not.toThrow();
  });
});

describe('maskSecret', () => {
  it('hides all but the edges of a key', () => {
    expect(maskSecret('')).toBe('(not set)');
    expect(maskSecret('short')).toBe('****');
    expect(maskSecret('test-secret-value')).toBe('tes…alue');
  });
});
