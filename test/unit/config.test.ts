import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { ConfigSchema, loadConfig, getConfig, reloadConfig, resetConfig } from '../../src/config.js';

describe('Config', () => {
  const originalEnv = { ...process.env };

  beforeEach(() => {
    resetConfig();
  });

  afterEach(() => {
    process.env = { ...originalEnv };
    resetConfig();
  });

  describe('ConfigSchema', () => {
    it('should provide default values when no input given', () => {
      const config = ConfigSchema.parse({});
      expect(config.agentName).toBe('architect');
      expect(config.host).toBe('localhost');
      expect(config.port).toBeUndefined();
      expect(config.model).toBeUndefined();
      expect(config.apiKey).toBeUndefined();
      expect(config.requestTimeoutMs).toBe(300000);
      expect(config.maxIterations).toBe(5);
      expect(config.maxRetries).toBe(3);
      expect(config.retryBaseMs).toBe(1000);
      expect(config.temperature).toBe(0.7);
      expect(config.maxTokens).toBe(2048);
      expect(config.stream).toBe(false);
      expect(config.toolsDir).toBe('tools');
      expect(config.logLevel).toBe('info');
    });

    it('should reject invalid port numbers', () => {
      expect(() => ConfigSchema.parse({ port: 0 })).toThrow();
      expect(() => ConfigSchema.parse({ port: 65536 })).toThrow();
    });

    it('should reject temperatures outside 0-2', () => {
      expect(() => ConfigSchema.parse({ temperature: -0.1 })).toThrow();
      expect(() => ConfigSchema.parse({ temperature: 2.5 })).toThrow();
      expect(ConfigSchema.parse({ temperature: 2 }).temperature).toBe(2);
    });

    it('should require at least one iteration and one attempt', () => {
      expect(() => ConfigSchema.parse({ maxIterations: 0 })).toThrow();
      expect(() => ConfigSchema.parse({ maxRetries: 0 })).toThrow();
    });

    it('should reject unknown log levels', () => {
      expect(() => ConfigSchema.parse({ logLevel: 'verbose' })).toThrow();
    });
  });

  describe('loadConfig', () => {
    it('should read AGENT_* variables', () => {
      const config = loadConfig({
        AGENT_NAME: 'po',
        AGENT_HOST: 'gpu-box',
        AGENT_PORT: '9002',
        AGENT_MODEL: 'po-large',
        AGENT_API_KEY: 'test-secret',
        AGENT_REQUEST_TIMEOUT_MS: '1500',
        AGENT_MAX_ITERATIONS: '8',
        AGENT_MAX_RETRIES: '2',
        AGENT_RETRY_BASE_MS: '250',
        AGENT_TEMPERATURE: '0.2',
        AGENT_MAX_TOKENS: '512',
        AGENT_STREAM: 'true',
        AGENT_TOOLS_DIR: '/etc/agent-tools',
        AGENT_LOG_LEVEL: 'debug',
      });

      expect(config).toEqual({
        agentName: 'po',
        host: 'gpu-box',
        port: 9002,
        model: 'po-large',
        apiKey: 'test-secret',
        requestTimeoutMs: 1500,
        maxIterations: 8,
        maxRetries: 2,
        retryBaseMs: 250,
        temperature: 0.2,
        maxTokens: 512,
        stream: true,
        toolsDir: '/etc/agent-tools',
        logLevel: 'debug',
      });
    });

    it('should fall back to defaults for empty and non-numeric values', () => {
      const config = loadConfig({ AGENT_PORT: 'abc', AGENT_HOST: '', AGENT_MAX_TOKENS: '' });
      expect(config.port).toBeUndefined();
      expect(config.host).toBe('localhost');
      expect(config.maxTokens).toBe(2048);
    });

    it('should accept 1 as true for AGENT_STREAM', () => {
      expect(loadConfig({ AGENT_STREAM: '1' }).stream).toBe(true);
      expect(loadConfig({ AGENT_STREAM: 'no' }).stream).toBe(false);
    });

    it('should throw on out-of-range values', () => {
      expect(() => loadConfig({ AGENT_PORT: '70000' })).toThrow();
    });
  });

  describe('singleton helpers', () => {
    it('should cache the config until reloaded', () => {
      process.env['AGENT_NAME'] = 'dev';
      const first = getConfig();
      process.env['AGENT_NAME'] = 'po';

      expect(getConfig()).toBe(first);
      expect(getConfig().agentName).toBe('dev');
      expect(reloadConfig().agentName).toBe('po');
    });

    it('should reload after reset', () => {
      process.env['AGENT_MAX_RETRIES'] = '4';
      expect(getConfig().maxRetries).toBe(4);
      resetConfig();
      delete process.env['AGENT_MAX_RETRIES'];
      expect(getConfig().maxRetries).toBe(3);
    });
  });
});
