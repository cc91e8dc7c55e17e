/**
 * Server Configuration Tests
 */

import { describe, it, expect } from 'vitest';
import { DEFAULT_MODEL, loadServerConfig } from '../../../src/server/server-config.js';
import { OrchestratorError } from '../../../src/shared/errors/index.js';

describe('loadServerConfig', () => {
  it('should apply defaults when nothing is configured', () => {
    const config = loadServerConfig([], {});

    expect(config).toEqual({
      host: '127.0.0.1',
      port: 8000,
      transport: 'http',
      headless: true,
      operationTimeoutMs: 60_000,
      taskTimeoutMs: 900_000,
      sessionIdleTtlMs: 1_800_000,
      taskRetentionMs: 3_600_000,
      logLevel: 'info',
      openai: { model: DEFAULT_MODEL },
    });
  });

  it('should read environment variables', () => {
    const config = loadServerConfig([], {
      HOST: '0.0.0.0',
      PORT: '9100',
      OPENAI_API_KEY: 'test-secret',
      OPENAI_BASE_URL: 'http://llm.internal/v1',
      OPENAI_MODEL: 'test-model',
      CHROME_PATH: '/usr/bin/chromium',
      LOG_LEVEL: 'debug',
    });

    expect(config.host).toBe('0.0.0.0');
    expect(config.port).toBe(9100);
    expect(config.executablePath).toBe('/usr/bin/chromium');
    expect(config.logLevel).toBe('debug');
    expect(config.openai).toEqual({
      apiKey: 'test-secret',
      baseURL: 'http://llm.internal/v1',
      model: 'test-model',
    });
  });

  it('should prefer CLI args over environment variables', () => {
    const config = loadServerConfig(['--port', '9200', '--logLevel=warning'], {
      PORT: '9100',
      LOG_LEVEL: 'debug',
    });

    expect(config.port).toBe(9200);
    expect(config.logLevel).toBe('warning');
  });

  it('should treat blank environment variables as unset', () => {
    const config = loadServerConfig([], { PORT: ' ', OPENAI_API_KEY: '' });

    expect(config.port).toBe(8000);
    expect(config.openai.apiKey).toBeUndefined();
  });

  it('should select the stdio transport', () => {
    expect(loadServerConfig(['--transport', 'stdio'], {}).transport).toBe('stdio');
  });

  it('should reject an invalid port', () => {
    expect(() => loadServerConfig(['--port', 'eighty'], {})).toThrow(OrchestratorError);
    expect(() => loadServerConfig([], { PORT: '70000' })).toThrow(/Invalid configuration: port/);
  });

  it('should reject an unknown transport', () => {
    expect(() => loadServerConfig(['--transport', 'grpc'], {})).toThrow(
      /Invalid configuration: transport/
    );
  });

  it('should reject an unknown log level', () => {
    try {
      loadServerConfig([], { LOG_LEVEL: 'verbose' });
      expect.fail('expected loadServerConfig to throw');
    } catch (error) {
      expect(OrchestratorError.isOrchestratorError(error)).toBe(true);
      if (OrchestratorError.isOrchestratorError(error)) {
        expect(error.code).toBe('INVALID_PARAMETERS');
        expect(error.message).toMatch(/^Invalid configuration: logLevel: /);
      }
    }
  });
});
