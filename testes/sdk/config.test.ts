/**
 * TESTES - Carregamento de configuração
 */

import {
  ArgumentError,
  DEFAULT_BASE_URL,
  MissingParameterError,
  describeConfig,
  loadConfig
} from '../../sdk/src';

describe('loadConfig', () => {
  test('opções explícitas têm precedência sobre o ambiente', () => {
    const config = loadConfig(
      { apiKey: 'explicit-secret', baseUrl: 'https://eu.api.test' },
      { ELEVENLABS_API_KEY: 'env-secret', ELEVENLABS_BASE_URL: 'https://env.api.test' }
    );

    expect(config.apiKey).toBe('explicit-secret');
    expect(config.baseUrl).toBe('https://eu.api.test');
  });

  test('defaults: URL pública, log info, sem timeout', () => {
    const config = loadConfig({}, { ELEVENLABS_API_KEY: 'env-secret' });

    expect(config.baseUrl).toBe(DEFAULT_BASE_URL);
    expect(config.logLevel).toBe('info');
    expect(config.timeout).toBeUndefined();
    expect(config.customHeaders).toEqual({});
  });

  test('nomes de variáveis configuráveis', () => {
    const config = loadConfig(
      { apiKeyEnv: 'VOICE_KEY', baseUrlEnv: 'VOICE_URL' },
      { VOICE_KEY: 'custom-secret', VOICE_URL: 'http://localhost:9000//' }
    );

    expect(config.apiKey).toBe('custom-secret');
    expect(config.baseUrl).toBe('http://localhost:9000');
  });

  test('chave em branco conta como ausente', () => {
    expect(() => loadConfig({ apiKey: '  ' }, {}))
      .toThrow(new MissingParameterError('apiKey', 'apiKey is required: pass it explicitly or set ELEVENLABS_API_KEY'));
  });

  test('ELEVENLABS_LOG_LEVEL e ELEVENLABS_TIMEOUT_MS', () => {
    const config = loadConfig({}, {
      ELEVENLABS_API_KEY: 'env-secret',
      ELEVENLABS_LOG_LEVEL: 'debug',
      ELEVENLABS_TIMEOUT_MS: '1500'
    });

    expect(config.logLevel).toBe('debug');
    expect(config.timeout).toBe(1500);
  });

  test('valores inválidos → ArgumentError', () => {
    expect(() => loadConfig({ apiKey: 'k', baseUrl: 'ftp://files' }, {}))
      .toThrow(new ArgumentError('Invalid base URL: ftp://files'));
    expect(() => loadConfig({ apiKey: 'k', timeout: 0 }, {}))
      .toThrow('Timeout must be a positive number');
    expect(() => loadConfig({}, { ELEVENLABS_API_KEY: 'k', ELEVENLABS_TIMEOUT_MS: 'soon' }))
      .toThrow('Timeout must be a positive number');
    expect(() => loadConfig({}, { ELEVENLABS_API_KEY: 'k', ELEVENLABS_LOG_LEVEL: 'loud' }))
      .toThrow('Invalid log level: loud');
  });

  test('configuração é imutável e describeConfig mascara a chave', () => {
    const config = loadConfig({ apiKey: 'test-secret', customHeaders: { 'x-team': 'voice' } }, {});

    expect(Object.isFrozen(config)).toBe(true);
    expect(describeConfig(config)).toEqual({
      apiKey: '[REDACTED]',
      baseUrl: DEFAULT_BASE_URL,
      timeout: undefined,
      logLevel: 'info',
      customHeaders: ['x-team']
    });
  });
});
