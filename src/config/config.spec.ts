import { loadConfig } from './index';

describe('loadConfig', () => {
  it('falls back to defaults', () => {
    expect(loadConfig({}, '/srv/pantry-finder')).toEqual({
      dataFile: '/srv/pantry-finder/data/pantries.csv',
      geocoder: {
        baseUrl: 'https://nominatim.openstreetmap.org',
        userAgent: 'PantryFinder/1.0 (contact: example@example.com)',
        timeoutMs: 10_000,
        resultLimit: 5,
      },
      ipLocator: {
        url: 'https://ipinfo.io/json',
        timeoutMs: 5_000,
      },
      logLevel: 'warn',
    });
  });

  it('reads overrides from the environment', () => {
    const config = loadConfig(
      {
        PANTRY_DATA_FILE: 'fixtures/pantries.csv',
        GEOCODER_BASE_URL: 'https://nominatim.example.org/',
        GEOCODER_USER_AGENT: 'FoodBankHelpline/2.0 (ops@example.org)',
        GEOCODER_TIMEOUT_MS: '2500',
        GEOCODER_RESULT_LIMIT: '3',
        IP_LOCATOR_TIMEOUT_MS: '1500',
        LOG_LEVEL: 'debug',
      },
      '/srv/pantry-finder'
    );

    expect(config.dataFile).toBe('/srv/pantry-finder/fixtures/pantries.csv');
    expect(config.geocoder).toEqual({
      baseUrl: 'https://nominatim.example.org',
      userAgent: 'FoodBankHelpline/2.0 (ops@example.org)',
      timeoutMs: 2500,
      resultLimit: 3,
    });
    expect(config.ipLocator.timeoutMs).toBe(1500);
    expect(config.logLevel).toBe('debug');
  });

  it('keeps an absolute dataset path', () => {
    expect(loadConfig({ PANTRY_DATA_FILE: '/data/pantries.csv' }, '/srv/pantry-finder').dataFile).toBe(
      '/data/pantries.csv'
    );
  });

  it('rejects invalid values', () => {
    expect(() => loadConfig({ GEOCODER_TIMEOUT_MS: 'soon' })).toThrow(/^Invalid configuration: GEOCODER_TIMEOUT_MS: /);
    expect(() => loadConfig({ LOG_LEVEL: 'loud' })).toThrow(/^Invalid configuration: LOG_LEVEL: /);
    expect(() => loadConfig({ IP_LOCATOR_URL: 'not a url' })).toThrow(/^Invalid configuration: IP_LOCATOR_URL: /);
  });
});
