import { describe, it, expect } from 'vitest';
import { ConfigError, loadConfig } from '../src/config.js';

describe('loadConfig', () => {
  it('applies defaults for an empty environment', () => {
    const config = loadConfig({});
    expect(config.NODE_ENV).toBe('development');
    expect(config.PORT).toBe(3001);
    expect(config.DB_SSL).toBe(false);
    expect(config.DEFAULT_DEPARTMENTS).toEqual(['IT', 'HR', 'Finance']);
    expect(config.DEFAULT_POSITIONS_PER_DEPARTMENT).toBe(3);
  });

  it('trims and de-duplicates the default department list', () => {
    const config = loadConfig({ DEFAULT_DEPARTMENTS: 'IT, HR,IT,, ' });
    expect(config.DEFAULT_DEPARTMENTS).toEqual(['IT', 'HR']);
  });

  it('coerces numbers and booleans', () => {
    const config = loadConfig({ PORT: '8080', DB_SSL: 'true', DEFAULT_POSITIONS_PER_DEPARTMENT: '0' });
    expect(config.PORT).toBe(8080);
    expect(config.DB_SSL).toBe(true);
    expect(config.DEFAULT_POSITIONS_PER_DEPARTMENT).toBe(0);
  });

  it('refuses the development JWT secret in production', () => {
    expect(() => loadConfig({ NODE_ENV: 'production' })).toThrow(ConfigError);
    expect(() => loadConfig({ NODE_ENV: 'production' })).toThrow('JWT_SECRET: JWT_SECRET must be set in production');
    expect(loadConfig({ NODE_ENV: 'production', JWT_SECRET: 'test-secret' }).JWT_SECRET).toBe('test-secret');
  });

  it('reports every invalid field', () => {
    try {
      loadConfig({ PORT: '0', LOG_LEVEL: 'loud' });
      expect.unreachable();
    } catch (err) {
      expect(err).toBeInstanceOf(ConfigError);
      if (err instanceof ConfigError) {
        expect(err.issues.map((i) => i.path.join('.')).sort()).toEqual(['LOG_LEVEL', 'PORT']);
      }
    }
  });
});
