import { describe, it, expect } from 'vitest';
import { ValidationError } from '../wheel/errors';
import { loadConfig, DEFAULT_PORT, DEFAULT_DOWNLOAD_NAME } from './config';

describe('loadConfig', () => {
  it('falls back to defaults', () => {
    expect(DEFAULT_PORT).toBe(5000);
    expect(DEFAULT_DOWNLOAD_NAME).toBe('2pd_wheel.stl');
    expect(loadConfig({})).toEqual({
      port: DEFAULT_PORT,
      hostname: '0.0.0.0',
      dev: true,
      downloadName: DEFAULT_DOWNLOAD_NAME,
      format: 'binary',
    });
  });

  it('reads the environment', () => {
    const config = loadConfig({
      PORT: '8080',
      HOST: '127.0.0.1',
      NODE_ENV: 'production',
      WHEEL_FILENAME: 'wheel.stl',
      STL_FORMAT: 'ascii',
    });
    expect(config).toEqual({
      port: 8080,
      hostname: '127.0.0.1',
      dev: false,
      downloadName: 'wheel.stl',
      format: 'ascii',
    });
  });

  it('treats an empty PORT as unset', () => {
    expect(loadConfig({ PORT: '' }).port).toBe(DEFAULT_PORT);
  });

  it('rejects invalid ports', () => {
    expect(() => loadConfig({ PORT: 'http' })).toThrow('Invalid PORT "http"');
    expect(() => loadConfig({ PORT: '70000' })).toThrow('Invalid PORT');
    expect(() => loadConfig({ PORT: '80.5' })).toThrow('Invalid PORT');
  });

  it('rejects filenames that would break the download header', () => {
    expect(() => loadConfig({ WHEEL_FILENAME: 'my "wheel".stl' })).toThrow('Invalid WHEEL_FILENAME');
  });

  it('normalizes the STL format', () => {
    expect(loadConfig({ STL_FORMAT: ' ASCII ' }).format).toBe('ascii');
  });

  it('rejects unknown STL formats as a settings error', () => {
    expect(() => loadConfig({ STL_FORMAT: 'obj' })).toThrow(
      'Invalid STL_FORMAT "obj": use binary or ascii'
    );
    expect(() => loadConfig({ STL_FORMAT: 'obj' })).not.toThrow(ValidationError);
  });
});
