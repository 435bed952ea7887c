import type { StlFormat } from '../types';
import { isStlFormat } from '../stlexporter';

export interface ServerConfig {
  port: number;
  hostname: string;
  dev: boolean;
  downloadName: string; // Filename offered to the browser
  format: StlFormat;
}

export const DEFAULT_PORT = 5000;
export const DEFAULT_DOWNLOAD_NAME = '2pd_wheel.stl';

function parsePort(value: string | undefined): number {
  if (value === undefined || value.trim() === '') return DEFAULT_PORT;
  const port = Number(value);
  if (!Number.isInteger(port) || port < 1 || port > 65535) {
    throw new Error(`Invalid PORT "${value}": expected an integer between 1 and 65535`);
  }
  return port;
}

function parseFormat(value: string | undefined): StlFormat {
  if (value === undefined || value.trim() === '') return 'binary';
  const format = value.trim().toLowerCase();
  // Plain Error: ValidationError is reserved for request input
  if (!isStlFormat(format)) {
    throw new Error(`Invalid STL_FORMAT "${value}": use binary or ascii`);
  }
  return format;
}

function parseDownloadName(value: string | undefined): string {
  if (value === undefined || value.trim() === '') return DEFAULT_DOWNLOAD_NAME;
  const name = value.trim();
  // Ends up inside a quoted Content-Disposition header
  if (!/^[\w.-]+$/.test(name)) {
    throw new Error(`Invalid WHEEL_FILENAME "${value}": use letters, digits, "_", "-" and "."`);
  }
  return name;
}

export function loadConfig(env: Record<string, string | undefined> = process.env): ServerConfig {
  return {
    port: parsePort(env.PORT),
    hostname: env.HOST?.trim() || '0.0.0.0',
    dev: env.NODE_ENV !== 'production',
    downloadName: parseDownloadName(env.WHEEL_FILENAME),
    format: parseFormat(env.STL_FORMAT),
  };
}
