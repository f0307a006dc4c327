// core/config.ts
// Runtime configuration from environment variables

import { InputError } from '../types/index.js';

export interface AppConfig {
  port: number;
  host: string;
  gristServer: string;
  filterColumn: string;
  templatesDir: string;
  renderConcurrency: number;
  renderTimeoutMs: number;
  chromiumPath?: string;
  maxBodyBytes: number;
  dataSourceTimeoutMs: number;
}

export const DEFAULT_CONFIG: AppConfig = {
  port: 5000,
  host: '127.0.0.1',
  gristServer: 'https://grist.numerique.gouv.fr',
  filterColumn: 'Pdf_print',
  templatesDir: 'templates_publipostage',
  renderConcurrency: 2,
  renderTimeoutMs: 30000,
  maxBodyBytes: 16 * 1024 * 1024,
  dataSourceTimeoutMs: 60000,
};

function readInt(env: NodeJS.ProcessEnv, name: string, fallback: number, min: number): number {
  const raw = env[name]?.trim();
  if (!raw) return fallback;

  const value = Number(raw);
  if (!Number.isInteger(value) || value < min) {
    throw new InputError(`Invalid ${name}`, `Expected an integer >= ${min}, got "${raw}"`);
  }
  return value;
}

function readString(env: NodeJS.ProcessEnv, name: string, fallback: string): string {
  const raw = env[name]?.trim();
  return raw ? raw : fallback;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const chromiumPath = env.CHROMIUM_PATH?.trim();

  return {
    port: readInt(env, 'PORT', DEFAULT_CONFIG.port, 0),
    host: readString(env, 'HOST', DEFAULT_CONFIG.host),
    gristServer: readString(env, 'GRIST_SERVER', DEFAULT_CONFIG.gristServer),
    filterColumn: readString(env, 'PDF_FILTER_COLUMN', DEFAULT_CONFIG.filterColumn),
    templatesDir: readString(env, 'TEMPLATES_FOLDER', DEFAULT_CONFIG.templatesDir),
    renderConcurrency: readInt(env, 'RENDER_CONCURRENCY', DEFAULT_CONFIG.renderConcurrency, 1),
    renderTimeoutMs: readInt(env, 'RENDER_TIMEOUT_MS', DEFAULT_CONFIG.renderTimeoutMs, 1),
    chromiumPath: chromiumPath || undefined,
    maxBodyBytes: readInt(env, 'MAX_BODY_BYTES', DEFAULT_CONFIG.maxBodyBytes, 1),
    dataSourceTimeoutMs: readInt(env, 'DATA_SOURCE_TIMEOUT_MS', DEFAULT_CONFIG.dataSourceTimeoutMs, 1),
  };
}

/**
 * Parse a numeric CLI flag with the same rules as the environment
 */
export function parseIntOption(name: string, raw: string, min: number): number {
  return readInt({ [name]: raw }, name, min, min);
}
