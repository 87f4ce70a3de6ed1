/**
 * Config Service
 * 設定管理服務 - 讀取設定檔與環境變數（環境變數優先）
 */

import fs from 'node:fs';
import path from 'node:path';
import os from 'node:os';
import { isRecord } from '../utils/guards.js';
import type { AppConfig, CollectionMode, HarvestSettings } from '../types/config.js';

const DEFAULT_CONFIG_DIR = path.join(os.homedir(), '.config', 'fc-stops');
const DEFAULT_CONFIG_FILE = 'config.json';

export const DEFAULT_SETTINGS: HarvestSettings = {
  requestDelaySec: 0.7,
  geocodeDelaySec: 1.1,
  geocodeEnabled: true,
  userAgent: 'NearestStopsBot/1.0',
  dataDir: 'data',
  fanOutSharedRoutes: false,
  collectionMode: 'pdf-first',
  logLevel: 'info',
};

const LOG_LEVELS = ['debug', 'info', 'warn', 'error'] as const;

type Env = Record<string, string | undefined>;

function parseSeconds(value: string | undefined): number | undefined {
  if (value === undefined || value.trim() === '') return undefined;
  const n = Number(value);
  return Number.isFinite(n) && n >= 0 ? n : undefined;
}

function isCollectionMode(value: unknown): value is CollectionMode {
  return value === 'pdf-first' || value === 'combined';
}

function isLogLevel(value: unknown): value is HarvestSettings['logLevel'] {
  return LOG_LEVELS.some((level) => level === value);
}

/**
 * Keep only well-typed keys from a parsed config file
 */
function sanitize(source: unknown): AppConfig {
  if (!isRecord(source)) {
    return {};
  }
  const config: AppConfig = {};

  if (typeof source.requestDelaySec === 'number') config.requestDelaySec = source.requestDelaySec;
  if (typeof source.geocodeDelaySec === 'number') config.geocodeDelaySec = source.geocodeDelaySec;
  if (typeof source.geocodeEnabled === 'boolean') config.geocodeEnabled = source.geocodeEnabled;
  if (typeof source.userAgent === 'string') config.userAgent = source.userAgent;
  if (typeof source.dataDir === 'string') config.dataDir = source.dataDir;
  if (typeof source.fanOutSharedRoutes === 'boolean') config.fanOutSharedRoutes = source.fanOutSharedRoutes;
  if (isCollectionMode(source.collectionMode)) config.collectionMode = source.collectionMode;
  if (isLogLevel(source.logLevel)) config.logLevel = source.logLevel;

  return config;
}

export class ConfigService {
  private configPath: string;
  private config: AppConfig;
  private env: Env;

  constructor(configPath?: string, env: Env = process.env) {
    this.configPath = configPath || path.join(DEFAULT_CONFIG_DIR, DEFAULT_CONFIG_FILE);
    this.env = env;
    this.config = this.load();
  }

  /**
   * 載入設定檔
   */
  private load(): AppConfig {
    try {
      if (fs.existsSync(this.configPath)) {
        const content = fs.readFileSync(this.configPath, 'utf-8');
        return sanitize(JSON.parse(content));
      }
    } catch {
      // 設定檔損毀時使用空設定
    }
    return {};
  }

  getConfigPath(): string {
    return this.configPath;
  }

  getRequestDelaySec(): number {
    return parseSeconds(this.env.REQUEST_DELAY_SEC)
      ?? this.config.requestDelaySec
      ?? DEFAULT_SETTINGS.requestDelaySec;
  }

  getGeocodeDelaySec(): number {
    return parseSeconds(this.env.GEOCODE_DELAY_SEC)
      ?? this.config.geocodeDelaySec
      ?? DEFAULT_SETTINGS.geocodeDelaySec;
  }

  /**
   * GEOCODE_ENABLED=0 disables; any other value enables
   */
  isGeocodeEnabled(): boolean {
    const envValue = this.env.GEOCODE_ENABLED;
    if (envValue !== undefined && envValue.length > 0) {
      return envValue !== '0';
    }
    return this.config.geocodeEnabled ?? DEFAULT_SETTINGS.geocodeEnabled;
  }

  getUserAgent(): string {
    const envValue = this.env.CRAWLER_UA;
    if (envValue && envValue.length > 0) {
      return envValue;
    }
    return this.config.userAgent ?? DEFAULT_SETTINGS.userAgent;
  }

  getDataDir(): string {
    const envValue = this.env.FC_STOPS_DATA_DIR;
    if (envValue && envValue.length > 0) {
      return envValue;
    }
    return this.config.dataDir ?? DEFAULT_SETTINGS.dataDir;
  }

  isFanOutEnabled(): boolean {
    const envValue = this.env.FAN_OUT_SHARED_ROUTES;
    if (envValue !== undefined && envValue.length > 0) {
      return envValue === '1';
    }
    return this.config.fanOutSharedRoutes ?? DEFAULT_SETTINGS.fanOutSharedRoutes;
  }

  getCollectionMode(): CollectionMode {
    const envValue = this.env.COLLECTION_MODE;
    if (isCollectionMode(envValue)) {
      return envValue;
    }
    return this.config.collectionMode ?? DEFAULT_SETTINGS.collectionMode;
  }

  getLogLevel(): HarvestSettings['logLevel'] {
    const envValue = this.env.LOG_LEVEL;
    if (isLogLevel(envValue)) {
      return envValue;
    }
    return this.config.logLevel ?? DEFAULT_SETTINGS.logLevel;
  }

  /**
   * 取得合併後的完整設定
   */
  getSettings(): HarvestSettings {
    return {
      requestDelaySec: this.getRequestDelaySec(),
      geocodeDelaySec: this.getGeocodeDelaySec(),
      geocodeEnabled: this.isGeocodeEnabled(),
      userAgent: this.getUserAgent(),
      dataDir: this.getDataDir(),
      fanOutSharedRoutes: this.isFanOutEnabled(),
      collectionMode: this.getCollectionMode(),
      logLevel: this.getLogLevel(),
    };
  }
}

// 預設實例
let defaultInstance: ConfigService | null = null;

export function getConfigService(configPath?: string): ConfigService {
  if (!defaultInstance || (configPath && defaultInstance.getConfigPath() !== configPath)) {
    defaultInstance = new ConfigService(configPath);
  }
  return defaultInstance;
}
