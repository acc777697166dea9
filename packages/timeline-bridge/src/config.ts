import './envLoader';
import os, { type NetworkInterfaceInfo } from 'node:os';
import type { EventCallbackHost } from '@dlna-bridge/upnp-core';
import { createModuleLogger } from '@dlna-bridge/upnp-core';

const logger = createModuleLogger('config');

/**
 * אובייקט התצורה המרכזי של הגשר.
 * כל ערך ניתן לדריסה במשתנה סביבה שנגזר מהנתיב שלו:
 * server.httpPort -> SERVER_HTTP_PORT
 */
export const defaultConfig = {
  server: {
    httpPort: 32488,
    // ריק = זיהוי אוטומטי מכרטיסי הרשת
    hostIp: '',
  },
  player: {
    product: 'DLNA Timeline Player',
    version: '1',
    platform: 'Linux',
    platformVersion: '1',
  },
  discovery: {
    // כתובת תיאור קבועה, עוקפת את SSDP
    locationUrl: '',
    searchIntervalMs: 30 * 1000,
    bindPort: 1910,
    multicastTtl: 4,
  },
  notify: {
    intervalMs: 500,
  },
  aliases: {
    // "uuid:כינוי,שם:כינוי,ip:כינוי"
    list: '',
  },
  storage: {
    configPath: 'config',
    dataFileName: 'data.json',
  },
};

export type BridgeConfig = typeof defaultConfig;
export type PlayerConfig = BridgeConfig['player'];

type ConfigValue = string | number | boolean;
type ConfigTree = { [key: string]: ConfigValue | ConfigTree };
export type EnvSource = Record<string, string | undefined>;

// פונקציית עזר להמרת camelCase ל-SNAKE_CASE
export const camelToSnakeCase = (str: string) => str.replace(/[A-Z]/g, letter => `_${letter}`).toUpperCase();

function coerce(raw: string, fallback: ConfigValue, envVarName: string): ConfigValue {
  if (typeof fallback === 'number') {
    const value = Number(raw);
    if (raw.trim() === '' || !Number.isFinite(value)) {
      logger.warn(`${envVarName}=${raw} is not a number, keeping ${fallback}`);
      return fallback;
    }
    return value;
  }
  if (typeof fallback === 'boolean') {
    return raw === 'true' || raw === '1';
  }
  return raw;
}

/**
 * @hebrew עובר על עץ התצורה ודורס כל ערך שיש לו משתנה סביבה תואם.
 * הערך מומר לסוג של ערך ברירת המחדל.
 */
function applyOverrides(tree: ConfigTree, source: EnvSource, path: string[] = []): void {
  for (const key of Object.keys(tree)) {
    const newPath = [...path, key];
    const value = tree[key];
    if (typeof value === 'object') {
      applyOverrides(value, source, newPath);
      continue;
    }
    const envVarName = newPath.map(camelToSnakeCase).join('_');
    const raw = source[envVarName];
    if (raw !== undefined) {
      tree[key] = coerce(raw, value, envVarName);
    }
  }
}

/**
 * @hebrew בונה את התצורה מברירות המחדל ומשתני הסביבה.
 * @param source - מקור משתני הסביבה (ברירת מחדל process.env).
 */
export function loadConfig(source: EnvSource = process.env): BridgeConfig {
  const config = structuredClone(defaultConfig);
  applyOverrides(config, source);
  return config;
}

/**
 * @hebrew כתובת ה-IP שההתקנים ישלחו אליה אירועים.
 * server.hostIp אם הוגדר, אחרת כתובת IPv4 הראשונה שאינה פנימית.
 * @returns null אם לא נמצאה כתובת (המנויים לאירועים מושבתים).
 */
export function resolveHostIp(
  config: BridgeConfig,
  interfaces: NodeJS.Dict<NetworkInterfaceInfo[]> = os.networkInterfaces(),
): string | null {
  if (config.server.hostIp) {
    return config.server.hostIp;
  }
  for (const entries of Object.values(interfaces)) {
    const address = entries?.find(entry => entry.family === 'IPv4' && !entry.internal);
    if (address) {
      return address.address;
    }
  }
  logger.warn('No host ip found, event subscription is disabled');
  return null;
}

export function callbackHost(config: BridgeConfig, hostIp: string | null = resolveHostIp(config)): EventCallbackHost {
  return { hostIp, httpPort: config.server.httpPort };
}

export const config = loadConfig();
