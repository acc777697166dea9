// שמירת נתונים לכל התקן (כינוי וטוקן) בקובץ JSON
import * as fs from 'node:fs/promises';
import * as path from 'node:path';
import type { NameAliasResolver } from '@dlna-bridge/upnp-core';
import { createModuleLogger } from '@dlna-bridge/upnp-core';

const logger = createModuleLogger('DeviceDataStore');

export interface DeviceRecord {
  alias?: string;
  token?: string;
}

/** המפתח הוא ה-uuid של ההתקן */
export type DeviceData = Record<string, DeviceRecord>;

export interface DeviceDataStoreOptions {
  configPath: string;
  dataFileName: string;
  /** טבלת כינויים קבועה: "key:alias,key:alias", המפתח הוא uuid, שם או ip */
  aliases?: string;
}

export interface AliasEntry {
  key: string;
  alias: string;
}

/**
 * @hebrew מפרק את טבלת הכינויים הקבועה. רשומה בלי נקודתיים מדולגת.
 */
export function parseAliasTable(list: string): AliasEntry[] {
  const entries: AliasEntry[] = [];
  for (const item of list.split(',')) {
    if (!item.trim()) continue;
    const separator = item.indexOf(':');
    if (separator <= 0) {
      logger.warn(`Ignoring alias entry without a key: "${item}"`);
      continue;
    }
    entries.push({ key: item.slice(0, separator).trim(), alias: item.slice(separator + 1).trim() });
  }
  return entries;
}

function readRecord(value: unknown): DeviceRecord | null {
  if (typeof value !== 'object' || value === null || Array.isArray(value)) {
    return null;
  }
  const record: DeviceRecord = {};
  if ('alias' in value && typeof value.alias === 'string') record.alias = value.alias;
  if ('token' in value && typeof value.token === 'string') record.token = value.token;
  return record;
}

function readDeviceData(parsed: unknown): DeviceData {
  const data: DeviceData = {};
  if (typeof parsed !== 'object' || parsed === null || Array.isArray(parsed)) {
    return data;
  }
  for (const [uuid, value] of Object.entries(parsed)) {
    const record = readRecord(value);
    if (record) data[uuid] = record;
  }
  return data;
}

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

/**
 * @hebrew מאגר הנתונים של ההתקנים. קובץ חסר או לא תקין נקרא כמאגר ריק.
 */
export class DeviceDataStore implements NameAliasResolver {
  readonly filePath: string;
  private readonly aliasTable: AliasEntry[];

  constructor(options: DeviceDataStoreOptions) {
    this.filePath = path.join(options.configPath, options.dataFileName);
    this.aliasTable = parseAliasTable(options.aliases ?? '');
  }

  async load(): Promise<DeviceData> {
    let text: string;
    try {
      text = await fs.readFile(this.filePath, 'utf-8');
    } catch (error) {
      if (!isMissingFile(error)) {
        logger.warn(`Cannot read ${this.filePath}, using empty data`, { error });
      }
      return {};
    }
    if (!text.trim()) {
      return {};
    }
    try {
      return readDeviceData(JSON.parse(text));
    } catch (error) {
      logger.warn(`Invalid JSON in ${this.filePath}, using empty data`, { error });
      return {};
    }
  }

  async save(data: DeviceData): Promise<void> {
    await fs.mkdir(path.dirname(this.filePath), { recursive: true });
    await fs.writeFile(this.filePath, JSON.stringify(data, null, 4), 'utf-8');
  }

  private async update(uuid: string, change: (record: DeviceRecord) => void): Promise<void> {
    const data = await this.load();
    const record = data[uuid] ?? {};
    change(record);
    data[uuid] = record;
    await this.save(data);
  }

  /**
   * @hebrew השם שיוצג להתקן: כינוי שמור, אחרת כינוי מהטבלה הקבועה
   * (לפי uuid, שם או ip), אחרת השם המקורי.
   */
  async resolveAlias(uuid: string, name: string, ip: string): Promise<string> {
    const data = await this.load();
    const saved = data[uuid]?.alias;
    if (saved !== undefined) {
      return saved;
    }
    const keys = [uuid.trim(), name.trim(), ip.trim()];
    const entry = this.aliasTable.find(candidate => keys.includes(candidate.key));
    return entry ? entry.alias : name;
  }

  saveAlias(uuid: string, alias: string): Promise<void> {
    return this.update(uuid, record => {
      record.alias = alias;
    });
  }

  async getToken(uuid: string): Promise<string | null> {
    const data = await this.load();
    return data[uuid]?.token ?? null;
  }

  setToken(uuid: string, token: string): Promise<void> {
    return this.update(uuid, record => {
      record.token = token;
    });
  }
}
