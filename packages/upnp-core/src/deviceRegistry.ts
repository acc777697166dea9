import { EventEmitter } from 'node:events';
import type { UpnpDeviceOptions } from './types';
import { createModuleLogger } from './logger';
import { UpnpDevice, type DeviceOwner } from './upnpDevice';

const logger = createModuleLogger('DeviceRegistry');

export type RemovalHandler = (device: UpnpDevice) => Promise<void> | void;
export type RegistryTask = () => Promise<void> | void;

/**
 * @hebrew מחזיק את כל ההתקנים הפעילים ואת תור העבודה היחיד שלהם.
 * הסרת התקן (למשל אחרי שגיאות חיבור חוזרות) נשלחת כהודעה לתור ומתבצעת פעם אחת בלבד.
 *
 * אירועים: 'deviceadded' (device), 'deviceremoved' (device).
 */
export class DeviceRegistry extends EventEmitter implements DeviceOwner {
  private readonly devices: UpnpDevice[] = [];
  private readonly removalHandlers: RemovalHandler[] = [];
  private queue: Promise<void> = Promise.resolve();

  constructor(private readonly deviceOptions: UpnpDeviceOptions = {}) {
    super();
  }

  list(): readonly UpnpDevice[] {
    return this.devices;
  }

  getByUuid(uuid: string): UpnpDevice | undefined {
    return this.devices.find(device => device.uuid === uuid);
  }

  /** כמו getByUuid, אבל מוודא שההתקן טעון */
  async findByUuid(uuid: string): Promise<UpnpDevice | null> {
    const device = this.getByUuid(uuid);
    if (!device) {
      logger.info(`Device uuid not found: ${uuid}`);
      return null;
    }
    await device.getData();
    return device;
  }

  add(device: UpnpDevice): boolean {
    const exists = this.devices.some(existing =>
      existing === device
      || existing.locationUrl === device.locationUrl
      || (device.uuid !== '' && existing.equals(device)));
    if (exists) {
      return false;
    }
    device.owner = this;
    this.devices.push(device);
    this.emit('deviceadded', device);
    return true;
  }

  remove(device: UpnpDevice): boolean {
    const index = this.devices.indexOf(device);
    if (index < 0) {
      return false;
    }
    this.devices.splice(index, 1);
    return true;
  }

  /**
   * @hebrew יוצר התקן מכתובת תיאור, טוען אותו ומוסיף לרשימה.
   * @returns ההתקן (או התקן קיים עם אותו uuid), או null אם התיאור לא תקין או לא נגיש.
   */
  async addFromLocation(locationUrl: string): Promise<UpnpDevice | null> {
    const known = this.devices.find(device => device.locationUrl === locationUrl);
    if (known) {
      return known;
    }
    const device = new UpnpDevice(locationUrl, this.deviceOptions);
    try {
      await device.getData();
    } catch (error) {
      logger.warn(`Ignoring device at ${locationUrl}`, { error });
      return null;
    }
    const sameDevice = this.getByUuid(device.uuid);
    if (sameDevice) {
      return sameDevice;
    }
    this.add(device);
    return device;
  }

  /** טוען את כל ההתקנים במקביל */
  async loadAll(): Promise<void> {
    await Promise.all(this.devices.map(device => device.getData()));
  }

  onRemoval(handler: RemovalHandler): void {
    this.removalHandlers.push(handler);
  }

  /**
   * @hebrew מוסיף משימה לתור העבודה. המשימות רצות אחת אחרי השנייה;
   * שגיאה במשימה נרשמת ללוג ולא עוצרת את התור.
   */
  post(task: RegistryTask): Promise<void> {
    this.queue = this.queue
      .then(task)
      .catch((error: unknown) => {
        logger.error('Registry task failed', { error });
      });
    return this.queue;
  }

  /** מחכה עד שהתור מתרוקן, כולל משימות שנוספו בזמן ההמתנה */
  async drain(): Promise<void> {
    let current: Promise<void>;
    do {
      current = this.queue;
      await current;
    } while (current !== this.queue);
  }

  requestRemoval(device: UpnpDevice): void {
    void this.post(() => this.removeDevice(device));
  }

  private async removeDevice(device: UpnpDevice): Promise<void> {
    if (!this.remove(device)) {
      return;
    }
    logger.warn(`Removed device ${device.name} (${device.uuid})`);
    device.stopAllSubscriptions();
    for (const handler of this.removalHandlers) {
      try {
        await handler(device);
      } catch (error) {
        logger.error(`Removal handler failed for ${device.name}`, { error });
      }
    }
    this.emit('deviceremoved', device);
  }
}
