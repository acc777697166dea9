import type { HttpClient, RemovalHandler, UpnpDevice } from '@dlna-bridge/upnp-core';
import { createModuleLogger, defaultHttpClient, delay } from '@dlna-bridge/upnp-core';
import type { AdapterDirectory, PlaybackState } from './adapter';
import { serverReportHeaders, subscriberPushHeaders, type PlayerInfo } from './headers';
import { Subscriber, type SubscriberOwner } from './subscriber';
import { DISCONNECTED_SNAPSHOT, STOPPED_SNAPSHOT, type TimelineSnapshot } from './timeline';

const logger = createModuleLogger('SubscribeManager');

export const DEFAULT_NOTIFY_INTERVAL_MS = 500;
/** ההמתנה לאירוע מההתקנים מוגבלת לפי כמה מרווחי הודעה */
export const WAIT_INTERVALS = 10;

/** החלק של DeviceRegistry שהמנהל צריך */
export interface DeviceDirectory {
  list(): readonly UpnpDevice[];
  getByUuid(uuid: string): UpnpDevice | undefined;
  onRemoval(handler: RemovalHandler): void;
}

export interface SubscribeManagerOptions {
  devices: DeviceDirectory;
  adapters: AdapterDirectory;
  player: PlayerInfo;
  notifyIntervalMs?: number;
  http?: HttpClient;
}

/**
 * @hebrew מנהל את הבקרים שנרשמו לכל התקן, שולח להם Timeline
 * ומדווח לשרת המדיה על התקדמות הניגון.
 *
 * הלולאה הראשית (start) ישנה מרווח קבוע, מחכה לשינוי באחד ההתקנים
 * שיש להם מנויים (עד WAIT_INTERVALS מרווחים) ואז שולחת לכולם.
 */
export class SubscribeManager implements SubscriberOwner {
  private readonly subscribers = new Map<string, Subscriber[]>();
  private readonly lastServerNotifyState = new Map<string, PlaybackState>();
  private readonly devices: DeviceDirectory;
  private readonly adapters: AdapterDirectory;
  private readonly player: PlayerInfo;
  private readonly http: HttpClient;
  readonly notifyIntervalMs: number;

  private running = false;
  private wakeController: AbortController | null = null;
  private waitController: AbortController | null = null;
  private loop: Promise<void> | null = null;

  constructor(options: SubscribeManagerOptions) {
    this.devices = options.devices;
    this.adapters = options.adapters;
    this.player = options.player;
    this.http = options.http ?? defaultHttpClient;
    this.notifyIntervalMs = options.notifyIntervalMs ?? DEFAULT_NOTIFY_INTERVAL_MS;
    this.devices.onRemoval(device => this.handleDeviceRemoved(device));
  }

  get isRunning(): boolean {
    return this.running;
  }

  subscribersOf(targetUuid: string): readonly Subscriber[] {
    return this.subscribers.get(targetUuid) ?? [];
  }

  getSubscriber(targetUuid: string, clientUuid: string): Subscriber | null {
    return this.subscribersOf(targetUuid).find(subscriber => subscriber.uuid === clientUuid) ?? null;
  }

  updateCommandId(targetUuid: string, clientUuid: string, commandId: number): boolean {
    const subscriber = this.getSubscriber(targetUuid, clientUuid);
    if (!subscriber) {
      return false;
    }
    subscriber.commandId = commandId;
    return true;
  }

  /**
   * @hebrew רושם בקר להתקן. רישום חוזר עם אותה כתובת רק מעדכן את ה-commandID;
   * רישום עם כתובת אחרת מחליף את המנוי הקיים.
   * המנוי הראשון של התקן מפעיל את לולאת חידוש המנוי לאירועי ההתקן.
   */
  addSubscriber(
    targetUuid: string,
    clientUuid: string,
    host: string,
    port: number,
    protocol: string = 'http',
    commandId: number = 0,
  ): Subscriber {
    logger.info(`Add subscriber ${clientUuid} for ${targetUuid} at ${protocol}://${host}:${port} (command ${commandId})`);
    const list = this.subscribers.get(targetUuid) ?? [];
    const index = list.findIndex(subscriber => subscriber.uuid === clientUuid);
    const existing = index >= 0 ? list[index] : undefined;
    if (existing && existing.matches(host, port, protocol)) {
      existing.commandId = commandId;
      return existing;
    }

    const subscriber = new Subscriber(clientUuid, host, port, this, protocol, commandId, this.http);
    if (index >= 0) {
      list[index] = subscriber;
    } else {
      list.push(subscriber);
    }
    const isFirst = !this.subscribers.has(targetUuid);
    this.subscribers.set(targetUuid, list);
    if (isFirst) {
      this.startDeviceSubscription(targetUuid);
    }
    return subscriber;
  }

  private startDeviceSubscription(targetUuid: string): void {
    const device = this.devices.getByUuid(targetUuid);
    if (!device) {
      return;
    }
    void device.loopSubscribe().catch((error: unknown) => {
      logger.error(`Event subscription loop failed for ${device.name}`, { error });
    });
  }

  /**
   * @hebrew מסיר בקר מהתקן אחד, או מכל ההתקנים אם לא צוין התקן.
   * כשלהתקן לא נשארו מנויים, לולאת חידוש המנוי שלו נעצרת.
   * @returns true אם הוסר מנוי כלשהו.
   */
  removeSubscriber(clientUuid: string, targetUuid?: string): boolean {
    logger.info(`Remove subscriber ${clientUuid}${targetUuid ? ` from ${targetUuid}` : ''}`);
    const targets = targetUuid !== undefined ? [targetUuid] : [...this.subscribers.keys()];
    let removed = false;
    for (const uuid of targets) {
      const list = this.subscribers.get(uuid);
      if (!list) continue;
      const index = list.findIndex(subscriber => subscriber.uuid === clientUuid);
      if (index < 0) continue;
      list.splice(index, 1);
      removed = true;
      if (list.length === 0) {
        this.subscribers.delete(uuid);
        this.devices.getByUuid(uuid)?.stopSubscribe();
      }
    }
    return removed;
  }

  /**
   * @hebrew מדווח לשרת המדיה על מצב הניגון בהתקן.
   * מדלג אם אין מנויים (אלא אם force), אין תור או שרת, ההודעות מושתקות,
   * או שהמצב נשאר stopped מאז הדיווח הקודם.
   * @returns true אם נשלח דיווח והשרת קיבל אותו.
   */
  async notifyServerDevice(device: UpnpDevice, force: boolean = false): Promise<boolean> {
    if (this.subscribersOf(device.uuid).length === 0 && !force) {
      return false;
    }
    const adapter = this.adapters.adapterFor(device);
    const mediaServer = adapter.mediaServer;
    if (!mediaServer || !adapter.queue) {
      return false;
    }
    if (adapter.noNotice && !force) {
      logger.info(`Ignore server notice for ${device.name}`);
      return false;
    }
    const state = adapter.playbackState;
    if (state === null) {
      return false;
    }
    if (!force && state === 'stopped' && this.lastServerNotifyState.get(device.uuid) === 'stopped') {
      return false;
    }
    this.lastServerNotifyState.set(device.uuid, state);

    const params = await adapter.getServerState();
    if (!params || params.state === undefined) {
      return false;
    }
    try {
      await this.http.get(mediaServer.timelineUrl(), {
        params,
        headers: serverReportHeaders(device, this.player),
      });
      return true;
    } catch (error) {
      logger.warn(`Notify server error for ${device.name}`, { error, params });
      return false;
    }
  }

  async notifyServer(): Promise<void> {
    await Promise.all(this.devices.list().map(device => this.notifyServerDevice(device)));
  }

  /**
   * @hebrew ה-Timeline של ההתקן כרגע.
   * @returns null אם ההודעות להתקן מושתקות.
   */
  async msgForDevice(device: UpnpDevice): Promise<TimelineSnapshot | null> {
    const adapter = this.adapters.adapterFor(device);
    if (adapter.noNotice) {
      return null;
    }
    if (adapter.transportState === null || adapter.transportState === 'STOPPED' || !adapter.queue) {
      return STOPPED_SNAPSHOT;
    }
    const parameters = await adapter.getTimelineState();
    if (!parameters || parameters.state === undefined) {
      return STOPPED_SNAPSHOT;
    }
    logger.debug(`Notify ${device.uuid}`, { parameters });
    return { kind: 'playing', parameters: { ...parameters, itemType: 'music' } };
  }

  /** שולח את ה-Timeline של ההתקן לכל המנויים שלו במקביל */
  async notifyDevice(device: UpnpDevice): Promise<void> {
    const subscribers = [...this.subscribersOf(device.uuid)];
    if (subscribers.length === 0) {
      return;
    }
    const snapshot = await this.msgForDevice(device);
    if (snapshot === null) {
      logger.info(`Ignore subscriber notice for ${device.name}`);
      return;
    }
    const headers = subscriberPushHeaders(device, this.player);
    await Promise.all(subscribers.map(subscriber => subscriber.send(snapshot, headers)));
  }

  /** שולח Timeline עם disconnected="1" ומסיר את כל המנויים של ההתקן */
  async notifyDeviceDisconnected(device: UpnpDevice): Promise<void> {
    const subscribers = [...this.subscribersOf(device.uuid)];
    const headers = subscriberPushHeaders(device, this.player);
    await Promise.all(subscribers.map(subscriber => subscriber.send(DISCONNECTED_SNAPSHOT, headers)));
    for (const subscriber of subscribers) {
      this.removeSubscriber(subscriber.uuid, device.uuid);
    }
  }

  async notify(): Promise<void> {
    await this.notifyServer();
    await Promise.all(this.devices.list().map(device => this.notifyDevice(device)));
  }

  private async handleDeviceRemoved(device: UpnpDevice): Promise<void> {
    const adapter = this.adapters.adapterFor(device);
    adapter.markDisconnected();
    await this.notifyDeviceDisconnected(device);
    await this.notifyServerDevice(device, true);
    adapter.queue = null;
    this.adapters.removeAdapter(adapter);
    this.subscribers.delete(device.uuid);
    this.lastServerNotifyState.delete(device.uuid);
  }

  /** ההתקנים שיש להם מנויים. התקנים שכבר לא ברשימה נמחקים מהמנויים */
  private targetDevices(): UpnpDevice[] {
    const targets: UpnpDevice[] = [];
    for (const [uuid, list] of this.subscribers) {
      if (list.length === 0) continue;
      const device = this.devices.getByUuid(uuid);
      if (device) {
        targets.push(device);
      } else {
        logger.info(`Dropping subscribers of unknown device ${uuid}`);
        this.subscribers.delete(uuid);
        this.lastServerNotifyState.delete(uuid);
      }
    }
    return targets;
  }

  /**
   * @hebrew מחכה לאירוע הראשון מאחד ההתקנים, עד timeoutMs.
   * שגיאה מהמתאם מסיימת את ההמתנה כמו אירוע.
   */
  private async waitForFirstEvent(targets: UpnpDevice[], timeoutMs: number): Promise<void> {
    const timer = new AbortController();
    this.waitController = timer;
    const waits = targets.map(device =>
      this.adapters.adapterFor(device).waitForEvent(timeoutMs).catch((error: unknown) => {
        logger.debug(`Wait for event failed for ${device.name}`, { error });
      }));
    try {
      await Promise.race([...waits, delay(timeoutMs, timer.signal)]);
    } finally {
      timer.abort();
      if (this.waitController === timer) {
        this.waitController = null;
      }
    }
  }

  /**
   * @hebrew סבב אחד של הלולאה הראשית, אחרי השינה.
   * @returns false אם אין התקנים עם מנויים (הסבב דולג).
   */
  async runCycle(): Promise<boolean> {
    const targets = this.targetDevices();
    if (targets.length === 0) {
      return false;
    }
    await this.waitForFirstEvent(targets, this.notifyIntervalMs * WAIT_INTERVALS);
    if (!this.running && this.loop) {
      return true;
    }
    try {
      await this.notify();
    } catch (error) {
      logger.info('Subscribe notify error', { error });
    }
    return true;
  }

  /**
   * @hebrew הלולאה הראשית. ההבטחה מסתיימת אחרי stop().
   */
  start(): Promise<void> {
    if (!this.loop) {
      this.running = true;
      this.loop = this.run().finally(() => {
        this.loop = null;
      });
    }
    return this.loop;
  }

  private async run(): Promise<void> {
    try {
      await this.notify();
    } catch (error) {
      logger.info('Subscribe notify error', { error });
    }
    while (this.running) {
      this.wakeController = new AbortController();
      await delay(this.notifyIntervalMs, this.wakeController.signal);
      if (!this.running) break;
      await this.runCycle();
    }
  }

  /** עוצר את הלולאה הראשית ומעיר כל המתנה שלה. שליחה שכבר התחילה מסתיימת לפני שהלולאה יוצאת */
  stop(): void {
    this.running = false;
    this.wakeController?.abort();
    this.waitController?.abort();
  }
}
