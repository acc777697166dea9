// גילוי התקנים ב-SSDP: שליחת M-SEARCH מחזורית וקליטת תשובות
import * as dgram from 'node:dgram';
import { createModuleLogger } from './logger';
import { HTTP_REQUEST_TYPE, HTTP_RESPONSE_TYPE, parseHeaderLines, parseHttpPacket } from './genericHttpParser';
import { delay, toError } from './utils';

const logger = createModuleLogger('ssdpDiscovery');

export const SSDP_MULTICAST_ADDRESS = '239.255.255.250';
export const SSDP_PORT = 1900;
export const DEFAULT_BIND_PORT = 1910;
export const DEFAULT_MULTICAST_TTL = 4;
export const DEFAULT_SEARCH_INTERVAL_MS = 30_000;
const MX_VALUE = 10;
const SEARCH_TARGET = 'ssdp:all';

/** החלק של dgram.Socket שהגילוי משתמש בו */
export interface SsdpSocket {
  bind(port: number, callback: () => void): void;
  addMembership(multicastAddress: string): void;
  setMulticastTTL(ttl: number): void;
  send(msg: Buffer, port: number, address: string, callback: (error: Error | null) => void): void;
  close(callback?: () => void): void;
  on(event: 'message', listener: (msg: Buffer, rinfo: dgram.RemoteInfo) => void): void;
  on(event: 'error', listener: (err: Error) => void): void;
  on(event: 'close', listener: () => void): void;
  removeListener(event: 'error', listener: (err: Error) => void): void;
}

export interface SsdpDiscoveryOptions {
  /** כתובת תיאור קבועה. אם הוגדרה, הגילוי לא נוגע ברשת */
  locationUrl?: string;
  bindPort?: number;
  multicastTtl?: number;
  searchIntervalMs?: number;
  createSocket?: () => SsdpSocket;
}

export type NewDeviceCallback = (location: string) => void | Promise<void>;

export function buildMSearchMessage(): string {
  return [
    'M-SEARCH * HTTP/1.1',
    `HOST: ${SSDP_MULTICAST_ADDRESS}:${SSDP_PORT}`,
    'MAN: "ssdp:discover"',
    `MX: ${MX_VALUE}`,
    `ST: ${SEARCH_TARGET}`,
    '',
    '',
  ].join('\r\n');
}

/**
 * @hebrew מחלץ את הכותרות מדאטגרמת SSDP (תשובת M-SEARCH או NOTIFY).
 * שמות הכותרות מוחזרים באותיות קטנות.
 */
export function parseSsdpHeaders(message: Buffer): Record<string, string> {
  const text = message.toString('utf-8');
  const parserType = text.startsWith('HTTP/') ? HTTP_RESPONSE_TYPE : HTTP_REQUEST_TYPE;
  const packet = parseHttpPacket(message, parserType);
  return packet ? packet.headers : parseHeaderLines(text);
}

/**
 * @hebrew לקוח SSDP: מדווח על כל כתובת location חדשה פעם אחת בלבד.
 */
export class SsdpDiscovery {
  private readonly seenLocations = new Set<string>();
  private readonly options: Required<Omit<SsdpDiscoveryOptions, 'locationUrl'>> & { locationUrl?: string };
  private socket: SsdpSocket | null = null;
  private connected = false;
  private sleepController: AbortController | null = null;
  private sendLoop: Promise<void> | null = null;

  constructor(options: SsdpDiscoveryOptions = {}) {
    this.options = {
      locationUrl: options.locationUrl || undefined,
      bindPort: options.bindPort ?? DEFAULT_BIND_PORT,
      multicastTtl: options.multicastTtl ?? DEFAULT_MULTICAST_TTL,
      searchIntervalMs: options.searchIntervalMs ?? DEFAULT_SEARCH_INTERVAL_MS,
      createSocket: options.createSocket ?? (() => dgram.createSocket({ type: 'udp4', reuseAddr: true })),
    };
  }

  get isConnected(): boolean {
    return this.connected;
  }

  get knownLocations(): ReadonlySet<string> {
    return this.seenLocations;
  }

  /**
   * @hebrew מתחיל גילוי. עם locationUrl קבוע הקולבק נקרא פעם אחת וזהו.
   * אחרת נפתח סוקט, מצטרפים לקבוצת ה-multicast ולולאת השליחה מתחילה לרוץ ברקע.
   * @throws אם ה-bind או ההצטרפות נכשלו. הסוקט נסגר ואפשר לקרוא שוב.
   */
  async discover(onNewDevice: NewDeviceCallback): Promise<void> {
    if (this.options.locationUrl) {
      this.seenLocations.add(this.options.locationUrl);
      await onNewDevice(this.options.locationUrl);
      return;
    }
    if (this.socket) {
      logger.warn('discover() called while already running');
      return;
    }

    const socket = this.options.createSocket();
    this.socket = socket;

    socket.on('message', (msg) => {
      this.handleMessage(msg, onNewDevice);
    });
    socket.on('error', (err) => {
      logger.error('SSDP socket error', { error: err });
    });
    socket.on('close', () => {
      logger.info('SSDP socket closed');
      this.connected = false;
      this.sleepController?.abort();
    });

    try {
      // שגיאה לפני שה-bind הסתיים (למשל EADDRINUSE) לא קוראת לקולבק של bind
      await new Promise<void>((resolve, reject) => {
        const onBindError = (err: Error) => reject(err);
        socket.on('error', onBindError);
        socket.bind(this.options.bindPort, () => {
          socket.removeListener('error', onBindError);
          resolve();
        });
      });
      socket.setMulticastTTL(this.options.multicastTtl);
      socket.addMembership(SSDP_MULTICAST_ADDRESS);
    } catch (error) {
      logger.error(`SSDP socket setup failed on port ${this.options.bindPort}`, { error });
      this.socket = null;
      try {
        socket.close();
      } catch (closeError) {
        logger.warn('Error closing SSDP socket after setup failure', { error: closeError });
      }
      throw error;
    }
    this.connected = true;
    logger.info(`SSDP socket bound on port ${this.options.bindPort}, joined ${SSDP_MULTICAST_ADDRESS}`);

    this.sendLoop = this.runSendLoop();
  }

  /**
   * @hebrew מטפל בדאטגרמה נכנסת.
   * @returns ה-location אם הוא חדש, אחרת null.
   */
  handleMessage(message: Buffer, onNewDevice: NewDeviceCallback): string | null {
    const headers = parseSsdpHeaders(message);
    const location = headers.location;
    if (!location || this.seenLocations.has(location)) {
      return null;
    }
    this.seenLocations.add(location);
    logger.info(`New device location ${location}`);
    Promise.resolve()
      .then(() => onNewDevice(location))
      .catch((error: unknown) => {
        logger.error(`New device callback failed for ${location}`, { error });
      });
    return location;
  }

  private async runSendLoop(): Promise<void> {
    const message = Buffer.from(buildMSearchMessage());
    while (this.connected) {
      try {
        await this.send(message);
        logger.debug(`M-SEARCH sent to ${SSDP_MULTICAST_ADDRESS}:${SSDP_PORT}`);
      } catch (error) {
        logger.error('M-SEARCH send failed', { error: toError(error) });
      }
      this.sleepController = new AbortController();
      await delay(this.options.searchIntervalMs, this.sleepController.signal);
    }
  }

  private send(message: Buffer): Promise<void> {
    const socket = this.socket;
    if (!socket) {
      return Promise.reject(new Error('SSDP socket is not open'));
    }
    return new Promise((resolve, reject) => {
      socket.send(message, SSDP_PORT, SSDP_MULTICAST_ADDRESS, (error) => {
        if (error) reject(error);
        else resolve();
      });
    });
  }

  async stop(): Promise<void> {
    const socket = this.socket;
    this.connected = false;
    this.sleepController?.abort();
    if (socket) {
      this.socket = null;
      await new Promise<void>(resolve => socket.close(resolve));
    }
    await this.sendLoop;
    this.sendLoop = null;
  }
}
