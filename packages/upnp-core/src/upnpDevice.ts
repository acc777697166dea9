import type {
  ActionData,
  ActionResult,
  DeviceDescription,
  HttpClient,
  ServiceDescription,
  ServiceHost,
  UpnpDeviceOptions,
} from './types';
import { ActionNotFoundError, DeviceValidationError, ServiceNotFoundError } from './errors';
import { createModuleLogger } from './logger';
import { DEFAULT_SUBSCRIBE_TIMEOUT_SEC, UpnpService } from './upnpService';
import { asArray, childNode, childText, isXmlNode, parseXml, stripDefaultNamespace, type XmlNode } from './xmlUtils';
import { convertVolume, defaultHttpClient, formatTimedelta, parseTimedelta } from './utils';

const logger = createModuleLogger('upnpDevice');

export const UPNP_AVT_SERVICE_TYPE_PREFIX = 'urn:schemas-upnp-org:service:AVTransport';
export const UPNP_RC_SERVICE_TYPE_PREFIX = 'urn:schemas-upnp-org:service:RenderingControl';
export const ALLOWED_UPNP_AVT_VERSIONS: readonly string[] = ['1', '2'];
export const ALLOWED_UPNP_RC_VERSIONS: readonly string[] = ['1', '2'];

/** מספר שגיאות חיבור רצופות שאחריו ההתקן מוסר */
export const ERROR_COUNT_TO_REMOVE = 20;

const DESCRIPTION_TIMEOUT_MS = 10_000;
const DEFAULT_MODEL = 'DLNA Timeline Player';

/**
 * @hebrew הבעלים של ההתקן (הרג'יסטרי שיצר אותו). ההסרה נשלחת אליו כהודעה
 * ומתבצעת בתור העבודה שלו, לא בהקשר שבו התגלתה התקלה.
 */
export interface DeviceOwner {
  requestRemoval(device: UpnpDevice): void;
}

export interface PositionInfo {
  /** מילישניות */
  position: number | null;
  duration: number | null;
  trackUri?: string;
}

function readServiceDescription(node: XmlNode): ServiceDescription | null {
  const serviceType = childText(node, 'serviceType');
  const controlURL = childText(node, 'controlURL');
  const eventSubURL = childText(node, 'eventSubURL');
  const SCPDURL = childText(node, 'SCPDURL');
  if (!serviceType || controlURL === undefined || eventSubURL === undefined || SCPDURL === undefined) {
    return null;
  }
  return { serviceType, serviceId: childText(node, 'serviceId'), controlURL, eventSubURL, SCPDURL };
}

/**
 * @hebrew מנתח את מסמך התיאור של ההתקן (device description).
 */
export async function parseDeviceDescription(xml: string, locationUrl: string): Promise<DeviceDescription> {
  const root = await parseXml(stripDefaultNamespace(xml));
  const device = childNode(root, 'device');
  if (!device) {
    throw new DeviceValidationError(`No <device> element in description ${locationUrl}`, locationUrl);
  }
  const services = asArray(childNode(device, 'serviceList')?.service)
    .filter(isXmlNode)
    .map(readServiceDescription)
    .filter((service): service is ServiceDescription => service !== null);
  return {
    friendlyName: childText(device, 'friendlyName'),
    modelDescription: childText(device, 'modelDescription'),
    modelName: childText(device, 'modelName'),
    manufacturer: childText(device, 'manufacturer'),
    UDN: childText(device, 'UDN'),
    services,
  };
}

function splitServiceType(serviceType: string): [string, string] {
  const separator = serviceType.lastIndexOf(':');
  return separator < 0 ? [serviceType, ''] : [serviceType.slice(0, separator), serviceType.slice(separator + 1)];
}

function toNumber(value: unknown): number | null {
  if (typeof value === 'number') return value;
  if (typeof value === 'string' && value.trim() !== '') {
    const parsed = Number(value);
    return Number.isFinite(parsed) ? parsed : null;
  }
  return null;
}

/**
 * @hebrew התקן מרנדר (renderer) שהתגלה ברשת, עם השירותים שלו.
 * הזהות היא ה-uuid בלבד.
 */
export class UpnpDevice implements ServiceHost {
  readonly locationUrl: string;
  name = '';
  model = '';
  uuid = '';
  ip = '';
  readonly services = new Map<string, UpnpService>();

  volumeMin = 0;
  volumeMax = 100;
  volumeStep = 1;

  avtServiceType = '';
  rcServiceType = '';
  avtServiceVersion = 0;
  rcServiceVersion = 0;

  repeatErrorCount = 0;
  /** ההקשר שמחזיק את ההתקן ואחראי להסרתו */
  owner: DeviceOwner | null = null;

  description: DeviceDescription | null = null;

  private loading: Promise<void> | null = null;
  private readonly actionRoutes = new Map<string, UpnpService>();
  private readonly http: HttpClient;

  constructor(locationUrl: string, private readonly options: UpnpDeviceOptions = {}) {
    this.locationUrl = locationUrl;
    this.http = options.http ?? defaultHttpClient;
  }

  get isLoaded(): boolean {
    return this.description !== null;
  }

  /**
   * @hebrew טוען את תיאור ההתקן ואת השירותים שלו. קריאה נוספת אחרי טעינה מוצלחת לא עושה דבר.
   * @throws DeviceValidationError אם חסרים שם, UDN, AVTransport או RenderingControl.
   */
  async getData(): Promise<void> {
    if (this.description) {
      return;
    }
    if (!this.loading) {
      this.loading = this.load().finally(() => {
        this.loading = null;
      });
    }
    return this.loading;
  }

  private async load(): Promise<void> {
    logger.debug(`Fetching device description ${this.locationUrl}`);
    const response = await this.http.get(this.locationUrl, { responseType: 'text', timeout: DESCRIPTION_TIMEOUT_MS });
    if (typeof response.data !== 'string') {
      throw new DeviceValidationError(`Device description at ${this.locationUrl} is not text`, this.locationUrl);
    }
    const description = await parseDeviceDescription(response.data, this.locationUrl);

    this.services.clear();
    this.actionRoutes.clear();
    this.avtServiceType = '';
    this.rcServiceType = '';

    this.name = description.friendlyName ?? '';
    this.model = description.modelDescription ?? this.options.defaultModel ?? DEFAULT_MODEL;
    this.uuid = (description.UDN ?? '').replace(/^uuid:/, '');

    for (const serviceDescription of description.services) {
      const service = new UpnpService(serviceDescription, this, this.http);
      this.services.set(service.serviceType, service);
      await service.getActions();

      const [prefix, version] = splitServiceType(service.serviceType);
      if (prefix === UPNP_AVT_SERVICE_TYPE_PREFIX && ALLOWED_UPNP_AVT_VERSIONS.includes(version)) {
        this.avtServiceType = service.serviceType;
        this.avtServiceVersion = Number(version);
      } else if (prefix === UPNP_RC_SERVICE_TYPE_PREFIX && ALLOWED_UPNP_RC_VERSIONS.includes(version)) {
        this.rcServiceType = service.serviceType;
        this.rcServiceVersion = Number(version);
      }
    }

    if (!this.name || !this.uuid) {
      logger.error(`Device has no name or uuid: ${this.locationUrl}`);
      throw new DeviceValidationError(`Not a valid DLNA device ${this.locationUrl}`, this.locationUrl);
    }
    if (!this.avtServiceType || !this.rcServiceType) {
      logger.error(`Device has no AVTransport or RenderingControl service: ${this.locationUrl}`);
      throw new DeviceValidationError(`Not a valid DLNA renderer ${this.name}`, this.locationUrl);
    }

    this.ip = new URL(this.locationUrl).hostname;
    if (this.options.aliasResolver) {
      this.name = await this.options.aliasResolver.resolveAlias(this.uuid, this.name, this.ip);
    }
    await this.loadVolumeInfo();
    await Promise.all([...this.services.values()].map(service => service.getSpec()));

    this.description = description;
    logger.info(`Loaded device ${this.name} (${this.uuid}) at ${this.ip}`);
  }

  private async loadVolumeInfo(): Promise<void> {
    this.volumeMin = 0;
    this.volumeMax = 100;
    this.volumeStep = 1;
    try {
      const variables = await this.getService(this.rcServiceType).getStateVariables();
      const range = variables.find(variable => variable.name === 'Volume')?.allowedValueRange;
      if (!range) return;
      const min = toNumber(range.minimum);
      const max = toNumber(range.maximum);
      const step = toNumber(range.step);
      if (min !== null && max !== null && max > min) {
        this.volumeMin = Math.trunc(min);
        this.volumeMax = Math.trunc(max);
        this.volumeStep = step !== null && step > 0 ? Math.trunc(step) : 1;
      }
    } catch (error) {
      logger.warn(`Volume info lookup failed for ${this.name}, using 0-100`, { error });
    }
  }

  getService(serviceType: string): UpnpService {
    const service = this.services.get(serviceType);
    if (!service) {
      logger.error(`Device ${this.name} has no service type ${serviceType}`);
      throw new ServiceNotFoundError(serviceType);
    }
    return service;
  }

  private async findServiceByAction(actionName: string): Promise<UpnpService | null> {
    for (const service of this.services.values()) {
      if (await service.getActionSpec(actionName)) {
        return service;
      }
    }
    return null;
  }

  /**
   * @hebrew מפעיל פעולה בשם נתון. אם לא צוין סוג שירות, הפעולה מנותבת לשירות הראשון שמגדיר אותה.
   * @returns ערכי הפלט, או null אם ההתקן החזיר fault או שהבקשה נכשלה.
   */
  async invoke(actionName: string, data: ActionData = {}, serviceType?: string): Promise<ActionResult | null> {
    await this.getData();
    let service: UpnpService | null;
    if (serviceType !== undefined) {
      service = this.getService(serviceType);
    } else {
      service = this.actionRoutes.get(actionName) ?? await this.findServiceByAction(actionName);
      if (service) {
        this.actionRoutes.set(actionName, service);
      }
    }
    if (!service) {
      throw new ActionNotFoundError(actionName);
    }
    return service.control(actionName, data);
  }

  private async transport(actionName: string, data: ActionData = {}): Promise<ActionResult | null> {
    await this.getData();
    return this.invoke(actionName, data, this.avtServiceType);
  }

  private async rendering(actionName: string, data: ActionData = {}): Promise<ActionResult | null> {
    await this.getData();
    return this.invoke(actionName, data, this.rcServiceType);
  }

  // --- AVTransport ---

  play(speed: number = 1): Promise<ActionResult | null> {
    return this.transport('Play', { InstanceID: 0, Speed: speed });
  }

  pause(): Promise<ActionResult | null> {
    return this.transport('Pause');
  }

  stop(): Promise<ActionResult | null> {
    return this.transport('Stop');
  }

  next(): Promise<ActionResult | null> {
    return this.transport('Next');
  }

  previous(): Promise<ActionResult | null> {
    return this.transport('Previous');
  }

  /** @param positionMs - מיקום במילישניות מתחילת הרצועה */
  seek(positionMs: number): Promise<ActionResult | null> {
    return this.transport('Seek', { Unit: 'REL_TIME', Target: formatTimedelta(positionMs) });
  }

  setAVTransportURI(uri: string, metadata: string = ''): Promise<ActionResult | null> {
    return this.transport('SetAVTransportURI', { CurrentURI: uri, CurrentURIMetaData: metadata });
  }

  getTransportInfo(): Promise<ActionResult | null> {
    return this.transport('GetTransportInfo');
  }

  getPositionInfo(): Promise<ActionResult | null> {
    return this.transport('GetPositionInfo');
  }

  getMediaInfo(): Promise<ActionResult | null> {
    return this.transport('GetMediaInfo');
  }

  async getPosition(): Promise<PositionInfo | null> {
    const info = await this.getPositionInfo();
    if (!info) return null;
    const relTime = info.RelTime;
    const duration = info.TrackDuration;
    return {
      position: typeof relTime === 'string' ? parseTimedelta(relTime) : null,
      duration: typeof duration === 'string' ? parseTimedelta(duration) : null,
      trackUri: typeof info.TrackURI === 'string' ? info.TrackURI : undefined,
    };
  }

  // --- RenderingControl ---

  async getVolume(): Promise<number | null> {
    const result = await this.rendering('GetVolume');
    return result ? toNumber(result.CurrentVolume) : null;
  }

  setVolume(volume: number): Promise<ActionResult | null> {
    return this.rendering('SetVolume', { DesiredVolume: volume });
  }

  /** עוצמה באחוזים (0-100) מומרת לטווח של ההתקן */
  async setVolumePercent(percent: number): Promise<ActionResult | null> {
    await this.getData();
    const clamped = Math.min(100, Math.max(0, percent));
    return this.setVolume(convertVolume(clamped, 100, 0, this.volumeMax, this.volumeMin, this.volumeStep));
  }

  async getVolumePercent(): Promise<number | null> {
    const volume = await this.getVolume();
    return volume === null ? null : convertVolume(volume, this.volumeMax, this.volumeMin, 100, 0, 1);
  }

  async getMute(): Promise<boolean | null> {
    const result = await this.rendering('GetMute');
    if (!result) return null;
    const mute = result.CurrentMute;
    return mute === true || mute === 1 || mute === '1' || mute === 'true';
  }

  setMute(mute: boolean): Promise<ActionResult | null> {
    return this.rendering('SetMute', { DesiredMute: mute ? 1 : 0 });
  }

  // --- Eventing ---

  async subscribe(serviceType?: string, timeoutSec: number = DEFAULT_SUBSCRIBE_TIMEOUT_SEC): Promise<boolean | null> {
    await this.getData();
    return this.getService(serviceType ?? this.avtServiceType).subscribe(timeoutSec);
  }

  async loopSubscribe(serviceType?: string, timeoutSec: number = DEFAULT_SUBSCRIBE_TIMEOUT_SEC): Promise<void> {
    await this.getData();
    return this.getService(serviceType ?? this.avtServiceType).loopSubscribe(timeoutSec);
  }

  stopSubscribe(serviceType?: string): void {
    this.services.get(serviceType ?? this.avtServiceType)?.stopSubscribe();
  }

  stopAllSubscriptions(): void {
    for (const service of this.services.values()) {
      service.stopSubscribe();
    }
  }

  // --- ServiceHost ---

  eventCallbackUrl(): string | null {
    const host = this.options.callbackHost;
    if (!host?.hostIp) {
      return null;
    }
    return `http://${host.hostIp}:${host.httpPort}/dlna/callback/${this.uuid}`;
  }

  recordSuccess(): void {
    this.repeatErrorCount = 0;
  }

  recordConnectionFailure(action: string, error: Error): void {
    this.repeatErrorCount += 1;
    if (this.repeatErrorCount < ERROR_COUNT_TO_REMOVE) {
      return;
    }
    logger.warn(`Removing device ${this.name} after ${this.repeatErrorCount} connection errors (last: ${action})`, { error });
    if (this.owner) {
      this.owner.requestRemoval(this);
    } else {
      logger.warn(`Device ${this.name} has no owner, cannot remove it`);
    }
  }

  equals(other: UpnpDevice): boolean {
    return this.uuid === other.uuid;
  }

  toString(): string {
    return `DLNA Device ${this.name} ${this.ip} ${this.uuid}`;
  }
}
