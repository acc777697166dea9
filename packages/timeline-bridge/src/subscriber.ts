import type { HttpClient } from '@dlna-bridge/upnp-core';
import { createModuleLogger, defaultHttpClient } from '@dlna-bridge/upnp-core';
import type { HeaderMap } from './headers';
import { buildTimelineXml, type TimelineSnapshot } from './timeline';
import { TIMELINE_PATH } from './mediaServer';

const logger = createModuleLogger('Subscriber');

export const PUSH_TIMEOUT_MS = 1000;

export interface SubscriberOwner {
  removeSubscriber(clientUuid: string, targetUuid?: string): boolean;
}

/**
 * @hebrew בקר שנרשם לקבל Timeline של התקן אחד.
 * שליחה שנכשלה מסירה את המנוי: בקר שלא עונה כבר לא מאזין.
 */
export class Subscriber {
  readonly url: string;

  constructor(
    readonly uuid: string,
    readonly host: string,
    readonly port: number,
    private readonly owner: SubscriberOwner,
    readonly protocol: string = 'http',
    public commandId: number = 0,
    private readonly http: HttpClient = defaultHttpClient,
  ) {
    this.url = `${protocol}://${host}:${port}${TIMELINE_PATH}`;
  }

  matches(host: string, port: number, protocol: string): boolean {
    return this.host === host && this.port === port && this.protocol === protocol;
  }

  /**
   * @returns true אם הבקר קיבל את ההודעה.
   */
  async send(snapshot: TimelineSnapshot, headers: HeaderMap): Promise<boolean> {
    const body = buildTimelineXml(snapshot, this.commandId);
    try {
      await this.http.post(this.url, body, { headers, timeout: PUSH_TIMEOUT_MS });
      return true;
    } catch (error) {
      logger.warn(`Subscriber send error ${this.toString()}, removing subscriber ${this.uuid}`, { error });
      this.owner.removeSubscriber(this.uuid);
      return false;
    }
  }

  toString(): string {
    return `${this.host}:${this.port}`;
  }
}
