// כותרות הזיהוי שהנגן שולח לשרת המדיה ולבקרים
import type { UpnpDevice } from '@dlna-bridge/upnp-core';
import type { PlayerConfig } from './config';

export type DeviceIdentity = Pick<UpnpDevice, 'uuid' | 'name' | 'model'>;
export type PlayerInfo = Pick<PlayerConfig, 'version' | 'platform' | 'platformVersion'>;
export type HeaderMap = Record<string, string>;

const PROVIDES = 'player,pubsub-player';

/** דיווח התקדמות לשרת המדיה */
export function serverReportHeaders(device: DeviceIdentity, player: PlayerInfo): HeaderMap {
  return {
    'X-Plex-Client-Identifier': device.uuid,
    'X-Plex-Device': device.model,
    'X-Plex-Device-Name': device.name,
    'X-Plex-Platform': player.platform,
    'X-Plex-Platform-Version': player.platformVersion,
    'X-Plex-Product': device.model,
    'X-Plex-Version': player.version,
    'X-Plex-Provides': PROVIDES,
  };
}

/** תשובות השרת החיצוני לבקשות של שרת המדיה */
export function serverResponseHeaders(device: DeviceIdentity, player: PlayerInfo): HeaderMap {
  return {
    Accept: '*/*',
    Connection: 'keep-alive',
    'Accept-Language': 'en',
    'X-Plex-Device': device.model,
    'X-Plex-Platform': player.platform,
    'X-Plex-Platform-Version': player.platformVersion,
    'X-Plex-Product': device.model,
    'X-Plex-Version': player.version,
    'X-Plex-Client-Identifier': device.uuid,
    'X-Plex-Device-Name': device.name,
    'X-Plex-Provides': PROVIDES,
  };
}

/** שליחת Timeline לבקר רשום */
export function subscriberPushHeaders(device: DeviceIdentity, player: PlayerInfo): HeaderMap {
  return {
    'Content-Type': 'application/xml',
    Connection: 'Keep-Alive',
    'X-Plex-Client-Identifier': device.uuid,
    'X-Plex-Platform': player.platform,
    'X-Plex-Platform-Version': player.platformVersion,
    'X-Plex-Product': device.model,
    'X-Plex-Version': player.version,
    'X-Plex-Device-Name': device.name,
    'Accept-Encoding': 'gzip, deflate',
    'Accept-Language': 'en,*',
  };
}

/** תשובה לבקר שמושך Timeline (poll) */
export function timelinePollHeaders(device: DeviceIdentity): HeaderMap {
  return {
    'X-Plex-Client-Identifier': device.uuid,
    'X-Plex-Protocol': '1.0',
    'Access-Control-Allow-Origin': '*',
    'Access-Control-Max-Age': '1209600',
    'Access-Control-Expose-Headers': 'X-Plex-Client-Identifier',
    'Content-Type': 'text/xml;charset=utf-8',
  };
}
