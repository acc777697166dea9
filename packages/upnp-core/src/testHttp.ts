// עזרים לבדיקות: לקוח HTTP מזויף וטעינת קבצי XML לדוגמה
import { readFileSync } from 'node:fs';
import type { AxiosRequestConfig } from 'axios';
import { vi } from 'vitest';

export const LOCATION_URL = 'http://10.0.0.5:8200/desc.xml';

export function readFixture(name: string): string {
  return readFileSync(new URL(`./__fixtures__/${name}`, import.meta.url), 'utf-8');
}

/** קבצי התיאור של הרמקול לדוגמה, לפי הכתובות שלהם */
export function speakerDocuments(): Record<string, string> {
  return {
    [LOCATION_URL]: readFixture('description.xml'),
    'http://10.0.0.5:8200/cm/scpd.xml': readFixture('connectionmanager.xml'),
    'http://10.0.0.5:8200/rc/scpd.xml': readFixture('renderingcontrol.xml'),
    'http://10.0.0.5:8200/avt/scpd.xml': readFixture('avtransport.xml'),
  };
}

export function soapResponse(action: string, serviceType: string, body: string = ''): string {
  return '<?xml version="1.0"?>'
    + '<s:Envelope xmlns:s="http://schemas.xmlsoap.org/soap/envelope/" s:encodingStyle="http://schemas.xmlsoap.org/soap/encoding/">'
    + `<s:Body><u:${action}Response xmlns:u="${serviceType}">${body}</u:${action}Response></s:Body></s:Envelope>`;
}

export function soapFault(code: number, description: string): string {
  return '<?xml version="1.0"?>'
    + '<s:Envelope xmlns:s="http://schemas.xmlsoap.org/soap/envelope/" s:encodingStyle="http://schemas.xmlsoap.org/soap/encoding/">'
    + '<s:Body><s:Fault><faultcode>s:Client</faultcode><faultstring>UPnPError</faultstring><detail>'
    + `<UPnPError xmlns="urn:schemas-upnp-org:control-1-0"><errorCode>${code}</errorCode><errorDescription>${description}</errorDescription></UPnPError>`
    + '</detail></s:Fault></s:Body></s:Envelope>';
}

/**
 * לקוח HTTP מזויף: GET מחזיר את המסמך לפי הכתובת, POST ו-request מחזירים 200 ריק.
 */
export function createFakeHttp(documents: Record<string, string> = {}) {
  return {
    get: vi.fn(async (url: string, _config?: AxiosRequestConfig) => {
      const data = documents[url];
      if (data === undefined) {
        throw new Error(`Unexpected GET ${url}`);
      }
      return { status: 200, data };
    }),
    post: vi.fn(async (_url: string, _data?: unknown, _config?: AxiosRequestConfig) => ({ status: 200, data: '' })),
    request: vi.fn(async (_config: AxiosRequestConfig) => ({ status: 200, data: '' })),
  };
}

export type FakeHttp = ReturnType<typeof createFakeHttp>;
