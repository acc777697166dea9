// בניית מעטפות SOAP, שליחתן להתקן וניתוח התשובה
import { isAxiosError } from 'axios';
import { create } from 'xmlbuilder2';
import type { ActionArgs, ActionResult, HttpClient, SoapFault, SoapOutcome } from './types';
import { createModuleLogger } from './logger';
import { childNode, childText, isXmlNode, nodeText, parseXml, type XmlNode } from './xmlUtils';
import { isConnectionError, toError } from './utils';

const moduleLogger = createModuleLogger('upnpSoapClient');

const SOAP_ENV_NS = 'http://schemas.xmlsoap.org/soap/envelope/';
const SOAP_ENC_NS = 'http://schemas.xmlsoap.org/soap/encoding/';

export const SOAP_TIMEOUT_MS = 10_000;

/**
 * @hebrew בונה מעטפת SOAP מלאה לפעולה.
 * הארגומנטים נכתבים כאלמנטים לפי סדר המפתחות באובייקט.
 */
export function buildSoapEnvelope(serviceType: string, actionName: string, args: ActionArgs): string {
  const root = create({ version: '1.0', encoding: 'utf-8' })
    .ele('s:Envelope', { 'xmlns:s': SOAP_ENV_NS, 's:encodingStyle': SOAP_ENC_NS });
  const action = root.ele('s:Body').ele(`u:${actionName}`, { 'xmlns:u': serviceType });
  for (const [name, value] of Object.entries(args)) {
    action.ele(name).txt(String(value));
  }
  return root.end({ prettyPrint: false });
}

function readFault(fault: XmlNode): SoapFault {
  const detail = childNode(fault, 'detail') ?? childNode(fault, 'Detail');
  const upnpError = childNode(detail, 'UPnPError');
  const soapFault: SoapFault = {
    faultCode: childText(fault, 'faultcode') ?? childText(fault, 'Faultcode') ?? 'Unknown',
    faultString: childText(fault, 'faultstring') ?? childText(fault, 'Faultstring') ?? 'Unknown SOAP Fault',
  };
  if (upnpError) {
    const code = Number(childText(upnpError, 'errorCode'));
    if (Number.isFinite(code)) soapFault.upnpErrorCode = code;
    soapFault.upnpErrorDescription = childText(upnpError, 'errorDescription');
  } else if (detail) {
    soapFault.detail = nodeText(detail);
  }
  return soapFault;
}

function readActionValues(response: XmlNode): ActionResult {
  const values: ActionResult = {};
  for (const [key, value] of Object.entries(response)) {
    if (key === '$' || key.startsWith('xmlns')) continue;
    if (typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean') {
      values[key] = value;
    } else {
      const text = nodeText(value);
      values[key] = text ?? '';
    }
  }
  return values;
}

/**
 * @hebrew מנתח תגובת SOAP. מחזיר את ערכי הפלט של הפעולה או SoapFault.
 * XML לא תקין מוחזר כ-fault עם הקוד ClientParseError.
 */
export async function parseSoapResponse(
  xmlResponse: string,
  actionName: string,
): Promise<{ kind: 'result'; values: ActionResult } | { kind: 'fault'; fault: SoapFault }> {
  let parsed: XmlNode;
  try {
    parsed = await parseXml(xmlResponse, { parseValues: true });
  } catch (error) {
    return {
      kind: 'fault',
      fault: { faultCode: 'ClientParseError', faultString: 'Error parsing XML response.', detail: toError(error).message },
    };
  }

  const body = childNode(parsed, 'Body') ?? childNode(childNode(parsed, 'Envelope'), 'Body');
  if (!body) {
    return {
      kind: 'fault',
      fault: { faultCode: 'ClientParseError', faultString: 'SOAP Body not found in response.' },
    };
  }

  const fault = childNode(body, 'Fault');
  if (fault) {
    return { kind: 'fault', fault: readFault(fault) };
  }

  const actionResponse = body[`${actionName}Response`];
  if (isXmlNode(actionResponse)) {
    return { kind: 'result', values: readActionValues(actionResponse) };
  }
  if (actionResponse !== undefined) {
    // <u:PlayResponse/> ריק מגיע כמחרוזת ריקה
    return { kind: 'result', values: {} };
  }

  return {
    kind: 'fault',
    fault: { faultCode: 'ClientParseError', faultString: `No ${actionName}Response or Fault in SOAP body.` },
  };
}

/**
 * @hebrew שולח פעולת SOAP לנקודת הבקרה של שירות.
 * לא זורק: כל תוצאה (הצלחה, fault, שגיאת חיבור או שגיאה אחרת) מוחזרת כ-SoapOutcome.
 */
export async function sendSoapRequest(
  http: HttpClient,
  controlUrl: string,
  serviceType: string,
  actionName: string,
  args: ActionArgs,
): Promise<SoapOutcome> {
  const envelope = buildSoapEnvelope(serviceType, actionName, args);
  moduleLogger.trace(`SOAP request ${actionName} -> ${controlUrl}`, { envelope });

  try {
    const response = await http.post(controlUrl, envelope, {
      headers: {
        'Content-Type': 'text/xml; charset="utf-8"',
        SOAPACTION: `"${serviceType}#${actionName}"`,
      },
      responseType: 'text',
      timeout: SOAP_TIMEOUT_MS,
    });
    const data = typeof response.data === 'string' ? response.data : String(response.data);
    return await parseSoapResponse(data, actionName);
  } catch (error) {
    if (isConnectionError(error)) {
      return { kind: 'connection-error', error: toError(error) };
    }
    // התקנים מחזירים UPnP fault עם סטטוס 500
    if (isAxiosError(error) && typeof error.response?.data === 'string') {
      const parsed = await parseSoapResponse(error.response.data, actionName);
      if (parsed.kind === 'fault' && parsed.fault.faultCode !== 'ClientParseError') {
        return parsed;
      }
    }
    return { kind: 'error', error: toError(error) };
  }
}
