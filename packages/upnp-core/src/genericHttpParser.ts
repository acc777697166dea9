import { HTTPParser } from 'http-parser-js';
import { createModuleLogger } from './logger';

export const HTTP_REQUEST_TYPE = HTTPParser.REQUEST;
export const HTTP_RESPONSE_TYPE = HTTPParser.RESPONSE;

const logger = createModuleLogger('genericHttpParser');

export interface ParsedHttpPacket {
  method?: string;
  url?: string;
  statusCode?: number;
  statusMessage?: string;
  /** שמות הכותרות באותיות קטנות */
  headers: Record<string, string>;
  body?: Buffer;
}

/**
 * @hebrew מנתח הודעת HTTP גולמית (בקשה או תגובה) באמצעות http-parser-js.
 * משמש לניתוח דאטגרמות SSDP, שהן הודעות HTTP על גבי UDP.
 * @returns ParsedHttpPacket אם הניתוח הושלם, אחרת null.
 */
export function parseHttpPacket(
  messageBuffer: Buffer,
  parserType: typeof HTTP_REQUEST_TYPE | typeof HTTP_RESPONSE_TYPE,
): ParsedHttpPacket | null {
  const parser = new HTTPParser(parserType);
  const result: ParsedHttpPacket = { headers: {} };
  const bodyChunks: Buffer[] = [];
  let complete = false;

  parser[HTTPParser.kOnHeadersComplete] = (info) => {
    const rawHeaders = info.headers;
    for (let i = 0; i + 1 < rawHeaders.length; i += 2) {
      result.headers[rawHeaders[i].toLowerCase()] = rawHeaders[i + 1].trim();
    }
    if (parserType === HTTP_REQUEST_TYPE) {
      result.method = HTTPParser.methods[info.method];
      result.url = info.url;
    } else {
      result.statusCode = info.statusCode;
      result.statusMessage = info.statusMessage;
    }
  };

  parser[HTTPParser.kOnBody] = (chunk, offset, length) => {
    bodyChunks.push(Buffer.from(chunk.subarray(offset, offset + length)));
  };

  parser[HTTPParser.kOnMessageComplete] = () => {
    complete = true;
  };

  try {
    const executeResult = parser.execute(messageBuffer);
    if (executeResult instanceof Error) {
      logger.debug('parseHttpPacket: execute() returned an error', { error: executeResult.message });
      return null;
    }
    const finishResult = parser.finish();
    if (finishResult instanceof Error) {
      logger.debug('parseHttpPacket: finish() returned an error', { error: finishResult.message });
      return null;
    }
  } catch (err) {
    logger.debug('parseHttpPacket: exception during parsing', { error: err instanceof Error ? err.message : String(err) });
    return null;
  }

  if (!complete) {
    logger.debug('parseHttpPacket: message did not complete');
    return null;
  }

  if (bodyChunks.length > 0) {
    result.body = Buffer.concat(bodyChunks);
  }
  return result;
}

/**
 * @hebrew ניתוח כותרות פשוט: פיצול לפי CRLF, דילוג על שורת הפתיחה,
 * שם הכותרת באותיות קטנות והערך בלי רווחים. משמש כשהפרסר של HTTP נכשל.
 */
export function parseHeaderLines(message: string): Record<string, string> {
  const headers: Record<string, string> = {};
  const lines = message.split('\r\n').slice(1);
  for (const line of lines) {
    const separator = line.indexOf(':');
    if (separator <= 0) continue;
    const name = line.slice(0, separator).trim().toLowerCase();
    headers[name] = line.slice(separator + 1).trim();
  }
  return headers;
}
