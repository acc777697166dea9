import axios, { isAxiosError } from 'axios';
import type { HttpClient } from './types';

export const USER_AGENT = 'Node.js/DlnaTimelineBridge/0.1 UPnP/1.0';

/**
 * @hebrew המתנה (sleep). אם ה-signal מבוטל ההמתנה מסתיימת מוקדם, בלי שגיאה.
 * @param ms - זמן המתנה במילישניות.
 */
export function delay(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise(resolve => {
    if (signal?.aborted) {
      resolve();
      return;
    }
    const onAbort = () => {
      clearTimeout(timer);
      resolve();
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);
    signal?.addEventListener('abort', onAbort, { once: true });
  });
}

/**
 * @hebrew ממיר משך בפורמט H:MM:SS או H:MM:SS.fff (כמו RelTime ו-TrackDuration) למילישניות.
 * @returns מספר המילישניות, או null אם המחרוזת אינה בפורמט הזה (למשל NOT_IMPLEMENTED).
 */
export function parseTimedelta(value: string): number | null {
  const match = /^\s*(\d+):(\d{1,2}):(\d{1,2})(?:\.(\d+))?\s*$/.exec(value);
  if (!match) {
    return null;
  }
  const [, hours, minutes, seconds, fraction] = match;
  const millis = fraction ? Math.round(Number(`0.${fraction}`) * 1000) : 0;
  return ((Number(hours) * 60 + Number(minutes)) * 60 + Number(seconds)) * 1000 + millis;
}

/** הפעולה ההפוכה ל-parseTimedelta, לפורמט שפעולת Seek מצפה לו. */
export function formatTimedelta(ms: number): string {
  const totalSeconds = Math.max(0, Math.floor(ms / 1000));
  const hours = Math.floor(totalSeconds / 3600);
  const minutes = Math.floor((totalSeconds % 3600) / 60);
  const seconds = totalSeconds % 60;
  return `${hours}:${String(minutes).padStart(2, '0')}:${String(seconds).padStart(2, '0')}`;
}

/**
 * @hebrew ממיר עוצמת שמע מטווח אחד לאחר (למשל אחוזים לטווח של ההתקן).
 * טווחים זהים מחזירים את הערך כמו שהוא, טווחים באותו רוחב רק מוזזים.
 */
export function convertVolume(
  value: number,
  fromMax: number,
  fromMin: number,
  toMax: number,
  toMin: number,
  toStep: number,
): number {
  if (fromMax === toMax && fromMin === toMin) {
    return value;
  }
  if (fromMax - fromMin === toMax - toMin) {
    return value - fromMin + toMin;
  }
  const percent = (value - fromMin) / (fromMax - fromMin);
  const scaled = percent * (toMax - toMin);
  return Math.trunc(scaled / toStep) + toMin;
}

/**
 * @hebrew שגיאת תקשורת שלא הגיעה אליה תשובה בכלל (סירוב חיבור, DNS, timeout).
 */
export function isConnectionError(error: unknown): boolean {
  return isAxiosError(error) && error.response === undefined;
}

export function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}

export function createHttpClient(): HttpClient {
  return axios.create({
    headers: { 'User-Agent': USER_AGENT },
  });
}

/** לקוח HTTP משותף לכל הרכיבים שלא קיבלו לקוח משלהם */
export const defaultHttpClient: HttpClient = createHttpClient();
