import type { UpnpDevice } from '@dlna-bridge/upnp-core';
import type { MediaServer } from './mediaServer';
import type { PlayQueue } from './playQueue';

export type PlaybackState = 'playing' | 'paused' | 'stopped' | 'buffering';

/** מאפייני Timeline (או פרמטרים לדיווח לשרת), שם ערך */
export type TimelineParameters = Record<string, string | number>;

/**
 * @hebrew המתאם שממפה את מצב ההתקן לאוצר המילים של הבקר.
 * המימוש נמצא מחוץ לחבילה; המנהל משתמש רק בממשק הזה.
 */
export interface PlaybackAdapter {
  readonly device: UpnpDevice;
  /** כשמופעל, לא נשלחות הודעות לבקרים ולשרת */
  noNotice: boolean;
  queue: PlayQueue | null;
  readonly mediaServer: MediaServer | null;
  /** מצב הניגון כפי שהבקר מכיר אותו, null אם אין סשן */
  readonly playbackState: PlaybackState | null;
  /** מצב ה-AVTransport של ההתקן (STOPPED, PLAYING...) */
  readonly transportState: string | null;

  /** המאפיינים של Timeline המוזיקה, או null אם אין מה לדווח */
  getTimelineState(): Promise<TimelineParameters | null>;
  /** פרמטרי הדיווח לשרת המדיה, או null */
  getServerState(): Promise<TimelineParameters | null>;
  /** מסתיים כשמצב ההתקן משתנה, או אחרי timeoutMs */
  waitForEvent(timeoutMs: number): Promise<void>;
  markDisconnected(): void;
}

export interface AdapterDirectory {
  /** המתאם של ההתקן. נוצר בקריאה הראשונה */
  adapterFor(device: UpnpDevice): PlaybackAdapter;
  removeAdapter(adapter: PlaybackAdapter): void;
}
