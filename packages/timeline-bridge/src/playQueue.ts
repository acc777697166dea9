import type { HttpClient } from '@dlna-bridge/upnp-core';
import { createModuleLogger, defaultHttpClient } from '@dlna-bridge/upnp-core';
import { QueueError } from './errors';
import { MediaServer, TOKEN_PARAM } from './mediaServer';

const logger = createModuleLogger('PlayQueue');

/** מספר פריטים כולל לא ידוע (תור אינסופי, למשל רדיו) */
export const UNLIMITED = Number.POSITIVE_INFINITY;

/** מרווח מינימלי בין הפריט הנבחר לקצוות החלון */
export const MIN_QUEUE_GAP = 25;

/** מספר סבבי טעינת עמודים מקסימלי לפעולה אחת */
export const MAX_PAGING_ROUNDS = 100;

export interface QueueMediaPart {
  key: string;
}

export interface QueueMedia {
  Part: QueueMediaPart[];
}

export interface QueueTrack {
  playQueueItemID: number;
  key: string;
  ratingKey: string;
  duration?: number;
  title?: string;
  type?: string;
  Media: QueueMedia[];
}

/** עמוד של תור הניגון, כפי שהשרת מחזיר אותו ב-MediaContainer */
export interface QueueInfo {
  playQueueID: number;
  playQueueVersion?: number;
  playQueueSelectedItemID: number;
  playQueueSelectedItemOffset: number;
  playQueueTotalCount?: number;
  playQueueShuffled?: boolean;
  allowShuffle?: boolean;
  Metadata: QueueTrack[];
}

export interface TrackInfo {
  duration: number | undefined;
  key: string;
  ratingKey: string;
  containerKey: string;
  playQueueID: number;
  playQueueVersion: number | undefined;
  playQueueItemID: number;
}

type JsonObject = { [key: string]: unknown };

function isObject(value: unknown): value is JsonObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function readNumber(source: JsonObject, key: string): number | undefined {
  const value = source[key];
  if (typeof value === 'number') return value;
  if (typeof value === 'string' && value.trim() !== '' && Number.isFinite(Number(value))) return Number(value);
  return undefined;
}

function readString(source: JsonObject, key: string): string | undefined {
  const value = source[key];
  if (typeof value === 'string') return value;
  if (typeof value === 'number') return String(value);
  return undefined;
}

function readFlag(source: JsonObject, key: string): boolean | undefined {
  const value = source[key];
  if (typeof value === 'boolean') return value;
  if (typeof value === 'number') return value !== 0;
  if (value === '1' || value === 'true') return true;
  if (value === '0' || value === 'false') return false;
  return undefined;
}

function readMedia(value: unknown): QueueMedia[] {
  if (!Array.isArray(value)) return [];
  return value.filter(isObject).map(media => ({
    Part: (Array.isArray(media.Part) ? media.Part : [])
      .filter(isObject)
      .map(part => readString(part, 'key'))
      .filter((key): key is string => key !== undefined)
      .map(key => ({ key })),
  }));
}

function readTrack(value: unknown): QueueTrack {
  if (!isObject(value)) {
    throw new QueueError('Queue item is not an object');
  }
  const playQueueItemID = readNumber(value, 'playQueueItemID');
  const key = readString(value, 'key');
  const ratingKey = readString(value, 'ratingKey');
  if (playQueueItemID === undefined || key === undefined || ratingKey === undefined) {
    throw new QueueError('Queue item is missing playQueueItemID, key or ratingKey');
  }
  return {
    playQueueItemID,
    key,
    ratingKey,
    duration: readNumber(value, 'duration'),
    title: readString(value, 'title'),
    type: readString(value, 'type'),
    Media: readMedia(value.Media),
  };
}

/**
 * @hebrew מאמת את תשובת ה-JSON של השרת וממיר אותה ל-QueueInfo.
 * @throws QueueError אם חסרים שדות חובה.
 */
export function readMediaContainer(data: unknown): QueueInfo {
  const container = isObject(data) ? data.MediaContainer : undefined;
  if (!isObject(container)) {
    throw new QueueError('Response has no MediaContainer');
  }
  const playQueueID = readNumber(container, 'playQueueID');
  const selectedItemId = readNumber(container, 'playQueueSelectedItemID');
  const selectedOffset = readNumber(container, 'playQueueSelectedItemOffset');
  if (playQueueID === undefined || selectedItemId === undefined || selectedOffset === undefined) {
    throw new QueueError('MediaContainer is missing the play queue id or the selected item');
  }
  const metadata = container.Metadata;
  return {
    playQueueID,
    playQueueVersion: readNumber(container, 'playQueueVersion'),
    playQueueSelectedItemID: selectedItemId,
    playQueueSelectedItemOffset: selectedOffset,
    playQueueTotalCount: readNumber(container, 'playQueueTotalCount'),
    playQueueShuffled: readFlag(container, 'playQueueShuffled'),
    allowShuffle: readFlag(container, 'allowShuffle'),
    Metadata: Array.isArray(metadata) ? metadata.map(readTrack) : [],
  };
}

interface LoadedWindow {
  info: QueueInfo;
  startOffset: number;
  lastOffset: number;
}

/**
 * @hebrew חלון על תור ניגון מרוחק שנטען בעמודים.
 *
 * startOffset הוא המיקום המוחלט של הפריט הראשון בחלון. הפריט הנבחר
 * תמיד בתוך החלון: startOffset <= selectedOffset <= lastOffset.
 * החלון מתרחב לפי הצורך ב-more, עמוד אחד בכל פעם.
 */
export class PlayQueue {
  info: QueueInfo | null = null;
  startOffset: number | null = null;
  /** מצב החזרה של הנגן (0 כבוי, 1 פריט אחד, 2 כל התור) */
  repeat = 0;

  constructor(
    public containerKey: string,
    readonly server: MediaServer,
    private readonly http: HttpClient = defaultHttpClient,
  ) {}

  /**
   * @hebrew יוצר תור מכתובת מלאה של שרת המדיה, למשל
   * http://10.0.0.3:32400/playQueues/17?own=1&X-Plex-Token=...
   * הטוקן עובר לשרת ולא נשמר במפתח התור.
   */
  static fromUrl(url: string, http?: HttpClient): PlayQueue {
    const parsed = new URL(url);
    const server = MediaServer.fromUrl(parsed);
    parsed.searchParams.delete(TOKEN_PARAM);
    const query = parsed.searchParams.toString();
    return new PlayQueue(query ? `${parsed.pathname}?${query}` : parsed.pathname, server, http);
  }

  get lastOffset(): number | null {
    if (this.startOffset === null || this.info === null) {
      return null;
    }
    return this.startOffset + this.info.Metadata.length - 1;
  }

  private async fetchPage(url: string): Promise<QueueInfo> {
    const response = await this.http.get(url, { headers: { Accept: 'application/json' } });
    return readMediaContainer(response.data);
  }

  /**
   * @hebrew טוען את העמוד הראשון (פעם אחת) ומחשב את startOffset
   * לפי מיקום הפריט הנבחר בחלון.
   * @throws QueueError אם הפריט הנבחר לא נמצא בעמוד.
   */
  async getInfo(): Promise<QueueInfo> {
    if (this.info) {
      return this.info;
    }
    const url = this.server.buildUrl(this.containerKey);
    logger.info(`Get queue ${this.containerKey}`);
    const info = await this.fetchPage(url);
    const index = info.Metadata.findIndex(track => track.playQueueItemID === info.playQueueSelectedItemID);
    if (index < 0) {
      throw new QueueError(`Selected item ${info.playQueueSelectedItemID} is not in the first page of ${this.containerKey}`);
    }
    this.info = info;
    this.startOffset = info.playQueueSelectedItemOffset - index;
    return info;
  }

  private async loaded(): Promise<LoadedWindow> {
    const info = await this.getInfo();
    const startOffset = this.startOffset ?? 0;
    return { info, startOffset, lastOffset: startOffset + info.Metadata.length - 1 };
  }

  async availableTracks(): Promise<QueueTrack[]> {
    const info = await this.getInfo();
    return info.Metadata;
  }

  async availableCount(): Promise<number> {
    return (await this.availableTracks()).length;
  }

  async totalCount(): Promise<number> {
    const info = await this.getInfo();
    return info.playQueueTotalCount ? info.playQueueTotalCount : UNLIMITED;
  }

  async selectedItemId(): Promise<number> {
    return (await this.getInfo()).playQueueSelectedItemID;
  }

  async selectedOffset(): Promise<number> {
    return (await this.getInfo()).playQueueSelectedItemOffset;
  }

  private async assertInRange(offset: number): Promise<void> {
    const total = await this.totalCount();
    if (!Number.isInteger(offset) || offset < 0 || offset >= total) {
      throw new QueueError(`Offset ${offset} is out of range (total ${total})`);
    }
  }

  /**
   * @hebrew מוסיף עמוד אחד לחלון: אחרי הפריט האחרון (after) או לפני הראשון.
   * פריטים שכבר נמצאים בחלון מדולגים.
   * @returns מספר הפריטים שנוספו. 0 אם החלון כבר בקצה.
   */
  async more(after: boolean = true): Promise<number> {
    const { info, startOffset, lastOffset } = await this.loaded();
    const total = await this.totalCount();
    let anchor: QueueTrack | undefined;
    if (after) {
      if (lastOffset >= total - 1) return 0;
      anchor = info.Metadata[info.Metadata.length - 1];
    } else {
      if (startOffset <= 1) return 0;
      anchor = info.Metadata[0];
    }
    if (!anchor) {
      return 0;
    }

    const url = new URL(this.server.buildUrl(this.containerKey));
    for (const param of ['center', 'includeBefore', 'includeAfter']) {
      url.searchParams.delete(param);
    }
    url.searchParams.set('includeAfter', after ? '1' : '0');
    url.searchParams.set('includeBefore', after ? '0' : '1');
    url.searchParams.set('center', String(anchor.playQueueItemID));

    const page = await this.fetchPage(url.toString());
    const known = new Set(info.Metadata.map(track => track.playQueueItemID));
    const added = page.Metadata.filter(track => !known.has(track.playQueueItemID));
    if (after) {
      info.Metadata = [...info.Metadata, ...added];
      logger.debug(`Queue ${this.containerKey} append ${added.length} items`);
    } else {
      info.Metadata = [...added, ...info.Metadata];
      this.startOffset = startOffset - added.length;
      logger.debug(`Queue ${this.containerKey} prepend ${added.length} items`);
    }
    return added.length;
  }

  /**
   * @hebrew הפריט במיקום מוחלט. החלון מורחב לפי הצורך.
   * @throws QueueError אם המיקום מחוץ לתור או שלא ניתן לטעון אותו.
   */
  async track(offset: number): Promise<QueueTrack> {
    await this.assertInRange(offset);
    for (let round = 0; round < MAX_PAGING_ROUNDS; round++) {
      const { info, startOffset, lastOffset } = await this.loaded();
      if (offset >= startOffset && offset <= lastOffset) {
        return info.Metadata[offset - startOffset];
      }
      const added = await this.more(offset > lastOffset);
      if (added === 0) {
        break;
      }
    }
    throw new QueueError(`Track at offset ${offset} could not be loaded`);
  }

  async selectedTrack(): Promise<QueueTrack> {
    return this.track(await this.selectedOffset());
  }

  /**
   * @hebrew בוחר פריט לפי מיקום. לפני הבחירה החלון מורחב כך שיישארו לפחות
   * MIN_QUEUE_GAP פריטים משני הצדדים, אלא אם הגענו לקצה התור.
   */
  async setSelectedOffset(offset: number): Promise<void> {
    await this.assertInRange(offset);
    const total = await this.totalCount();
    for (let round = 0; round < MAX_PAGING_ROUNDS; round++) {
      const { startOffset, lastOffset } = await this.loaded();
      let added: number | null = null;
      if (offset > lastOffset - MIN_QUEUE_GAP && lastOffset + 1 < total) {
        added = await this.more(true);
      } else if (offset < startOffset + MIN_QUEUE_GAP && startOffset > 0) {
        added = await this.more(false);
      }
      if (added === null || added === 0) {
        break;
      }
    }

    const { info, startOffset, lastOffset } = await this.loaded();
    if (offset < startOffset || offset > lastOffset) {
      throw new QueueError(`Offset ${offset} is outside the loaded window ${startOffset}-${lastOffset}`);
    }
    info.playQueueSelectedItemOffset = offset;
    info.playQueueSelectedItemID = info.Metadata[offset - startOffset].playQueueItemID;
  }

  /** עובר לפריט הבא ומחזיר אותו */
  async nextTrack(): Promise<QueueTrack> {
    await this.setSelectedOffset((await this.selectedOffset()) + 1);
    return this.selectedTrack();
  }

  /** עובר לפריט הקודם ומחזיר אותו */
  async prevTrack(): Promise<QueueTrack> {
    await this.setSelectedOffset((await this.selectedOffset()) - 1);
    return this.selectedTrack();
  }

  /**
   * @hebrew בוחר את הפריט עם המפתח הנתון מתוך החלון הטעון.
   * @returns true אם הפריט נמצא.
   */
  async selectTrackKey(key: string): Promise<boolean> {
    const { info, startOffset } = await this.loaded();
    const index = info.Metadata.findIndex(track => track.key === key);
    if (index < 0) {
      return false;
    }
    await this.setSelectedOffset(startOffset + index);
    return true;
  }

  /**
   * @hebrew מעדכן את החלון אחרי שהשרת יצר תור חדש (למשל אחרי ערבוב).
   * הפריט שהיה נבחר נשאר נבחר, והמיקום שלו מחושב מחדש בתור החדש.
   * @throws QueueError אם הפריט הנבחר הקודם או הנבחר החדש לא נמצאים בעמוד.
   */
  async refreshQueue(playQueueId: number): Promise<void> {
    const { info } = await this.loaded();
    if (playQueueId !== info.playQueueID) {
      logger.info(`Refresh to a different queue ${info.playQueueID} -> ${playQueueId}`);
      this.containerKey = this.containerKey.replace(String(info.playQueueID), String(playQueueId));
    }

    const oldSelectedItemId = info.playQueueSelectedItemID;
    const oldSelectedOffset = info.playQueueSelectedItemOffset;
    logger.info(`Refresh queue ${this.containerKey}`);
    const page = await this.fetchPage(this.server.buildUrl(this.containerKey));

    const oldIndex = page.Metadata.findIndex(track => track.playQueueItemID === oldSelectedItemId);
    const newIndex = page.Metadata.findIndex(track => track.playQueueItemID === page.playQueueSelectedItemID);
    if (oldIndex < 0 || newIndex < 0) {
      throw new QueueError('Refreshed queue has no current selected item');
    }
    const startOffset = page.playQueueSelectedItemOffset - newIndex;
    const selectedOffset = startOffset + oldIndex;
    logger.info(`Refreshed queue selected offset ${oldSelectedOffset} -> ${selectedOffset}, start offset ${this.startOffset} -> ${startOffset}`);

    page.playQueueSelectedItemID = oldSelectedItemId;
    page.playQueueSelectedItemOffset = selectedOffset;
    this.info = page;
    this.startOffset = startOffset;
  }

  /**
   * @hebrew כתובת הקובץ של הפריט (החלק הראשון של המדיה הראשונה).
   * @throws QueueError אם לפריט אין חלקי מדיה.
   */
  urlForTrack(track: QueueTrack): string {
    const part = track.Media[0]?.Part[0];
    if (!part) {
      throw new QueueError(`Track ${track.key} has no media part`);
    }
    return this.server.buildUrl(part.key);
  }

  /** בתור אינסופי ערבוב אסור, אלא אם השרת התיר אותו במפורש */
  async allowShuffle(): Promise<boolean> {
    const info = await this.getInfo();
    if (info.allowShuffle === undefined) {
      return (await this.totalCount()) !== UNLIMITED;
    }
    return info.allowShuffle;
  }

  async getTrackInfo(): Promise<TrackInfo> {
    const track = await this.selectedTrack();
    const info = await this.getInfo();
    return {
      duration: track.duration,
      key: track.key,
      ratingKey: track.ratingKey,
      containerKey: `/playQueues/${info.playQueueID}`,
      playQueueID: info.playQueueID,
      playQueueVersion: info.playQueueVersion,
      playQueueItemID: track.playQueueItemID,
    };
  }
}
