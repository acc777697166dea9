// עזרים לבדיקות: לקוח HTTP מזויף, מתאמים מזויפים ושרת תור ניגון בזיכרון
import type { AxiosRequestConfig } from 'axios';
import { vi } from 'vitest';
import { UpnpDevice } from '@dlna-bridge/upnp-core';
import type { AdapterDirectory, PlaybackAdapter, PlaybackState, TimelineParameters } from './adapter';
import type { MediaServer } from './mediaServer';
import type { PlayQueue } from './playQueue';

export function createFakeHttp() {
  return {
    get: vi.fn(async (_url: string, _config?: AxiosRequestConfig): Promise<{ status: number; data: unknown }> => ({ status: 200, data: '' })),
    post: vi.fn(async (_url: string, _data?: unknown, _config?: AxiosRequestConfig) => ({ status: 200, data: '' })),
    request: vi.fn(async (_config: AxiosRequestConfig) => ({ status: 200, data: '' })),
  };
}

export type FakeHttp = ReturnType<typeof createFakeHttp>;

/** התקן שלא נטען מהרשת, עם זהות קבועה */
export function createDevice(uuid: string, name: string): UpnpDevice {
  const device = new UpnpDevice(`http://10.0.0.5:8200/${uuid}/desc.xml`);
  device.uuid = uuid;
  device.name = name;
  device.model = 'Network Speaker';
  device.ip = '10.0.0.5';
  vi.spyOn(device, 'loopSubscribe').mockResolvedValue(undefined);
  vi.spyOn(device, 'stopSubscribe');
  return device;
}

export class FakeAdapter implements PlaybackAdapter {
  noNotice = false;
  queue: PlayQueue | null = null;
  mediaServer: MediaServer | null = null;
  playbackState: PlaybackState | null = null;
  transportState: string | null = null;
  timelineState: TimelineParameters | null = null;
  serverState: TimelineParameters | null = null;

  constructor(readonly device: UpnpDevice) {}

  getTimelineState = vi.fn(async () => this.timelineState);
  getServerState = vi.fn(async () => this.serverState);
  waitForEvent = vi.fn(async (_timeoutMs: number) => undefined);
  markDisconnected = vi.fn(() => {
    this.playbackState = 'stopped';
    this.transportState = 'STOPPED';
  });
}

export class FakeDirectory implements AdapterDirectory {
  readonly adapters = new Map<string, FakeAdapter>();

  adapterFor(device: UpnpDevice): FakeAdapter {
    let adapter = this.adapters.get(device.uuid);
    if (!adapter) {
      adapter = new FakeAdapter(device);
      this.adapters.set(device.uuid, adapter);
    }
    return adapter;
  }

  removeAdapter = vi.fn((adapter: PlaybackAdapter) => {
    this.adapters.delete(adapter.device.uuid);
  });
}

export interface QueueServerOptions {
  /** 0 = תור בלי סך ידוע */
  total?: number;
  windowStart?: number;
  windowSize?: number;
  selected?: number;
  pageSize?: number;
  allowShuffle?: boolean;
}

export const QUEUE_ITEM_BASE = 1000;

export function queueItem(offset: number) {
  return {
    playQueueItemID: QUEUE_ITEM_BASE + offset,
    key: `/library/metadata/${2000 + offset}`,
    ratingKey: String(2000 + offset),
    duration: 180000,
    title: `Track ${offset}`,
    type: 'track',
    Media: [{ Part: [{ key: `/library/parts/${3000 + offset}/file.flac` }] }],
  };
}

/**
 * @hebrew שרת תור ניגון 17 בזיכרון, פריט במיקום i מקבל מזהה 1000+i.
 * בקשה עם center מחזירה את הפריט המרכזי ועוד pageSize פריטים לכיוון המבוקש.
 */
export function createQueueServer(options: QueueServerOptions = {}) {
  const total = options.total ?? 100;
  const length = total === 0 ? 1000 : total;
  const windowStart = options.windowStart ?? 40;
  const windowSize = options.windowSize ?? 10;
  const selected = options.selected ?? 45;
  const pageSize = options.pageSize ?? 10;

  const container = (start: number, end: number) => ({
    MediaContainer: {
      playQueueID: 17,
      playQueueVersion: 3,
      playQueueSelectedItemID: QUEUE_ITEM_BASE + selected,
      playQueueSelectedItemOffset: selected,
      playQueueTotalCount: total,
      ...(options.allowShuffle === undefined ? {} : { allowShuffle: options.allowShuffle ? 1 : 0 }),
      Metadata: Array.from({ length: Math.max(0, end - start) }, (_, i) => queueItem(start + i)),
    },
  });

  return (url: URL) => {
    const center = url.searchParams.get('center');
    if (center === null) {
      return container(windowStart, Math.min(length, windowStart + windowSize));
    }
    const index = Number(center) - QUEUE_ITEM_BASE;
    if (url.searchParams.get('includeAfter') === '1') {
      return container(index, Math.min(length, index + pageSize + 1));
    }
    return container(Math.max(0, index - pageSize), index + 1);
  };
}
