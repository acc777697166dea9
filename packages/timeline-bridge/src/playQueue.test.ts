import { beforeEach, describe, it, expect } from 'vitest';
import { QueueError } from './errors';
import { MIN_QUEUE_GAP, PlayQueue, readMediaContainer, UNLIMITED } from './playQueue';
import { createFakeHttp, createQueueServer, queueItem, type FakeHttp, type QueueServerOptions } from './testDoubles';

const QUEUE_URL = 'http://10.0.0.3:32400/playQueues/17?own=1&X-Plex-Token=test-token';

function serveQueue(http: FakeHttp, options: QueueServerOptions = {}, pages: Record<string, unknown> = {}): void {
    const server = createQueueServer(options);
    http.get.mockImplementation(async (url: string) => {
        const parsed = new URL(url);
        return { status: 200, data: pages[parsed.pathname] ?? server(parsed) };
    });
}

describe('PlayQueue', () => {
    let http: FakeHttp;

    beforeEach(() => {
        http = createFakeHttp();
    });

    describe('fromUrl', () => {
        it('should split the media server and the container key', () => {
            const queue = PlayQueue.fromUrl(QUEUE_URL, http);

            expect(queue.containerKey).toBe('/playQueues/17?own=1');
            expect(queue.server.protocol).toBe('http');
            expect(queue.server.address).toBe('10.0.0.3');
            expect(queue.server.port).toBe(32400);
            expect(queue.server.token).toBe('test-token');
        });
    });

    describe('getInfo', () => {
        it('should place the window around the selected item', async () => {
            serveQueue(http);
            const queue = PlayQueue.fromUrl(QUEUE_URL, http);

            const info = await queue.getInfo();
            await queue.getInfo();

            expect(info.playQueueID).toBe(17);
            expect(queue.startOffset).toBe(40);
            expect(queue.lastOffset).toBe(49);
            expect(http.get).toHaveBeenCalledTimes(1);
            expect(http.get).toHaveBeenCalledWith(QUEUE_URL, { headers: { Accept: 'application/json' } });
        });
    });

    describe('track', () => {
        it('should read a track inside the window without paging', async () => {
            serveQueue(http);
            const queue = PlayQueue.fromUrl(QUEUE_URL, http);

            expect((await queue.track(45)).playQueueItemID).toBe(1045);
            expect(http.get).toHaveBeenCalledTimes(1);
        });

        it('should page forward around the last item', async () => {
            serveQueue(http);
            const queue = PlayQueue.fromUrl(QUEUE_URL, http);

            const track = await queue.track(52);

            expect(track.playQueueItemID).toBe(1052);
            expect(queue.lastOffset).toBe(59);
            expect(http.get).toHaveBeenCalledTimes(2);
            expect(http.get.mock.calls[1][0]).toBe(`${QUEUE_URL}&includeAfter=1&includeBefore=0&center=1049`);
        });

        it('should page backward and move the start offset', async () => {
            serveQueue(http);
            const queue = PlayQueue.fromUrl(QUEUE_URL, http);

            const track = await queue.track(0);

            expect(track.playQueueItemID).toBe(1000);
            expect(queue.startOffset).toBe(0);
            expect(await queue.availableCount()).toBe(50);
        });

        it('should return the same track however the window was reached', async () => {
            serveQueue(http);
            const queue = PlayQueue.fromUrl(QUEUE_URL, http);

            const before = await queue.track(52);
            await queue.track(99);
            await queue.track(3);
            const after = await queue.track(52);

            expect(after).toEqual(before);
        });

        it('should reject offsets outside the queue', async () => {
            serveQueue(http);
            const queue = PlayQueue.fromUrl(QUEUE_URL, http);

            await expect(queue.track(100)).rejects.toBeInstanceOf(QueueError);
            await expect(queue.track(-1)).rejects.toBeInstanceOf(QueueError);
        });
    });

    describe('more', () => {
        it('should do nothing at the end of the queue', async () => {
            serveQueue(http, { windowStart: 90, selected: 95 });
            const queue = PlayQueue.fromUrl(QUEUE_URL, http);

            expect(await queue.more(true)).toBe(0);
            expect(http.get).toHaveBeenCalledTimes(1);
        });

        it('should do nothing once the window starts at offset 1', async () => {
            serveQueue(http, { windowStart: 1, selected: 3 });
            const queue = PlayQueue.fromUrl(QUEUE_URL, http);

            expect(await queue.more(false)).toBe(0);
            expect(queue.startOffset).toBe(1);
            expect(http.get).toHaveBeenCalledTimes(1);
        });
    });

    describe('setSelectedOffset', () => {
        it('should keep the gap on both sides of the selection', async () => {
            serveQueue(http);
            const queue = PlayQueue.fromUrl(QUEUE_URL, http);

            await queue.setSelectedOffset(47);

            expect(await queue.selectedOffset()).toBe(47);
            expect(await queue.selectedItemId()).toBe(1047);
            expect(queue.startOffset).toBe(20);
            expect(queue.lastOffset).toBe(79);
            expect(47 - 20).toBeGreaterThanOrEqual(MIN_QUEUE_GAP);
            expect(79 - 47).toBeGreaterThanOrEqual(MIN_QUEUE_GAP);
            expect(http.get).toHaveBeenCalledTimes(6);
        });

        it('should stop at the end of the queue', async () => {
            serveQueue(http);
            const queue = PlayQueue.fromUrl(QUEUE_URL, http);

            await queue.setSelectedOffset(98);

            expect(queue.lastOffset).toBe(99);
            expect(queue.startOffset).toBe(40);
            expect((await queue.selectedTrack()).playQueueItemID).toBe(1098);
        });

        it('should reject an offset past the total count', async () => {
            serveQueue(http);
            const queue = PlayQueue.fromUrl(QUEUE_URL, http);

            await expect(queue.setSelectedOffset(100)).rejects.toBeInstanceOf(QueueError);
        });
    });

    describe('navigation', () => {
        it('should move the selection to the next and previous tracks', async () => {
            serveQueue(http);
            const queue = PlayQueue.fromUrl(QUEUE_URL, http);

            expect((await queue.nextTrack()).playQueueItemID).toBe(1046);
            expect(await queue.selectedOffset()).toBe(46);
            expect((await queue.prevTrack()).playQueueItemID).toBe(1045);
            expect(await queue.selectedOffset()).toBe(45);
        });

        it('should select a track by its key', async () => {
            serveQueue(http);
            const queue = PlayQueue.fromUrl(QUEUE_URL, http);

            expect(await queue.selectTrackKey('/library/metadata/2042')).toBe(true);
            expect(await queue.selectedItemId()).toBe(1042);
            expect(await queue.selectTrackKey('/library/metadata/9999')).toBe(false);
        });
    });

    describe('refreshQueue', () => {
        it('should keep the selected item when the queue id changes', async () => {
            serveQueue(http, {}, {
                '/playQueues/18': {
                    MediaContainer: {
                        playQueueID: 18,
                        playQueueVersion: 1,
                        playQueueSelectedItemID: 1012,
                        playQueueSelectedItemOffset: 5,
                        playQueueTotalCount: 100,
                        Metadata: [queueItem(12), queueItem(45), queueItem(77)],
                    },
                },
            });
            const queue = PlayQueue.fromUrl(QUEUE_URL, http);
            await queue.getInfo();

            await queue.refreshQueue(18);

            expect(queue.containerKey).toBe('/playQueues/18?own=1');
            expect(http.get.mock.calls[1][0]).toBe('http://10.0.0.3:32400/playQueues/18?own=1&X-Plex-Token=test-token');
            expect(queue.startOffset).toBe(5);
            expect(await queue.selectedOffset()).toBe(6);
            expect(await queue.selectedItemId()).toBe(1045);
            expect((await queue.selectedTrack()).key).toBe('/library/metadata/2045');
        });

        it('should fail when the selected item is missing from the new queue', async () => {
            serveQueue(http, {}, {
                '/playQueues/18': {
                    MediaContainer: {
                        playQueueID: 18,
                        playQueueSelectedItemID: 1012,
                        playQueueSelectedItemOffset: 0,
                        Metadata: [queueItem(12)],
                    },
                },
            });
            const queue = PlayQueue.fromUrl(QUEUE_URL, http);
            await queue.getInfo();

            await expect(queue.refreshQueue(18)).rejects.toThrow('Refreshed queue has no current selected item');
        });
    });

    describe('allowShuffle', () => {
        it('should refuse shuffle for an unbounded queue without an explicit flag', async () => {
            serveQueue(http, { total: 0 });
            const queue = PlayQueue.fromUrl(QUEUE_URL, http);

            expect(await queue.totalCount()).toBe(UNLIMITED);
            expect(await queue.allowShuffle()).toBe(false);
        });

        it('should follow the server flag when present', async () => {
            serveQueue(http, { total: 0, allowShuffle: true });
            const queue = PlayQueue.fromUrl(QUEUE_URL, http);

            expect(await queue.allowShuffle()).toBe(true);
        });

        it('should allow shuffle for a bounded queue', async () => {
            serveQueue(http);
            const queue = PlayQueue.fromUrl(QUEUE_URL, http);

            expect(await queue.allowShuffle()).toBe(true);
        });
    });

    describe('track details', () => {
        it('should build the media part URL with the token', async () => {
            serveQueue(http);
            const queue = PlayQueue.fromUrl(QUEUE_URL, http);

            const track = await queue.selectedTrack();

            expect(queue.urlForTrack(track)).toBe('http://10.0.0.3:32400/library/parts/3045/file.flac?X-Plex-Token=test-token');
        });

        it('should describe the selected track', async () => {
            serveQueue(http);
            const queue = PlayQueue.fromUrl(QUEUE_URL, http);

            expect(await queue.getTrackInfo()).toEqual({
                duration: 180000,
                key: '/library/metadata/2045',
                ratingKey: '2045',
                containerKey: '/playQueues/17',
                playQueueID: 17,
                playQueueVersion: 3,
                playQueueItemID: 1045,
            });
        });
    });
});

describe('readMediaContainer', () => {
    it('should reject a response without a MediaContainer', () => {
        expect(() => readMediaContainer({ error: 'not found' })).toThrow(QueueError);
    });

    it('should reject items without an id', () => {
        const data = {
            MediaContainer: {
                playQueueID: 1,
                playQueueSelectedItemID: 1,
                playQueueSelectedItemOffset: 0,
                Metadata: [{ key: '/library/metadata/1' }],
            },
        };
        expect(() => readMediaContainer(data)).toThrow('Queue item is missing playQueueItemID, key or ratingKey');
    });
});
