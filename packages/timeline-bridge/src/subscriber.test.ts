import { beforeEach, describe, it, expect, vi } from 'vitest';
import { PUSH_TIMEOUT_MS, Subscriber } from './subscriber';
import { STOPPED_SNAPSHOT } from './timeline';
import { createFakeHttp, type FakeHttp } from './testDoubles';

describe('Subscriber', () => {
    let http: FakeHttp;
    const owner = { removeSubscriber: vi.fn(() => true) };

    beforeEach(() => {
        http = createFakeHttp();
        owner.removeSubscriber.mockClear();
    });

    it('should build the timeline URL of the controller', () => {
        const subscriber = new Subscriber('client-1', '10.0.0.9', 32500, owner, 'http', 0, http);

        expect(subscriber.url).toBe('http://10.0.0.9:32500/:/timeline');
        expect(subscriber.toString()).toBe('10.0.0.9:32500');
        expect(subscriber.matches('10.0.0.9', 32500, 'http')).toBe(true);
        expect(subscriber.matches('10.0.0.9', 32500, 'https')).toBe(false);
    });

    it('should post the timeline with its command id', async () => {
        const subscriber = new Subscriber('client-1', '10.0.0.9', 32500, owner, 'http', 7, http);

        expect(await subscriber.send(STOPPED_SNAPSHOT, { 'X-Test': '1' })).toBe(true);

        expect(http.post).toHaveBeenCalledTimes(1);
        const [url, body, config] = http.post.mock.calls[0];
        expect(url).toBe('http://10.0.0.9:32500/:/timeline');
        expect(String(body)).toContain('<MediaContainer commandID="7">');
        expect(config).toEqual({ headers: { 'X-Test': '1' }, timeout: PUSH_TIMEOUT_MS });
        expect(owner.removeSubscriber).not.toHaveBeenCalled();
    });

    it('should remove itself when the controller does not answer', async () => {
        http.post.mockRejectedValueOnce(new Error('socket hang up'));
        const subscriber = new Subscriber('client-1', '10.0.0.9', 32500, owner, 'http', 0, http);

        expect(await subscriber.send(STOPPED_SNAPSHOT, {})).toBe(false);
        expect(owner.removeSubscriber).toHaveBeenCalledWith('client-1');
    });
});
