import { EventEmitter } from 'node:events';
import { describe, it, expect, vi } from 'vitest';
import type { SsdpSocket } from '@dlna-bridge/upnp-core';
import { TimelineBridge } from './bridge';
import { loadConfig } from './config';
import { createFakeHttp, FakeDirectory } from './testDoubles';

const LOCATION = 'http://10.0.0.5:8200/desc.xml';

class FakeSocket extends EventEmitter implements SsdpSocket {
    bind = vi.fn((_port: number, callback: () => void) => {
        callback();
    });
    addMembership = vi.fn((_address: string) => undefined);
    setMulticastTTL = vi.fn((_ttl: number) => undefined);
    send = vi.fn((_msg: Buffer, _port: number, _address: string, callback: (error: Error | null) => void) => {
        callback(null);
    });
    close = vi.fn((callback?: () => void) => {
        this.emit('close');
        callback?.();
    });
}

describe('TimelineBridge', () => {
    it('should load the configured location without opening a socket', async () => {
        const http = createFakeHttp();
        http.get.mockRejectedValue(new Error('connect ECONNREFUSED'));
        const createSocket = vi.fn(() => new FakeSocket());
        const bridge = new TimelineBridge({
            adapters: new FakeDirectory(),
            config: loadConfig({ DISCOVERY_LOCATION_URL: LOCATION }),
            http,
            hostIp: '10.0.0.2',
            createSocket,
        });

        await bridge.start();

        expect(http.get.mock.calls[0][0]).toBe(LOCATION);
        expect(bridge.registry.list()).toEqual([]);
        expect(bridge.manager.isRunning).toBe(true);
        expect(createSocket).not.toHaveBeenCalled();

        await bridge.stop();
        expect(bridge.manager.isRunning).toBe(false);
    });

    it('should follow locations announced over SSDP', async () => {
        const http = createFakeHttp();
        http.get.mockRejectedValue(new Error('connect ECONNREFUSED'));
        const socket = new FakeSocket();
        const bridge = new TimelineBridge({
            adapters: new FakeDirectory(),
            config: loadConfig({ DISCOVERY_MULTICAST_TTL: '2' }),
            http,
            hostIp: null,
            createSocket: () => socket,
        });

        await bridge.start();
        socket.emit('message', Buffer.from(`HTTP/1.1 200 OK\r\nLOCATION: ${LOCATION}\r\nCACHE-CONTROL: max-age=1800\r\n\r\n`));

        await vi.waitFor(() => expect(http.get).toHaveBeenCalledTimes(1));
        expect(http.get.mock.calls[0][0]).toBe(LOCATION);
        expect(socket.setMulticastTTL).toHaveBeenCalledWith(2);
        expect(bridge.discovery.knownLocations.has(LOCATION)).toBe(true);

        await bridge.stop();
        expect(socket.close).toHaveBeenCalledTimes(1);
    });
});
