import { EventEmitter } from 'node:events';
import type { RemoteInfo } from 'node:dgram';
import { describe, it, expect, vi } from 'vitest';
import { buildMSearchMessage, SsdpDiscovery, type SsdpSocket } from './ssdpDiscovery';

const RINFO: RemoteInfo = { address: '10.0.0.5', family: 'IPv4', port: 1900, size: 0 };

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

function searchResponse(location: string): Buffer {
    return Buffer.from([
        'HTTP/1.1 200 OK',
        'CACHE-CONTROL: max-age=1800',
        `LOCATION: ${location}`,
        'ST: urn:schemas-upnp-org:device:MediaRenderer:1',
        'Content-Length: 0',
        '',
        '',
    ].join('\r\n'));
}

describe('buildMSearchMessage', () => {
    it('should search for all devices', () => {
        expect(buildMSearchMessage()).toBe(
            'M-SEARCH * HTTP/1.1\r\nHOST: 239.255.255.250:1900\r\nMAN: "ssdp:discover"\r\nMX: 10\r\nST: ssdp:all\r\n\r\n',
        );
    });
});

describe('SsdpDiscovery', () => {
    it('should join the multicast group and send a search', async () => {
        const socket = new FakeSocket();
        const discovery = new SsdpDiscovery({ createSocket: () => socket });

        await discovery.discover(() => undefined);

        expect(socket.bind).toHaveBeenCalledWith(1910, expect.any(Function));
        expect(socket.setMulticastTTL).toHaveBeenCalledWith(4);
        expect(socket.addMembership).toHaveBeenCalledWith('239.255.255.250');
        expect(socket.send).toHaveBeenCalledTimes(1);
        const [message, port, address] = socket.send.mock.calls[0];
        expect(message.toString()).toBe(buildMSearchMessage());
        expect(port).toBe(1900);
        expect(address).toBe('239.255.255.250');
        expect(discovery.isConnected).toBe(true);

        await discovery.stop();
        expect(socket.close).toHaveBeenCalledTimes(1);
        expect(discovery.isConnected).toBe(false);
    });

    it('should reject and close the socket when the bind fails', async () => {
        const socket = new FakeSocket();
        socket.bind.mockImplementation((_port: number, _callback: () => void) => {
            socket.emit('error', new Error('bind EADDRINUSE 0.0.0.0:1910'));
        });
        const discovery = new SsdpDiscovery({ createSocket: () => socket });

        await expect(discovery.discover(() => undefined)).rejects.toThrow('bind EADDRINUSE 0.0.0.0:1910');

        expect(socket.close).toHaveBeenCalledTimes(1);
        expect(socket.send).not.toHaveBeenCalled();
        expect(discovery.isConnected).toBe(false);
    });

    it('should close the socket and allow a retry when joining the group fails', async () => {
        const failing = new FakeSocket();
        failing.addMembership.mockImplementation(() => {
            throw new Error('addMembership ENODEV');
        });
        const working = new FakeSocket();
        const createSocket = vi.fn((): FakeSocket => working).mockReturnValueOnce(failing);
        const discovery = new SsdpDiscovery({ createSocket });

        await expect(discovery.discover(() => undefined)).rejects.toThrow('addMembership ENODEV');
        expect(failing.close).toHaveBeenCalledTimes(1);

        await discovery.discover(() => undefined);

        expect(createSocket).toHaveBeenCalledTimes(2);
        expect(working.addMembership).toHaveBeenCalledWith('239.255.255.250');
        expect(discovery.isConnected).toBe(true);
        await discovery.stop();
        expect(working.close).toHaveBeenCalledTimes(1);
    });

    it('should report each location once', async () => {
        const socket = new FakeSocket();
        const discovery = new SsdpDiscovery({ createSocket: () => socket });
        const onNewDevice = vi.fn((_location: string) => undefined);
        await discovery.discover(onNewDevice);

        socket.emit('message', searchResponse('http://10.0.0.5:8200/desc.xml'), RINFO);
        socket.emit('message', searchResponse('http://10.0.0.5:8200/desc.xml'), RINFO);
        socket.emit('message', searchResponse('http://10.0.0.7:49152/rootDesc.xml'), RINFO);

        await vi.waitFor(() => expect(onNewDevice).toHaveBeenCalledTimes(2));
        expect(onNewDevice.mock.calls.map(([location]) => location)).toEqual([
            'http://10.0.0.5:8200/desc.xml',
            'http://10.0.0.7:49152/rootDesc.xml',
        ]);
        await discovery.stop();
    });

    it('should ignore messages without a location', () => {
        const discovery = new SsdpDiscovery();
        const onNewDevice = vi.fn();

        const location = discovery.handleMessage(Buffer.from('NOTIFY * HTTP/1.1\r\nNTS: ssdp:byebye\r\n\r\n'), onNewDevice);

        expect(location).toBeNull();
        expect(discovery.knownLocations.size).toBe(0);
    });

    it('should keep going when the callback fails', async () => {
        const discovery = new SsdpDiscovery();
        const onNewDevice = vi.fn(async () => {
            throw new Error('callback failed');
        });

        expect(discovery.handleMessage(searchResponse('http://10.0.0.5:8200/desc.xml'), onNewDevice)).toBe('http://10.0.0.5:8200/desc.xml');
        await vi.waitFor(() => expect(onNewDevice).toHaveBeenCalledTimes(1));
        expect(discovery.handleMessage(searchResponse('http://10.0.0.8:8200/desc.xml'), onNewDevice)).toBe('http://10.0.0.8:8200/desc.xml');
    });

    it('should use a static location without touching the network', async () => {
        const createSocket = vi.fn(() => new FakeSocket());
        const discovery = new SsdpDiscovery({ locationUrl: 'http://10.0.0.5:8200/desc.xml', createSocket });
        const onNewDevice = vi.fn();

        await discovery.discover(onNewDevice);

        expect(onNewDevice).toHaveBeenCalledWith('http://10.0.0.5:8200/desc.xml');
        expect(createSocket).not.toHaveBeenCalled();
    });
});
