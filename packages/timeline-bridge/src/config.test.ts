import { describe, it, expect } from 'vitest';
import type { NetworkInterfaceInfo } from 'node:os';
import { callbackHost, camelToSnakeCase, defaultConfig, loadConfig, resolveHostIp } from './config';

function ipv4(address: string, internal: boolean): NetworkInterfaceInfo {
    return { address, netmask: '255.255.255.0', family: 'IPv4', mac: '00:00:00:00:00:00', internal, cidr: `${address}/24` };
}

describe('config', () => {
    describe('camelToSnakeCase', () => {
        it('should turn a camelCase key into an env name part', () => {
            expect(camelToSnakeCase('httpPort')).toBe('HTTP_PORT');
            expect(camelToSnakeCase('platformVersion')).toBe('PLATFORM_VERSION');
            expect(camelToSnakeCase('server')).toBe('SERVER');
        });
    });

    describe('loadConfig', () => {
        it('should use the defaults when no variable is set', () => {
            expect(loadConfig({})).toEqual(defaultConfig);
        });

        it('should override values from the environment by their path', () => {
            const config = loadConfig({
                SERVER_HTTP_PORT: '40000',
                PLAYER_PLATFORM: 'Raspbian',
                DISCOVERY_LOCATION_URL: 'http://10.0.0.5:8200/desc.xml',
                ALIASES_LIST: 'Living Room Speaker:Salon',
            });

            expect(config.server.httpPort).toBe(40000);
            expect(config.player.platform).toBe('Raspbian');
            expect(config.discovery.locationUrl).toBe('http://10.0.0.5:8200/desc.xml');
            expect(config.aliases.list).toBe('Living Room Speaker:Salon');
            expect(defaultConfig.server.httpPort).toBe(32488);
        });

        it('should keep the default for an invalid number', () => {
            const config = loadConfig({ NOTIFY_INTERVAL_MS: 'soon', DISCOVERY_BIND_PORT: '' });

            expect(config.notify.intervalMs).toBe(500);
            expect(config.discovery.bindPort).toBe(1910);
        });
    });

    describe('resolveHostIp', () => {
        it('should prefer the configured address', () => {
            const config = loadConfig({ SERVER_HOST_IP: '192.168.1.20' });

            expect(resolveHostIp(config, { eth0: [ipv4('10.0.0.2', false)] })).toBe('192.168.1.20');
        });

        it('should pick the first external IPv4 address', () => {
            const interfaces = {
                lo: [ipv4('127.0.0.1', true)],
                eth0: [ipv4('10.0.0.2', false)],
            };

            expect(resolveHostIp(loadConfig({}), interfaces)).toBe('10.0.0.2');
        });

        it('should return null without an external address', () => {
            expect(resolveHostIp(loadConfig({}), { lo: [ipv4('127.0.0.1', true)] })).toBeNull();
        });
    });

    it('should combine the host address and the http port for event callbacks', () => {
        expect(callbackHost(loadConfig({ SERVER_HTTP_PORT: '40000' }), '10.0.0.2')).toEqual({ hostIp: '10.0.0.2', httpPort: 40000 });
    });
});
