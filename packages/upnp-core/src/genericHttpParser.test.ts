// src/genericHttpParser.test.ts
import { describe, it, expect } from 'vitest';
import { HTTP_REQUEST_TYPE, HTTP_RESPONSE_TYPE, parseHeaderLines, parseHttpPacket } from './genericHttpParser';

describe('parseHttpPacket', () => {
    it('should parse an SSDP search response', () => {
        const responseLines = [
            'HTTP/1.1 200 OK',
            'CACHE-CONTROL: max-age=1800',
            'LOCATION: http://10.0.0.5:8200/desc.xml',
            'ST: urn:schemas-upnp-org:device:MediaRenderer:1',
            'USN: uuid:5f9ec1b6-0000-4000-8000-000000000001::urn:schemas-upnp-org:device:MediaRenderer:1',
            'Content-Length: 0',
            '',
            '',
        ];
        const result = parseHttpPacket(Buffer.from(responseLines.join('\r\n')), HTTP_RESPONSE_TYPE);

        expect(result).not.toBeNull();
        if (!result) return;

        expect(result.statusCode).toBe(200);
        expect(result.statusMessage).toBe('OK');
        expect(result.headers.location).toBe('http://10.0.0.5:8200/desc.xml');
        expect(result.headers['cache-control']).toBe('max-age=1800');
        expect(result.body).toBeUndefined();
    });

    it('should parse an SSDP NOTIFY request', () => {
        const requestLines = [
            'NOTIFY * HTTP/1.1',
            'HOST: 239.255.255.250:1900',
            'LOCATION: http://10.0.0.7:49152/rootDesc.xml',
            'NT: upnp:rootdevice',
            'NTS: ssdp:alive',
            '',
            '',
        ];
        const result = parseHttpPacket(Buffer.from(requestLines.join('\r\n')), HTTP_REQUEST_TYPE);

        expect(result).not.toBeNull();
        if (!result) return;

        expect(result.method).toBe('NOTIFY');
        expect(result.url).toBe('*');
        expect(result.headers).toEqual({
            host: '239.255.255.250:1900',
            location: 'http://10.0.0.7:49152/rootDesc.xml',
            nt: 'upnp:rootdevice',
            nts: 'ssdp:alive',
        });
    });

    it('should return null for a message that is not HTTP', () => {
        expect(parseHttpPacket(Buffer.from('hello there\r\n\r\n'), HTTP_REQUEST_TYPE)).toBeNull();
    });
});

describe('parseHeaderLines', () => {
    it('should skip the start line and lowercase header names', () => {
        const text = 'HTTP/1.1 200 OK\r\nLocation:  http://10.0.0.5:8200/desc.xml \r\nbroken line\r\nST: ssdp:all\r\n\r\n';
        expect(parseHeaderLines(text)).toEqual({
            location: 'http://10.0.0.5:8200/desc.xml',
            st: 'ssdp:all',
        });
    });
});
