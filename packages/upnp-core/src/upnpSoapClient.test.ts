import { describe, it, expect } from 'vitest';
import { AxiosError } from 'axios';
import { buildSoapEnvelope, parseSoapResponse, sendSoapRequest, SOAP_TIMEOUT_MS } from './upnpSoapClient';
import { createFakeHttp, soapFault, soapResponse } from './testHttp';

const AVT = 'urn:schemas-upnp-org:service:AVTransport:1';
const CONTROL_URL = 'http://10.0.0.5:8200/avt/control';

describe('buildSoapEnvelope', () => {
    it('should write the arguments in order inside the action element', () => {
        const envelope = buildSoapEnvelope(AVT, 'Play', { InstanceID: 0, Speed: 1 });

        expect(envelope).toContain('<s:Envelope xmlns:s="http://schemas.xmlsoap.org/soap/envelope/" s:encodingStyle="http://schemas.xmlsoap.org/soap/encoding/">');
        expect(envelope).toContain(`<s:Body><u:Play xmlns:u="${AVT}"><InstanceID>0</InstanceID><Speed>1</Speed></u:Play></s:Body>`);
    });

    it('should escape argument values', () => {
        const envelope = buildSoapEnvelope(AVT, 'SetAVTransportURI', { CurrentURI: 'http://h/a?x=1&y=2' });
        expect(envelope).toContain('<CurrentURI>http://h/a?x=1&amp;y=2</CurrentURI>');
    });
});

describe('parseSoapResponse', () => {
    it('should return the output values of the action', async () => {
        const xml = soapResponse('GetVolume', 'urn:schemas-upnp-org:service:RenderingControl:1', '<CurrentVolume>12</CurrentVolume>');
        expect(await parseSoapResponse(xml, 'GetVolume')).toEqual({ kind: 'result', values: { CurrentVolume: 12 } });
    });

    it('should return an empty result for an empty response element', async () => {
        expect(await parseSoapResponse(soapResponse('Play', AVT), 'Play')).toEqual({ kind: 'result', values: {} });
    });

    it('should read the UPnP error of a fault', async () => {
        const outcome = await parseSoapResponse(soapFault(701, 'Transition not available'), 'Play');
        expect(outcome).toEqual({
            kind: 'fault',
            fault: {
                faultCode: 's:Client',
                faultString: 'UPnPError',
                upnpErrorCode: 701,
                upnpErrorDescription: 'Transition not available',
            },
        });
    });

    it('should report unparseable XML as a client parse fault', async () => {
        const outcome = await parseSoapResponse('<not-closed', 'Play');
        expect(outcome.kind).toBe('fault');
        if (outcome.kind !== 'fault') return;
        expect(outcome.fault.faultCode).toBe('ClientParseError');
    });
});

describe('sendSoapRequest', () => {
    it('should post the envelope with the SOAPACTION header', async () => {
        const http = createFakeHttp();
        http.post.mockResolvedValueOnce({ status: 200, data: soapResponse('Stop', AVT) });

        const outcome = await sendSoapRequest(http, CONTROL_URL, AVT, 'Stop', { InstanceID: 0 });

        expect(outcome).toEqual({ kind: 'result', values: {} });
        expect(http.post).toHaveBeenCalledWith(CONTROL_URL, expect.stringContaining('<InstanceID>0</InstanceID>'), {
            headers: {
                'Content-Type': 'text/xml; charset="utf-8"',
                SOAPACTION: `"${AVT}#Stop"`,
            },
            responseType: 'text',
            timeout: SOAP_TIMEOUT_MS,
        });
    });

    it('should classify a request without a response as a connection error', async () => {
        const http = createFakeHttp();
        http.post.mockRejectedValueOnce(new AxiosError('connect ECONNREFUSED 10.0.0.5:8200', 'ECONNREFUSED'));

        const outcome = await sendSoapRequest(http, CONTROL_URL, AVT, 'Stop', { InstanceID: 0 });

        expect(outcome.kind).toBe('connection-error');
    });

    it('should classify other failures as errors', async () => {
        const http = createFakeHttp();
        http.post.mockRejectedValueOnce(new Error('boom'));

        const outcome = await sendSoapRequest(http, CONTROL_URL, AVT, 'Stop', { InstanceID: 0 });

        expect(outcome).toEqual({ kind: 'error', error: new Error('boom') });
    });
});
