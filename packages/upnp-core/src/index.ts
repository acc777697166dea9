// From logger.ts
export {
    default as createLogger,
    createModuleLogger,
} from './logger';
export type { CustomLogger, LogLevel } from './logger';

// From types.ts
export type * from './types';

// From errors.ts
export {
    ActionArgumentError,
    ActionNotFoundError,
    DeviceValidationError,
    ServiceNotFoundError,
} from './errors';

// From utils.ts
export {
    convertVolume,
    createHttpClient,
    defaultHttpClient,
    delay,
    formatTimedelta,
    isConnectionError,
    parseTimedelta,
    toError,
} from './utils';

// From upnpSoapClient.ts
export {
    buildSoapEnvelope,
    parseSoapResponse,
    sendSoapRequest,
    SOAP_TIMEOUT_MS,
} from './upnpSoapClient';

// From upnpService.ts
export {
    buildActionArguments,
    DEFAULT_ACTION_DATA,
    DEFAULT_SUBSCRIBE_TIMEOUT_SEC,
    parseServiceSpec,
    UpnpService,
} from './upnpService';

// From upnpDevice.ts
export {
    ERROR_COUNT_TO_REMOVE,
    parseDeviceDescription,
    UpnpDevice,
} from './upnpDevice';
export type { DeviceOwner, PositionInfo } from './upnpDevice';

// From deviceRegistry.ts
export { DeviceRegistry } from './deviceRegistry';
export type { RemovalHandler, RegistryTask } from './deviceRegistry';

// From ssdpDiscovery.ts
export {
    buildMSearchMessage,
    parseSsdpHeaders,
    SsdpDiscovery,
} from './ssdpDiscovery';
export type { NewDeviceCallback, SsdpDiscoveryOptions, SsdpSocket } from './ssdpDiscovery';
