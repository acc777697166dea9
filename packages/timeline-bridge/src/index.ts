// From config.ts
export {
    callbackHost,
    config,
    defaultConfig,
    loadConfig,
    resolveHostIp,
} from './config';
export type { BridgeConfig, EnvSource, PlayerConfig } from './config';

// From errors.ts
export { QueueError } from './errors';

// From deviceDataStore.ts
export { DeviceDataStore, parseAliasTable } from './deviceDataStore';
export type { AliasEntry, DeviceData, DeviceDataStoreOptions, DeviceRecord } from './deviceDataStore';

// From mediaServer.ts
export { MediaServer, TIMELINE_PATH, TOKEN_PARAM } from './mediaServer';

// From playQueue.ts
export {
    MAX_PAGING_ROUNDS,
    MIN_QUEUE_GAP,
    PlayQueue,
    readMediaContainer,
    UNLIMITED,
} from './playQueue';
export type { QueueInfo, QueueMedia, QueueMediaPart, QueueTrack, TrackInfo } from './playQueue';

// From adapter.ts
export type { AdapterDirectory, PlaybackAdapter, PlaybackState, TimelineParameters } from './adapter';

// From headers.ts
export {
    serverReportHeaders,
    serverResponseHeaders,
    subscriberPushHeaders,
    timelinePollHeaders,
} from './headers';
export type { DeviceIdentity, HeaderMap, PlayerInfo } from './headers';

// From timeline.ts
export {
    buildTimelineXml,
    CONTROLLABLE,
    DISCONNECTED_SNAPSHOT,
    STOPPED_SNAPSHOT,
} from './timeline';
export type { TimelineSnapshot } from './timeline';

// From subscriber.ts
export { PUSH_TIMEOUT_MS, Subscriber } from './subscriber';
export type { SubscriberOwner } from './subscriber';

// From subscribeManager.ts
export { DEFAULT_NOTIFY_INTERVAL_MS, SubscribeManager, WAIT_INTERVALS } from './subscribeManager';
export type { DeviceDirectory, SubscribeManagerOptions } from './subscribeManager';

// From bridge.ts
export { TimelineBridge } from './bridge';
export type { TimelineBridgeOptions } from './bridge';
