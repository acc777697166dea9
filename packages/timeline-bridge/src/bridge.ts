import type { HttpClient, SsdpSocket } from '@dlna-bridge/upnp-core';
import { createModuleLogger, defaultHttpClient, DeviceRegistry, SsdpDiscovery } from '@dlna-bridge/upnp-core';
import type { AdapterDirectory } from './adapter';
import { callbackHost, config as defaultBridgeConfig, type BridgeConfig } from './config';
import { DeviceDataStore } from './deviceDataStore';
import { SubscribeManager } from './subscribeManager';

const logger = createModuleLogger('TimelineBridge');

export interface TimelineBridgeOptions {
  adapters: AdapterDirectory;
  config?: BridgeConfig;
  http?: HttpClient;
  /** כתובת ה-IP לאירועים. ברירת מחדל: זיהוי לפי התצורה */
  hostIp?: string | null;
  createSocket?: () => SsdpSocket;
}

/**
 * @hebrew מחבר את כל החלקים: גילוי, רשימת התקנים, נתוני התקנים ומנהל המנויים.
 */
export class TimelineBridge {
  readonly config: BridgeConfig;
  readonly store: DeviceDataStore;
  readonly registry: DeviceRegistry;
  readonly discovery: SsdpDiscovery;
  readonly manager: SubscribeManager;
  private managerLoop: Promise<void> | null = null;

  constructor(options: TimelineBridgeOptions) {
    const config = options.config ?? defaultBridgeConfig;
    const http = options.http ?? defaultHttpClient;
    this.config = config;
    this.store = new DeviceDataStore({
      configPath: config.storage.configPath,
      dataFileName: config.storage.dataFileName,
      aliases: config.aliases.list,
    });
    this.registry = new DeviceRegistry({
      http,
      aliasResolver: this.store,
      defaultModel: config.player.product,
      callbackHost: options.hostIp === undefined ? callbackHost(config) : callbackHost(config, options.hostIp),
    });
    this.discovery = new SsdpDiscovery({
      locationUrl: config.discovery.locationUrl,
      bindPort: config.discovery.bindPort,
      multicastTtl: config.discovery.multicastTtl,
      searchIntervalMs: config.discovery.searchIntervalMs,
      createSocket: options.createSocket,
    });
    this.manager = new SubscribeManager({
      devices: this.registry,
      adapters: options.adapters,
      player: config.player,
      notifyIntervalMs: config.notify.intervalMs,
      http,
    });
  }

  async start(): Promise<void> {
    logger.info('Starting timeline bridge');
    await this.discovery.discover(async location => {
      await this.registry.addFromLocation(location);
    });
    this.managerLoop = this.manager.start().catch((error: unknown) => {
      logger.error('Subscribe manager loop failed', { error });
    });
  }

  async stop(): Promise<void> {
    this.manager.stop();
    await this.discovery.stop();
    for (const device of this.registry.list()) {
      device.stopAllSubscriptions();
    }
    await this.managerLoop;
    this.managerLoop = null;
    logger.info('Timeline bridge stopped');
  }
}
