import { ImouApiClient } from "./api/client";
import { ImouCamChannel } from "./channel/channel";
import { ImouDiscoverService } from "./channel/discovery";
import { DEFAULT_API_URL, DEFAULT_SCAN_INTERVAL } from "./constants";
import { ImouDataUpdateCoordinator } from "./coordinator";
import { ImouError, SetupNotReadyError } from "./exceptions";
import { createLogger, ImouLogger } from "./logger";
import { parseTimeout } from "./utils";

/** Credentials and endpoint of the Imou open API */
export interface ImouConnectionOptions {
  apiUrl?: string;
  appId: string;
  appSecret: string;
  /** Request timeout in seconds; an empty string keeps the default */
  apiTimeout?: number | string | null;
  logger?: ImouLogger;
}

/** Options of a single configured channel */
export interface ImouChannelOptions extends ImouConnectionOptions {
  deviceId: string;
  channelId: string;
  /** Display name overriding "<device> - <channel>" */
  channelName?: string;
  /** Seconds to wait after waking up a dormant device */
  waitAfterWakeup?: number;
  cameraWaitBeforeDownload?: number;
  /** Polling interval in seconds */
  scanInterval?: number;
}

export interface ImouChannelSetup {
  client: ImouApiClient;
  channel: ImouCamChannel;
  coordinator: ImouDataUpdateCoordinator;
}

export function createApiClient(options: ImouConnectionOptions): ImouApiClient {
  const log = options.logger ?? createLogger("setup");
  const client = new ImouApiClient(options.apiUrl ?? DEFAULT_API_URL, options.appId, options.appSecret, undefined, options.logger);
  const timeout = parseTimeout(options.apiTimeout);
  if (timeout !== null) {
    log.debug(`Setting API timeout to ${timeout}`);
    client.setTimeout(timeout);
  }
  return client;
}

/**
 * Check the credentials and list every channel visible to them, keyed by
 * display name.
 */
export async function discover(options: ImouConnectionOptions): Promise<Record<string, ImouCamChannel>> {
  const client = createApiClient(options);
  await client.connect();
  const service = new ImouDiscoverService(client, options.logger);
  return service.discoverChannels();
}

/**
 * Set up one channel: create it, discover its entities and run a first
 * polling cycle.
 *
 * Every entity starts disabled; the host enables those it registers.
 * Throws SetupNotReadyError when the channel cannot be polled yet.
 */
export async function setupChannel(options: ImouChannelOptions): Promise<ImouChannelSetup> {
  const log = options.logger ?? createLogger("setup");
  log.debug(`Setting up device ${options.channelName ?? ""} (${options.deviceId})`);

  const client = createApiClient(options);

  const channel = new ImouCamChannel(client, options.deviceId, options.channelId, options.logger);
  if (options.channelName !== undefined && options.channelName !== "") {
    channel.setName(options.channelName);
  }
  if (options.cameraWaitBeforeDownload !== undefined) {
    log.debug(`Setting camera wait before download to ${options.cameraWaitBeforeDownload}`);
    channel.setCameraWaitBeforeDownload(options.cameraWaitBeforeDownload);
  }
  if (options.waitAfterWakeup !== undefined) {
    log.debug(`Setting wait after wakeup to ${options.waitAfterWakeup}`);
    channel.setWaitAfterWakeup(options.waitAfterWakeup);
  }

  try {
    await channel.initialize();
  } catch (err) {
    if (err instanceof ImouError) {
      log.error(err.toString());
      throw new SetupNotReadyError(err.toString());
    }
    throw err;
  }
  for (const sensor of channel.getAllSensors()) {
    sensor.setEnabled(false);
  }

  const coordinator = new ImouDataUpdateCoordinator(channel, options.scanInterval ?? DEFAULT_SCAN_INTERVAL, options.logger);
  await coordinator.refresh();
  if (!coordinator.lastUpdateSuccess) {
    throw new SetupNotReadyError(coordinator.lastError?.toString() ?? `channel ${channel.getName()} could not be refreshed`);
  }

  return { client, channel, coordinator };
}
