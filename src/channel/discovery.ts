import { ImouError, InvalidResponseError } from "../exceptions";
import { createLogger, ImouLogger } from "../logger";
import type { DeviceBaseItem, ImouApi } from "../types";
import { ImouCamChannel } from "./channel";

/**
 * Discover the camera channels registered with an Imou account
 */
export class ImouDiscoverService {
  private readonly apiClient: ImouApi;
  private readonly log: ImouLogger;

  constructor(apiClient: ImouApi, logger?: ImouLogger) {
    this.apiClient = apiClient;
    this.log = logger ?? createLogger("discovery");
  }

  /**
   * Discover every registered channel and initialize it.
   *
   * A device whose details cannot be understood is skipped; any other API
   * failure stops the discovery and the channels found so far are returned.
   * Channels are keyed by display name, which is not guaranteed to be unique.
   */
  async discoverChannels(): Promise<Record<string, ImouCamChannel>> {
    this.log.debug("Starting discovery");
    const channels: Record<string, ImouCamChannel> = {};

    try {
      const devicesData = await this.apiClient.deviceBaseList();
      if (devicesData.deviceList === undefined || devicesData.count === undefined) {
        throw new InvalidResponseError(`deviceList or count not found in ${JSON.stringify(devicesData)}`);
      }
      this.log.debug(`Discovered ${devicesData.count} registered devices`);

      for (const device of devicesData.deviceList) {
        try {
          await this.discoverDevice(device, channels);
        } catch (err) {
          if (!(err instanceof InvalidResponseError)) {
            throw err;
          }
          this.log.warn(`Skipping unrecognized or unsupported device ${device.deviceId}: ${err.toString()}`);
        }
      }
    } catch (err) {
      if (!(err instanceof ImouError)) {
        throw err;
      }
      this.log.error(`Exception: ${err.toString()}`);
    }

    return channels;
  }

  private async discoverDevice(device: DeviceBaseItem, channels: Record<string, ImouCamChannel>): Promise<void> {
    const detailArray = await this.apiClient.deviceBaseDetailList([device.deviceId]);
    if (detailArray.deviceList === undefined || detailArray.deviceList.length !== 1) {
      throw new InvalidResponseError(`deviceList not found in ${JSON.stringify(detailArray)}`);
    }
    const detail = detailArray.deviceList[0];

    for (const channelData of detail.channels) {
      const channel = new ImouCamChannel(this.apiClient, device.deviceId, channelData.channelId, this.log);
      await channel.initialize();
      channels[channel.getName()] = channel;
    }
  }
}
