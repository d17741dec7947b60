import {
  CAMERA_WAIT_BEFORE_DOWNLOAD,
  CLOSE_DORMANT,
  DORMANT_ABILITY,
  isOnlineStatusCode,
  ONLINE_STATUS,
  OnlineStatusCode,
  OnlineStatusLabel,
  PTZ_OPERATIONS,
  UNKNOWN,
  WAIT_AFTER_WAKE_UP
} from "../constants";
import { PlatformEnum, PtzEnum } from "../enums";
import { ImouError, InvalidResponseError } from "../exceptions";
import { createLogger, ImouLogger } from "../logger";
import type { Collection, ImouApi } from "../types";
import { sleep } from "../utils";
import { ImouButton, ImouChannelEntity, ImouSelect, ImouSensor, WakeupTarget } from "./entity";

const NOT_AVAILABLE = "N.A";

/**
 * A single video channel of an Imou camera, addressed by (device id, channel id).
 *
 * The channel owns the entities exposed for it and is the one place that
 * wakes up a dormant device before an entity talks to it.
 */
export class ImouCamChannel implements WakeupTarget {
  private readonly apiClient: ImouApi;
  private readonly deviceId: string;
  private readonly channelId: string;
  private readonly log: ImouLogger;

  private status: OnlineStatusCode = UNKNOWN;
  private channelName: string = NOT_AVAILABLE;
  private deviceName: string = NOT_AVAILABLE;
  private deviceModel: string = NOT_AVAILABLE;
  private fullName: string = NOT_AVAILABLE;
  private givenName: string = "";
  private collections: Array<Collection> = [];

  private sensorInstances: Record<PlatformEnum, Array<ImouChannelEntity>> = {
    [PlatformEnum.sensor]: [],
    [PlatformEnum.button]: [],
    [PlatformEnum.select]: []
  };

  private initialized: boolean = false;
  private enabled: boolean = true;
  private sleepable: boolean = false;
  private waitAfterWakeup: number = WAIT_AFTER_WAKE_UP;
  private cameraWaitBeforeDownload: number = CAMERA_WAIT_BEFORE_DOWNLOAD;

  constructor(apiClient: ImouApi, deviceId: string, channelId: string, logger?: ImouLogger) {
    this.apiClient = apiClient;
    this.deviceId = deviceId;
    this.channelId = channelId;
    this.log = logger ?? createLogger("channel");
  }

  getDeviceId(): string {
    return this.deviceId;
  }

  getChannelId(): string {
    return this.channelId;
  }

  getModel(): string {
    return this.deviceModel;
  }

  getApiClient(): ImouApi {
    return this.apiClient;
  }

  /**
   * Display name: the name given by the user, or "<device> - <channel>"
   */
  getName(): string {
    if (this.givenName !== "") {
      return this.givenName;
    }
    return this.fullName;
  }

  setName(givenName: string): void {
    this.givenName = givenName;
  }

  setEnabled(value: boolean): void {
    this.enabled = value;
  }

  isEnabled(): boolean {
    return this.enabled;
  }

  isInitialized(): boolean {
    return this.initialized;
  }

  /** Status label: Offline, Online, Dormant or Unknown */
  getStatus(): OnlineStatusLabel {
    return ONLINE_STATUS[this.status];
  }

  /** Raw online code as last reported by the cloud */
  getStatusCode(): OnlineStatusCode {
    return this.status;
  }

  /** A dormant device counts as online */
  isOnline(): boolean {
    const status = this.getStatus();
    return status === ONLINE_STATUS["1"] || status === ONLINE_STATUS["4"];
  }

  isSleepable(): boolean {
    return this.sleepable;
  }

  setSleepable(value: boolean): void {
    this.sleepable = value;
  }

  /** Seconds to wait after waking up a dormant device */
  setWaitAfterWakeup(value: number): void {
    this.waitAfterWakeup = value;
  }

  getWaitAfterWakeup(): number {
    return this.waitAfterWakeup;
  }

  setCameraWaitBeforeDownload(value: number): void {
    this.cameraWaitBeforeDownload = value;
  }

  getCameraWaitBeforeDownload(): number {
    return this.cameraWaitBeforeDownload;
  }

  getCollections(): Array<Collection> {
    return this.collections;
  }

  getAllSensors(): Array<ImouChannelEntity> {
    return Object.values(this.sensorInstances).flat();
  }

  getSensorsByPlatform(platform: string): Array<ImouChannelEntity> {
    if (!isPlatform(platform)) {
      return [];
    }
    return this.sensorInstances[platform];
  }

  getSensorByName(type: string, param: string): ImouChannelEntity | null {
    return this.getAllSensors().find(s => s.getType() === type && s.getParam() === param) ?? null;
  }

  toString(): string {
    return `${this.fullName} (${this.deviceModel}, serial ${this.deviceId}, channel ${this.channelId})`;
  }

  private addSensorInstance(
    instances: Record<PlatformEnum, Array<ImouChannelEntity>>,
    instance: ImouChannelEntity
  ): void {
    instance.setDevice(this);
    instances[instance.platform].push(instance);
  }

  /**
   * Retrieve the device and channel details plus the stored PTZ positions and
   * create the entities of the channel.
   *
   * Errors are logged, not thrown: the channel is marked as initialized either
   * way, and callers should look at the entities it ended up with. Calling it
   * again rebuilds the entity set; the new set replaces the current one only
   * when it was built completely. Replaced entities stay attached to the
   * channel and keep waking it up.
   */
  async initialize(): Promise<void> {
    const instances: Record<PlatformEnum, Array<ImouChannelEntity>> = {
      [PlatformEnum.sensor]: [],
      [PlatformEnum.button]: [],
      [PlatformEnum.select]: []
    };
    try {
      const deviceArray = await this.apiClient.deviceBaseDetailList([this.deviceId]);
      if (deviceArray.deviceList === undefined || deviceArray.deviceList.length !== 1) {
        throw new InvalidResponseError(`deviceList not found in ${JSON.stringify(deviceArray)}`);
      }
      const deviceData = deviceArray.deviceList[0];

      this.deviceName = deviceData.name;
      this.deviceModel = deviceData.deviceModel;
      if (deviceData.ability !== undefined) {
        this.sleepable = deviceData.ability.split(",").map(a => a.trim()).includes(DORMANT_ABILITY);
      }

      const channelData = deviceData.channels.find(c => c.channelId === this.channelId);
      if (channelData === undefined) {
        throw new InvalidResponseError(`invalid channel id ${this.channelId}`);
      }

      this.channelName = channelData.channelName;
      this.fullName = `${this.deviceName} - ${this.channelName}`;
      this.log.debug(`Retrieved channel: ${this.toString()}`);

      const favourites = await this.apiClient.getCollection(this.deviceId, this.channelId);
      this.collections = favourites.collections ?? [];
      this.log.debug(`found ${this.collections.length} collection points`);

      this.addSensorInstance(
        instances,
        new ImouSensor(this.apiClient, this.deviceId, this.channelId, "status", "", this.log)
      );
      this.addSensorInstance(
        instances,
        new ImouButton(this.apiClient, this.deviceId, this.channelId, "restartDevice", "", this.log)
      );
      for (const collection of this.collections) {
        this.addSensorInstance(
          instances,
          new ImouButton(this.apiClient, this.deviceId, this.channelId, "turnCollection", collection.name, this.log)
        );
      }
      this.addSensorInstance(
        instances,
        new ImouSelect(this.apiClient, this.deviceId, this.channelId, "turnCollection", "", this.log)
      );
      this.sensorInstances = instances;
    } catch (err) {
      if (!(err instanceof ImouError)) {
        throw err;
      }
      this.log.error(`Exception: ${err.toString()}`);
    }

    this.initialized = true;
  }

  /**
   * Refresh the online status of the channel
   */
  async refreshStatus(): Promise<void> {
    const deviceData = await this.apiClient.deviceOnline(this.deviceId);
    if (!isOnlineStatusCode(deviceData.onLine)) {
      throw new InvalidResponseError(`onLine not valid in ${JSON.stringify(deviceData)}`);
    }

    const channelData = deviceData.channels?.find(c => c.channelId === this.channelId);
    if (channelData === undefined || !isOnlineStatusCode(channelData.onLine)) {
      throw new InvalidResponseError(`onLine not valid in ${JSON.stringify(channelData ?? null)}`);
    }

    this.status = channelData.onLine;
  }

  /**
   * Wake up a dormant device. Resolves to false when the device is still not
   * online after one wake-up command and the configured wait.
   */
  async wakeup(): Promise<boolean> {
    if (!this.sleepable) {
      return true;
    }
    await this.refreshStatus();
    if (this.getStatus() === ONLINE_STATUS["1"]) {
      return true;
    }

    this.log.debug(`[${this.getName()}] waking up the dormant device`);
    await this.apiClient.setDeviceCameraStatus(this.deviceId, CLOSE_DORMANT, true);
    await sleep(this.waitAfterWakeup * 1000);

    await this.refreshStatus();
    if (this.getStatus() === ONLINE_STATUS["1"]) {
      this.log.debug(`[${this.getName()}] device is now online`);
      return true;
    }
    this.log.warn(`[${this.getName()}] failed to wake up dormant device`);
    return false;
  }

  /**
   * Move the camera in one direction for `duration` milliseconds, waking it up
   * first. Resolves to false when the device could not be woken up.
   */
  async movePtz(direction: PtzEnum, duration: number = 1000): Promise<boolean> {
    if (!this.enabled || !(await this.wakeup())) {
      return false;
    }
    this.log.debug(`[${this.getName()}] moving ${direction} for ${duration}ms`);
    await this.apiClient.controlMovePtz(this.deviceId, this.channelId, PTZ_OPERATIONS[direction], duration);
    return true;
  }

  /**
   * Entry point of every polling cycle
   */
  async getData(): Promise<boolean> {
    if (!this.enabled) {
      return false;
    }
    if (!this.initialized) {
      await this.initialize();
    }
    this.log.debug(`[${this.getName()}] update requested`);

    await this.refreshStatus();
    return true;
  }
}

function isPlatform(value: string): value is PlatformEnum {
  return value === PlatformEnum.sensor || value === PlatformEnum.button || value === PlatformEnum.select;
}
