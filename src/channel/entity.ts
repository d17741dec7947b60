import {
  BUTTONS,
  ButtonType,
  isOnlineStatusCode,
  ONLINE_STATUS,
  OnlineStatusLabel,
  SELECT_SENTINEL,
  SELECTS,
  SENSOR_ICONS,
  SENSORS,
  SelectType,
  SensorType
} from "../constants";
import { PlatformEnum } from "../enums";
import { InvalidConfigurationError } from "../exceptions";
import { createLogger, ImouLogger } from "../logger";
import type { ImouApi } from "../types";

const defaultLogger = createLogger("entity");

/**
 * The part of a channel an entity is allowed to use: waking it up before a
 * remote read or write. Entities never own their channel.
 */
export interface WakeupTarget {
  wakeup(): Promise<boolean>;
}

/**
 * Base class of everything observable or controllable on a channel
 */
export abstract class ImouEntity<TType extends string = string> {
  abstract readonly platform: PlatformEnum;

  protected readonly apiClient: ImouApi;
  protected readonly deviceId: string;
  protected readonly channelId: string;
  protected readonly sensorType: TType;
  protected readonly sensorParam: string;
  protected readonly description: string;
  protected readonly log: ImouLogger;

  protected enabled: boolean = true;
  protected updated: boolean = false;
  protected attributes: Record<string, string> = {};
  private wakeupTarget: WakeupTarget | null = null;

  protected constructor(
    apiClient: ImouApi,
    deviceId: string,
    channelId: string,
    sensorType: TType,
    sensorParam: string,
    label: string,
    logger?: ImouLogger
  ) {
    this.apiClient = apiClient;
    this.deviceId = deviceId;
    this.channelId = channelId;
    this.sensorType = sensorType;
    this.sensorParam = sensorParam;
    this.description = `${label} ${sensorParam}`;
    this.log = logger ?? defaultLogger;
  }

  getDeviceId(): string {
    return this.deviceId;
  }

  getChannelId(): string {
    return this.channelId;
  }

  getType(): TType {
    return this.sensorType;
  }

  getParam(): string {
    return this.sensorParam;
  }

  getName(): string {
    return `${this.sensorType} ${this.sensorParam}`;
  }

  getDescription(): string {
    return this.description;
  }

  getIcon(): string {
    return SENSOR_ICONS[this.sensorType] ?? SENSOR_ICONS.__default__;
  }

  setEnabled(value: boolean): void {
    this.enabled = value;
  }

  isEnabled(): boolean {
    return this.enabled;
  }

  /** Whether the entity has been updated at least once */
  isUpdated(): boolean {
    return this.updated;
  }

  getAttributes(): Record<string, string> {
    return this.attributes;
  }

  /**
   * Attach the channel used to wake up a dormant device
   */
  setDevice(target: WakeupTarget | null): void {
    this.wakeupTarget = target;
  }

  /**
   * Check whether the entity may talk to the device: it must be enabled and,
   * when attached to a channel, the channel must be awake.
   */
  async isReady(): Promise<boolean> {
    if (!this.enabled) {
      return false;
    }
    if (this.wakeupTarget !== null) {
      return this.wakeupTarget.wakeup();
    }
    return true;
  }

  protected markUpdated(): void {
    if (!this.updated) {
      this.updated = true;
    }
  }

  abstract update(): Promise<void>;
}

/**
 * Read-only state of a channel
 */
export class ImouSensor extends ImouEntity<SensorType> {
  readonly platform = PlatformEnum.sensor;
  private state: OnlineStatusLabel | null = null;

  constructor(apiClient: ImouApi, deviceId: string, channelId: string, sensorType: SensorType, sensorParam: string = "", logger?: ImouLogger) {
    super(apiClient, deviceId, channelId, sensorType, sensorParam, SENSORS[sensorType], logger);
  }

  async update(): Promise<void> {
    if (!(await this.isReady())) {
      return;
    }

    if (this.sensorType === "status") {
      const deviceData = await this.apiClient.deviceOnline(this.deviceId);
      const channelData = deviceData.channels?.find(c => c.channelId === this.channelId);
      if (isOnlineStatusCode(deviceData.onLine) && channelData !== undefined && isOnlineStatusCode(channelData.onLine)) {
        this.state = ONLINE_STATUS[channelData.onLine];
      } else {
        this.state = ONLINE_STATUS.UNKNOWN;
      }
    }

    this.log.debug(`[${this.getName()}] updating ${this.getDescription()}, value is ${this.state}`);
    this.markUpdated();
  }

  getState(): string | null {
    return this.state;
  }
}

/**
 * Fire-and-forget action on a channel
 */
export class ImouButton extends ImouEntity<ButtonType> {
  readonly platform = PlatformEnum.button;

  constructor(apiClient: ImouApi, deviceId: string, channelId: string, sensorType: ButtonType, sensorParam: string = "", logger?: ImouLogger) {
    super(apiClient, deviceId, channelId, sensorType, sensorParam, BUTTONS[sensorType], logger);
  }

  async press(): Promise<void> {
    if (!(await this.isReady())) {
      return;
    }

    if (this.sensorType === "restartDevice") {
      await this.apiClient.restartDevice(this.deviceId);
    } else if (this.sensorType === "turnCollection") {
      await this.apiClient.turnCollection(this.deviceId, this.channelId, this.sensorParam);
    }

    this.log.debug(`[${this.getName()}] pressed button ${this.getDescription()}`);
    this.markUpdated();
  }

  /** Buttons hold no state */
  async update(): Promise<void> {
    return;
  }

  getDeviceClass(): string | null {
    return this.sensorType === "restartDevice" ? "restart" : null;
  }
}

/**
 * Multi-valued control of a channel. The current option always snaps back
 * to the sentinel, so selecting behaves like a momentary action.
 */
export class ImouSelect extends ImouEntity<SelectType> {
  readonly platform = PlatformEnum.select;
  private currentOption: string | null = null;
  private availableOptions: Array<string> = [];

  constructor(apiClient: ImouApi, deviceId: string, channelId: string, sensorType: SelectType, sensorParam: string = "", logger?: ImouLogger) {
    super(apiClient, deviceId, channelId, sensorType, sensorParam, SELECTS[sensorType], logger);
  }

  async update(): Promise<void> {
    if (!(await this.isReady())) {
      return;
    }

    if (this.sensorType === "turnCollection") {
      const favourites = await this.apiClient.getCollection(this.deviceId, this.channelId);
      const collections = favourites.collections ?? [];
      this.log.debug(`found ${collections.length} collection points`);
      this.availableOptions = [SELECT_SENTINEL, ...collections.map(c => c.name)];
      this.currentOption = SELECT_SENTINEL;
    }

    this.log.debug(`[${this.getName()}] updating ${this.getDescription()}, value is ${this.currentOption}`);
    this.markUpdated();
  }

  getCurrentOption(): string | null {
    return this.currentOption;
  }

  getAvailableOptions(): Array<string> {
    return this.availableOptions;
  }

  async selectOption(option: string): Promise<void> {
    if (option === SELECT_SENTINEL) {
      return;
    }
    if (!this.availableOptions.includes(option)) {
      throw new InvalidConfigurationError(
        `selectOption: '${option}' not in available options: ${this.availableOptions.slice(1).join(", ")}`
      );
    }

    if (!(await this.isReady())) {
      return;
    }

    this.log.debug(`[${this.getName()}] ${this.getDescription()} setting to ${option}`);
    if (this.sensorType === "turnCollection") {
      await this.apiClient.turnCollection(this.deviceId, this.channelId, option);
      this.currentOption = SELECT_SENTINEL;
    }
  }
}

export type ImouChannelEntity = ImouSensor | ImouButton | ImouSelect;
