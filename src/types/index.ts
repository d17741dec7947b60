/** Generic JSON object as decoded from an API response */
export type ImouJson = Record<string, unknown>;

/**
 * Signed request envelope posted to every open API method
 */
export interface ImouRequestBody {
  system: {
    ver: string;
    appId: string;
    sign: string;
    time: number;
    nonce: string;
  };
  params: Record<string, unknown>;
  id: string;
}

/**
 * Envelope of every open API response
 */
export interface ImouResponseBody {
  result?: {
    code?: string;
    msg?: string;
    data?: unknown;
  };
  id?: string;
}

/** Result of the accessToken method */
export interface AccessTokenData {
  accessToken: string;
  /** Seconds until the token expires */
  expireTime: number;
}

/** Entry of deviceBaseList */
export interface DeviceBaseItem {
  deviceId: string;
  [key: string]: unknown;
}

export interface DeviceBaseListData {
  count?: number;
  deviceList?: Array<DeviceBaseItem>;
  [key: string]: unknown;
}

/** Channel entry of deviceBaseDetailList */
export interface ChannelDetail {
  channelId: string;
  channelName: string;
  [key: string]: unknown;
}

/** Device entry of deviceBaseDetailList */
export interface DeviceDetail {
  deviceId: string;
  name: string;
  deviceModel: string;
  /** Comma separated capability flags, e.g. "PT,Dormant" */
  ability?: string;
  channels: Array<ChannelDetail>;
  [key: string]: unknown;
}

export interface DeviceDetailListData {
  deviceList?: Array<DeviceDetail>;
  [key: string]: unknown;
}

/** Result of deviceOnline */
export interface DeviceOnlineData {
  deviceId?: string;
  onLine?: string;
  channels?: Array<{ channelId?: string; onLine?: string; [key: string]: unknown }>;
  [key: string]: unknown;
}

/** A named PTZ position bookmark */
export interface Collection {
  name: string;
  [key: string]: unknown;
}

export interface CollectionListData {
  collections?: Array<Collection>;
  [key: string]: unknown;
}

/**
 * Capabilities of the Imou cloud consumed by channels, entities and discovery.
 * ImouApiClient is the HTTP implementation.
 */
export interface ImouApi {
  connect(): Promise<void>;
  deviceBaseList(): Promise<DeviceBaseListData>;
  deviceBaseDetailList(deviceIds: Array<string>): Promise<DeviceDetailListData>;
  deviceOnline(deviceId: string): Promise<DeviceOnlineData>;
  getCollection(deviceId: string, channelId: string): Promise<CollectionListData>;
  restartDevice(deviceId: string): Promise<void>;
  turnCollection(deviceId: string, channelId: string, name: string): Promise<void>;
  setDeviceCameraStatus(deviceId: string, enableType: string, enable: boolean): Promise<void>;
  controlMovePtz(deviceId: string, channelId: string, operation: number, duration: number): Promise<void>;
}
