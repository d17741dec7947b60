import axios, { AxiosInstance, AxiosResponse } from "axios";
import { Agent as HttpAgent } from "node:http";
import { Agent as HttpsAgent } from "node:https";
import { randomUUID } from "node:crypto";
import {
  DEFAULT_API_URL,
  DEFAULT_TIMEOUT,
  MAX_RETRIES,
  NOT_AUTHORIZED_CODES,
  TOKEN_EXPIRED_CODES
} from "../constants";
import {
  ApiError,
  ConnectionFailedError,
  ImouError,
  InvalidConfigurationError,
  InvalidResponseError,
  NotAuthorizedError
} from "../exceptions";
import { createLogger, ImouLogger } from "../logger";
import type {
  AccessTokenData,
  CollectionListData,
  DeviceBaseListData,
  DeviceDetailListData,
  DeviceOnlineData,
  ImouApi,
  ImouJson,
  ImouRequestBody
} from "../types";
import { isRecord, makeNonce, signRequest } from "../utils";
import {
  parseCollectionList,
  parseDeviceBaseList,
  parseDeviceDetailList,
  parseDeviceOnline
} from "./parsers";

// Refresh the token this many seconds before the cloud expires it
const TOKEN_EXPIRY_MARGIN = 60;

/**
 * Imou open API client
 *
 * Every call is signed with the app secret and, apart from the token request
 * itself, carries the access token obtained by `connect()`.
 */
export class ImouApiClient implements ImouApi {
  readonly baseUrl: string;
  readonly appId: string;
  private readonly appSecret: string;
  private readonly log: ImouLogger;

  private timeout: number;
  private httpClient: AxiosInstance;
  // Shared by every HTTP client this instance builds
  private readonly httpsAgent = new HttpsAgent({ keepAlive: true, keepAliveMsecs: 30000, maxSockets: 10 });
  private readonly httpAgent = new HttpAgent({ keepAlive: true, keepAliveMsecs: 30000, maxSockets: 10 });

  // Session
  private accessToken: string | null = null;
  private tokenExpiresAt: number = 0;
  private connected: boolean = false;
  private connecting: Promise<void> | null = null;

  constructor(
    baseUrl: string = DEFAULT_API_URL,
    appId: string,
    appSecret: string,
    timeout: number = DEFAULT_TIMEOUT,
    logger?: ImouLogger
  ) {
    if (!appId || !appSecret) {
      throw new InvalidConfigurationError("app id and app secret are required");
    }
    this.baseUrl = baseUrl.replace(/\/+$/, "");
    this.appId = appId;
    this.appSecret = appSecret;
    this.timeout = timeout;
    this.log = logger ?? createLogger("api");
    this.httpClient = this.createHttpClient();
  }

  private createHttpClient(): AxiosInstance {
    return axios.create({
      timeout: this.timeout * 1000,
      headers: { "Content-Type": "application/json" },
      httpsAgent: this.httpsAgent,
      httpAgent: this.httpAgent,
      validateStatus: () => true // status is checked in send()
    });
  }

  /**
   * Set the request timeout in seconds. The keep-alive connections are kept.
   */
  setTimeout(timeout: number): void {
    if (!(timeout > 0)) {
      throw new InvalidConfigurationError(`timeout ${timeout} must be a positive number`);
    }
    this.timeout = timeout;
    this.httpClient = this.createHttpClient();
  }

  getTimeout(): number {
    return this.timeout;
  }

  isConnected(): boolean {
    return this.connected;
  }

  /**
   * Close the keep-alive connections
   */
  close(): void {
    this.httpsAgent.destroy();
    this.httpAgent.destroy();
  }

  /**
   * Check the credentials and obtain an access token.
   * Concurrent callers share the same token request.
   */
  async connect(): Promise<void> {
    if (!this.connecting) {
      this.connecting = this.requestAccessToken().finally(() => {
        this.connecting = null;
      });
    }
    return this.connecting;
  }

  private async requestAccessToken(): Promise<void> {
    this.connected = false;
    const data = await this.send("accessToken", {}, true);
    const token = parseAccessToken(data);
    this.accessToken = token.accessToken;
    this.tokenExpiresAt = Date.now() + token.expireTime * 1000;
    this.connected = true;
    this.log.debug(`Retrieved access token, valid for ${token.expireTime}s`);
  }

  private hasValidToken(): boolean {
    return this.accessToken !== null && Date.now() < this.tokenExpiresAt - TOKEN_EXPIRY_MARGIN * 1000;
  }

  /**
   * Call an API method, connecting first when needed and reconnecting when the
   * cloud reports the token as expired.
   */
  private async callApi(method: string, params: Record<string, unknown> = {}): Promise<ImouJson> {
    for (let attempt = 1; ; attempt++) {
      if (!this.hasValidToken()) {
        await this.connect();
      }
      try {
        return await this.send(method, params, false);
      } catch (err) {
        if (err instanceof ApiError && TOKEN_EXPIRED_CODES.has(err.code) && attempt < MAX_RETRIES) {
          this.log.debug(`${method}: access token expired, reconnecting (attempt ${attempt})`);
          this.accessToken = null;
          this.connected = false;
          continue;
        }
        throw err;
      }
    }
  }

  private async send(method: string, params: Record<string, unknown>, isConnectRequest: boolean): Promise<ImouJson> {
    const time = Math.round(Date.now() / 1000);
    const nonce = makeNonce();
    const body: ImouRequestBody = {
      system: {
        ver: "1.0",
        appId: this.appId,
        sign: signRequest(time, nonce, this.appSecret),
        time,
        nonce
      },
      params: isConnectRequest ? { ...params } : { ...params, token: this.accessToken },
      id: randomUUID()
    };
    const url = `${this.baseUrl}/${method}`;
    this.log.debug(`Calling ${url} with params ${JSON.stringify(params)}`);

    let response: AxiosResponse<unknown>;
    try {
      response = await this.httpClient.post<unknown>(url, body);
    } catch (err) {
      if (err instanceof ImouError) {
        throw err;
      }
      const reason = err instanceof Error ? err.message : String(err);
      throw new ConnectionFailedError(`${method}: ${reason}`);
    }

    if (response.status >= 400) {
      throw new ConnectionFailedError(`${method}: API returned HTTP status ${response.status}`);
    }

    const raw = response.data;
    let data: unknown = raw;
    if (typeof raw === "string") {
      try {
        data = JSON.parse(raw);
      } catch {
        throw new InvalidResponseError(`${method}: failed to parse response ${raw.substring(0, 200)}`);
      }
    }

    if (!isRecord(data) || !isRecord(data.result)) {
      throw new InvalidResponseError(`${method}: unexpected response ${JSON.stringify(data)}`);
    }

    const result = data.result;
    const code = result.code === undefined ? "" : String(result.code);
    if (code !== "0") {
      const msg = typeof result.msg === "string" ? result.msg : "";
      if (NOT_AUTHORIZED_CODES.has(code)) {
        throw new NotAuthorizedError(`${code}: ${msg}`);
      }
      throw new ApiError(`${code}: ${msg}`, method, code);
    }

    this.log.debug(`${method} returned ${JSON.stringify(result.data)}`);
    return isRecord(result.data) ? result.data : {};
  }

  /**
   * List every device bound to or shared with the account
   */
  async deviceBaseList(): Promise<DeviceBaseListData> {
    const data = await this.callApi("deviceBaseList", {
      bindId: -1,
      limit: 128,
      type: "bindAndShare",
      needApInfo: false
    });
    return parseDeviceBaseList(data);
  }

  async deviceBaseDetailList(deviceIds: Array<string>): Promise<DeviceDetailListData> {
    const data = await this.callApi("deviceBaseDetailList", {
      deviceList: deviceIds.map(deviceId => ({ deviceId, channelList: "" }))
    });
    return parseDeviceDetailList(data);
  }

  async deviceOnline(deviceId: string): Promise<DeviceOnlineData> {
    const data = await this.callApi("deviceOnline", { deviceId });
    return parseDeviceOnline(data);
  }

  /**
   * Get the named PTZ positions stored on a channel
   */
  async getCollection(deviceId: string, channelId: string): Promise<CollectionListData> {
    const data = await this.callApi("getCollection", { deviceId, channelId });
    return parseCollectionList(data);
  }

  async restartDevice(deviceId: string): Promise<void> {
    await this.callApi("restartDevice", { deviceId });
  }

  /**
   * Move the camera to a named PTZ position
   */
  async turnCollection(deviceId: string, channelId: string, name: string): Promise<void> {
    await this.callApi("turnCollection", { deviceId, channelId, name });
  }

  /**
   * Toggle a camera switch, e.g. "closeDormant" to wake up a sleeping device
   */
  async setDeviceCameraStatus(deviceId: string, enableType: string, enable: boolean): Promise<void> {
    await this.callApi("setDeviceCameraStatus", { deviceId, enableType, enable });
  }

  /**
   * Move the camera in one direction for `duration` milliseconds
   */
  async controlMovePtz(deviceId: string, channelId: string, operation: number, duration: number): Promise<void> {
    await this.callApi("controlMovePTZ", { deviceId, channelId, operation: String(operation), duration });
  }
}

function parseAccessToken(data: ImouJson): AccessTokenData {
  const { accessToken, expireTime } = data;
  if (typeof accessToken !== "string" || accessToken === "") {
    throw new InvalidResponseError(`accessToken not found in ${JSON.stringify(data)}`);
  }
  const seconds = typeof expireTime === "number" ? expireTime : Number(expireTime);
  if (!Number.isFinite(seconds)) {
    throw new InvalidResponseError(`expireTime not valid in ${JSON.stringify(data)}`);
  }
  return { accessToken, expireTime: seconds };
}
