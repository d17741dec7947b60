import type { ImouLogger } from "../../logger";
import type { DeviceDetail, ImouApi } from "../../types";

export function createFakeApi(): jest.Mocked<ImouApi> {
  return {
    connect: jest.fn().mockResolvedValue(undefined),
    deviceBaseList: jest.fn().mockResolvedValue({ count: 0, deviceList: [] }),
    deviceBaseDetailList: jest.fn().mockResolvedValue({ deviceList: [] }),
    deviceOnline: jest.fn().mockResolvedValue({ onLine: "1", channels: [] }),
    getCollection: jest.fn().mockResolvedValue({ collections: [] }),
    restartDevice: jest.fn().mockResolvedValue(undefined),
    turnCollection: jest.fn().mockResolvedValue(undefined),
    setDeviceCameraStatus: jest.fn().mockResolvedValue(undefined),
    controlMovePtz: jest.fn().mockResolvedValue(undefined)
  };
}

export function createFakeLogger(): jest.Mocked<ImouLogger> {
  return {
    debug: jest.fn(),
    info: jest.fn(),
    warn: jest.fn(),
    error: jest.fn()
  };
}

export function deviceDetail(
  deviceId: string,
  name: string,
  channels: Array<{ channelId: string; channelName: string }>,
  extra: Partial<DeviceDetail> = {}
): DeviceDetail {
  return { deviceId, name, deviceModel: "X1", channels, ...extra };
}

export function onlinePayload(deviceCode: string, channelId: string, channelCode: string) {
  return { onLine: deviceCode, channels: [{ channelId, onLine: channelCode }] };
}
