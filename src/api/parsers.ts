import type {
  ChannelDetail,
  Collection,
  CollectionListData,
  DeviceBaseItem,
  DeviceBaseListData,
  DeviceDetail,
  DeviceDetailListData,
  DeviceOnlineData,
  ImouJson
} from "../types";
import { isRecord } from "../utils";

// Fields the cloud may send as numbers or strings are normalised to strings.
function asString(value: unknown): string | undefined {
  if (typeof value === "string") {
    return value;
  }
  if (typeof value === "number") {
    return String(value);
  }
  return undefined;
}

function records(value: unknown): Array<ImouJson> | undefined {
  return Array.isArray(value) ? value.filter(isRecord) : undefined;
}

export function parseDeviceBaseList(data: ImouJson): DeviceBaseListData {
  const deviceList = records(data.deviceList)?.flatMap((item): Array<DeviceBaseItem> => {
    const deviceId = asString(item.deviceId);
    return deviceId === undefined ? [] : [{ ...item, deviceId }];
  });
  return {
    ...data,
    count: typeof data.count === "number" ? data.count : undefined,
    deviceList
  };
}

function parseChannelDetail(item: ImouJson): Array<ChannelDetail> {
  const channelId = asString(item.channelId);
  if (channelId === undefined) {
    return [];
  }
  return [{ ...item, channelId, channelName: asString(item.channelName) ?? "" }];
}

function parseDeviceDetail(item: ImouJson): Array<DeviceDetail> {
  const deviceId = asString(item.deviceId);
  if (deviceId === undefined) {
    return [];
  }
  return [{
    ...item,
    deviceId,
    name: asString(item.name) ?? "",
    deviceModel: asString(item.deviceModel) ?? "",
    ability: asString(item.ability),
    channels: (records(item.channels) ?? []).flatMap(parseChannelDetail)
  }];
}

export function parseDeviceDetailList(data: ImouJson): DeviceDetailListData {
  return {
    ...data,
    deviceList: records(data.deviceList)?.flatMap(parseDeviceDetail)
  };
}

export function parseDeviceOnline(data: ImouJson): DeviceOnlineData {
  return {
    ...data,
    deviceId: asString(data.deviceId),
    onLine: asString(data.onLine),
    channels: records(data.channels)?.map(channel => ({
      ...channel,
      channelId: asString(channel.channelId),
      onLine: asString(channel.onLine)
    }))
  };
}

export function parseCollectionList(data: ImouJson): CollectionListData {
  return {
    ...data,
    collections: records(data.collections)?.flatMap((item): Array<Collection> => {
      const name = asString(item.name);
      return name === undefined ? [] : [{ ...item, name }];
    })
  };
}
