import { ImouDiscoverService } from '../channel/discovery';
import { SELECT_SENTINEL } from '../constants';
import { PlatformEnum } from '../enums';
import { ApiError } from '../exceptions';
import type { DeviceDetailListData } from '../types';
import { createFakeApi, createFakeLogger, deviceDetail } from './helpers/fake-api';

describe('ImouDiscoverService', () => {
  let api: ReturnType<typeof createFakeApi>;
  let logger: ReturnType<typeof createFakeLogger>;
  let service: ImouDiscoverService;

  const details: Record<string, DeviceDetailListData> = {
    D1: { deviceList: [deviceDetail('D1', 'Home', [{ channelId: 'C1', channelName: 'Cam1' }])] },
    D2: { deviceList: [] },
    D3: {
      deviceList: [
        deviceDetail('D3', 'Garage', [
          { channelId: '0', channelName: 'Door' },
          { channelId: '1', channelName: 'Yard' }
        ])
      ]
    }
  };

  beforeEach(() => {
    api = createFakeApi();
    logger = createFakeLogger();
    service = new ImouDiscoverService(api, logger);
    api.deviceBaseDetailList.mockImplementation(async ([deviceId]) => details[deviceId] ?? {});
  });

  it('should discover a single channel and initialize it', async () => {
    api.deviceBaseList.mockResolvedValue({ count: 1, deviceList: [{ deviceId: 'D1' }] });

    const channels = await service.discoverChannels();

    expect(Object.keys(channels)).toEqual(['Home - Cam1']);
    const channel = channels['Home - Cam1'];
    expect(channel.getDeviceId()).toBe('D1');
    expect(channel.getChannelId()).toBe('C1');
    expect(channel.isInitialized()).toBe(true);
    expect(channel.getSensorsByPlatform('sensor')).toHaveLength(1);
    expect(channel.getSensorsByPlatform('button')).toHaveLength(1);

    const [select] = channel.getSensorsByPlatform('select');
    await select.update();
    expect(select.platform).toBe(PlatformEnum.select);
    if (select.platform === PlatformEnum.select) {
      expect(select.getAvailableOptions()).toEqual([SELECT_SENTINEL]);
    }
  });

  it('should skip an unrecognized device and keep the others', async () => {
    api.deviceBaseList.mockResolvedValue({
      count: 3,
      deviceList: [{ deviceId: 'D1' }, { deviceId: 'D2' }, { deviceId: 'D3' }]
    });

    const channels = await service.discoverChannels();

    expect(Object.keys(channels)).toEqual(['Home - Cam1', 'Garage - Door', 'Garage - Yard']);
    expect(new Set(Object.values(channels).map(c => c.getDeviceId()))).toEqual(new Set(['D1', 'D3']));
    expect(logger.warn).toHaveBeenCalledTimes(1);
    expect(logger.warn).toHaveBeenCalledWith(expect.stringContaining('Skipping unrecognized or unsupported device D2'));
  });

  it('should stop at an API error and return what was found so far', async () => {
    api.deviceBaseList.mockResolvedValue({
      count: 3,
      deviceList: [{ deviceId: 'D1' }, { deviceId: 'D2' }, { deviceId: 'D3' }]
    });
    api.deviceBaseDetailList.mockImplementation(async ([deviceId]) => {
      if (deviceId === 'D2') {
        throw new ApiError('DV1003: device offline', 'deviceBaseDetailList', 'DV1003');
      }
      return details[deviceId] ?? {};
    });

    const channels = await service.discoverChannels();

    expect(Object.keys(channels)).toEqual(['Home - Cam1']);
    expect(logger.error).toHaveBeenCalledWith('Exception: API error: DV1003: device offline');
  });

  it('should return nothing when the device list is malformed', async () => {
    api.deviceBaseList.mockResolvedValue({ deviceList: [{ deviceId: 'D1' }] });

    await expect(service.discoverChannels()).resolves.toEqual({});
    expect(api.deviceBaseDetailList).not.toHaveBeenCalled();
    expect(logger.error).toHaveBeenCalledTimes(1);
  });

  it('should propagate errors that are not domain errors', async () => {
    api.deviceBaseList.mockRejectedValue(new RangeError('unexpected'));

    await expect(service.discoverChannels()).rejects.toThrow(RangeError);
  });
});
