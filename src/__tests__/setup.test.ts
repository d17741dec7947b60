/**
 * Tests for channel setup and account discovery
 */

import axios, { AxiosInstance } from 'axios';
import { discover, setupChannel, createApiClient } from '../setup';
import { InvalidConfigurationError, SetupNotReadyError } from '../exceptions';
import { createFakeLogger } from './helpers/fake-api';

jest.mock('axios');
const mockedAxios = jest.mocked(axios);

function ok(data: unknown) {
  return { status: 200, headers: {}, data: { id: 'r', result: { code: '0', msg: 'ok', data } } };
}

const CREDENTIALS = { appId: 'test-app', appSecret: 'test-secret' };

describe('setup', () => {
  let post: jest.Mock;
  let responses: Record<string, unknown>;
  let logger: ReturnType<typeof createFakeLogger>;

  beforeEach(() => {
    jest.clearAllMocks();
    logger = createFakeLogger();
    responses = {
      accessToken: ok({ accessToken: 'test-token', expireTime: 3600 }),
      deviceBaseList: ok({ count: 1, deviceList: [{ deviceId: 'D1' }] }),
      deviceBaseDetailList: ok({
        deviceList: [{
          deviceId: 'D1',
          name: 'Home',
          deviceModel: 'X1',
          channels: [{ channelId: '0', channelName: 'Cam1' }]
        }]
      }),
      getCollection: ok({ collections: [{ name: 'Gate' }] }),
      deviceOnline: ok({ deviceId: 'D1', onLine: '1', channels: [{ channelId: '0', onLine: '1' }] })
    };
    post = jest.fn().mockImplementation(async (url: string) => {
      const method = url.substring(url.lastIndexOf('/') + 1);
      return responses[method] ?? ok({});
    });
    mockedAxios.create.mockReturnValue({ post } as unknown as AxiosInstance);
  });

  function calledMethods(): Array<string> {
    return post.mock.calls.map(([url]) => url.substring(url.lastIndexOf('/') + 1));
  }

  describe('createApiClient', () => {
    it('should keep the default timeout for an empty value', () => {
      const client = createApiClient({ ...CREDENTIALS, apiTimeout: '', logger });

      expect(client.getTimeout()).toBe(10);
      expect(mockedAxios.create).toHaveBeenCalledTimes(1);
    });

    it('should apply a timeout given as text', () => {
      const client = createApiClient({ ...CREDENTIALS, apiTimeout: '30', logger });

      expect(client.getTimeout()).toBe(30);
      expect(mockedAxios.create).toHaveBeenLastCalledWith(expect.objectContaining({ timeout: 30000 }));
    });

    it('should reject a timeout that is not a number', () => {
      expect(() => createApiClient({ ...CREDENTIALS, apiTimeout: 'soon', logger })).toThrow(InvalidConfigurationError);
    });

    it('should use the configured endpoint', () => {
      const client = createApiClient({ ...CREDENTIALS, apiUrl: 'https://openapi-sg.easy4ip.com/openapi', logger });

      expect(client.baseUrl).toBe('https://openapi-sg.easy4ip.com/openapi');
    });
  });

  describe('discover', () => {
    it('should check the credentials and list the channels', async () => {
      const channels = await discover({ ...CREDENTIALS, logger });

      expect(Object.keys(channels)).toEqual(['Home - Cam1']);
      expect(calledMethods()).toEqual([
        'accessToken',
        'deviceBaseList',
        'deviceBaseDetailList',
        'deviceBaseDetailList',
        'getCollection'
      ]);
    });
  });

  describe('setupChannel', () => {
    it('should initialize the channel and run a first refresh', async () => {
      const { client, channel, coordinator } = await setupChannel({
        ...CREDENTIALS,
        deviceId: 'D1',
        channelId: '0',
        channelName: 'Front door',
        waitAfterWakeup: 8,
        scanInterval: 300,
        logger
      });

      expect(client.isConnected()).toBe(true);
      expect(channel.getName()).toBe('Front door');
      expect(channel.toString()).toBe('Home - Cam1 (X1, serial D1, channel 0)');
      expect(channel.getWaitAfterWakeup()).toBe(8);
      expect(channel.getStatus()).toBe('Online');
      expect(channel.getAllSensors()).toHaveLength(4);
      expect(channel.getAllSensors().every(sensor => !sensor.isEnabled())).toBe(true);
      expect(coordinator.scanInterval).toBe(300);
      expect(coordinator.lastUpdateSuccess).toBe(true);
      expect(coordinator.isRunning()).toBe(false);
      expect(calledMethods()).toEqual(['accessToken', 'deviceBaseDetailList', 'getCollection', 'deviceOnline']);
    });

    it('should keep the generated name when none is given', async () => {
      const { channel } = await setupChannel({ ...CREDENTIALS, deviceId: 'D1', channelId: '0', channelName: '', logger });

      expect(channel.getName()).toBe('Home - Cam1');
    });

    it('should not be ready when the first refresh fails', async () => {
      responses.deviceOnline = ok({ deviceId: 'D1', onLine: '7', channels: [] });

      await expect(
        setupChannel({ ...CREDENTIALS, deviceId: 'D1', channelId: '0', logger })
      ).rejects.toThrow(SetupNotReadyError);
    });

    it('should not be ready when the credentials are rejected', async () => {
      responses.accessToken = { status: 200, headers: {}, data: { id: 'r', result: { code: 'OP1009', msg: 'denied' } } };

      const error = await setupChannel({ ...CREDENTIALS, deviceId: 'D1', channelId: '0', logger })
        .catch((err: unknown) => err);

      expect(error).toBeInstanceOf(SetupNotReadyError);
      expect(error).toMatchObject({ message: 'Not authorized: OP1009: denied' });
    });
  });
});
