import { describe, test, expect, jest, beforeEach } from '@jest/globals';
import { SearxngScraperServer } from '../../src/server';
import { InitializationService } from '../../src/services/initialization';
import { TransportManager } from '../../src/transport/manager';

jest.mock('../../src/services/initialization');
jest.mock('../../src/transport/manager');

const MockInitializationService = jest.mocked(InitializationService);
const MockTransportManager = jest.mocked(TransportManager);

describe('SearxngScraperServer', () => {
  let server: SearxngScraperServer;

  beforeEach(() => {
    jest.clearAllMocks();
    server = new SearxngScraperServer();
  });

  function initService() {
    return MockInitializationService.mock.instances[0];
  }

  function transportManager() {
    return MockTransportManager.mock.instances[0];
  }

  test('should create SearxngScraperServer instance', () => {
    expect(server).toBeInstanceOf(SearxngScraperServer);
    expect(MockInitializationService).toHaveBeenCalledTimes(1);
    expect(MockTransportManager).toHaveBeenCalledTimes(1);
  });

  test('should initialize successfully', async () => {
    jest.mocked(initService().initialize).mockResolvedValue(undefined);

    await expect(server.initialize()).resolves.toBeUndefined();
    expect(initService().initialize).toHaveBeenCalledTimes(1);
  });

  test('should propagate initialization failures', async () => {
    jest
      .mocked(initService().initialize)
      .mockRejectedValue(new Error('Environment validation failed'));

    await expect(server.initialize()).rejects.toThrow('Environment validation failed');
  });

  test('should connect successfully', async () => {
    jest.mocked(transportManager().connect).mockResolvedValue(undefined);

    await expect(server.connect()).resolves.toBeUndefined();
    expect(transportManager().connect).toHaveBeenCalledWith(undefined);
  });

  test('should close the transport on stop', async () => {
    jest.mocked(transportManager().close).mockResolvedValue(undefined);

    await server.stop();

    expect(transportManager().close).toHaveBeenCalledTimes(1);
  });
});
