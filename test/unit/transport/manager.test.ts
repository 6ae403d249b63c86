import { describe, test, expect, jest, beforeEach } from '@jest/globals';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import { TransportManager } from '../../../src/transport/manager';
import { mcpServer } from '../../../src/mcp/mcpServer';

jest.mock('../../../src/mcp/mcpServer', () => ({
  mcpServer: {
    connect: jest.fn(),
    close: jest.fn(),
  },
}));

const mockConnect = jest.mocked(mcpServer.connect);
const mockClose = jest.mocked(mcpServer.close);

describe('Transport Manager', () => {
  let transportManager: TransportManager;

  beforeEach(() => {
    transportManager = new TransportManager();
    jest.clearAllMocks();
  });

  test('should connect with custom transport', async () => {
    mockConnect.mockResolvedValue(undefined);
    const customTransport = new StdioServerTransport();

    await expect(transportManager.connect(customTransport)).resolves.toBeUndefined();

    expect(mockConnect).toHaveBeenCalledTimes(1);
    expect(mockConnect).toHaveBeenCalledWith(customTransport);
  });

  test('should use STDIO when no transport is provided', async () => {
    mockConnect.mockResolvedValue(undefined);

    await transportManager.connect();

    expect(mockConnect).toHaveBeenCalledWith(expect.any(StdioServerTransport));
  });

  test('should handle connection errors', async () => {
    mockConnect.mockRejectedValue(new Error('Connection failed'));

    await expect(transportManager.connect()).rejects.toThrow('Connection failed');
  });

  test('should close the server', async () => {
    mockClose.mockResolvedValue(undefined);

    await transportManager.close();

    expect(mockClose).toHaveBeenCalledTimes(1);
  });
});
