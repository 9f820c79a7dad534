import Redis from 'ioredis';
import { RedisClientManager } from '../RedisClientManager';

type Listener = (...args: unknown[]) => void;

const mockCreateClient = () => {
  const handlers = new Map<string, Listener>();
  return {
    handlers,
    on: jest.fn((event: string, listener: Listener) => {
      handlers.set(event, listener);
    }),
    connect: jest.fn().mockResolvedValue(undefined),
    quit: jest.fn().mockResolvedValue('OK'),
  };
};

let mockClients: ReturnType<typeof mockCreateClient>[] = [];

jest.mock('ioredis', () => ({
  __esModule: true,
  default: jest.fn(() => {
    const client = mockCreateClient();
    mockClients.push(client);
    return client;
  }),
}));

jest.mock('../../../config', () => ({
  __esModule: true,
  default: {
    redis: {
      url: 'redis://localhost:6379',
      tls: { rejectUnauthorized: true, ca: 'test-ca' },
    },
  },
}));

jest.mock('../../../utils/logger', () => ({
  info: jest.fn(),
  error: jest.fn(),
  warn: jest.fn(),
  debug: jest.fn(),
}));

const MockRedis = jest.mocked(Redis);

describe('RedisClientManager', () => {
  beforeEach(() => {
    jest.clearAllMocks();
    mockClients = [];
  });

  it('creates one connection per name', () => {
    const manager = new RedisClientManager();

    const first = manager.getClient('bridge:subscriber');
    const second = manager.getClient('bridge:subscriber');

    expect(first).toBe(second);
    expect(MockRedis).toHaveBeenCalledTimes(1);
    expect(MockRedis).toHaveBeenCalledWith('redis://localhost:6379', expect.objectContaining({ lazyConnect: true }));
  });

  it('adds TLS options for rediss URLs only', () => {
    const manager = new RedisClientManager();

    manager.getClient('plain', 'redis://localhost:6379');
    manager.getClient('secure', 'rediss://cache.internal:6380');

    expect(MockRedis).toHaveBeenNthCalledWith(
      1,
      'redis://localhost:6379',
      expect.not.objectContaining({ tls: expect.anything() }),
    );
    expect(MockRedis).toHaveBeenNthCalledWith(
      2,
      'rediss://cache.internal:6380',
      expect.objectContaining({ tls: { rejectUnauthorized: true, ca: 'test-ca' } }),
    );
  });

  it('tracks connection health from client events', () => {
    const manager = new RedisClientManager();
    manager.getClient('bridge:subscriber');
    const { handlers } = mockClients[0];

    expect(manager.getHealth()['bridge:subscriber'].status).toBe('connecting');

    handlers.get('error')?.(new Error('ECONNREFUSED'));
    expect(manager.getHealth()['bridge:subscriber']).toMatchObject({ status: 'error', lastError: 'ECONNREFUSED' });

    handlers.get('ready')?.();
    expect(manager.getHealth()['bridge:subscriber']).toMatchObject({ status: 'ready', lastError: undefined });
  });

  it('disconnects a single named client', async () => {
    const manager = new RedisClientManager();
    manager.getClient('a');
    manager.getClient('b');

    await manager.disconnect('a');

    expect(mockClients[0].quit).toHaveBeenCalledTimes(1);
    expect(mockClients[1].quit).not.toHaveBeenCalled();
    expect(Object.keys(manager.getHealth())).toEqual(['b']);
  });

  it('disconnects every client', async () => {
    const manager = new RedisClientManager();
    manager.getClient('a');
    manager.getClient('b');

    await manager.disconnect();

    expect(mockClients.every((client) => client.quit.mock.calls.length === 1)).toBe(true);
    expect(manager.getHealth()).toEqual({});
  });
});
