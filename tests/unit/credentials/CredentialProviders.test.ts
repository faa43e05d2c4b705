import { PassThrough } from 'stream';
import { EnvCredentialProvider } from '../../../src/infrastructure/credentials/EnvCredentialProvider';
import { ChainCredentialProvider } from '../../../src/infrastructure/credentials/ChainCredentialProvider';
import { ConsoleCredentialProvider } from '../../../src/infrastructure/credentials/ConsoleCredentialProvider';
import { ICredentialProvider } from '../../../src/application/types';

// Mock config
jest.mock('../../../src/config/index', () => ({
  config: {
    auth: {
      tenantId: '',
      clientId: 'env-client-id',
      clientSecret: 'env-secret',
      accessToken: '',
    },
    graph: {
      apiBaseUrl: 'https://graph.microsoft.com/beta',
      loginBaseUrl: 'https://login.microsoftonline.com',
    },
    http: { timeoutMs: 30000 },
    logging: { level: 'error' },
    storage: { exportOutputDir: './exports' },
  },
}));

// Mock logger
jest.mock('../../../src/infrastructure/logging/Logger', () => ({
  logger: {
    debug: jest.fn(),
    info: jest.fn(),
    warn: jest.fn(),
    error: jest.fn(),
  },
}));

describe('EnvCredentialProvider', () => {
  it('should read the credential from config by default', async () => {
    await expect(new EnvCredentialProvider().get()).resolves.toEqual({
      clientId: 'env-client-id',
      clientSecret: 'env-secret',
    });
  });

  it('should return null when either part is empty', async () => {
    await expect(new EnvCredentialProvider('test-client-id', '').get()).resolves.toBeNull();
    await expect(new EnvCredentialProvider('', 'test-secret').get()).resolves.toBeNull();
  });
});

describe('ChainCredentialProvider', () => {
  it('should return the first credential found', async () => {
    const empty: ICredentialProvider = { get: jest.fn().mockResolvedValue(null) };
    const found: ICredentialProvider = {
      get: jest.fn().mockResolvedValue({ clientId: 'test-client-id', clientSecret: 'test-secret' }),
    };
    const unused: ICredentialProvider = { get: jest.fn() };

    const credential = await new ChainCredentialProvider(empty, found, unused).get();

    expect(credential).toEqual({ clientId: 'test-client-id', clientSecret: 'test-secret' });
    expect(empty.get).toHaveBeenCalledTimes(1);
    expect(unused.get).not.toHaveBeenCalled();
  });

  it('should return null when no provider has a credential', async () => {
    const empty: ICredentialProvider = { get: jest.fn().mockResolvedValue(null) };

    await expect(new ChainCredentialProvider(empty).get()).resolves.toBeNull();
  });
});

describe('ConsoleCredentialProvider', () => {
  it('should not prompt when stdin is not a terminal', async () => {
    const input = Object.assign(new PassThrough(), { isTTY: false }) as unknown as NodeJS.ReadStream;
    const output = new PassThrough() as unknown as NodeJS.WriteStream;
    const write = jest.spyOn(output, 'write');

    await expect(new ConsoleCredentialProvider(input, output).get()).resolves.toBeNull();
    expect(write).not.toHaveBeenCalled();
  });
});
