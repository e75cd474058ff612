import axios from 'axios';
import { AuthError, UpstreamUnavailable } from '../../common/errors';
import { testConfig } from '../../common/testing/config';
import { ManualClock } from '../../common/testing/manual-clock';
import { CredentialStore } from '../credentials/credential-store';
import { TokenManager } from './token-manager.service';

jest.mock('axios');

const mockedPost = axios.post as jest.Mock;

const tokenResponse = (accessToken: string, extra: Record<string, unknown> = {}) => ({
  status: 200,
  data: { accessToken, expiresIn: 3600, ...extra },
});

describe('TokenManager', () => {
  const store: CredentialStore = {
    getMerchantCredentials: async () => ({ clientId: 'client-a', clientSecret: 'test-secret' }),
  };
  let clock: ManualClock;
  let manager: TokenManager;

  beforeEach(() => {
    mockedPost.mockReset();
    clock = new ManualClock();
    manager = new TokenManager(testConfig({ MARKETPLACE_API_BASE_URL: 'https://api.test' }), store, clock);
  });

  it('requests a client token once and serves it from cache', async () => {
    mockedPost.mockResolvedValueOnce(tokenResponse('tok-1'));

    await expect(manager.getToken('m-1')).resolves.toBe('tok-1');
    await expect(manager.getToken('m-1')).resolves.toBe('tok-1');

    expect(mockedPost).toHaveBeenCalledTimes(1);
    expect(mockedPost.mock.calls[0][0]).toBe('https://api.test/authentication/v1.0/oauth/token');
    expect(mockedPost.mock.calls[0][1]).toBe('grantType=client_credentials&clientId=client-a&clientSecret=test-secret');
  });

  it('refreshes with the refresh token once less than 20% of the lifetime remains', async () => {
    mockedPost
      .mockResolvedValueOnce(tokenResponse('tok-1', { refreshToken: 'r-1' }))
      .mockResolvedValueOnce(tokenResponse('tok-2'));

    await manager.getToken('m-1');
    clock.advance(2_000_000);
    await expect(manager.getToken('m-1')).resolves.toBe('tok-1');

    clock.advance(900_000);
    await expect(manager.getToken('m-1')).resolves.toBe('tok-2');
    expect(mockedPost).toHaveBeenCalledTimes(2);
    expect(mockedPost.mock.calls[1][1]).toBe(
      'grantType=refresh_token&clientId=client-a&clientSecret=test-secret&refreshToken=r-1',
    );
  });

  it('shares one in-flight refresh between concurrent callers', async () => {
    mockedPost.mockResolvedValueOnce(tokenResponse('tok-1'));

    const tokens = await Promise.all([manager.getToken('m-1'), manager.getToken('m-2'), manager.getToken('m-1')]);

    expect(tokens).toEqual(['tok-1', 'tok-1', 'tok-1']);
    expect(mockedPost).toHaveBeenCalledTimes(1);
  });

  it('falls back to client credentials when the refresh grant is rejected', async () => {
    mockedPost
      .mockResolvedValueOnce(tokenResponse('tok-1', { refreshToken: 'r-1' }))
      .mockResolvedValueOnce({ status: 400, data: { error: 'invalid_grant' } })
      .mockResolvedValueOnce(tokenResponse('tok-3'));

    await manager.getToken('m-1');
    clock.advance(3_600_000);

    await expect(manager.getToken('m-1')).resolves.toBe('tok-3');
    expect(mockedPost.mock.calls[2][1]).toContain('grantType=client_credentials');
  });

  it('raises AuthError when the client credentials are rejected', async () => {
    mockedPost.mockResolvedValueOnce({ status: 401, data: { error: 'unauthorized' } });

    await expect(manager.getToken('m-1')).rejects.toBeInstanceOf(AuthError);
  });

  it('raises UpstreamUnavailable when the token endpoint fails', async () => {
    mockedPost.mockResolvedValueOnce({ status: 503, data: '' });
    await expect(manager.getToken('m-1')).rejects.toBeInstanceOf(UpstreamUnavailable);

    mockedPost.mockRejectedValueOnce(new Error('socket hang up'));
    await expect(manager.getToken('m-1')).rejects.toThrow('Token request failed: socket hang up');
  });

  it('fetches a new token after invalidation', async () => {
    mockedPost.mockResolvedValueOnce(tokenResponse('tok-1')).mockResolvedValueOnce(tokenResponse('tok-2'));

    await manager.getToken('m-1');
    await manager.invalidate('m-1');

    await expect(manager.getToken('m-1')).resolves.toBe('tok-2');
  });
});
