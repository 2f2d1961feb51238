import { Test, TestingModule } from '@nestjs/testing';
import axios, { AxiosInstance } from 'axios';
import { TwitchAuthService } from './twitch-auth.service';
import { TwitchHelixClient } from './twitch-helix.client';

describe('TwitchHelixClient', () => {
  let client: TwitchHelixClient;

  const mockHttp = {
    get: jest.fn(),
  };

  const mockAuthService = {
    clientId: 'test-client-id',
    getAccessToken: jest.fn(),
    invalidate: jest.fn(),
  };

  const unauthorized = () =>
    Object.assign(new Error('Request failed with status code 401'), {
      isAxiosError: true,
      response: { status: 401 },
    });

  beforeEach(async () => {
    jest.spyOn(axios, 'create').mockReturnValue(mockHttp as unknown as AxiosInstance);

    const module: TestingModule = await Test.createTestingModule({
      providers: [
        TwitchHelixClient,
        {
          provide: TwitchAuthService,
          useValue: mockAuthService,
        },
      ],
    }).compile();

    client = module.get<TwitchHelixClient>(TwitchHelixClient);
    mockAuthService.getAccessToken.mockResolvedValue('token-1');
  });

  afterEach(() => {
    jest.restoreAllMocks();
    jest.clearAllMocks();
  });

  it('should create its client against the Helix base url', () => {
    expect(axios.create).toHaveBeenCalledWith({ baseURL: 'https://api.twitch.tv/helix', timeout: 10_000 });
  });

  it('should send the app credentials and return the response body', async () => {
    const params = new URLSearchParams({ login: 'alice' });
    const controller = new AbortController();
    mockHttp.get.mockResolvedValue({ data: { data: [] } });

    const result = await client.get('/users', params, controller.signal);

    expect(result).toEqual({ data: [] });
    expect(mockAuthService.getAccessToken).toHaveBeenCalledWith(controller.signal);
    expect(mockHttp.get).toHaveBeenCalledWith('/users', {
      params,
      headers: {
        'Client-Id': 'test-client-id',
        Authorization: 'Bearer token-1',
      },
      signal: controller.signal,
    });
  });

  it('should invalidate the token and retry once on 401', async () => {
    mockAuthService.getAccessToken.mockResolvedValueOnce('revoked').mockResolvedValueOnce('token-2');
    mockHttp.get.mockRejectedValueOnce(unauthorized()).mockResolvedValueOnce({ data: { data: ['ok'] } });

    const result = await client.get('/streams', new URLSearchParams());

    expect(result).toEqual({ data: ['ok'] });
    expect(mockAuthService.invalidate).toHaveBeenCalledTimes(1);
    expect(mockHttp.get).toHaveBeenCalledTimes(2);
    expect(mockHttp.get.mock.calls[1][1].headers.Authorization).toBe('Bearer token-2');
  });

  it('should not retry a second 401', async () => {
    mockHttp.get.mockRejectedValue(unauthorized());

    await expect(client.get('/streams', new URLSearchParams())).rejects.toThrow(
      'Request failed with status code 401',
    );
    expect(mockHttp.get).toHaveBeenCalledTimes(2);
  });

  it('should propagate other errors without retrying', async () => {
    mockHttp.get.mockRejectedValue(new Error('Network Error'));

    await expect(client.get('/streams', new URLSearchParams())).rejects.toThrow('Network Error');
    expect(mockAuthService.invalidate).not.toHaveBeenCalled();
    expect(mockHttp.get).toHaveBeenCalledTimes(1);
  });
});
