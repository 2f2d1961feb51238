import { Test, TestingModule } from '@nestjs/testing';
import { TrackedStreamer } from '../now-live/interfaces/tracked-streamer.interface';
import { NowLiveEvent } from '../now-live/now-live.events';
import { NowLiveEventBus } from '../now-live/now-live-event.bus';
import { SentryService } from '../sentry/sentry.service';
import { ActiveBroadcastsService } from './active-broadcasts.service';
import { BroadcastStatesHandler } from './broadcast-states.handler';

describe('BroadcastStatesHandler', () => {
  let handler: BroadcastStatesHandler;
  let bus: NowLiveEventBus;
  let controller: AbortController;

  const mockActiveBroadcasts = {
    loadData: jest.fn(),
    ensureStatusMessageExists: jest.fn(),
    isMessageTracked: jest.fn(),
    createBroadcastMessage: jest.fn(),
    updateBroadcastMessage: jest.fn(),
    endBroadcastMessage: jest.fn(),
    discardBroadcastMessage: jest.fn(),
    updateSummary: jest.fn(),
  };
  const mockSentryService = { captureException: jest.fn() };

  const streamer = (id: string): TrackedStreamer => ({
    id,
    login: `user${id}`,
    displayName: `User${id}`,
    profileImageUrl: `https://example.com/${id}.png`,
    isLive: true,
    lastOnline: new Date('2024-05-01T18:00:00.000Z'),
    nextMediaRefreshAt: new Date('2024-05-01T18:06:00.000Z'),
    broadcast: {
      title: 'Building things',
      categoryId: '1469308723',
      categoryName: 'Software and Game Development',
      viewerCount: 12,
      startedAt: new Date('2024-05-01T18:00:00.000Z'),
    },
  });

  beforeEach(async () => {
    const module: TestingModule = await Test.createTestingModule({
      providers: [
        BroadcastStatesHandler,
        { provide: ActiveBroadcastsService, useValue: mockActiveBroadcasts },
        { provide: SentryService, useValue: mockSentryService },
      ],
    }).compile();

    handler = module.get<BroadcastStatesHandler>(BroadcastStatesHandler);
    bus = new NowLiveEventBus();
    bus.subscribe(handler.toSubscriber());
    controller = new AbortController();

    Object.values(mockActiveBroadcasts).forEach((mock) => mock.mockResolvedValue(undefined));
    mockActiveBroadcasts.isMessageTracked.mockReturnValue(false);
  });

  afterEach(() => {
    jest.clearAllMocks();
  });

  it('should load the sink state and ensure the summary on startup', async () => {
    bus.emit(NowLiveEvent.ServiceStarting, { signal: controller.signal });
    await bus.drain();

    expect(mockActiveBroadcasts.loadData).toHaveBeenCalledWith(controller.signal);
    expect(mockActiveBroadcasts.ensureStatusMessageExists).toHaveBeenCalledWith(controller.signal);
  });

  it('should update tracked messages and create the others when detected live', async () => {
    mockActiveBroadcasts.isMessageTracked.mockImplementation((id: string) => id === '1');
    const streamers = [streamer('1'), streamer('2')];

    bus.emit(NowLiveEvent.BroadcastDetectedLive, { streamers, signal: controller.signal });
    await bus.drain();

    expect(mockActiveBroadcasts.updateBroadcastMessage).toHaveBeenCalledWith(streamers[0], controller.signal, false);
    expect(mockActiveBroadcasts.createBroadcastMessage).toHaveBeenCalledWith(streamers[1], controller.signal);
    expect(mockActiveBroadcasts.updateSummary).toHaveBeenCalledWith(controller.signal);
  });

  it('should refresh the preview on MediaRefreshDue', async () => {
    mockActiveBroadcasts.isMessageTracked.mockReturnValue(true);
    const streamers = [streamer('1')];

    bus.emit(NowLiveEvent.BroadcastMediaRefreshDue, { streamers, signal: controller.signal });
    await bus.drain();

    expect(mockActiveBroadcasts.updateBroadcastMessage).toHaveBeenCalledWith(streamers[0], controller.signal, true);
  });

  it('should keep processing the other streamers when one fails', async () => {
    const failure = new Error('Request failed with status code 500');
    mockActiveBroadcasts.createBroadcastMessage.mockRejectedValueOnce(failure);

    bus.emit(NowLiveEvent.BroadcastContinuing, { streamers: [streamer('1'), streamer('2')] });
    await bus.drain();

    expect(mockActiveBroadcasts.createBroadcastMessage).toHaveBeenCalledTimes(2);
    expect(mockSentryService.captureException).toHaveBeenCalledWith(failure, { userId: '1', state: 'continuing' });
    expect(mockActiveBroadcasts.updateSummary).toHaveBeenCalledTimes(1);
  });

  it('should end broadcasts and update the summary', async () => {
    const streamers = [streamer('1')];

    bus.emit(NowLiveEvent.BroadcastEnded, { streamers, signal: controller.signal });
    await bus.drain();

    expect(mockActiveBroadcasts.endBroadcastMessage).toHaveBeenCalledWith(streamers[0], controller.signal);
    expect(mockActiveBroadcasts.updateSummary).toHaveBeenCalledWith(controller.signal);
  });

  it('should take down the message of a removed user', async () => {
    bus.emit(NowLiveEvent.UserRemoved, { streamers: [streamer('1')] });
    await bus.drain();

    expect(mockActiveBroadcasts.discardBroadcastMessage).toHaveBeenCalledWith('1', undefined);
    expect(mockActiveBroadcasts.updateSummary).toHaveBeenCalledWith(undefined);
  });

  it('should report stream errors to Sentry', async () => {
    const error = new Error('Request failed with status code 503');

    bus.emit(NowLiveEvent.UserStreamError, { userId: '1', message: 'Was not updated', error });
    await bus.drain();

    expect(mockSentryService.captureException).toHaveBeenCalledWith(error, {
      userId: '1',
      message: 'Was not updated',
    });
  });

  it('should not report cancelled summary updates', async () => {
    const abortError = new Error('This operation was aborted');
    abortError.name = 'AbortError';
    mockActiveBroadcasts.updateSummary.mockRejectedValueOnce(abortError);

    bus.emit(NowLiveEvent.BroadcastEnded, { streamers: [], signal: controller.signal });
    await bus.drain();

    expect(mockSentryService.captureException).not.toHaveBeenCalled();
  });
});
