import { TrackedStreamer } from './interfaces/tracked-streamer.interface';

export enum NowLiveEvent {
  ServiceStarted = 'service.started',
  ServiceStarting = 'service.starting',
  ServiceExiting = 'service.exiting',
  ServiceExited = 'service.exited',
  BroadcastDetectedLive = 'broadcast.detected-live',
  BroadcastEnded = 'broadcast.ended',
  BroadcastContinuing = 'broadcast.continuing',
  BroadcastMediaRefreshDue = 'broadcast.media-refresh-due',
  UserAdded = 'user.added',
  UserRemoved = 'user.removed',
  UserStreamError = 'user.stream-error',
}

export interface StreamersPayload {
  streamers: TrackedStreamer[];
  signal?: AbortSignal;
}

export interface LifecyclePayload {
  signal?: AbortSignal;
}

export interface StreamErrorPayload {
  userId: string;
  message: string;
  error: unknown;
}

export interface NowLiveEventMap {
  [NowLiveEvent.ServiceStarted]: LifecyclePayload;
  [NowLiveEvent.ServiceStarting]: LifecyclePayload;
  [NowLiveEvent.ServiceExiting]: LifecyclePayload;
  [NowLiveEvent.ServiceExited]: LifecyclePayload;
  [NowLiveEvent.BroadcastDetectedLive]: StreamersPayload;
  [NowLiveEvent.BroadcastEnded]: StreamersPayload;
  [NowLiveEvent.BroadcastContinuing]: StreamersPayload;
  [NowLiveEvent.BroadcastMediaRefreshDue]: StreamersPayload;
  [NowLiveEvent.UserAdded]: StreamersPayload;
  [NowLiveEvent.UserRemoved]: StreamersPayload;
  [NowLiveEvent.UserStreamError]: StreamErrorPayload;
}

export type NowLiveEventHandler<E extends NowLiveEvent> = (payload: NowLiveEventMap[E]) => void | Promise<void>;

/**
 * A subscriber handles any subset of the events; missing handlers are skipped.
 */
export type NowLiveSubscriber = {
  [E in NowLiveEvent]?: NowLiveEventHandler<E>;
};
