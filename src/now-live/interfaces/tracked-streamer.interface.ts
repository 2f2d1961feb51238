export interface BroadcastMetadata {
  title: string;
  categoryId: string;
  categoryName: string;
  viewerCount: number;
  startedAt: Date;
  thumbnailUrl?: string;
  language?: string;
}

/**
 * A Twitch account on the roster together with the liveness the tracker last observed.
 * `broadcast` and `nextMediaRefreshAt` are only set while `isLive` is true.
 */
export interface TrackedStreamer {
  id: string;
  login: string;
  displayName: string;
  profileImageUrl: string;
  isLive: boolean;
  lastOnline: Date | null;
  nextMediaRefreshAt: Date | null;
  broadcast: BroadcastMetadata | null;
}

export interface UserProfile {
  id: string;
  login: string;
  displayName: string;
  profileImageUrl: string;
}

export interface LiveStream {
  userId: string;
  broadcast: BroadcastMetadata;
}
