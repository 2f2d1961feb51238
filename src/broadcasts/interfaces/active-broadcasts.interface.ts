/**
 * A Discord message showing one live broadcast.
 */
export interface BroadcastMessage {
  messageId: string;
  userId: string;
  login: string;
  displayName: string;
  // Cache-busting timestamp of the preview image currently shown
  previewUpdatedAt: Date;
}

export interface ActiveBroadcastsState {
  statusMessageId: string | null;
  messages: BroadcastMessage[];
}
