import dayjs from 'dayjs';
import { TrackedStreamer } from '../now-live/interfaces/tracked-streamer.interface';
import { DiscordEmbed, DiscordEmbedField } from './interfaces/discord.interface';

export const FOOTER_TEXT = 'Now Live Tracker';

export interface EmbedStyle {
  onlineColor: number;
  offlineColor: number;
  footerIcon?: string;
}

export interface SummaryEntry {
  displayName: string;
  messageId: string;
}

function pluralize(value: number, singular: string): string {
  return `${value} ${singular}${value === 1 ? '' : 's'}`;
}

/**
 * "45 minutes", "1 hour", "2 hours and 1 minute"
 */
export function formatDuration(start: Date, end: Date): string {
  const totalMinutes = Math.max(dayjs(end).diff(start, 'minute'), 0);
  if (totalMinutes < 60) {
    return pluralize(totalMinutes, 'minute');
  }

  const hours = Math.floor(totalMinutes / 60);
  const minutes = totalMinutes % 60;
  const hoursText = pluralize(hours, 'hour');
  return minutes > 0 ? `${hoursText} and ${pluralize(minutes, 'minute')}` : hoursText;
}

/**
 * Twitch serves a cached preview per URL; the timestamp query forces a fresh image.
 */
export function getStreamPreviewUrl(login: string, at: Date, width = 1280, height = 720): string {
  return `https://static-cdn.jtvnw.net/previews-ttv/live_user_${login}-${width}x${height}.jpg?${dayjs(at).unix()}`;
}

export function getChannelUrl(login: string): string {
  return `https://www.twitch.tv/${login}`;
}

function baseEmbed(style: EmbedStyle, now: Date): DiscordEmbed {
  return {
    timestamp: now.toISOString(),
    footer: style.footerIcon ? { text: FOOTER_TEXT, icon_url: style.footerIcon } : { text: FOOTER_TEXT },
  };
}

export function buildLiveEmbed(
  streamer: TrackedStreamer,
  style: EmbedStyle,
  now: Date,
  previewUpdatedAt: Date,
): DiscordEmbed {
  if (!streamer.broadcast) {
    throw new Error(`${streamer.displayName} (${streamer.id}) has no broadcast to display`);
  }

  const fields: DiscordEmbedField[] = [
    { name: 'Started', value: `<t:${dayjs(streamer.broadcast.startedAt).unix()}:R>`, inline: true },
    { name: 'Viewers', value: String(streamer.broadcast.viewerCount), inline: true },
  ];
  if (streamer.broadcast.categoryName) {
    fields.push({ name: 'Category', value: streamer.broadcast.categoryName, inline: true });
  }

  return {
    ...baseEmbed(style, now),
    title: `${streamer.displayName} is now live!`,
    description: streamer.broadcast.title,
    url: getChannelUrl(streamer.login),
    color: style.onlineColor,
    image: { url: getStreamPreviewUrl(streamer.login, previewUpdatedAt) },
    thumbnail: { url: streamer.profileImageUrl },
    fields,
  };
}

export function buildEndedEmbed(streamer: TrackedStreamer, style: EmbedStyle, now: Date): DiscordEmbed {
  const embed: DiscordEmbed = {
    ...baseEmbed(style, now),
    title: `${streamer.displayName} finished streaming.`,
    url: getChannelUrl(streamer.login),
    color: style.offlineColor,
    thumbnail: { url: streamer.profileImageUrl },
  };

  if (streamer.broadcast) {
    embed.fields = [
      { name: 'Stream Duration', value: formatDuration(streamer.broadcast.startedAt, now), inline: true },
    ];
  }
  return embed;
}

export function buildSummaryContent(entries: readonly SummaryEntry[], guildId: string, channelId: string): string {
  if (entries.length === 0) {
    return '## Active Streams\nNo streams are currently active';
  }

  const links = entries.map(
    (entry) => `- [${entry.displayName}](https://discord.com/channels/${guildId}/${channelId}/${entry.messageId})`,
  );
  return ['## Active Streams', ...links].join('\n');
}
