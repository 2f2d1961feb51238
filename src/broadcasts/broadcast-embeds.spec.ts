import { TrackedStreamer } from '../now-live/interfaces/tracked-streamer.interface';
import {
  buildEndedEmbed,
  buildLiveEmbed,
  buildSummaryContent,
  formatDuration,
  getStreamPreviewUrl,
} from './broadcast-embeds';

describe('broadcast-embeds', () => {
  const startedAt = new Date('2024-05-01T18:00:00.000Z');
  const now = new Date('2024-05-01T18:10:00.000Z');
  const style = { onlineColor: 0x9146ff, offlineColor: 0x747f8d };

  const streamer: TrackedStreamer = {
    id: '1001',
    login: 'alice',
    displayName: 'Alice',
    profileImageUrl: 'https://example.com/alice.png',
    isLive: true,
    lastOnline: startedAt,
    nextMediaRefreshAt: now,
    broadcast: {
      title: 'Building things',
      categoryId: '1469308723',
      categoryName: 'Software and Game Development',
      viewerCount: 12,
      startedAt,
    },
  };

  const minutesAfterStart = (minutes: number) => new Date(startedAt.getTime() + minutes * 60 * 1000);

  describe('formatDuration', () => {
    it.each([
      [0, '0 minutes'],
      [1, '1 minute'],
      [59, '59 minutes'],
      [60, '1 hour'],
      [61, '1 hour and 1 minute'],
      [125, '2 hours and 5 minutes'],
    ])('should format %i minutes as "%s"', (minutes, expected) => {
      expect(formatDuration(startedAt, minutesAfterStart(minutes))).toBe(expected);
    });

    it('should ignore partial minutes', () => {
      expect(formatDuration(startedAt, new Date(startedAt.getTime() + 119 * 1000))).toBe('1 minute');
    });

    it('should never go negative', () => {
      expect(formatDuration(startedAt, minutesAfterStart(-5))).toBe('0 minutes');
    });
  });

  describe('getStreamPreviewUrl', () => {
    it('should build the preview url with a unix timestamp', () => {
      expect(getStreamPreviewUrl('alice', startedAt)).toBe(
        'https://static-cdn.jtvnw.net/previews-ttv/live_user_alice-1280x720.jpg?1714586400',
      );
    });
  });

  describe('buildLiveEmbed', () => {
    it('should render the live broadcast', () => {
      expect(buildLiveEmbed(streamer, style, now, now)).toEqual({
        timestamp: '2024-05-01T18:10:00.000Z',
        footer: { text: 'Now Live Tracker' },
        title: 'Alice is now live!',
        description: 'Building things',
        url: 'https://www.twitch.tv/alice',
        color: 0x9146ff,
        image: { url: 'https://static-cdn.jtvnw.net/previews-ttv/live_user_alice-1280x720.jpg?1714587000' },
        thumbnail: { url: 'https://example.com/alice.png' },
        fields: [
          { name: 'Started', value: '<t:1714586400:R>', inline: true },
          { name: 'Viewers', value: '12', inline: true },
          { name: 'Category', value: 'Software and Game Development', inline: true },
        ],
      });
    });

    it('should add the footer icon when configured', () => {
      const embed = buildLiveEmbed(streamer, { ...style, footerIcon: 'https://example.com/icon.png' }, now, now);

      expect(embed.footer).toEqual({ text: 'Now Live Tracker', icon_url: 'https://example.com/icon.png' });
    });

    it('should reject a streamer without a broadcast', () => {
      expect(() => buildLiveEmbed({ ...streamer, broadcast: null }, style, now, now)).toThrow(
        'Alice (1001) has no broadcast to display',
      );
    });
  });

  describe('buildEndedEmbed', () => {
    it('should show how long the broadcast lasted', () => {
      const embed = buildEndedEmbed(streamer, style, minutesAfterStart(95));

      expect(embed.title).toBe('Alice finished streaming.');
      expect(embed.color).toBe(0x747f8d);
      expect(embed.fields).toEqual([{ name: 'Stream Duration', value: '1 hour and 35 minutes', inline: true }]);
    });

    it('should omit the duration without broadcast metadata', () => {
      expect(buildEndedEmbed({ ...streamer, broadcast: null }, style, now).fields).toBeUndefined();
    });
  });

  describe('buildSummaryContent', () => {
    it('should say when nothing is live', () => {
      expect(buildSummaryContent([], '100', '200')).toBe('## Active Streams\nNo streams are currently active');
    });

    it('should link every live broadcast message', () => {
      const content = buildSummaryContent(
        [
          { displayName: 'Alice', messageId: '301' },
          { displayName: 'Bob', messageId: '302' },
        ],
        '100',
        '200',
      );

      expect(content).toBe(
        '## Active Streams\n' +
          '- [Alice](https://discord.com/channels/100/200/301)\n' +
          '- [Bob](https://discord.com/channels/100/200/302)',
      );
    });
  });
});
