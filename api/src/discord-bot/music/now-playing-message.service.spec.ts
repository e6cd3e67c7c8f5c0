import { Logger } from '@nestjs/common';
import type { Message } from 'discord.js';
import { NowPlayingMessageService } from './now-playing-message.service';
import type { QueuedTrack } from './music-queue.service';

const track: QueuedTrack = {
  song: 'Next Up',
  album: 'Singles',
  image: '',
  media_url: 'https://aac.saavncdn.com/next_320.mp4',
  duration: 2.75,
  music: 'Composer',
  singers: 'Singer',
  year: '2025',
  requestedBy: '<@7>',
};

describe('NowPlayingMessageService', () => {
  let service: NowPlayingMessageService;
  let edit: jest.Mock;

  beforeEach(() => {
    jest.spyOn(Logger.prototype, 'warn').mockImplementation();
    service = new NowPlayingMessageService();
    edit = jest.fn().mockResolvedValue(undefined);
    service.track('g1', { edit } as unknown as Message);
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  it('rewrites the tracked message when a new track starts', async () => {
    await service.onTrackStarted({ guildId: 'g1', track, channelName: 'Lounge' });

    const [[payload]] = edit.mock.calls as [
      [{ embeds: { toJSON(): { description?: string } }[] }],
    ];
    expect(payload.embeds[0].toJSON().description).toBe('**Next Up**');
  });

  it('ignores guilds without a tracked message', async () => {
    await service.onTrackStarted({ guildId: 'g2', track, channelName: 'Lounge' });

    expect(edit).not.toHaveBeenCalled();
  });

  it('forgets a message that can no longer be edited', async () => {
    edit.mockRejectedValue(new Error('Unknown Message'));

    await service.onTrackStarted({ guildId: 'g1', track, channelName: 'Lounge' });

    expect(service.get('g1')).toBeNull();
  });
});
