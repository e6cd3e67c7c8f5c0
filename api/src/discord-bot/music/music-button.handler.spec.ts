import type { ButtonInteraction } from 'discord.js';
import { MUSIC_BUTTON_IDS } from '../discord-bot.constants';
import { MusicButtonHandler } from './music-button.handler';
import type { MusicPlayerService } from './music-player.service';
import { MusicQueueService, type QueuedTrack } from './music-queue.service';
import { NowPlayingMessageService } from './now-playing-message.service';

function track(title: string): QueuedTrack {
  return {
    song: title,
    album: 'Live',
    image: '',
    media_url: `https://aac.saavncdn.com/${title}_320.mp4`,
    duration: 3.2,
    music: 'Band',
    singers: 'Singer',
    year: '2024',
    requestedBy: '<@7>',
  };
}

function click(customId: string) {
  const interaction = {
    customId,
    guildId: 'g1',
    reply: jest.fn().mockResolvedValue(undefined),
    update: jest.fn().mockResolvedValue(undefined),
    deferUpdate: jest.fn().mockResolvedValue(undefined),
  };
  return {
    interaction,
    asButton: interaction as unknown as ButtonInteraction,
  };
}

describe('MusicButtonHandler', () => {
  let handler: MusicButtonHandler;
  let queue: MusicQueueService;
  let nowPlaying: NowPlayingMessageService;
  let player: {
    previous: jest.Mock;
    pause: jest.Mock;
    resume: jest.Mock;
    skip: jest.Mock;
    stop: jest.Mock;
    getChannelName: jest.Mock;
  };

  beforeEach(() => {
    queue = new MusicQueueService();
    nowPlaying = new NowPlayingMessageService();
    player = {
      previous: jest.fn().mockReturnValue(null),
      pause: jest.fn().mockReturnValue(true),
      resume: jest.fn().mockReturnValue(true),
      skip: jest.fn().mockReturnValue(true),
      stop: jest.fn().mockReturnValue(true),
      getChannelName: jest.fn().mockReturnValue('Music Lounge'),
    };
    handler = new MusicButtonHandler(
      player as unknown as MusicPlayerService,
      queue,
      nowPlaying,
    );
  });

  it('tells the user when there is no history', async () => {
    const { interaction, asButton } = click(MUSIC_BUTTON_IDS.PREVIOUS);

    await handler.handle(asButton);

    expect(interaction.reply).toHaveBeenCalledWith({
      content: '⏮️ No previous song in history!',
      ephemeral: true,
    });
  });

  it('marks the embed paused', async () => {
    queue.enqueue('g1', track('a'));
    queue.advance('g1');
    const { interaction, asButton } = click(MUSIC_BUTTON_IDS.PAUSE);

    await handler.handle(asButton);

    const [[payload]] = interaction.update.mock.calls as [
      [{ embeds: { toJSON(): { fields?: { name: string; value: string }[] } }[] }],
    ];
    const status = payload.embeds[0]
      .toJSON()
      .fields?.find((field) => field.name === '🎚️ Status');
    expect(status?.value).toBe('⏸️ Paused');
  });

  it('toggles loop mode', async () => {
    const first = click(MUSIC_BUTTON_IDS.LOOP);
    await handler.handle(first.asButton);
    const second = click(MUSIC_BUTTON_IDS.LOOP);
    await handler.handle(second.asButton);

    expect(first.interaction.reply).toHaveBeenCalledWith({
      content: '🔁 Loop: ON',
      ephemeral: true,
    });
    expect(second.interaction.reply).toHaveBeenCalledWith({
      content: '🔁 Loop: OFF',
      ephemeral: true,
    });
  });

  it('only shuffles a queue of two or more', async () => {
    queue.enqueue('g1', track('a'));
    const { interaction, asButton } = click(MUSIC_BUTTON_IDS.SHUFFLE);

    await handler.handle(asButton);

    expect(interaction.reply).toHaveBeenCalledWith({
      content: '❌ Not enough songs in queue to shuffle.',
      ephemeral: true,
    });
  });

  it('replaces the message with the stopped embed and drops the controls', async () => {
    const { interaction, asButton } = click(MUSIC_BUTTON_IDS.STOP);

    await handler.handle(asButton);

    expect(player.stop).toHaveBeenCalledWith('g1');
    const [[payload]] = interaction.update.mock.calls as [
      [{ embeds: { toJSON(): { title?: string } }[]; components: unknown[] }],
    ];
    expect(payload.embeds[0].toJSON().title).toBe('⏹️ Stopped');
    expect(payload.components).toEqual([]);
  });

  it('acknowledges a skip without replying', async () => {
    const { interaction, asButton } = click(MUSIC_BUTTON_IDS.SKIP);

    await handler.handle(asButton);

    expect(interaction.deferUpdate).toHaveBeenCalled();
    expect(interaction.reply).not.toHaveBeenCalled();
  });
});
