import { Logger } from '@nestjs/common';
import type { EventEmitter2 } from '@nestjs/event-emitter';
import {
  AudioPlayerStatus,
  VoiceConnectionStatus,
  createAudioPlayer,
  createAudioResource,
  entersState,
  joinVoiceChannel,
} from '@discordjs/voice';
import type { VoiceBasedChannel } from 'discord.js';
import { MUSIC_EVENTS } from '../discord-bot.constants';
import { MusicPlayerService } from './music-player.service';
import { MusicQueueService, type QueuedTrack } from './music-queue.service';

jest.mock('@discordjs/voice', () => ({
  ...jest.requireActual<typeof import('@discordjs/voice')>('@discordjs/voice'),
  joinVoiceChannel: jest.fn(),
  createAudioPlayer: jest.fn(),
  createAudioResource: jest.fn(),
  entersState: jest.fn(),
}));

const joinMock = jest.mocked(joinVoiceChannel);
const playerMock = jest.mocked(createAudioPlayer);
const resourceMock = jest.mocked(createAudioResource);
const entersStateMock = jest.mocked(entersState);

function track(title: string): QueuedTrack {
  return {
    song: title,
    album: '',
    image: '',
    media_url: `https://aac.saavncdn.com/${title}_320.mp4`,
    duration: 3,
    music: '',
    singers: '',
    year: '',
    requestedBy: '<@1>',
  };
}

function voiceChannel(id: string, name: string): VoiceBasedChannel {
  return {
    id,
    name,
    guild: { id: 'g1', voiceAdapterCreator: jest.fn() },
  } as unknown as VoiceBasedChannel;
}

describe('MusicPlayerService', () => {
  let queue: MusicQueueService;
  let emit: jest.Mock;
  let service: MusicPlayerService;
  let connection: {
    joinConfig: { channelId: string };
    state: { status: VoiceConnectionStatus };
    on: jest.Mock;
    subscribe: jest.Mock;
    destroy: jest.Mock;
  };
  let player: { state: { status: AudioPlayerStatus }; on: jest.Mock; play: jest.Mock; stop: jest.Mock };

  beforeEach(() => {
    jest.spyOn(Logger.prototype, 'log').mockImplementation();
    jest.spyOn(Logger.prototype, 'debug').mockImplementation();
    jest.spyOn(Logger.prototype, 'error').mockImplementation();

    connection = {
      joinConfig: { channelId: '' },
      state: { status: VoiceConnectionStatus.Ready },
      on: jest.fn(),
      subscribe: jest.fn(),
      destroy: jest.fn(),
    };
    player = {
      state: { status: AudioPlayerStatus.Idle },
      on: jest.fn(),
      play: jest.fn(),
      stop: jest.fn().mockReturnValue(true),
    };

    // One live connection per guild, retargeted on every join.
    joinMock.mockImplementation((config) => {
      connection.joinConfig.channelId = config.channelId;
      return connection as unknown as ReturnType<typeof joinVoiceChannel>;
    });
    playerMock.mockReturnValue(player as unknown as ReturnType<typeof createAudioPlayer>);
    entersStateMock.mockResolvedValue(
      connection as unknown as Awaited<ReturnType<typeof entersState>>,
    );
    resourceMock.mockImplementation(
      (url) => ({ url }) as unknown as ReturnType<typeof createAudioResource>,
    );

    queue = new MusicQueueService();
    emit = jest.fn();
    service = new MusicPlayerService(queue, { emit } as unknown as EventEmitter2);
  });

  afterEach(() => {
    jest.restoreAllMocks();
    jest.clearAllMocks();
  });

  it('starts the first queued track and announces it', async () => {
    await service.join(voiceChannel('vc-1', 'Lounge'));
    queue.enqueue('g1', track('a'), track('b'));

    expect(service.startIfIdle('g1')?.song).toBe('a');
    expect(player.play).toHaveBeenCalledWith({ url: 'https://aac.saavncdn.com/a_320.mp4' });
    expect(emit).toHaveBeenCalledWith(MUSIC_EVENTS.TRACK_STARTED, {
      guildId: 'g1',
      track: track('a'),
      channelName: 'Lounge',
    });
  });

  it('watches for disconnects once per connection when moving channels', async () => {
    await service.join(voiceChannel('vc-1', 'Lounge'));
    await service.join(voiceChannel('vc-2', 'Stage'));
    await service.join(voiceChannel('vc-1', 'Lounge'));

    expect(joinMock).toHaveBeenCalledTimes(3);
    expect(connection.on).toHaveBeenCalledTimes(1);
    expect(connection.on).toHaveBeenCalledWith(
      VoiceConnectionStatus.Disconnected,
      expect.any(Function),
    );
    expect(playerMock).toHaveBeenCalledTimes(1);
    expect(service.getChannelName('g1')).toBe('Lounge');
  });

  it('drops tracks that fail to start instead of looping them forever', async () => {
    resourceMock.mockImplementation(() => {
      throw new Error('FFmpeg/avconv not found!');
    });
    await service.join(voiceChannel('vc-1', 'Lounge'));
    queue.enqueue('g1', track('a'), track('b'));
    queue.toggleLoop('g1');

    expect(service.startIfIdle('g1')).toBeNull();
    expect(resourceMock).toHaveBeenCalledTimes(2);
    expect(queue.get('g1').queue).toEqual([]);
    expect(queue.get('g1').nowPlaying).toBeNull();
    expect(emit).not.toHaveBeenCalled();
  });

  it('skips a broken track and plays the next one', async () => {
    resourceMock.mockImplementationOnce(() => {
      throw new Error('bad stream');
    });
    await service.join(voiceChannel('vc-1', 'Lounge'));
    queue.enqueue('g1', track('a'), track('b'));

    expect(service.startIfIdle('g1')?.song).toBe('b');
    expect(queue.get('g1').nowPlaying?.song).toBe('b');
  });

  it('tears the session down when a move never becomes ready', async () => {
    await service.join(voiceChannel('vc-1', 'Lounge'));
    entersStateMock.mockRejectedValueOnce(new Error('timeout'));

    await expect(service.join(voiceChannel('vc-2', 'Stage'))).rejects.toThrow('timeout');
    expect(service.isConnected('g1')).toBe(false);
    expect(connection.destroy).toHaveBeenCalledTimes(1);
  });
});
