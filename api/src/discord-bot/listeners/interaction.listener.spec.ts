import { Logger } from '@nestjs/common';
import { Events, type Interaction } from 'discord.js';
import { InteractionListener } from './interaction.listener';
import type { DiscordBotClientService } from '../discord-bot-client.service';
import type { SlashCommandHandler } from '../commands/slash-command';
import type { MusicButtonHandler } from '../music/music-button.handler';
import { MUSIC_BUTTON_IDS } from '../discord-bot.constants';

function chatInput(commandName: string) {
  return {
    commandName,
    replied: false,
    deferred: false,
    isChatInputCommand: () => true,
    isButton: () => false,
    reply: jest.fn().mockResolvedValue(undefined),
    followUp: jest.fn().mockResolvedValue(undefined),
  };
}

function button(customId: string) {
  return {
    customId,
    replied: false,
    deferred: false,
    isChatInputCommand: () => false,
    isButton: () => true,
    reply: jest.fn().mockResolvedValue(undefined),
  };
}

describe('InteractionListener', () => {
  let listener: InteractionListener;
  let client: { on: jest.Mock };
  let ping: SlashCommandHandler & { handleInteraction: jest.Mock };
  let buttons: { handle: jest.Mock };

  beforeEach(() => {
    jest.spyOn(Logger.prototype, 'log').mockImplementation();
    jest.spyOn(Logger.prototype, 'warn').mockImplementation();
    jest.spyOn(Logger.prototype, 'error').mockImplementation();

    client = { on: jest.fn() };
    ping = {
      commandName: 'ping',
      group: 'general',
      getDefinition: jest.fn(),
      handleInteraction: jest.fn().mockResolvedValue(undefined),
    };
    buttons = { handle: jest.fn().mockResolvedValue(undefined) };
    const clientService = {
      getClient: jest.fn().mockReturnValue(client),
    } as unknown as DiscordBotClientService;

    listener = new InteractionListener(
      clientService,
      [ping],
      buttons as unknown as MusicButtonHandler,
    );
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  it('attaches to the client once per connection', () => {
    listener.attachListener();
    listener.attachListener();

    expect(client.on).toHaveBeenCalledTimes(1);
    expect(client.on).toHaveBeenCalledWith(
      Events.InteractionCreate,
      expect.any(Function),
    );

    listener.detachListener();
    listener.attachListener();
    expect(client.on).toHaveBeenCalledTimes(2);
  });

  it('routes slash commands by name', async () => {
    const interaction = chatInput('ping');

    await listener.handleInteraction(interaction as unknown as Interaction);

    expect(ping.handleInteraction).toHaveBeenCalledWith(interaction);
  });

  it('ignores unknown commands', async () => {
    const interaction = chatInput('unknown');

    await listener.handleInteraction(interaction as unknown as Interaction);

    expect(ping.handleInteraction).not.toHaveBeenCalled();
    expect(interaction.reply).not.toHaveBeenCalled();
  });

  it('replies with a generic failure when a command throws', async () => {
    ping.handleInteraction.mockRejectedValue(new Error('boom'));
    const interaction = chatInput('ping');

    await listener.handleInteraction(interaction as unknown as Interaction);

    expect(interaction.reply).toHaveBeenCalledWith({
      content: 'Something went wrong. Please try again later.',
      ephemeral: true,
    });
  });

  it('routes music control buttons', async () => {
    const interaction = button(MUSIC_BUTTON_IDS.SKIP);

    await listener.handleInteraction(interaction as unknown as Interaction);

    expect(buttons.handle).toHaveBeenCalledWith(interaction);
  });

  it('leaves other buttons alone', async () => {
    await listener.handleInteraction(
      button('other:thing') as unknown as Interaction,
    );

    expect(buttons.handle).not.toHaveBeenCalled();
  });
});
