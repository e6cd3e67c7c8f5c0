import type {
  ChatInputCommandInteraction,
  RESTPostAPIChatInputApplicationCommandsJSONBody,
} from 'discord.js';

/** Injection token for the array of every slash command handler. */
export const BOT_COMMANDS = 'BOT_COMMANDS';

/** Commands load and are logged per group. */
export type CommandGroup = 'general' | 'music';

export interface SlashCommandHandler {
  readonly commandName: string;
  readonly group: CommandGroup;
  /** The command definition for Discord API registration */
  getDefinition(): RESTPostAPIChatInputApplicationCommandsJSONBody;
  handleInteraction(interaction: ChatInputCommandInteraction): Promise<void>;
}
