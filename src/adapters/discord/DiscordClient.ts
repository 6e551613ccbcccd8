import { Client, Events, GatewayIntentBits } from 'discord.js';
import { logger } from '../../infra/logger';

// Wrapper around discord.js Client for lifecycle management and event logging
// Handles authentication, ready state, and lifecycle events
export class DiscordClient {
  private readonly client: Client;
  // Promise that resolves when Discord client is fully ready
  private readonly ready: Promise<void>;

  constructor() {
    // Conversations are guild threads; the engine only posts to and archives them,
    // so the Guilds intent is all the gateway needs to deliver
    this.client = new Client({
      intents: [GatewayIntentBits.Guilds],
    });

    // Store promise that resolves when ClientReady event fires
    this.ready = new Promise<void>((resolve) => {
      this.client.once(Events.ClientReady, (readyClient) => {
        logger.info(
          {
            user: readyClient.user.tag,
            guilds: readyClient.guilds.cache.size,
          },
          'Discord client ready',
        );
        resolve();
      });
    });

    // Log when a conversation thread is deleted out from under us
    this.client.on(Events.ThreadDelete, (thread) => {
      logger.warn({ threadId: thread.id, guildId: thread.guildId }, 'Conversation thread deleted');
    });

    // Log any errors from Discord client
    this.client.on(Events.Error, (err) => {
      logger.error({ err }, 'Discord client error');
    });
  }

  // Connect to Discord with bot token and wait for ready state
  async start(token: string): Promise<void> {
    await this.client.login(token);
    // Wait for ClientReady event before returning
    await this.ready;
  }

  // Destroy client connection and cleanup resources
  async shutdown(): Promise<void> {
    await this.client.destroy();
  }

  // Read-only getter for number of guilds the bot is in
  get guildCount(): number {
    return this.client.guilds.cache.size;
  }

  // Expose raw discord.js Client for API calls
  get sdk(): Client {
    return this.client;
  }
}
