import { createHash } from 'crypto';
import type { ChatDispatch, ChatTransport } from '../../core/ports';
import type { DiscordClient } from './DiscordClient';

// Discord accepts nonces of at most 25 characters
const NONCE_LENGTH = 25;

// Same identity, same nonce: with enforceNonce Discord returns the message it
// already created instead of posting a second one
export const nonceFor = (identity: string): string =>
  createHash('sha256').update(identity).digest('hex').slice(0, NONCE_LENGTH);

/**
 * Chat transport backed by Discord threads. Each conversation id is a thread
 * id; archiving locks and archives the thread.
 */
export class DiscordTransport implements ChatTransport {
  constructor(private readonly client: DiscordClient) {}

  // The signal is checked between calls: discord.js takes no signal per request
  async dispatch(message: ChatDispatch, signal: AbortSignal): Promise<void> {
    signal.throwIfAborted();
    const channel = await this.client.sdk.channels.fetch(message.conversationId);
    signal.throwIfAborted();
    if (!channel || !channel.isSendable()) {
      throw new Error(`Conversation ${message.conversationId} is not a text channel the bot can post in`);
    }

    await channel.send({
      content: message.payload,
      nonce: nonceFor(message.identity),
      enforceNonce: true,
      allowedMentions: { parse: [] },
    });
  }

  async archive(conversationId: string, identity: string, signal: AbortSignal): Promise<void> {
    signal.throwIfAborted();
    const channel = await this.client.sdk.channels.fetch(conversationId);
    signal.throwIfAborted();
    if (!channel || !channel.isThread()) {
      throw new Error(`Conversation ${conversationId} is not a thread and cannot be archived`);
    }

    // Archiving twice is harmless; only touch the thread if it is still open
    if (!channel.locked) {
      await channel.setLocked(true, `casebridge ${identity}`);
      signal.throwIfAborted();
    }
    if (!channel.archived) {
      await channel.setArchived(true, `casebridge ${identity}`);
    }
  }
}
