import tmi, { type ChatUserstate, type Client } from 'tmi.js';
import type { ChatEvent } from '@linklog/core';

// No identity: tmi.js joins anonymously, which is enough to read chat.
export function createChatClient(channel: string): Client {
  return new tmi.Client({
    channels: [channel],
    connection: { reconnect: true, secure: true },
    options: { debug: false }
  });
}

export function toChatEvent(tags: ChatUserstate, message: string): ChatEvent {
  const isModerator = tags.mod === true || tags['user-type'] === 'mod';
  return {
    role: isModerator ? 'moderator' : 'viewer',
    displayName: tags['display-name'] || tags.username || '',
    message,
    sentTimestamp: tags['tmi-sent-ts'] ?? ''
  };
}
