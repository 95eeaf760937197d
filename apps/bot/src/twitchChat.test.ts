import { describe, expect, it } from 'vitest';
import { toChatEvent } from './twitchChat';

describe('toChatEvent', () => {
  it('maps moderator tags', () => {
    expect(
      toChatEvent(
        { mod: true, 'display-name': 'ModPerson', username: 'modperson', 'tmi-sent-ts': '1700000000000' },
        'https://example.com'
      )
    ).toEqual({
      role: 'moderator',
      displayName: 'ModPerson',
      message: 'https://example.com',
      sentTimestamp: '1700000000000'
    });
  });

  it('treats the legacy mod user type as a moderator', () => {
    expect(toChatEvent({ mod: false, 'user-type': 'mod' }, 'hi').role).toBe('moderator');
  });

  it('maps everyone else to viewer', () => {
    expect(toChatEvent({ mod: false, 'user-type': '' }, 'hi').role).toBe('viewer');
  });

  it('falls back to the login and an empty timestamp', () => {
    const event = toChatEvent({ username: 'someviewer' }, 'hi');

    expect(event.displayName).toBe('someviewer');
    expect(event.sentTimestamp).toBe('');
  });
});
