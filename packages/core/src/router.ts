import type { Logger } from 'pino';
import { MalformedEventError, StreamUnavailableError, WriteError } from './errors';
import { detectLinks } from './links';
import { toSpreadsheetRow } from './rows';
import type { ChatEvent, LinkSink, StreamMetadata, StreamSnapshot } from './types';

const MAX_DATE_MS = 8.64e15;

export type MessageRouterOptions = {
  privilegedNames: Iterable<string>;
  metadata: StreamMetadata;
  sink: LinkSink;
  logger: Logger;
};

export type MessageRouter = {
  process(event: ChatEvent): Promise<void>;
};

/**
 * `tmi-sent-ts` carries milliseconds as a decimal string. The last three
 * characters are dropped rather than divided away so the value is truncated,
 * never rounded.
 */
export function parseSentTimestamp(raw: string): number {
  if (!/^\d{4,}$/.test(raw)) {
    throw new MalformedEventError(`Invalid send timestamp "${raw}"`);
  }
  const seconds = Number.parseInt(raw.slice(0, -3), 10);
  // Date tops out at 8.64e15 ms
  if (!Number.isSafeInteger(seconds) || seconds * 1000 > MAX_DATE_MS) {
    throw new MalformedEventError(`Send timestamp "${raw}" is out of range`);
  }
  return seconds;
}

export function isAuthorizedSender(event: ChatEvent, privilegedNames: ReadonlySet<string>): boolean {
  return event.role === 'moderator' || privilegedNames.has(event.displayName);
}

export function createMessageRouter(options: MessageRouterOptions): MessageRouter {
  const { metadata, sink, logger } = options;
  const privilegedNames: ReadonlySet<string> = new Set(options.privilegedNames);

  const writeLinks = async (snapshot: StreamSnapshot) => {
    for (const link of snapshot.links) {
      try {
        await sink.append(toSpreadsheetRow(snapshot, link));
        logger.info({ link }, 'Wrote link to sheet');
      } catch (error) {
        if (!(error instanceof WriteError)) throw error;
        logger.error({ err: error, link }, 'Failed to write link to sheet');
      }
    }
  };

  return {
    async process(event) {
      if (!isAuthorizedSender(event, privilegedNames)) {
        logger.trace({ displayName: event.displayName }, 'Ignoring message from unprivileged sender');
        return;
      }

      const links = detectLinks(event.message);
      if (links.length === 0) {
        logger.trace({ displayName: event.displayName }, 'Ignoring message without links');
        return;
      }

      let observedAtEpochSeconds: number;
      try {
        observedAtEpochSeconds = parseSentTimestamp(event.sentTimestamp);
      } catch (error) {
        if (!(error instanceof MalformedEventError)) throw error;
        logger.warn({ err: error, displayName: event.displayName }, 'Dropping malformed chat event');
        return;
      }

      let title: string;
      try {
        title = await metadata.currentTitle();
      } catch (error) {
        if (!(error instanceof StreamUnavailableError)) throw error;
        logger.error({ err: error, links }, 'Failed to get stream title');
        return;
      }

      await writeLinks({ title, observedAtEpochSeconds, links });
    }
  };
}
