import 'dotenv/config';
import pino from 'pino';
import type { ChatUserstate } from 'tmi.js';
import {
  createAppTokenCache,
  createMessageRouter,
  createStreamMetadataClient,
  type Credentials
} from '@linklog/core';
import { createSerialQueue } from './dispatch';
import { loadEnv } from './env';
import { createSheetsLinkSink, createSheetsValues } from './services/sheets';
import { createChatClient, toChatEvent } from './twitchChat';

const logger = pino({ name: 'linklog-bot', level: 'info' });

const fail = (error: unknown, message: string) => {
  logger.fatal({ err: error }, message);
  process.exit(1);
};

const bootstrap = async () => {
  const env = loadEnv(process.env);
  logger.level = env.LOG_LEVEL;

  const credentials: Credentials = {
    clientId: env.CLIENT_ID,
    clientSecret: env.SECRET,
    broadcasterId: env.BROADCASTER_ID,
    channelName: env.CHANNEL_NAME
  };

  const tokens = createAppTokenCache({
    clientId: credentials.clientId,
    clientSecret: credentials.clientSecret,
    timeoutMs: env.REQUEST_TIMEOUT_MS
  });

  const router = createMessageRouter({
    privilegedNames: env.PRIVILEGED_USERS,
    metadata: createStreamMetadataClient({
      clientId: credentials.clientId,
      broadcasterId: credentials.broadcasterId,
      tokens,
      logger: logger.child({ module: 'metadata' }),
      timeoutMs: env.REQUEST_TIMEOUT_MS
    }),
    sink: createSheetsLinkSink({
      values: await createSheetsValues(env.GOOGLE_CREDENTIALS_FILE),
      spreadsheetId: env.SPREADSHEET_ID,
      range: env.SHEET_RANGE,
      logger: logger.child({ module: 'sheets' }),
      timeoutMs: env.REQUEST_TIMEOUT_MS
    }),
    logger: logger.child({ module: 'router' })
  });

  const queue = createSerialQueue((error) => fail(error, 'Unhandled error while processing chat message'));
  const client = createChatClient(credentials.channelName);

  client.on('message', (_channel: string, tags: ChatUserstate, message: string, self: boolean) => {
    if (self) return;
    const event = toChatEvent(tags, message);
    queue.enqueue(() => router.process(event));
  });

  client.on('connected', () => {
    logger.info({ channel: credentials.channelName, privileged: env.PRIVILEGED_USERS }, 'Listening to chat');
  });

  client.on('disconnected', (reason: string) => {
    logger.warn({ reason }, 'Chat disconnected, retrying');
  });

  client.on('reconnect', () => {
    logger.info('Reconnecting to Twitch chat');
  });

  await client.connect();
};

bootstrap().catch((error) => fail(error, 'Failed to start bot'));
