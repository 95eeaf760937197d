import { fetch } from 'undici';
import type { Logger } from 'pino';
import { z } from 'zod';
import { StreamUnavailableError } from './errors';
import type { StreamMetadata, TokenSource } from './types';

const HELIX_BASE = 'https://api.twitch.tv/helix';

const channelInformationSchema = z.object({
  data: z.array(
    z
      .object({
        broadcaster_id: z.string(),
        title: z.string()
      })
      .passthrough()
  )
});

export type ChannelInformation = z.infer<typeof channelInformationSchema>['data'][number];

export class HelixError extends Error {
  constructor(public readonly status: number, message: string) {
    super(message);
    this.name = 'HelixError';
  }
}

export async function helixRequest<T extends z.ZodTypeAny>(
  path: string,
  accessToken: string,
  clientId: string,
  schema: T,
  query?: Record<string, string | undefined>,
  timeoutMs?: number
): Promise<z.infer<T>> {
  const url = new URL(`${HELIX_BASE}${path}`);
  if (query) {
    Object.entries(query).forEach(([key, value]) => {
      if (value) url.searchParams.set(key, value);
    });
  }

  const res = await fetch(url, {
    headers: {
      Authorization: `Bearer ${accessToken}`,
      'Client-Id': clientId
    },
    signal: timeoutMs ? AbortSignal.timeout(timeoutMs) : undefined
  });

  if (!res.ok) {
    const body = await res.text();
    throw new HelixError(res.status, body);
  }

  const data = await res.json();
  return schema.parse(data);
}

export async function getChannelInformation(
  clientId: string,
  accessToken: string,
  broadcasterId: string,
  timeoutMs?: number
): Promise<ChannelInformation | null> {
  const response = await helixRequest(
    '/channels',
    accessToken,
    clientId,
    channelInformationSchema,
    { broadcaster_id: broadcasterId },
    timeoutMs
  );
  return response.data[0] ?? null;
}

export type StreamMetadataOptions = {
  clientId: string;
  broadcasterId: string;
  tokens: TokenSource;
  logger: Logger;
  timeoutMs?: number;
};

export function createStreamMetadataClient(options: StreamMetadataOptions): StreamMetadata {
  const { clientId, broadcasterId, tokens, logger, timeoutMs } = options;

  const lookupTitle = async (): Promise<string> => {
    const accessToken = await tokens.validToken();
    let channel: ChannelInformation | null;
    try {
      channel = await getChannelInformation(clientId, accessToken, broadcasterId, timeoutMs);
    } catch (error) {
      if (error instanceof HelixError && error.status === 401) {
        tokens.invalidate();
      }
      throw error;
    }

    if (!channel) {
      throw new Error(`No channel information returned for broadcaster ${broadcasterId}`);
    }
    if (!channel.title) {
      throw new Error(`Broadcaster ${broadcasterId} has no stream title`);
    }
    return channel.title;
  };

  return {
    async currentTitle() {
      try {
        return await lookupTitle();
      } catch (error) {
        logger.error({ err: error, broadcasterId }, 'Failed to get stream info');
        throw new StreamUnavailableError('Stream title unavailable', { cause: error });
      }
    }
  };
}
