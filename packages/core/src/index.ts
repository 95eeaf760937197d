export * from './errors';
export * from './links';
export * from './router';
export * from './rows';
export * from './token';
export * from './types';
export {
  createStreamMetadataClient,
  getChannelInformation,
  HelixError,
  helixRequest
} from './twitch';
export type { ChannelInformation, StreamMetadataOptions } from './twitch';
