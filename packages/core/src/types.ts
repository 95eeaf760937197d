export type Credentials = {
  clientId: string;
  clientSecret: string;
  broadcasterId: string;
  channelName: string;
};

export type CachedToken = {
  value: string;
  /** Epoch milliseconds, already shortened by the refresh margin. */
  expiresAt: number;
};

export type ChatRole = 'moderator' | 'viewer';

export type ChatEvent = {
  role: ChatRole;
  displayName: string;
  message: string;
  /** Raw `tmi-sent-ts` value: milliseconds since epoch. */
  sentTimestamp: string;
};

export type StreamSnapshot = {
  title: string;
  observedAtEpochSeconds: number;
  links: string[];
};

export type SpreadsheetRow = {
  title: string;
  date: string;
  time: string;
  link: string;
};

export type LinkSink = {
  append(row: SpreadsheetRow): Promise<void>;
};

export type TokenSource = {
  validToken(): Promise<string>;
  invalidate(): void;
};

export type StreamMetadata = {
  currentTitle(): Promise<string>;
};
