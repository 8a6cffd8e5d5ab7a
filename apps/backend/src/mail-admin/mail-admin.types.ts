export type RemoteMailbox = {
  address: string;
  enabled: boolean;
};

export type CreateRemoteMailboxInput = {
  address: string;
  localPart: string;
  domain: string;
  password: string;
  ttlSeconds: number;
};

export type MessageRef = {
  id: string;
  arrivedAt: Date;
  subject: string | null;
  sender: string | null;
};

export type RawMessage = {
  id: string;
  arrivedAt: Date;
  subject: string | null;
  sender: string | null;
  text: string | null;
  html: string | null;
};
