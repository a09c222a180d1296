// Command types
export type CommandType = 'register' | 'info' | 'accept' | 'decline' | 'tip' | 'withdraw';

export type AmountSpec =
  | { kind: 'exact'; value: bigint }  // base units
  | { kind: 'all' };

export type ParsedCommand =
  | { type: 'register' }
  | { type: 'info' }
  | { type: 'accept' }
  | { type: 'decline' }
  | { type: 'tip'; recipient: string; amount: AmountSpec }
  | { type: 'withdraw'; address: string; amount: AmountSpec };

// Reddit inbox types
export type InboxItemKind = 'comment' | 'message';

export interface InboxMessage {
  id: string;
  fullname: string;                 // t1_xxx (comment) or t4_xxx (message)
  kind: InboxItemKind;
  author: string | null;            // null for system messages
  subject: string;
  body: string;
  subreddit?: string;
  permalink?: string;
  parentAuthor?: string;            // comments only
  createdUtc: number;
}

export interface CommandPattern {
  type: CommandType;
  scope: InboxItemKind;
  pattern: string;
}
