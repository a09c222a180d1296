import { InboxMessage } from './types';

/**
 * Inbox API consumed by the poll loop. Rate limits, timeouts and connection
 * failures surface as TransientUpstreamError.
 */
export interface MessageSource {
  fetchUnread(limit: number): Promise<InboxMessage[]>;   // oldest first
  markRead(message: InboxMessage): Promise<void>;
  reply(message: InboxMessage, body: string): Promise<void>;
  sendMessage(username: string, subject: string, body: string): Promise<void>;
}

export interface WikiPublisher {
  editWikiPage(subreddit: string, page: string, content: string, reason: string): Promise<void>;
}

export interface CoinBackend {
  getBalance(): Promise<bigint>;
  send(address: string, amount: bigint): Promise<string>;
  validateAddress(address: string): Promise<boolean>;
}

export interface OperatorNotifier {
  notify(subject: string, body: string): Promise<void>;
}
