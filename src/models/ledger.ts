import { Action, ActionFilter, ActionState, NewAction } from './action';
import { User } from './user';

/**
 * Reads and writes against the ledger. Inside `LedgerStore.transaction` every
 * call shares one database transaction.
 */
export interface LedgerSession {
  actionExists(sourceMessageId: string): Promise<boolean>;
  createAction(input: NewAction): Promise<Action>;
  getAction(id: number): Promise<Action | null>;
  listActions(filter?: ActionFilter): Promise<Action[]>;
  transitionAction(id: number, state: ActionState, txid?: string): Promise<Action>;
  // Attach a txid to a still-pending action
  setTxid(id: number, txid: string): Promise<Action>;

  getUser(username: string): Promise<User | null>;
  listUsers(): Promise<User[]>;
  createUser(username: string): Promise<User>;
  adjustBalance(username: string, delta: bigint): Promise<User>;

  sumPendingTips(fromUser?: string): Promise<bigint>;
  sumBalances(): Promise<bigint>;
}

export interface LedgerStore extends LedgerSession {
  transaction<T>(fn: (session: LedgerSession) => Promise<T>): Promise<T>;
  migrate(): Promise<void>;
  close(): Promise<void>;
}
