export type ActionType = 'register' | 'info' | 'accept' | 'decline' | 'tip' | 'withdraw' | 'deposit';
export type ActionState = 'pending' | 'completed' | 'declined' | 'expired';

export interface Action {
  id: number;
  type: ActionType;
  state: ActionState;
  sourceMessageId: string;          // unique
  fromUser: string;
  toUser: string | null;
  amount: bigint | null;            // base units
  address: string | null;           // withdraw destination
  txid: string | null;
  subreddit: string | null;
  permalink: string | null;
  createdAt: Date;
  updatedAt: Date;
}

export interface NewAction {
  type: ActionType;
  state: Exclude<ActionState, 'expired'>;
  sourceMessageId: string;
  fromUser: string;
  toUser?: string | null;
  amount?: bigint | null;
  address?: string | null;
  txid?: string | null;
  subreddit?: string | null;
  permalink?: string | null;
  createdAt?: Date;
}

export interface ActionFilter {
  type?: ActionType;
  state?: ActionState;
  createdBefore?: Date;
  fromUser?: string;
  toUser?: string;
  involving?: string;               // fromUser or toUser
  newestFirst?: boolean;
  limit?: number;
}

export type DeclineReason =
  | 'not_registered'
  | 'self_tip'
  | 'below_minimum'
  | 'insufficient_balance'
  | 'invalid_address'
  | 'send_failed';

export type ExecutionResult =
  | {
      status: 'completed';
      action: Action;
      balance?: bigint;
      pendingOutgoing?: bigint;
      alreadyRegistered?: boolean;
      claimed?: Action[];           // pending tips completed on register/accept
      declinedTips?: Action[];      // pending tips refused by the recipient
    }
  | { status: 'pending'; action: Action }
  | { status: 'declined'; action: Action; reason: DeclineReason };
