import { Pool, PoolClient, QueryResult, QueryResultRow } from 'pg';
import { Action, ActionFilter, ActionState, ActionType, NewAction } from '../models/action';
import { LedgerSession, LedgerStore } from '../models/ledger';
import { User } from '../models/user';
import {
  DuplicateMessageError,
  InsufficientBalanceError,
  InvalidStateTransitionError,
  LedgerError,
  StorageError,
  errorCode
} from './errors';

type QueryFn = <R extends QueryResultRow>(text: string, values?: unknown[]) => Promise<QueryResult<R>>;

interface UserRow {
  username: string;
  balance: string;
  registered_at: Date;
}

interface ActionRow {
  id: string;
  type: string;
  state: string;
  source_message_id: string;
  from_user: string;
  to_user: string | null;
  amount: string | null;
  address: string | null;
  txid: string | null;
  subreddit: string | null;
  permalink: string | null;
  created_at: Date;
  updated_at: Date;
}

const ACTION_TYPES: readonly ActionType[] = ['register', 'info', 'accept', 'decline', 'tip', 'withdraw', 'deposit'];
const ACTION_STATES: readonly ActionState[] = ['pending', 'completed', 'declined', 'expired'];

const UNIQUE_VIOLATION = '23505';

const USER_COLUMNS = 'username, balance::text AS balance, registered_at';
const ACTION_COLUMNS = `id::text AS id, type, state, source_message_id, from_user, to_user,
  amount::text AS amount, address, txid, subreddit, permalink, created_at, updated_at`;

const SCHEMA = `
  CREATE TABLE IF NOT EXISTS users (
    id BIGSERIAL PRIMARY KEY,
    username TEXT NOT NULL,
    balance NUMERIC(78, 0) NOT NULL DEFAULT 0 CHECK (balance >= 0),
    registered_at TIMESTAMPTZ NOT NULL DEFAULT now()
  );
  CREATE UNIQUE INDEX IF NOT EXISTS users_username_key ON users (lower(username));

  CREATE TABLE IF NOT EXISTS actions (
    id BIGSERIAL PRIMARY KEY,
    type TEXT NOT NULL,
    state TEXT NOT NULL CHECK (state IN ('pending', 'completed', 'declined', 'expired')),
    source_message_id TEXT NOT NULL UNIQUE,
    from_user TEXT NOT NULL,
    to_user TEXT,
    amount NUMERIC(78, 0) CHECK (amount >= 0),
    address TEXT,
    txid TEXT,
    subreddit TEXT,
    permalink TEXT,
    created_at TIMESTAMPTZ NOT NULL DEFAULT now(),
    updated_at TIMESTAMPTZ NOT NULL DEFAULT now()
  );
  CREATE INDEX IF NOT EXISTS actions_type_state_created_idx ON actions (type, state, created_at);
  CREATE INDEX IF NOT EXISTS actions_from_user_idx ON actions (lower(from_user));
  CREATE INDEX IF NOT EXISTS actions_to_user_idx ON actions (lower(to_user));
`;

/**
 * Ledger queries against one connection (or the pool). All statements are
 * parameterized; amounts travel as decimal strings.
 */
export class PgLedgerSession implements LedgerSession {
  constructor(private queryFn: QueryFn) {}

  protected async run<R extends QueryResultRow>(text: string, values: unknown[] = []): Promise<QueryResult<R>> {
    try {
      return await this.queryFn<R>(text, values);
    } catch (error) {
      if (error instanceof LedgerError) throw error;
      throw new StorageError(`Database query failed: ${describe(error)}`, errorCode(error));
    }
  }

  /**
   * Run fn between BEGIN and COMMIT on this session's connection; any throw
   * rolls everything back and is rethrown.
   */
  async inTransaction<T>(fn: (session: LedgerSession) => Promise<T>): Promise<T> {
    await this.run('BEGIN');
    try {
      const result = await fn(this);
      await this.run('COMMIT');
      return result;
    } catch (error) {
      try {
        await this.run('ROLLBACK');
      } catch (rollbackError) {
        console.error('❌ Rollback failed:', rollbackError);
      }
      throw error;
    }
  }

  // ========== ACTIONS ==========

  async actionExists(sourceMessageId: string): Promise<boolean> {
    const result = await this.run('SELECT 1 FROM actions WHERE source_message_id = $1 LIMIT 1', [sourceMessageId]);
    return result.rows.length > 0;
  }

  async createAction(input: NewAction): Promise<Action> {
    try {
      const result = await this.run<ActionRow>(
        `INSERT INTO actions
           (type, state, source_message_id, from_user, to_user, amount, address, txid, subreddit, permalink, created_at, updated_at)
         VALUES ($1, $2, $3, $4, $5, $6, $7, $8, $9, $10, COALESCE($11, now()), COALESCE($11, now()))
         RETURNING ${ACTION_COLUMNS}`,
        [
          input.type,
          input.state,
          input.sourceMessageId,
          input.fromUser,
          input.toUser ?? null,
          input.amount === undefined || input.amount === null ? null : input.amount.toString(),
          input.address ?? null,
          input.txid ?? null,
          input.subreddit ?? null,
          input.permalink ?? null,
          input.createdAt ?? null
        ]
      );
      return toAction(result.rows[0]);
    } catch (error) {
      if (error instanceof StorageError && error.code === UNIQUE_VIOLATION) {
        throw new DuplicateMessageError(input.sourceMessageId);
      }
      throw error;
    }
  }

  async getAction(id: number): Promise<Action | null> {
    const result = await this.run<ActionRow>(`SELECT ${ACTION_COLUMNS} FROM actions WHERE id = $1`, [id]);
    if (result.rows.length === 0) return null;
    return toAction(result.rows[0]);
  }

  async listActions(filter: ActionFilter = {}): Promise<Action[]> {
    const conditions: string[] = [];
    const values: unknown[] = [];
    const param = (value: unknown): string => {
      values.push(value);
      return `$${values.length}`;
    };

    if (filter.type) conditions.push(`type = ${param(filter.type)}`);
    if (filter.state) conditions.push(`state = ${param(filter.state)}`);
    if (filter.createdBefore) conditions.push(`created_at < ${param(filter.createdBefore)}`);
    if (filter.fromUser) conditions.push(`lower(from_user) = lower(${param(filter.fromUser)})`);
    if (filter.toUser) conditions.push(`lower(to_user) = lower(${param(filter.toUser)})`);
    if (filter.involving) {
      const placeholder = param(filter.involving);
      conditions.push(`(lower(from_user) = lower(${placeholder}) OR lower(to_user) = lower(${placeholder}))`);
    }

    const where = conditions.length > 0 ? `WHERE ${conditions.join(' AND ')}` : '';
    const order = filter.newestFirst ? 'created_at DESC, id DESC' : 'created_at ASC, id ASC';
    const limit = filter.limit !== undefined ? `LIMIT ${param(filter.limit)}` : '';

    const result = await this.run<ActionRow>(
      `SELECT ${ACTION_COLUMNS} FROM actions ${where} ORDER BY ${order} ${limit}`,
      values
    );
    return result.rows.map(toAction);
  }

  async transitionAction(id: number, state: ActionState, txid?: string): Promise<Action> {
    // Only pending actions move; a terminal action never changes again
    const result = await this.run<ActionRow>(
      `UPDATE actions
          SET state = $2, txid = COALESCE($3, txid), updated_at = now()
        WHERE id = $1 AND state = 'pending'
        RETURNING ${ACTION_COLUMNS}`,
      [id, state, txid ?? null]
    );

    if (result.rows.length === 0) {
      const current = await this.getAction(id);
      throw new InvalidStateTransitionError(id, current ? current.state : null, state);
    }
    return toAction(result.rows[0]);
  }

  async setTxid(id: number, txid: string): Promise<Action> {
    const result = await this.run<ActionRow>(
      `UPDATE actions SET txid = $2, updated_at = now()
        WHERE id = $1 AND state = 'pending'
        RETURNING ${ACTION_COLUMNS}`,
      [id, txid]
    );

    if (result.rows.length === 0) {
      const current = await this.getAction(id);
      throw new InvalidStateTransitionError(id, current ? current.state : null, 'pending');
    }
    return toAction(result.rows[0]);
  }

  // ========== USERS ==========

  async getUser(username: string): Promise<User | null> {
    const result = await this.run<UserRow>(
      `SELECT ${USER_COLUMNS} FROM users WHERE lower(username) = lower($1)`,
      [username]
    );
    if (result.rows.length === 0) return null;
    return toUser(result.rows[0]);
  }

  async listUsers(): Promise<User[]> {
    const result = await this.run<UserRow>(`SELECT ${USER_COLUMNS} FROM users ORDER BY lower(username)`);
    return result.rows.map(toUser);
  }

  async createUser(username: string): Promise<User> {
    const result = await this.run<UserRow>(
      `INSERT INTO users (username) VALUES ($1)
       ON CONFLICT ((lower(username))) DO NOTHING
       RETURNING ${USER_COLUMNS}`,
      [username]
    );
    if (result.rows.length > 0) {
      return toUser(result.rows[0]);
    }

    const existing = await this.getUser(username);
    if (!existing) {
      throw new StorageError(`User ${username} could not be created`);
    }
    return existing;
  }

  async adjustBalance(username: string, delta: bigint): Promise<User> {
    const result = await this.run<UserRow>(
      `UPDATE users SET balance = balance + $2
        WHERE lower(username) = lower($1) AND balance + $2 >= 0
        RETURNING ${USER_COLUMNS}`,
      [username, delta.toString()]
    );
    if (result.rows.length > 0) {
      return toUser(result.rows[0]);
    }

    const user = await this.getUser(username);
    if (!user) {
      throw new StorageError(`User ${username} is not registered`);
    }
    throw new InsufficientBalanceError(user.username, user.balance, -delta);
  }

  // ========== AGGREGATES ==========

  async sumPendingTips(fromUser?: string): Promise<bigint> {
    const result = fromUser
      ? await this.run<{ total: string }>(
          `SELECT COALESCE(SUM(amount), 0)::text AS total FROM actions
            WHERE type = 'tip' AND state = 'pending' AND lower(from_user) = lower($1)`,
          [fromUser]
        )
      : await this.run<{ total: string }>(
          `SELECT COALESCE(SUM(amount), 0)::text AS total FROM actions
            WHERE type = 'tip' AND state = 'pending'`
        );
    return BigInt(result.rows[0].total);
  }

  async sumBalances(): Promise<bigint> {
    const result = await this.run<{ total: string }>('SELECT COALESCE(SUM(balance), 0)::text AS total FROM users');
    return BigInt(result.rows[0].total);
  }
}

export class DbService extends PgLedgerSession implements LedgerStore {
  private pool: Pool;

  constructor(pool: Pool) {
    super((text, values) => pool.query(text, values));
    this.pool = pool;
  }

  static connect(url: string, ssl = false): DbService {
    const pool = new Pool({
      connectionString: url,
      ssl: ssl ? { rejectUnauthorized: false } : undefined
    });
    pool.on('error', error => {
      console.error('❌ Idle database client error:', error);
    });
    return new DbService(pool);
  }

  // Each transaction gets its own pooled connection
  async transaction<T>(fn: (session: LedgerSession) => Promise<T>): Promise<T> {
    const client = await this.connectClient();
    try {
      return await new PgLedgerSession((text, values) => client.query(text, values)).inTransaction(fn);
    } finally {
      client.release();
    }
  }

  async migrate(): Promise<void> {
    await this.run(SCHEMA);
    console.log('✅ Database schema ready');
  }

  async close(): Promise<void> {
    await this.pool.end();
  }

  private async connectClient(): Promise<PoolClient> {
    try {
      return await this.pool.connect();
    } catch (error) {
      throw new StorageError(`Database connection failed: ${describe(error)}`, errorCode(error));
    }
  }
}

function describe(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

function toUser(row: UserRow): User {
  return {
    username: row.username,
    balance: BigInt(row.balance),
    registeredAt: row.registered_at
  };
}

function toAction(row: ActionRow): Action {
  const type = ACTION_TYPES.find(t => t === row.type);
  const state = ACTION_STATES.find(s => s === row.state);
  if (!type || !state) {
    throw new StorageError(`Action ${row.id} has unknown type/state ${row.type}/${row.state}`);
  }

  return {
    id: Number(row.id),
    type,
    state,
    sourceMessageId: row.source_message_id,
    fromUser: row.from_user,
    toUser: row.to_user,
    amount: row.amount === null ? null : BigInt(row.amount),
    address: row.address,
    txid: row.txid,
    subreddit: row.subreddit,
    permalink: row.permalink,
    createdAt: row.created_at,
    updatedAt: row.updated_at
  };
}
