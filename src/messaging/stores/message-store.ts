/**
 * Message Store
 * Durable, queryable backing store for envelopes and their delivery state
 */

import { MessageEnvelope } from '../envelope.js';
import { StoreError, errorMessage } from '../errors.js';
import type { DeliveryState, DeliveryStatus, MessageType } from '../types.js';
import type { DatabaseAdapter } from '../../persistence/index.js';
import { PGliteDatabaseAdapter } from '../../persistence/index.js';
import { getLogger, type Logger } from '../../observability/logger.js';

function storeLogger(logger?: Logger): Logger {
  return logger ?? getLogger().child({ module: 'MessageStore' });
}

/**
 * Message store interface
 */
export interface MessageStore {
  /** False for stores that accept writes without keeping them */
  readonly durable: boolean;

  /** Initialize the store (connect, create tables) */
  initialize(): Promise<void>;

  /** Persist an envelope as pending with retry count 0; a known id is ignored */
  saveMessage(envelope: MessageEnvelope): Promise<void>;

  /** Get an envelope by id */
  getMessage(messageId: string): Promise<MessageEnvelope | null>;

  /** Pending envelopes for a recipient, in insertion order */
  getPendingMessages(recipient: string): Promise<MessageEnvelope[]>;

  /** Number of pending envelopes for a recipient */
  countPendingMessages(recipient: string): Promise<number>;

  /** Set the delivery state (and optionally the retry count) unconditionally */
  updateMessageState(messageId: string, state: DeliveryState, retryCount?: number): Promise<boolean>;

  /**
   * Atomically move a pending message to `processed`. False for unknown ids
   * and for messages already processed or failed.
   */
  markProcessed(messageId: string): Promise<boolean>;

  /** Current retry count, 0 for unknown ids */
  getRetryCount(messageId: string): Promise<number>;

  /** Delivery state and retry count */
  getDeliveryStatus(messageId: string): Promise<DeliveryStatus | null>;

  /**
   * Atomically increment the retry count and move the message to `pending`
   * while the count stays within `maxRetries`, else to `failed`.
   * Returns null for unknown ids and for messages no longer pending.
   */
  recordFailure(messageId: string, maxRetries: number): Promise<DeliveryStatus | null>;

  /** Up to `limit` most recent envelopes exchanged between two agents, oldest first */
  getConversationHistory(agent1: string, agent2: string, limit: number): Promise<MessageEnvelope[]>;

  /** Release resources */
  close(): Promise<void>;
}

function nextFailureStatus(messageId: string, currentRetryCount: number, maxRetries: number): DeliveryStatus {
  const retryCount = currentRetryCount + 1;
  return {
    messageId,
    retryCount,
    state: retryCount <= maxRetries ? 'pending' : 'failed',
  };
}

// ============================================================================
// Null Store
// ============================================================================

/**
 * Store used when the broker runs without persistence. Accepts writes and
 * keeps nothing.
 */
export class NullMessageStore implements MessageStore {
  readonly durable = false;

  async initialize(): Promise<void> {}

  async saveMessage(_envelope: MessageEnvelope): Promise<void> {}

  async getMessage(_messageId: string): Promise<MessageEnvelope | null> {
    return null;
  }

  async getPendingMessages(_recipient: string): Promise<MessageEnvelope[]> {
    return [];
  }

  async countPendingMessages(_recipient: string): Promise<number> {
    return 0;
  }

  async updateMessageState(_messageId: string, _state: DeliveryState, _retryCount?: number): Promise<boolean> {
    return false;
  }

  async markProcessed(_messageId: string): Promise<boolean> {
    return false;
  }

  async getRetryCount(_messageId: string): Promise<number> {
    return 0;
  }

  async getDeliveryStatus(_messageId: string): Promise<DeliveryStatus | null> {
    return null;
  }

  async recordFailure(_messageId: string, _maxRetries: number): Promise<DeliveryStatus | null> {
    return null;
  }

  async getConversationHistory(_agent1: string, _agent2: string, _limit: number): Promise<MessageEnvelope[]> {
    return [];
  }

  async close(): Promise<void> {}
}

// ============================================================================
// In-Memory Store (for testing/development)
// ============================================================================

interface StoredMessage {
  envelope: MessageEnvelope;
  state: DeliveryState;
  retryCount: number;
}

/**
 * In-memory message store. Map iteration order is insertion order, which
 * gives per-recipient FIFO delivery. Each operation completes synchronously
 * inside its promise, so read-modify-write steps cannot interleave.
 */
export class InMemoryMessageStore implements MessageStore {
  readonly durable = true;
  private readonly messages = new Map<string, StoredMessage>();
  private readonly logger: Logger;

  constructor(logger?: Logger) {
    this.logger = storeLogger(logger);
  }

  async initialize(): Promise<void> {}

  async saveMessage(envelope: MessageEnvelope): Promise<void> {
    if (this.messages.has(envelope.messageId)) {
      this.logger.debug({ messageId: envelope.messageId }, 'Duplicate message ignored');
      return;
    }
    this.messages.set(envelope.messageId, { envelope, state: 'pending', retryCount: 0 });
  }

  async getMessage(messageId: string): Promise<MessageEnvelope | null> {
    return this.messages.get(messageId)?.envelope ?? null;
  }

  async getPendingMessages(recipient: string): Promise<MessageEnvelope[]> {
    return Array.from(this.messages.values())
      .filter(m => m.envelope.recipient === recipient && m.state === 'pending')
      .map(m => m.envelope);
  }

  async countPendingMessages(recipient: string): Promise<number> {
    let count = 0;
    for (const m of this.messages.values()) {
      if (m.envelope.recipient === recipient && m.state === 'pending') count++;
    }
    return count;
  }

  async updateMessageState(messageId: string, state: DeliveryState, retryCount?: number): Promise<boolean> {
    const stored = this.messages.get(messageId);
    if (!stored) return false;

    stored.state = state;
    if (retryCount !== undefined) {
      stored.retryCount = retryCount;
    }
    return true;
  }

  async markProcessed(messageId: string): Promise<boolean> {
    const stored = this.messages.get(messageId);
    if (stored?.state !== 'pending') return false;

    stored.state = 'processed';
    return true;
  }

  async getRetryCount(messageId: string): Promise<number> {
    return this.messages.get(messageId)?.retryCount ?? 0;
  }

  async getDeliveryStatus(messageId: string): Promise<DeliveryStatus | null> {
    const stored = this.messages.get(messageId);
    if (!stored) return null;
    return { messageId, state: stored.state, retryCount: stored.retryCount };
  }

  async recordFailure(messageId: string, maxRetries: number): Promise<DeliveryStatus | null> {
    const stored = this.messages.get(messageId);
    if (stored?.state !== 'pending') return null;

    const status = nextFailureStatus(messageId, stored.retryCount, maxRetries);
    stored.state = status.state;
    stored.retryCount = status.retryCount;
    return status;
  }

  async getConversationHistory(agent1: string, agent2: string, limit: number): Promise<MessageEnvelope[]> {
    if (limit <= 0) return [];

    const conversation = Array.from(this.messages.values())
      .map(m => m.envelope)
      .filter(
        e =>
          (e.sender === agent1 && e.recipient === agent2) ||
          (e.sender === agent2 && e.recipient === agent1)
      );

    return conversation.slice(-limit);
  }

  async close(): Promise<void> {}

  /**
   * Clear all messages (for testing)
   */
  clear(): void {
    this.messages.clear();
  }
}

// ============================================================================
// Database Store
// ============================================================================

/**
 * Database row type for messages
 */
interface MessageRow {
  seq: number;
  message_id: string;
  sender: string;
  recipient: string;
  message_type: MessageType;
  payload: string;
  timestamp: number;
  correlation_id: string | null;
  reply_to: string | null;
  signature: string | null;
  state: DeliveryState;
  retry_count: number;
  updated_at: number;
}

const TABLE_NAME_PATTERN = /^[A-Za-z_][A-Za-z0-9_]*$/;

/**
 * SQL-backed message store (Postgres dialect)
 */
export class DatabaseMessageStore implements MessageStore {
  readonly durable = true;
  private readonly tableName: string;
  private readonly logger: Logger;
  private initialized = false;

  constructor(
    private readonly db: DatabaseAdapter,
    tableName: string = 'messages',
    logger?: Logger
  ) {
    if (!TABLE_NAME_PATTERN.test(tableName)) {
      throw new StoreError(`Invalid table name: ${tableName}`, 'configure');
    }
    this.tableName = tableName;
    this.logger = storeLogger(logger);
  }

  async initialize(): Promise<void> {
    if (this.initialized) return;

    await this.guard('initialize', async () => {
      if (!this.db.isConnected()) {
        await this.db.connect();
      }

      await this.db.execute(`
        CREATE TABLE IF NOT EXISTS ${this.tableName} (
          seq SERIAL PRIMARY KEY,
          message_id TEXT NOT NULL UNIQUE,
          sender TEXT NOT NULL,
          recipient TEXT NOT NULL,
          message_type TEXT NOT NULL,
          payload TEXT NOT NULL,
          timestamp DOUBLE PRECISION NOT NULL,
          correlation_id TEXT,
          reply_to TEXT,
          signature TEXT,
          state TEXT NOT NULL DEFAULT 'pending',
          retry_count INTEGER NOT NULL DEFAULT 0,
          updated_at DOUBLE PRECISION NOT NULL
        );
        CREATE INDEX IF NOT EXISTS idx_${this.tableName}_recipient_state
          ON ${this.tableName}(recipient, state);
        CREATE INDEX IF NOT EXISTS idx_${this.tableName}_conversation
          ON ${this.tableName}(sender, recipient);
      `);
    });

    this.initialized = true;
    this.logger.info({ tableName: this.tableName }, 'Message store initialized');
  }

  async saveMessage(envelope: MessageEnvelope): Promise<void> {
    await this.ensureInitialized();

    const result = await this.guard('saveMessage', () =>
      this.db.query(
        `INSERT INTO ${this.tableName}
         (message_id, sender, recipient, message_type, payload, timestamp,
          correlation_id, reply_to, signature, state, retry_count, updated_at)
         VALUES ($1, $2, $3, $4, $5, $6, $7, $8, $9, 'pending', 0, $10)
         ON CONFLICT (message_id) DO NOTHING`,
        [
          envelope.messageId,
          envelope.sender,
          envelope.recipient,
          envelope.messageType,
          envelope.payload,
          envelope.timestamp,
          envelope.correlationId ?? null,
          envelope.replyTo ?? null,
          envelope.signature ?? null,
          Date.now(),
        ]
      )
    );

    if (result.rowCount === 0) {
      this.logger.debug({ messageId: envelope.messageId }, 'Duplicate message ignored');
    }
  }

  async getMessage(messageId: string): Promise<MessageEnvelope | null> {
    await this.ensureInitialized();

    const result = await this.guard('getMessage', () =>
      this.db.query<MessageRow>(`SELECT * FROM ${this.tableName} WHERE message_id = $1`, [messageId])
    );

    return result.rows.length > 0 ? this.rowToEnvelope(result.rows[0]) : null;
  }

  async getPendingMessages(recipient: string): Promise<MessageEnvelope[]> {
    await this.ensureInitialized();

    const result = await this.guard('getPendingMessages', () =>
      this.db.query<MessageRow>(
        `SELECT * FROM ${this.tableName} WHERE recipient = $1 AND state = 'pending' ORDER BY seq ASC`,
        [recipient]
      )
    );

    return result.rows.map(row => this.rowToEnvelope(row));
  }

  async countPendingMessages(recipient: string): Promise<number> {
    await this.ensureInitialized();

    const result = await this.guard('countPendingMessages', () =>
      this.db.query<{ count: number }>(
        `SELECT COUNT(*)::int AS count FROM ${this.tableName} WHERE recipient = $1 AND state = 'pending'`,
        [recipient]
      )
    );

    return result.rows[0]?.count ?? 0;
  }

  async updateMessageState(messageId: string, state: DeliveryState, retryCount?: number): Promise<boolean> {
    await this.ensureInitialized();

    const result = await this.guard('updateMessageState', () =>
      this.db.query(
        `UPDATE ${this.tableName}
         SET state = $1, retry_count = COALESCE($2, retry_count), updated_at = $3
         WHERE message_id = $4`,
        [state, retryCount ?? null, Date.now(), messageId]
      )
    );

    return result.rowCount > 0;
  }

  async markProcessed(messageId: string): Promise<boolean> {
    await this.ensureInitialized();

    const result = await this.guard('markProcessed', () =>
      this.db.query(
        `UPDATE ${this.tableName} SET state = 'processed', updated_at = $1
         WHERE message_id = $2 AND state = 'pending'`,
        [Date.now(), messageId]
      )
    );

    return result.rowCount > 0;
  }

  async getRetryCount(messageId: string): Promise<number> {
    const status = await this.getDeliveryStatus(messageId);
    return status?.retryCount ?? 0;
  }

  async getDeliveryStatus(messageId: string): Promise<DeliveryStatus | null> {
    await this.ensureInitialized();

    const result = await this.guard('getDeliveryStatus', () =>
      this.db.query<Pick<MessageRow, 'state' | 'retry_count'>>(
        `SELECT state, retry_count FROM ${this.tableName} WHERE message_id = $1`,
        [messageId]
      )
    );

    if (result.rows.length === 0) return null;
    return { messageId, state: result.rows[0].state, retryCount: result.rows[0].retry_count };
  }

  async recordFailure(messageId: string, maxRetries: number): Promise<DeliveryStatus | null> {
    await this.ensureInitialized();

    return this.guard('recordFailure', () =>
      this.db.transaction(async tx => {
        const current = await tx.query<Pick<MessageRow, 'state' | 'retry_count'>>(
          `SELECT state, retry_count FROM ${this.tableName} WHERE message_id = $1 FOR UPDATE`,
          [messageId]
        );
        const row = current.rows[0];
        if (row?.state !== 'pending') return null;

        const status = nextFailureStatus(messageId, row.retry_count, maxRetries);
        await tx.query(
          `UPDATE ${this.tableName} SET state = $1, retry_count = $2, updated_at = $3 WHERE message_id = $4`,
          [status.state, status.retryCount, Date.now(), messageId]
        );
        return status;
      })
    );
  }

  async getConversationHistory(agent1: string, agent2: string, limit: number): Promise<MessageEnvelope[]> {
    if (limit <= 0) return [];
    await this.ensureInitialized();

    const result = await this.guard('getConversationHistory', () =>
      this.db.query<MessageRow>(
        `SELECT * FROM ${this.tableName}
         WHERE (sender = $1 AND recipient = $2) OR (sender = $2 AND recipient = $1)
         ORDER BY seq DESC LIMIT $3`,
        [agent1, agent2, Math.floor(limit)]
      )
    );

    return result.rows.reverse().map(row => this.rowToEnvelope(row));
  }

  async close(): Promise<void> {
    await this.db.disconnect();
    this.initialized = false;
  }

  // ============================================================================
  // Private Helpers
  // ============================================================================

  private async ensureInitialized(): Promise<void> {
    if (!this.initialized) {
      await this.initialize();
    }
  }

  private async guard<T>(operation: string, fn: () => Promise<T>): Promise<T> {
    try {
      return await fn();
    } catch (error) {
      if (error instanceof StoreError) throw error;
      throw new StoreError(errorMessage(error), operation, error);
    }
  }

  private rowToEnvelope(row: MessageRow): MessageEnvelope {
    return MessageEnvelope.restore({
      messageId: row.message_id,
      sender: row.sender,
      recipient: row.recipient,
      messageType: row.message_type,
      payload: row.payload,
      timestamp: row.timestamp,
      correlationId: row.correlation_id,
      replyTo: row.reply_to,
      signature: row.signature,
    });
  }
}

// ============================================================================
// Factory
// ============================================================================

export type MessageStoreType = 'none' | 'memory' | 'pglite';

export interface MessageStoreOptions {
  type: MessageStoreType;
  /** PGlite data directory (pglite only); in-memory when omitted */
  dataDir?: string;
  /** Table name (pglite only) */
  tableName?: string;
  /** Pre-built adapter (pglite only); defaults to a PGlite adapter on `dataDir` */
  adapter?: DatabaseAdapter;
  logger?: Logger;
}

/**
 * Create a message store based on configuration
 */
export function createMessageStore(options: MessageStoreOptions): MessageStore {
  switch (options.type) {
    case 'none':
      return new NullMessageStore();
    case 'memory':
      return new InMemoryMessageStore(options.logger);
    case 'pglite':
      return new DatabaseMessageStore(
        options.adapter ?? new PGliteDatabaseAdapter({ dataDir: options.dataDir, logger: options.logger }),
        options.tableName,
        options.logger
      );
  }
}
