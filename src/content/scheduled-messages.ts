/**
 * One-off messages queued for a future time.
 *
 * Status only moves forward: pending → sent or pending → cancelled.
 */

import { NotFoundError, ValidationError } from '../system/error-handling';
import { BroadcastLogger, createComponentLogger } from '../utils/logger';
import { generateId } from './content-catalog';
import { ContentStore } from './content-store';
import { ScheduledMessage } from './types';

export interface ScheduleMessageInput {
  destinationId: string;
  body: string;
  dueAt: Date;
  category?: string;
}

export interface ScheduledMessageRepositoryOptions {
  clock?: () => Date;
  logger?: BroadcastLogger;
  idGenerator?: (prefix: string) => string;
}

function byDueAt(a: ScheduledMessage, b: ScheduledMessage): number {
  return Date.parse(a.dueAt) - Date.parse(b.dueAt);
}

export class ScheduledMessageRepository {
  private readonly store: ContentStore;
  private readonly clock: () => Date;
  private readonly logger: BroadcastLogger;
  private readonly idGenerator: (prefix: string) => string;

  constructor(store: ContentStore, options: ScheduledMessageRepositoryOptions = {}) {
    this.store = store;
    this.clock = options.clock ?? (() => new Date());
    this.logger = options.logger ?? createComponentLogger('scheduled-messages');
    this.idGenerator = options.idGenerator ?? generateId;
  }

  async schedule(input: ScheduleMessageInput): Promise<ScheduledMessage> {
    const problems: string[] = [];
    if (!input.destinationId.trim()) {
      problems.push('Destination id is required');
    }
    if (!input.body.trim()) {
      problems.push('Message body is required');
    }
    if (Number.isNaN(input.dueAt.getTime())) {
      problems.push('Due time is not a valid date');
    }
    if (problems.length > 0) {
      throw new ValidationError('Invalid scheduled message', problems, { operation: 'schedule' });
    }

    const message: ScheduledMessage = {
      id: this.idGenerator('msg'),
      destinationId: input.destinationId,
      body: input.body,
      dueAt: input.dueAt.toISOString(),
      category: input.category ?? 'general',
      status: 'pending',
      createdAt: this.clock().toISOString()
    };

    await this.store.transact(document => {
      document.scheduledMessages.push(message);
    });

    this.logger.info(`Scheduled message ${message.id} for ${message.dueAt}`, {
      destinationId: message.destinationId
    }, 'schedule');
    return message;
  }

  async cancel(id: string): Promise<ScheduledMessage> {
    return this.transition(id, 'cancelled');
  }

  async markSent(id: string): Promise<ScheduledMessage> {
    return this.transition(id, 'sent');
  }

  async get(id: string): Promise<ScheduledMessage> {
    const document = await this.store.read();
    const message = document.scheduledMessages.find(candidate => candidate.id === id);
    if (!message) {
      throw new NotFoundError(`Scheduled message ${id} not found`, { operation: 'get' });
    }
    return message;
  }

  async listPending(destinationId?: string): Promise<ScheduledMessage[]> {
    const document = await this.store.read();
    return document.scheduledMessages
      .filter(message => message.status === 'pending')
      .filter(message => !destinationId || message.destinationId === destinationId)
      .sort(byDueAt);
  }

  /**
   * Pending messages whose due time has passed, oldest first.
   */
  async getDue(now: Date = this.clock(), destinationId?: string): Promise<ScheduledMessage[]> {
    const pending = await this.listPending(destinationId);
    return pending.filter(message => Date.parse(message.dueAt) <= now.getTime());
  }

  private async transition(id: string, status: 'sent' | 'cancelled'): Promise<ScheduledMessage> {
    const updated = await this.store.transact(document => {
      const message = document.scheduledMessages.find(candidate => candidate.id === id);
      if (!message) {
        throw new NotFoundError(`Scheduled message ${id} not found`, { operation: status });
      }
      if (message.status !== 'pending') {
        throw new ValidationError(`Scheduled message ${id} is already ${message.status}`, undefined, {
          operation: status
        });
      }

      message.status = status;
      const stamp = this.clock().toISOString();
      if (status === 'sent') {
        message.sentAt = stamp;
      } else {
        message.cancelledAt = stamp;
      }
      return { ...message };
    });

    this.logger.info(`Scheduled message ${id} marked ${status}`, undefined, status);
    return updated;
  }
}
