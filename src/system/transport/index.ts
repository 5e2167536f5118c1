/**
 * Transport Module
 *
 * The outbound side of the service: plain messages, polls and member counts.
 * `TelegramTransport` talks to the Telegram Bot API over axios.
 */

import axios, { AxiosInstance, AxiosResponse } from 'axios';
import { FetchError, RetryHandler, Sleep, sleep, toError } from '../error-handling';
import { MemberCountSource } from '../../analytics/types';
import { BroadcastLogger, createComponentLogger } from '../../utils/logger';

export interface PollSettings {
  isAnonymous: boolean;
  allowsMultipleAnswers: boolean;
}

export interface SentMessage {
  messageId: number;
}

export interface Transport extends MemberCountSource {
  sendMessage(destinationId: string, text: string): Promise<SentMessage>;
  sendPoll(destinationId: string, question: string, options: string[], settings: PollSettings): Promise<SentMessage>;
}

interface TelegramResponse {
  ok: boolean;
  result?: unknown;
  description?: string;
  error_code?: number;
  parameters?: { retry_after?: number };
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isTelegramResponse(value: unknown): value is TelegramResponse {
  return isRecord(value) && typeof value.ok === 'boolean';
}

function readRetryAfter(body: TelegramResponse): number | undefined {
  const retryAfter = body.parameters?.retry_after;
  return typeof retryAfter === 'number' ? retryAfter : undefined;
}

export interface TelegramTransportOptions {
  botToken: string;
  apiBaseUrl?: string;
  timeoutMs?: number;
  maxRetries?: number;
  retryDelayMs?: number;
  /** Pre-built client; its baseURL must already include the bot token */
  client?: AxiosInstance;
  logger?: BroadcastLogger;
  sleep?: Sleep;
}

export class TelegramTransport implements Transport {
  private readonly client: AxiosInstance;
  private readonly retryHandler: RetryHandler;
  private readonly maxRetries: number;
  private readonly retryDelayMs: number;
  private readonly logger: BroadcastLogger;

  constructor(options: TelegramTransportOptions) {
    this.logger = options.logger ?? createComponentLogger('transport');
    this.maxRetries = options.maxRetries ?? 2;
    this.retryDelayMs = options.retryDelayMs ?? 2000;
    this.retryHandler = new RetryHandler('telegram', this.logger, options.sleep ?? sleep);

    this.client = options.client ?? axios.create({
      baseURL: `${options.apiBaseUrl ?? 'https://api.telegram.org'}/bot${options.botToken}`,
      timeout: options.timeoutMs ?? 10000,
      headers: { 'Content-Type': 'application/json' }
    });

    this.setupInterceptors();
  }

  async sendMessage(destinationId: string, text: string): Promise<SentMessage> {
    const result = await this.call('sendMessage', destinationId, {
      chat_id: destinationId,
      text,
      parse_mode: 'Markdown'
    }, false);
    return this.toSentMessage(result, 'sendMessage', destinationId);
  }

  async sendPoll(destinationId: string, question: string, options: string[], settings: PollSettings): Promise<SentMessage> {
    const result = await this.call('sendPoll', destinationId, {
      chat_id: destinationId,
      question,
      options,
      is_anonymous: settings.isAnonymous,
      allows_multiple_answers: settings.allowsMultipleAnswers
    }, false);
    return this.toSentMessage(result, 'sendPoll', destinationId);
  }

  async fetchMemberCount(destinationId: string): Promise<number> {
    const result = await this.call('getChatMemberCount', destinationId, { chat_id: destinationId }, true);
    if (typeof result !== 'number') {
      throw new FetchError('Unexpected getChatMemberCount result', { operation: 'getChatMemberCount', destinationId });
    }
    return result;
  }

  private setupInterceptors(): void {
    this.client.interceptors.request.use(config => {
      this.logger.debug(`Calling ${config.url ?? 'unknown method'}`, undefined, 'request');
      return config;
    });
  }

  private toSentMessage(result: unknown, method: string, destinationId: string): SentMessage {
    if (!isRecord(result) || typeof result.message_id !== 'number') {
      throw new FetchError(`Unexpected ${method} result`, { operation: method, destinationId });
    }
    return { messageId: result.message_id };
  }

  /**
   * Rate limits and server errors are retried; `retry_after` from the API
   * replaces the computed delay. A request that got no response at all may
   * still have been applied, so only idempotent calls retry those.
   */
  private call(
    method: string,
    destinationId: string,
    payload: Record<string, unknown>,
    idempotent: boolean
  ): Promise<unknown> {
    return this.retryHandler.handle(() => this.request(method, destinationId, payload), {
      maxRetries: this.maxRetries,
      retryDelay: this.retryDelayMs,
      backoffFactor: 2,
      shouldRetry: error => error instanceof FetchError
        && (error.isTransient() || (idempotent && error.isNetworkFailure())),
      delayFor: error => error instanceof FetchError && error.retryAfterSeconds !== undefined
        ? error.retryAfterSeconds * 1000
        : undefined
    });
  }

  private async request(method: string, destinationId: string, payload: Record<string, unknown>): Promise<unknown> {
    let response: AxiosResponse<unknown>;
    try {
      response = await this.client.post<unknown>(`/${method}`, payload, { validateStatus: () => true });
    } catch (error) {
      throw new FetchError(`Telegram ${method} request failed: ${toError(error).message}`, {
        operation: method,
        destinationId,
        cause: error
      });
    }

    const body = response.data;
    if (!isTelegramResponse(body)) {
      throw new FetchError(`Telegram ${method} returned an unexpected body (HTTP ${response.status})`, {
        operation: method,
        destinationId,
        status: response.status
      });
    }

    if (!body.ok || response.status >= 400) {
      throw new FetchError(`Telegram ${method} failed: ${body.description ?? `HTTP ${response.status}`}`, {
        operation: method,
        destinationId,
        status: body.error_code ?? response.status,
        retryAfterSeconds: readRetryAfter(body)
      });
    }

    return body.result;
  }
}
