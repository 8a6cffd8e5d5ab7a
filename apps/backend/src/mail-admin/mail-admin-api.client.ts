import { Inject, Injectable, Logger } from '@nestjs/common';
import axios from 'axios';
import * as crypto from 'crypto';
import {
  fingerprintIdentifier,
  serializeStructuredLog,
} from '../common/logging/structured-log.util';
import {
  MailAdminProvider,
  TEMPMAIL_CONFIG,
  TempMailConfig,
} from '../config/temp-mail.config';
import {
  MailAdminNotFoundError,
  MailAdminRequestError,
  QuotaExceededError,
  RemoteUnavailableError,
  TransientFetchError,
} from './mail-admin.errors';
import {
  parseMessageRefs,
  parseRawMessage,
  parseRemoteMailboxes,
} from './mail-admin-response.parser';
import {
  CreateRemoteMailboxInput,
  MessageRef,
  RawMessage,
  RemoteMailbox,
} from './mail-admin.types';

type RequestHeaders = Record<string, string>;

/**
 * Thin client over the mail server's admin and message APIs. Every call is a
 * single attempt that fails over across the configured base URLs; callers own
 * the retry policy.
 */
@Injectable()
export class MailAdminApiClient {
  private readonly logger = new Logger(MailAdminApiClient.name);

  constructor(
    @Inject(TEMPMAIL_CONFIG) private readonly config: TempMailConfig,
  ) {}

  private get provider(): MailAdminProvider {
    return this.config.mailAdmin.provider;
  }

  private resolveIdempotencyKey(address: string): string {
    const digest = crypto
      .createHash('sha256')
      .update(address.trim().toLowerCase())
      .digest('hex')
      .slice(0, 32);
    return `mailbox-provision:${digest}`;
  }

  private resolveHeaders(extra: RequestHeaders = {}): RequestHeaders {
    const token = this.config.mailAdmin.apiToken;
    const headers: RequestHeaders = {
      'content-type': 'application/json',
      ...extra,
    };
    if (!token) return headers;
    if (this.config.mailAdmin.tokenHeader === 'x-api-key') {
      headers['x-api-key'] = token;
    } else {
      headers.authorization = `Bearer ${token}`;
    }
    return headers;
  }

  private resolveMailboxCollectionPath(): string {
    return this.provider === 'MAILU' ? '/user' : '/mailboxes';
  }

  private buildCreatePayload(
    input: CreateRemoteMailboxInput,
  ): Record<string, unknown> {
    if (this.provider === 'MAILU') {
      return {
        email: input.address,
        raw_password: input.password,
        comment: `temporary mailbox, ttl ${input.ttlSeconds}s`,
        enabled: true,
        enable_imap: true,
        enable_pop: false,
      };
    }
    return {
      email: input.address,
      localPart: input.localPart,
      domain: input.domain,
      password: input.password,
      ttlSeconds: input.ttlSeconds,
    };
  }

  private resolveStatus(error: unknown): number {
    if (!axios.isAxiosError(error)) return 0;
    return Number(error.response?.status || 0);
  }

  private resolveResponseText(error: unknown): string {
    if (!axios.isAxiosError(error)) return '';
    return JSON.stringify(error.response?.data || '').toLowerCase();
  }

  isRetryableError(error: unknown): boolean {
    if (!axios.isAxiosError(error)) return false;
    const status = Number(error.response?.status || 0);
    if (status === 429) return true;
    if (status >= 500 && status <= 599 && status !== 507) return true;
    if (status) return false;
    const errorCode = String(error.code || '')
      .trim()
      .toUpperCase();
    return (
      errorCode === 'ECONNABORTED' ||
      errorCode === 'ECONNRESET' ||
      errorCode === 'ECONNREFUSED' ||
      errorCode === 'ETIMEDOUT' ||
      errorCode === 'EAI_AGAIN'
    );
  }

  private isAlreadyExistsError(error: unknown): boolean {
    const status = this.resolveStatus(error);
    if (status === 409) return true;
    if (status !== 400 && status !== 422) return false;
    const data = this.resolveResponseText(error);
    return (
      data.includes('already exists') ||
      data.includes('mailbox exists') ||
      data.includes('duplicate')
    );
  }

  private isQuotaError(error: unknown): boolean {
    const status = this.resolveStatus(error);
    if (status === 507) return true;
    if (status !== 400 && status !== 403 && status !== 422) return false;
    const data = this.resolveResponseText(error);
    return data.includes('quota') || data.includes('limit');
  }

  describeError(error: unknown): string {
    if (axios.isAxiosError(error)) {
      const status = Number(error.response?.status || 0);
      const code = String(error.code || '').trim();
      const dataSnippet = JSON.stringify(error.response?.data || '')
        .slice(0, 160)
        .replace(/\s+/g, ' ');
      const message = String(error.message || 'axios error').trim();
      const parts = [
        message,
        status ? `status=${status}` : null,
        code ? `code=${code}` : null,
        dataSnippet ? `data=${dataSnippet}` : null,
      ].filter(Boolean);
      return parts.join(' ');
    }
    if (error instanceof Error) return error.message;
    return String(error);
  }

  /**
   * Tries each base URL in order. Retryable failures move on to the next URL;
   * anything else is rethrown for the caller to classify. Exhausting every URL
   * raises `RemoteUnavailableError`.
   */
  private async sendWithFailover<T>(input: {
    operation: string;
    address: string;
    baseUrls: string[];
    send: (baseUrl: string) => Promise<T>;
  }): Promise<T> {
    if (!input.baseUrls.length) {
      throw new RemoteUnavailableError(
        input.operation,
        'no mail admin API base URL is configured',
      );
    }
    let lastError: unknown = null;
    for (let index = 0; index < input.baseUrls.length; index += 1) {
      const baseUrl = input.baseUrls[index];
      try {
        return await input.send(baseUrl);
      } catch (error: unknown) {
        if (!this.isRetryableError(error)) throw error;
        lastError = error;
        const nextBaseUrl = input.baseUrls[index + 1];
        if (nextBaseUrl) {
          this.logger.warn(
            serializeStructuredLog({
              event: 'mail_admin_request_failover',
              operation: input.operation,
              mailboxFingerprint: input.address
                ? fingerprintIdentifier(input.address)
                : null,
              provider: this.provider,
              fromEndpoint: baseUrl,
              toEndpoint: nextBaseUrl,
              error: this.describeError(error),
            }),
          );
        }
      }
    }
    throw new RemoteUnavailableError(
      input.operation,
      this.describeError(lastError),
    );
  }

  async createMailbox(input: CreateRemoteMailboxInput): Promise<RemoteMailbox> {
    const payload = this.buildCreatePayload(input);
    const headers = this.resolveHeaders({
      'x-idempotency-key': this.resolveIdempotencyKey(input.address),
    });
    try {
      await this.sendWithFailover({
        operation: 'create_mailbox',
        address: input.address,
        baseUrls: this.config.mailAdmin.adminApiBaseUrls,
        send: (baseUrl) =>
          axios.post(`${baseUrl}${this.resolveMailboxCollectionPath()}`, payload, {
            timeout: this.config.mailAdmin.timeoutMs,
            headers,
          }),
      });
    } catch (error: unknown) {
      if (error instanceof RemoteUnavailableError) throw error;
      if (this.isAlreadyExistsError(error)) {
        this.logger.warn(
          serializeStructuredLog({
            event: 'mail_admin_mailbox_already_exists',
            mailboxFingerprint: fingerprintIdentifier(input.address),
            provider: this.provider,
          }),
        );
        return { address: input.address, enabled: true };
      }
      if (this.isQuotaError(error)) {
        throw new QuotaExceededError(
          this.resolveStatus(error),
          this.describeError(error),
        );
      }
      throw new MailAdminRequestError(
        'create_mailbox',
        this.resolveStatus(error),
        this.describeError(error),
      );
    }
    this.logger.log(
      serializeStructuredLog({
        event: 'mail_admin_mailbox_created',
        mailboxFingerprint: fingerprintIdentifier(input.address),
        provider: this.provider,
      }),
    );
    return { address: input.address, enabled: true };
  }

  async deleteMailbox(address: string): Promise<void> {
    const headers = this.resolveHeaders();
    try {
      await this.sendWithFailover({
        operation: 'delete_mailbox',
        address,
        baseUrls: this.config.mailAdmin.adminApiBaseUrls,
        send: (baseUrl) =>
          axios.delete(
            `${baseUrl}${this.resolveMailboxCollectionPath()}/${encodeURIComponent(address)}`,
            { timeout: this.config.mailAdmin.timeoutMs, headers },
          ),
      });
    } catch (error: unknown) {
      if (error instanceof RemoteUnavailableError) throw error;
      if (this.resolveStatus(error) === 404) {
        throw new MailAdminNotFoundError(fingerprintIdentifier(address));
      }
      throw new MailAdminRequestError(
        'delete_mailbox',
        this.resolveStatus(error),
        this.describeError(error),
      );
    }
  }

  async listMailboxes(): Promise<RemoteMailbox[]> {
    const headers = this.resolveHeaders();
    try {
      const response = await this.sendWithFailover({
        operation: 'list_mailboxes',
        address: '',
        baseUrls: this.config.mailAdmin.adminApiBaseUrls,
        send: (baseUrl) =>
          axios.get(`${baseUrl}${this.resolveMailboxCollectionPath()}`, {
            timeout: this.config.mailAdmin.timeoutMs,
            headers,
          }),
      });
      return parseRemoteMailboxes(response.data);
    } catch (error: unknown) {
      if (error instanceof RemoteUnavailableError) throw error;
      throw new MailAdminRequestError(
        'list_mailboxes',
        this.resolveStatus(error),
        this.describeError(error),
      );
    }
  }

  private resolveMessagesUrl(baseUrl: string, address: string): string {
    return `${baseUrl}/mailboxes/${encodeURIComponent(address)}/messages`;
  }

  /**
   * At most `limit` messages that arrived at or after `since`, oldest first.
   * The scan watermark relies on that order when a page comes back full.
   */
  async listMessages(
    address: string,
    since: Date,
    limit: number,
  ): Promise<MessageRef[]> {
    const headers = this.resolveHeaders();
    try {
      const response = await this.sendWithFailover({
        operation: 'list_messages',
        address,
        baseUrls: [this.config.mailAdmin.messageApiBaseUrl].filter(Boolean),
        send: (baseUrl) =>
          axios.get(this.resolveMessagesUrl(baseUrl, address), {
            timeout: this.config.mailAdmin.timeoutMs,
            headers,
            params: { since: since.toISOString(), limit, order: 'asc' },
          }),
      });
      return parseMessageRefs(response.data);
    } catch (error: unknown) {
      if (error instanceof RemoteUnavailableError) throw error;
      if (this.resolveStatus(error) === 404) {
        throw new MailAdminNotFoundError(fingerprintIdentifier(address));
      }
      throw new MailAdminRequestError(
        'list_messages',
        this.resolveStatus(error),
        this.describeError(error),
      );
    }
  }

  async fetchMessage(address: string, ref: MessageRef): Promise<RawMessage> {
    const headers = this.resolveHeaders();
    try {
      const response = await this.sendWithFailover({
        operation: 'fetch_message',
        address,
        baseUrls: [this.config.mailAdmin.messageApiBaseUrl].filter(Boolean),
        send: (baseUrl) =>
          axios.get(
            `${this.resolveMessagesUrl(baseUrl, address)}/${encodeURIComponent(ref.id)}`,
            { timeout: this.config.mailAdmin.timeoutMs, headers },
          ),
      });
      return parseRawMessage(response.data, ref);
    } catch (error: unknown) {
      if (error instanceof RemoteUnavailableError) {
        throw new TransientFetchError(ref.id, error.message);
      }
      if (this.resolveStatus(error) === 404) {
        throw new MailAdminNotFoundError(`message ${ref.id}`);
      }
      throw new MailAdminRequestError(
        'fetch_message',
        this.resolveStatus(error),
        this.describeError(error),
      );
    }
  }
}
