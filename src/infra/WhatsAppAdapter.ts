import { DeliveryError, describeError } from '../domain/errors.js';
import { logger } from './logger.js';
import type { Env } from './env.js';

export type StepOutcome =
  | { status: 'sent'; messageId: string | null }
  | { status: 'failed'; error: string }
  | { status: 'skipped' };

export interface RecipientOutcome {
  to: string;
  note: StepOutcome;
  document: StepOutcome;
}

export interface DeliveryResult {
  mediaId: string;
  recipients: RecipientOutcome[];
}

export interface DocumentReport {
  bytes: Buffer;
  filename: string;
  mimeType: string;
  note: string;
}

/**
 * Messaging collaborator used by the report exporter
 */
export interface ReportDelivery {
  isConfigured(): boolean;
  uploadMedia(bytes: Buffer, filename: string, mimeType: string): Promise<string>;
  sendDocumentReport(report: DocumentReport): Promise<DeliveryResult>;
}

export interface WhatsAppConfig {
  accessToken?: string;
  phoneNumberId?: string;
  baseUrl: string;
  apiVersion: string;
  recipients: string[];
}

export function whatsAppConfigFromEnv(env: Env): WhatsAppConfig {
  return {
    accessToken: env.WHATSAPP_ACCESS_TOKEN,
    phoneNumberId: env.WHATSAPP_PHONE_NUMBER_ID,
    baseUrl: env.WHATSAPP_API_BASE_URL,
    apiVersion: env.WHATSAPP_API_VERSION,
    recipients: env.REPORT_RECIPIENTS,
  };
}

function apiErrorMessage(body: unknown, status: number): string {
  if (body && typeof body === 'object' && 'error' in body) {
    const error = body.error;
    if (error && typeof error === 'object' && 'message' in error && typeof error.message === 'string') {
      return `${status} ${error.message}`;
    }
  }
  return `HTTP ${status}`;
}

function stringField(body: unknown, field: string): string | null {
  if (body && typeof body === 'object' && field in body) {
    const value: unknown = Reflect.get(body, field);
    return typeof value === 'string' ? value : null;
  }
  return null;
}

function firstMessageId(body: unknown): string | null {
  if (body && typeof body === 'object' && 'messages' in body && Array.isArray(body.messages)) {
    return stringField(body.messages[0], 'id');
  }
  return null;
}

/**
 * WhatsApp Cloud API adapter: uploads a document once, then sends a text note and
 * the document to every configured recipient.
 */
export class WhatsAppAdapter implements ReportDelivery {
  constructor(
    private config: WhatsAppConfig,
    private fetchFn: typeof fetch = fetch
  ) {}

  isConfigured(): boolean {
    return Boolean(this.config.accessToken && this.config.phoneNumberId && this.config.recipients.length > 0);
  }

  async uploadMedia(bytes: Buffer, filename: string, mimeType: string): Promise<string> {
    const form = new FormData();
    form.append('messaging_product', 'whatsapp');
    form.append('type', mimeType);
    form.append('file', new Blob([bytes], { type: mimeType }), filename);

    const body = await this.post('media', form);
    const mediaId = stringField(body, 'id');
    if (!mediaId) {
      throw new DeliveryError('Report delivery: media upload returned no id', { step: 'upload' });
    }
    logger.info('Report uploaded', { filename, mediaId, bytes: bytes.length });
    return mediaId;
  }

  async sendDocumentReport(report: DocumentReport): Promise<DeliveryResult> {
    this.assertConfigured();

    let mediaId: string;
    try {
      mediaId = await this.uploadMedia(report.bytes, report.filename, report.mimeType);
    } catch (error) {
      throw new DeliveryError(`Report delivery: media upload failed: ${describeError(error)}`, {
        step: 'upload',
        filename: report.filename,
      });
    }

    const recipients: RecipientOutcome[] = [];
    for (const to of this.config.recipients.map(normalizeRecipient)) {
      const note: StepOutcome = report.note
        ? await this.attempt(() => this.sendMessage(to, { type: 'text', text: { body: report.note } }))
        : { status: 'skipped' };
      if (note.status === 'failed') {
        logger.warn('Report note not delivered', { to, error: note.error });
      }

      const document = await this.attempt(() =>
        this.sendMessage(to, { type: 'document', document: { id: mediaId, filename: report.filename } })
      );
      if (document.status === 'failed') {
        logger.error('Report document not delivered', { to, error: document.error });
      }

      recipients.push({ to, note, document });
    }

    const failed = recipients.filter((recipient) => recipient.document.status === 'failed');
    if (failed.length > 0) {
      throw new DeliveryError(
        `Report delivery: document send failed for ${failed.length} of ${recipients.length} recipients`,
        { step: 'document', mediaId, recipients }
      );
    }

    return { mediaId, recipients };
  }

  private async sendMessage(to: string, content: Record<string, unknown>): Promise<string | null> {
    const body = await this.post('messages', JSON.stringify({
      messaging_product: 'whatsapp',
      recipient_type: 'individual',
      to,
      ...content,
    }));
    return firstMessageId(body);
  }

  private async attempt(send: () => Promise<string | null>): Promise<StepOutcome> {
    try {
      return { status: 'sent', messageId: await send() };
    } catch (error) {
      return { status: 'failed', error: describeError(error) };
    }
  }

  private async post(endpoint: 'media' | 'messages', body: FormData | string): Promise<unknown> {
    this.assertConfigured();
    const url = `${this.config.baseUrl}/${this.config.apiVersion}/${this.config.phoneNumberId}/${endpoint}`;
    const headers: Record<string, string> = { Authorization: `Bearer ${this.config.accessToken}` };
    if (typeof body === 'string') {
      headers['Content-Type'] = 'application/json';
    }

    const response = await this.fetchFn(url, { method: 'POST', headers, body });
    const text = await response.text();
    let parsed: unknown = null;
    if (text) {
      try {
        parsed = JSON.parse(text);
      } catch {
        parsed = text;
      }
    }

    if (!response.ok) {
      throw new DeliveryError(`WhatsApp ${endpoint} request failed: ${apiErrorMessage(parsed, response.status)}`, {
        step: endpoint,
        status: response.status,
      });
    }
    return parsed;
  }

  private assertConfigured(): void {
    if (!this.isConfigured()) {
      throw new DeliveryError('Report delivery: WhatsApp is not configured', { step: 'configure' });
    }
  }
}

export function normalizeRecipient(value: string): string {
  return value.replace(/\D/g, '');
}
