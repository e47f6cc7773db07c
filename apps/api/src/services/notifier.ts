import twilio from 'twilio';
import type { AppConfig } from '../config.js';

export interface NotificationResult {
  sent: boolean;
  detail: string;
}

export interface Notifier {
  send(to: string, body: string): Promise<NotificationResult>;
}

type TwilioClient = ReturnType<typeof twilio>;

export class TwilioNotifier implements Notifier {
  private readonly client: TwilioClient;

  constructor(accountSid: string, authToken: string, private readonly from: string) {
    this.client = twilio(accountSid, authToken);
  }

  async send(to: string, body: string): Promise<NotificationResult> {
    const message = await this.client.messages.create({ to, from: this.from, body });
    return { sent: true, detail: `SMS sent (SID: ${message.sid})` };
  }
}

/** Stand-in used when SMS is switched off or Twilio is not configured. */
export class DisabledNotifier implements Notifier {
  constructor(private readonly reason: string) {}

  async send(): Promise<NotificationResult> {
    return { sent: false, detail: this.reason };
  }
}

export function createNotifier(config: AppConfig): Notifier {
  if (!config.SMS_NOTIFICATIONS_ENABLED) {
    return new DisabledNotifier('SMS notifications disabled');
  }

  const { TWILIO_ACCOUNT_SID, TWILIO_AUTH_TOKEN, TWILIO_FROM_NUMBER } = config;
  if (!TWILIO_ACCOUNT_SID || !TWILIO_AUTH_TOKEN || !TWILIO_FROM_NUMBER) {
    console.warn('SMS notifications enabled but Twilio is not configured; messages will not be sent');
    return new DisabledNotifier(
      'Twilio not configured (missing TWILIO_ACCOUNT_SID, TWILIO_AUTH_TOKEN, or TWILIO_FROM_NUMBER)',
    );
  }

  return new TwilioNotifier(TWILIO_ACCOUNT_SID, TWILIO_AUTH_TOKEN, TWILIO_FROM_NUMBER);
}

/**
 * Delivers an SMS after the ledger write has been committed. A delivery
 * failure is logged and reported, never thrown.
 */
export async function notifyBestEffort(
  notifier: Notifier,
  to: string,
  body: string,
): Promise<NotificationResult> {
  try {
    return await notifier.send(to, body);
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    console.error(`SMS delivery to ${to} failed:`, reason);
    return { sent: false, detail: `Failed to send SMS: ${reason}` };
  }
}
