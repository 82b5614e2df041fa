import { createLogger, type Logger } from './logger.js';

export interface MailMessage {
  to: string;
  subject: string;
  body: string;
}

/** Outbound mail. Rejects when the message could not be handed off. */
export interface MailSender {
  send(message: MailMessage): Promise<void>;
}

/**
 * Writes messages to the log instead of delivering them. The body (which may
 * hold a confirmation link) only appears at debug level.
 */
export class LogMailSender implements MailSender {
  constructor(private readonly log: Logger = createLogger('Mail')) {}

  async send(message: MailMessage): Promise<void> {
    this.log.info('Mail not delivered (log sender)', { to: message.to, subject: message.subject });
    this.log.debug('Mail body', { to: message.to, body: message.body });
  }
}

export function confirmationMail(
  to: string,
  publicUrl: string,
  accountId: number,
  code: string,
): MailMessage {
  const link = `${publicUrl}/api/confirmemail?id=${accountId}&code=${encodeURIComponent(code)}`;
  return {
    to,
    subject: 'Confirm your email address',
    body: `Please confirm your email address by opening the following link: ${link}`,
  };
}
