import { UpstreamError, errorMessage } from '../utils/errors';
import { Logger } from '../utils/Logger';

export interface EmailMessage {
  to: string;
  subject: string;
  text: string;
}

export interface EmailSender {
  readonly channel: string;
  send(message: EmailMessage): Promise<void>;
}

// Writes the message to the application log instead of a mail server
export class LoggingEmailSender implements EmailSender {
  readonly channel = 'log';

  async send(message: EmailMessage): Promise<void> {
    await Logger.logInfo('Email', `Email queued for ${message.to}: ${message.subject}`, {
      Endpoint: 'EmailSender',
      Status: 'EMAIL_LOGGED',
      RequestPayload: { to: message.to, subject: message.subject },
      ResponsePayload: message.text,
    });
  }
}

/**
 * Tries each sender in order and reports which channel delivered the message
 */
export class FallbackEmailSender {
  constructor(private readonly senders: EmailSender[]) {}

  async deliver(message: EmailMessage): Promise<string> {
    const failures: string[] = [];
    for (const sender of this.senders) {
      try {
        await sender.send(message);
        return sender.channel;
      } catch (err) {
        failures.push(`${sender.channel}: ${errorMessage(err)}`);
        await Logger.logWarning('Email', `Email channel ${sender.channel} failed`, {
          Endpoint: 'EmailSender',
          Exception: errorMessage(err),
        });
      }
    }
    throw new UpstreamError('All email channels failed', { failures });
  }
}
