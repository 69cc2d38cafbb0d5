import type { RuntimeConfig } from '../config';
import { ConfigurationError } from '../errors';
import { log } from '../log';
import type { OutboundInitiator } from './initiator';

export type ContactMethod = 'call' | 'text';

/** One-way operator alerts: reach the recipient, say the message, hang up. */
export class Notifier {
  constructor(
    private readonly initiator: Pick<OutboundInitiator, 'originateCall' | 'originateText'>,
    private readonly config: RuntimeConfig,
  ) {}

  public async notify(message: string, recipient?: string, method: ContactMethod = 'call'): Promise<void> {
    const target = recipient ?? this.config.identity.adminNumber;
    if (!target) {
      throw new ConfigurationError('notify needs a recipient or ADMIN_PHONE_NUMBER');
    }

    log.info({ event: 'notify', method, recipient: target, message_length: message.length }, 'sending notification');

    const deliver = async (session: { say(text: string): Promise<void>; hangup(): Promise<void> }) => {
      await session.say(message);
      await session.hangup();
    };

    if (method === 'call') {
      await this.initiator.originateCall(target, deliver);
      return;
    }
    await this.initiator.originateText(target, deliver);
  }

  public notifyError(error: string, recipient?: string, method: ContactMethod = 'call'): Promise<void> {
    return this.notify(
      `An error has occurred on system ${this.config.identity.name}. Please listen carefully to the following message. ${error}`,
      recipient,
      method,
    );
  }

  /** Logs the full stack locally; only the message is read out. */
  public notifyException(error: unknown, recipient?: string, method: ContactMethod = 'call'): Promise<void> {
    const message = error instanceof Error ? error.message : String(error);
    log.error({ err: error, event: 'notify_exception' }, 'reporting exception to operator');
    return this.notify(
      `An exception has occurred on system ${this.config.identity.name}. Please listen carefully to the following message. ${message}. The full details have been logged.`,
      recipient,
      method,
    );
  }
}
