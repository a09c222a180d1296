import { MessageSource, OperatorNotifier } from '../models/services';

// Reddit caps private message bodies at 10k characters
const MAX_BODY_LENGTH = 9500;

/**
 * Sends operator alerts as a Reddit private message.
 */
export class RedditNotifier implements OperatorNotifier {
  constructor(
    private source: MessageSource,
    private operatorUsername: string
  ) {}

  async notify(subject: string, body: string): Promise<void> {
    const text = body.length > MAX_BODY_LENGTH ? `${body.slice(0, MAX_BODY_LENGTH)}\n\n[truncated]` : body;
    await this.source.sendMessage(this.operatorUsername, subject, codeBlock(text));
    console.log(`📣 Notified operator /u/${this.operatorUsername}: ${subject}`);
  }
}

/**
 * Used when no operator account is configured or notifications are off.
 */
export class LogNotifier implements OperatorNotifier {
  async notify(subject: string, body: string): Promise<void> {
    console.error(`🚨 ALERT: ${subject}\n${body}`);
  }
}

export function createNotifier(
  source: MessageSource,
  settings: { enabled: boolean; operatorUsername?: string }
): OperatorNotifier {
  if (settings.enabled && settings.operatorUsername) {
    return new RedditNotifier(source, settings.operatorUsername);
  }
  return new LogNotifier();
}

function codeBlock(text: string): string {
  return text
    .split('\n')
    .map(line => `    ${line}`)
    .join('\n');
}
