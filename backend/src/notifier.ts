// backend/src/notifier.ts
import fetch, { type Response } from 'node-fetch';
import { NotifyError, errorMessage, isAbort } from './errors.js';
import type { Mailer } from './mailer.js';
import { alertHtml, alertSubject, alertText } from './messageTemplates.js';
import type { AlertEvent } from './types.js';

export interface Notifier {
  notify(event: AlertEvent): Promise<void>;
  /** Free-form status messages (startup, sleep, wake). */
  announce(text: string): Promise<void>;
}

const TELEGRAM_BASE = 'https://api.telegram.org';

export class TelegramNotifier implements Notifier {
  readonly channel = 'telegram';

  constructor(
    private readonly opts: { token: string; chatId: string; timeZone: string; baseUrl?: string; timeoutMs?: number },
  ) {}

  notify(event: AlertEvent): Promise<void> {
    return this.send(alertText(event, this.opts.timeZone));
  }

  announce(text: string): Promise<void> {
    return this.send(text);
  }

  private async send(text: string) {
    const url = `${this.opts.baseUrl ?? TELEGRAM_BASE}/bot${this.opts.token}/sendMessage`;
    const timeoutMs = this.opts.timeoutMs ?? 15_000;
    let res: Response;
    try {
      res = await fetch(url, {
        method: 'POST',
        headers: { 'Content-Type': 'application/json' },
        body: JSON.stringify({ chat_id: this.opts.chatId, text }),
        signal: AbortSignal.timeout(timeoutMs),
      });
    } catch (e) {
      if (isAbort(e)) throw new NotifyError([this.channel], `telegram no response after ${timeoutMs}ms`, { cause: e });
      throw new NotifyError([this.channel], `telegram send failed: ${errorMessage(e)}`, { cause: e });
    }
    if (!res.ok) {
      const description = await res.text().catch((e: unknown) => errorMessage(e));
      throw new NotifyError([this.channel], `telegram HTTP ${res.status}: ${description}`);
    }
    console.log('[telegram] sent', { chars: text.length });
  }
}

export class EmailNotifier implements Notifier {
  readonly channel = 'email';

  constructor(
    private readonly mailer: Mailer,
    private readonly opts: { recipients: string[]; timeZone: string },
  ) {}

  async notify(event: AlertEvent): Promise<void> {
    await this.deliver(alertSubject(event), alertText(event, this.opts.timeZone), alertHtml(event, this.opts.timeZone));
  }

  async announce(text: string): Promise<void> {
    const [firstLine] = text.split('\n');
    await this.deliver(firstLine, text, `<pre style="font-family:inherit">${escapeHtml(text)}</pre>`);
  }

  private async deliver(subject: string, text: string, html: string) {
    try {
      const { messageId } = await this.mailer.sendMail({ to: this.opts.recipients, subject, text, html });
      console.log('[email] sent', { to: this.opts.recipients, subject, messageId });
    } catch (e) {
      throw new NotifyError([this.channel], `email send failed: ${errorMessage(e)}`, { cause: e });
    }
  }
}

type Channel = Notifier & { readonly channel: string };

/** Delivers to every channel; one failing channel does not stop the rest. */
export class FanoutNotifier implements Notifier {
  constructor(private readonly channels: Channel[]) {}

  notify(event: AlertEvent): Promise<void> {
    return this.each((c) => c.notify(event));
  }

  announce(text: string): Promise<void> {
    return this.each((c) => c.announce(text));
  }

  private async each(fn: (c: Channel) => Promise<void>) {
    const failed: string[] = [];
    const causes: unknown[] = [];
    for (const c of this.channels) {
      try {
        await fn(c);
      } catch (e) {
        failed.push(c.channel);
        causes.push(e);
      }
    }
    if (failed.length) {
      throw new NotifyError(failed, `delivery failed on ${failed.join(', ')}: ${causes.map(errorMessage).join('; ')}`, {
        cause: causes.length === 1 ? causes[0] : causes,
      });
    }
  }
}

function escapeHtml(s: string) {
  return s.replace(/&/g, '&amp;').replace(/</g, '&lt;').replace(/>/g, '&gt;');
}
