// lib/diagnostics/notify.ts
// User-facing diagnostic channel: records messages and forwards them to a sink.

export type NotifyLevel = 'info' | 'warning' | 'error';

export type NotifyMessage = {
  level: NotifyLevel;
  text: string;
};

export type NotifySink = (msg: NotifyMessage) => void;

type Part = string | number | boolean;

export const consoleSink: NotifySink = (msg) => {
  if (msg.level === 'error') console.error(msg.text);
  else if (msg.level === 'warning') console.warn(msg.text);
  else console.info(msg.text);
};

export const silentSink: NotifySink = () => {};

/** Keeps the most recent `limit` messages; every message still reaches the sink. */
export class Notifier {
  private readonly log: NotifyMessage[] = [];

  constructor(
    private readonly sink: NotifySink = consoleSink,
    private readonly limit = 1000,
  ) {}

  info(...parts: Part[]) { this.push('info', parts); }
  warning(...parts: Part[]) { this.push('warning', parts); }
  error(...parts: Part[]) { this.push('error', parts); }

  messages(level?: NotifyLevel): NotifyMessage[] {
    return level ? this.log.filter(m => m.level === level) : [...this.log];
  }

  errors(): string[] {
    return this.messages('error').map(m => m.text);
  }

  hasErrors(): boolean {
    return this.log.some(m => m.level === 'error');
  }

  clear() {
    this.log.length = 0;
  }

  private push(level: NotifyLevel, parts: Part[]) {
    const msg: NotifyMessage = { level, text: parts.map(String).join('') };
    this.log.push(msg);
    if (this.log.length > this.limit) this.log.splice(0, this.log.length - this.limit);
    this.sink(msg);
  }
}
