import { format } from 'util';

export type FindingLevel = 'debug' | 'info' | 'warning' | 'error';

export const LEVEL_ORDER: Record<FindingLevel, number> = {
  debug: 0,
  info: 1,
  warning: 2,
  error: 3,
};

export type MessageParams = Record<string, string>;

// Positional messages use printf-style placeholders (%s, %d, %v, %j),
// named messages use {{name}} placeholders.
export type FindingMessage =
  | { kind: 'positional'; template: string; args: readonly unknown[] }
  | { kind: 'named'; template: string; params: MessageParams };

export interface Finding {
  level: FindingLevel;
  code: string;
  message: FindingMessage;
  cause?: unknown;
  timestamp: Date;
}

/** Read-only view of the findings a single check invocation produced. */
export interface DiagnosticResult {
  readonly name: string;
  readonly findings: readonly Finding[];
  passed(): boolean;
  errors(): Finding[];
  warnings(): Finding[];
}

/**
 * Append-only collector of findings for one check invocation.
 *
 * None of the append methods throw. Once sealed, further appends are dropped
 * so the result handed back to the caller stays as it was when the check
 * returned.
 */
export class ResultRecorder implements DiagnosticResult {
  private entries: Finding[] = [];
  private sealed = false;

  constructor(
    readonly name: string,
    private now: () => Date = () => new Date(),
  ) {}

  get findings(): readonly Finding[] {
    return [...this.entries];
  }

  passed(): boolean {
    return this.errors().length === 0;
  }

  errors(): Finding[] {
    return this.entries.filter(f => f.level === 'error');
  }

  warnings(): Finding[] {
    return this.entries.filter(f => f.level === 'warning');
  }

  debug(code: string, cause: unknown, template: string, ...args: unknown[]): void {
    this.append('debug', code, cause, { kind: 'positional', template, args });
  }

  info(code: string, cause: unknown, template: string, ...args: unknown[]): void {
    this.append('info', code, cause, { kind: 'positional', template, args });
  }

  warn(code: string, cause: unknown, template: string, ...args: unknown[]): void {
    this.append('warning', code, cause, { kind: 'positional', template, args });
  }

  error(code: string, cause: unknown, template: string, ...args: unknown[]): void {
    this.append('error', code, cause, { kind: 'positional', template, args });
  }

  debugt(code: string, cause: unknown, template: string, params: MessageParams): void {
    this.append('debug', code, cause, { kind: 'named', template, params: { ...params } });
  }

  infot(code: string, cause: unknown, template: string, params: MessageParams): void {
    this.append('info', code, cause, { kind: 'named', template, params: { ...params } });
  }

  warnt(code: string, cause: unknown, template: string, params: MessageParams): void {
    this.append('warning', code, cause, { kind: 'named', template, params: { ...params } });
  }

  errort(code: string, cause: unknown, template: string, params: MessageParams): void {
    this.append('error', code, cause, { kind: 'named', template, params: { ...params } });
  }

  seal(): DiagnosticResult {
    this.sealed = true;
    return this;
  }

  private append(level: FindingLevel, code: string, cause: unknown, message: FindingMessage): void {
    if (this.sealed) return;

    const finding: Finding = { level, code, message, timestamp: this.now() };
    if (cause !== undefined && cause !== null) {
      finding.cause = cause;
    }
    this.entries.push(finding);
  }
}

const NAMED_PLACEHOLDER = /\{\{\s*\.?([A-Za-z_][A-Za-z0-9_]*)\s*\}\}/g;

export function renderMessage(message: FindingMessage): string {
  if (message.kind === 'named') {
    return message.template.replace(NAMED_PLACEHOLDER, (_, key: string) => message.params[key] ?? '');
  }
  // %v has no util.format equivalent; it prints like %s
  return format(message.template.replace(/%v/g, '%s'), ...message.args);
}

export function describeError(err: unknown): string {
  if (err instanceof Error) {
    return `(${err.name}) ${err.message}`;
  }
  if (typeof err === 'object' && err !== null && 'message' in err && typeof err.message === 'string') {
    return err.message;
  }
  return String(err);
}
