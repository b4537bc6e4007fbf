// ─── Logging ────────────────────────────────────────────────────

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'fatal';

export interface LogContext {
  component: string;
  taskId?: string;
  agent?: string;
  tool?: string;
  [key: string]: unknown;
}
