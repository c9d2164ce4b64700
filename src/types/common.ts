import { z } from 'zod';

// Error codes surfaced by the exporter
export const ErrorCodeSchema = z.enum([
  'INVALID_ARGUMENT',
  'HTTP_ERROR',
  'TRANSPORT_ERROR',
  'INVALID_RESPONSE',
  'CONFIG_ERROR',
]);
export type ErrorCode = z.infer<typeof ErrorCodeSchema>;

// Log levels (RFC 5424)
export const LogLevel = z.enum([
  'debug',
  'info',
  'notice',
  'warning',
  'error',
  'critical',
  'alert',
  'emergency',
]);
export type LogLevel = z.infer<typeof LogLevel>;

// Structured log entry
export interface LogEntry {
  level: LogLevel;
  logger: string;
  data: Record<string, unknown>;
  timestamp?: string;
  trace_id?: string;
  span_id?: string;
}
