/**
 * Typed event definitions for the bridge's structured logging.
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface LogEntry {
  timestamp: string;
  level: LogLevel;
  source: string;
  issueNumber?: number;
  ticketKey?: string;
  rowIndex?: number;
  message: string;
  data?: Record<string, unknown>;
}

export type RunMode = 'scan' | 'ticket' | 'attachments';

// ── Run-level events ──

export interface RunStartedEvent {
  type: 'run-started';
  mode: RunMode;
  dryRun: boolean;
}

export interface RunCompletedEvent {
  type: 'run-completed';
  mode: RunMode;
  created: number;
  failed: number;
  skipped: number;
}

// ── Issue-level events ──

export interface RowSkippedEvent {
  type: 'row-skipped';
  rowIndex: number;
  recordId: string;
  reason: string;
}

export interface IssuePublishedEvent {
  type: 'issue-published';
  title: string;
  transport: string;
  issueNumber?: number;
}

export interface IssuePublishFailedEvent {
  type: 'issue-publish-failed';
  title: string;
  reason: string;
}

// ── Attachment events ──

export interface AttachmentUploadedEvent {
  type: 'attachment-uploaded';
  ticketKey: string;
  issueNumber: number;
  repoPath: string;
  rawUrl: string;
  transport: string;
}

export interface AttachmentFailedEvent {
  type: 'attachment-failed';
  ticketKey: string;
  issueNumber: number;
  localPath: string;
  reason: string;
}

export type BridgeEvent =
  | RunStartedEvent
  | RunCompletedEvent
  | RowSkippedEvent
  | IssuePublishedEvent
  | IssuePublishFailedEvent
  | AttachmentUploadedEvent
  | AttachmentFailedEvent;
