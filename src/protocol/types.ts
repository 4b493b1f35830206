/**
 * Wire protocol between an agent host and pkgrelay.
 * All messages are JSON-serialized over WebSocket.
 */
import type { ToolResponse } from '../devkit/types.js';

// ─── Client → pkgrelay ───

export interface RelayTaskMessage {
  type: 'task';
  id: string;
  payload: {
    tool: string;
    args: Record<string, unknown>;
  };
}

export interface RelayCancelMessage {
  type: 'cancel';
  id: string;
}

export interface RelayPingMessage {
  type: 'ping';
  timestamp: number;
}

export interface RelayToolsQueryMessage {
  type: 'tools_query';
}

export type ClientToRelayMessage =
  | RelayTaskMessage
  | RelayCancelMessage
  | RelayPingMessage
  | RelayToolsQueryMessage;

// ─── pkgrelay → Client ───

export interface RelayTaskResultMessage {
  type: 'task_result';
  id: string;
  result: ToolResponse;
}

export interface RelayPongMessage {
  type: 'pong';
  timestamp: number;
  active_tasks: number;
  uptime_seconds: number;
}

export interface RelayRegisterMessage {
  type: 'register';
  capabilities: string[];
  protocol_version: number;
}

export interface RelayToolsReportMessage {
  type: 'tools_report';
  tools: { name: string; description: string }[];
}

export interface RelayErrorMessage {
  type: 'error';
  message: string;
}

export type RelayToClientMessage =
  | RelayTaskResultMessage
  | RelayPongMessage
  | RelayRegisterMessage
  | RelayToolsReportMessage
  | RelayErrorMessage;

export const RELAY_PROTOCOL_VERSION = 1;
export const RELAY_AUTH_HEADER = 'x-pkgrelay-auth';
export const RELAY_PROTOCOL_HEADER = 'x-pkgrelay-protocol-version';
