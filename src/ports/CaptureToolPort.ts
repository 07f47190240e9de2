import type { CaptureKind } from '../core/notes/types.js';

export interface CaptureRequest {
  url: string;
  /** Absolute path the tool must produce. */
  destination: string;
  /** Aborted on timeout or shutdown; the tool must stop its work when it fires. */
  signal: AbortSignal;
}

export type CaptureToolResult =
  | { status: 'ok'; path: string }
  | { status: 'error'; reason: string; retryable: boolean };

export interface CaptureToolPort {
  readonly kind: CaptureKind;
  readonly name: string;
  capture(request: CaptureRequest): Promise<CaptureToolResult>;
}
