/**
 * @package @resilient-bridge/types
 * Shared TypeScript types for the resilience bridge and its gateway.
 * Backends, the core bridge and the HTTP surface all speak these contracts.
 */

// ============================================================
// REQUEST & RESULT
// ============================================================

export interface BridgeRequest {
  /** Unique request id (uuid v4) */
  readonly id: string;
  readonly content: string;
  /** Requester identity; "anonymous" when not supplied */
  readonly userId: string;
  readonly metadata: Readonly<Record<string, unknown>>;
  /** Epoch ms at which the request was created */
  readonly createdAt: number;
  /** SHA-256 hex digest of the content */
  readonly fingerprint: string;
}

export interface BridgeRequestInput {
  content: string;
  userId?: string;
  metadata?: Record<string, unknown>;
}

export type BridgeErrorCode =
  | 'ADMISSION_REJECTED'
  | 'BREAKER_OPEN'
  | 'BACKEND_FAILURE'
  | 'BACKEND_TIMEOUT'
  | 'INVALID_CONFIGURATION';

export interface BridgeResult {
  readonly content: string;
  /** Confidence score in [0, 1] */
  readonly confidence: number;
  /** Processing duration in ms */
  readonly processingTime: number;
  /** Identifiers of the stages that ran, in order */
  readonly stagesInvoked: readonly string[];
  readonly success: boolean;
  readonly errorCode?: BridgeErrorCode;
  /** Set on failures: whether resubmitting later may succeed */
  readonly retryable?: boolean;
  readonly traceId?: string;
  readonly cached?: boolean;
}

// ============================================================
// BACKEND CONTRACT
// ============================================================

export type BackendStatus = 'initializing' | 'ready' | 'processing' | 'error';

/**
 * Anything that can turn a request into a result asynchronously.
 * The signal aborts when the bridge gives up on the call.
 */
export interface BackendHandler {
  handle(request: BridgeRequest, signal?: AbortSignal): Promise<BridgeResult>;
  getMetrics?(): Record<string, unknown>;
  status?(): BackendStatus;
}

// ============================================================
// API TYPES
// ============================================================

export interface ApiResponse<T = unknown> {
  success: boolean;
  data?: T;
  error?: ApiError;
}

export interface ApiError {
  code: string;
  message: string;
  details?: Record<string, unknown>;
  requestId?: string;
}

export interface MessageResponse {
  response: string;
  confidence: number;
  processing_time: number;
  success: boolean;
  timestamp: string;
  error_code?: BridgeErrorCode;
  retryable?: boolean;
  request_id: string;
}
