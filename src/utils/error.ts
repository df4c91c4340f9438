export enum ErrorCodes {
  // Configuration Errors
  INVALID_CONFIGURATION = "INVALID_CONFIGURATION",
  MISSING_CREDENTIALS = "MISSING_CREDENTIALS",

  // Data Errors
  ORDER_DATA_MISSING = "ORDER_DATA_MISSING",
  ORDER_DATA_INVALID = "ORDER_DATA_INVALID",

  // Backend Errors
  TRANSCRIPTION_FAILED = "TRANSCRIPTION_FAILED",
  COMPLETION_FAILED = "COMPLETION_FAILED",
  SPEECH_SYNTHESIS_FAILED = "SPEECH_SYNTHESIS_FAILED",

  // Pipeline Errors
  PIPELINE_TERMINATED = "PIPELINE_TERMINATED",

  // Transport Errors
  FRAME_DESERIALIZATION_FAILED = "FRAME_DESERIALIZATION_FAILED",
}

export enum ErrorSeverity {
  LOW = "low",
  MEDIUM = "medium",
  HIGH = "high",
  CRITICAL = "critical",
}

export interface ErrorMetadata {
  component: string;
  originalError?: string;
  sessionId?: string;
  stage?: string;
  [key: string]: unknown;
}

export class VoiceAgentError extends Error {
  code: ErrorCodes;
  severity: ErrorSeverity;
  metadata: ErrorMetadata;

  constructor(
    message: string,
    code: ErrorCodes,
    severity: ErrorSeverity,
    metadata: Partial<ErrorMetadata>
  ) {
    super(message);
    this.name = "VoiceAgentError";
    this.code = code;
    this.severity = severity;
    this.metadata = {
      ...metadata,
      component: metadata.component || "unknown",
    };
  }
}

/**
 * Raised to the owner of a session when a stage fails and the pipeline
 * stops accepting frames. The owner closes the transport.
 */
export class PipelineTerminatedError extends VoiceAgentError {
  constructor(stage: string, cause: unknown, sessionId?: string) {
    super(
      `Pipeline terminated by stage ${stage}`,
      ErrorCodes.PIPELINE_TERMINATED,
      ErrorSeverity.HIGH,
      {
        component: "Pipeline",
        stage,
        sessionId,
        originalError: describeError(cause),
      }
    );
    this.name = "PipelineTerminatedError";
  }
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
