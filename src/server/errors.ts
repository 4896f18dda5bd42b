/**
 * MCP Server Error Handling
 *
 * Tool failures surface as MCPError with a closed category and a recovery
 * hint naming the tool to call next. Provider failures inside the
 * generative pipeline do not reach this layer; they become diagnostics.
 *
 * @module server/errors
 */

// ═══════════════════════════════════════════════════════════════════════════════
// ERROR CATEGORIES
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Error categories for MCP tool errors
 */
export type ErrorCategory =
  // Validation errors
  | 'VALIDATION_ERROR'

  // Session state errors
  | 'DOCUMENT_NOT_LOADED'
  | 'POST_NOT_FOUND'

  // File system errors
  | 'PATH_NOT_FOUND'
  | 'FILE_TOO_LARGE'

  // Configuration errors
  | 'CONFIGURATION_ERROR'

  // Internal errors
  | 'INTERNAL_ERROR';

// ═══════════════════════════════════════════════════════════════════════════════
// ERROR NAME TO CATEGORY MAPPING
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Map custom error class names to MCPError categories
 */
const ERROR_NAME_TO_CATEGORY: Record<string, ErrorCategory> = {
  ValidationError: 'VALIDATION_ERROR',
  ZodError: 'VALIDATION_ERROR',
};

// ═══════════════════════════════════════════════════════════════════════════════
// MCP ERROR CLASS
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * MCPError - Structured error class for all MCP tool failures
 */
export class MCPError extends Error {
  public readonly category: ErrorCategory;
  public readonly details?: Record<string, unknown>;

  constructor(category: ErrorCategory, message: string, details?: Record<string, unknown>) {
    super(message);
    this.name = 'MCPError';
    this.category = category;
    this.details = details;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, MCPError);
    }
  }

  /**
   * Create error from unknown caught value
   */
  static fromUnknown(error: unknown, defaultCategory: ErrorCategory = 'INTERNAL_ERROR'): MCPError {
    if (error instanceof MCPError) {
      return error;
    }

    if (error instanceof Error) {
      const category = ERROR_NAME_TO_CATEGORY[error.name] ?? defaultCategory;
      return new MCPError(category, error.message, {
        originalName: error.name,
        stack: error.stack,
      });
    }

    return new MCPError(defaultCategory, String(error), {
      originalValue: error,
    });
  }

  /**
   * Convert to JSON for logging/serialization
   */
  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      category: this.category,
      message: this.message,
      details: this.details,
      stack: this.stack,
    };
  }
}

// ═══════════════════════════════════════════════════════════════════════════════
// RECOVERY HINTS
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Recovery hint for AI agents to self-correct after errors.
 */
export interface RecoveryHint {
  tool: string;
  hint: string;
}

const RECOVERY_HINTS: Record<ErrorCategory, RecoveryHint> = {
  VALIDATION_ERROR: { tool: 'study_config_get', hint: 'Check parameter types and required fields' },
  DOCUMENT_NOT_LOADED: {
    tool: 'study_document_extract',
    hint: 'Load a document with study_document_extract before reviewing or chatting',
  },
  POST_NOT_FOUND: { tool: 'study_post_list', hint: 'Use study_post_list to find existing post ids' },
  PATH_NOT_FOUND: { tool: 'study_document_extract', hint: 'Verify the file path exists on the filesystem' },
  FILE_TOO_LARGE: {
    tool: 'study_document_extract',
    hint: 'Split the document or upload a smaller file (20 MiB limit per file)',
  },
  CONFIGURATION_ERROR: {
    tool: 'study_provider_status',
    hint: 'Check environment variable configuration: OPENAI_API_KEY and GEMINI_API_KEY',
  },
  INTERNAL_ERROR: { tool: 'study_provider_status', hint: 'Run study_provider_status for diagnostics' },
};

/**
 * Get recovery hint for an error category.
 */
export function getRecoveryHint(category: ErrorCategory): RecoveryHint {
  return RECOVERY_HINTS[category];
}

// ═══════════════════════════════════════════════════════════════════════════════
// ERROR RESPONSE FORMATTING
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Format MCPError for tool response
 */
export function formatErrorResponse(error: MCPError): {
  success: false;
  error: {
    category: ErrorCategory;
    message: string;
    recovery: RecoveryHint;
    details?: Record<string, unknown>;
  };
} {
  return {
    success: false,
    error: {
      category: error.category,
      message: error.message,
      recovery: RECOVERY_HINTS[error.category],
      details: error.details,
    },
  };
}

// ═══════════════════════════════════════════════════════════════════════════════
// ERROR FACTORY FUNCTIONS
// ═══════════════════════════════════════════════════════════════════════════════

export function validationError(message: string, details?: Record<string, unknown>): MCPError {
  return new MCPError('VALIDATION_ERROR', message, details);
}

export function documentNotLoadedError(): MCPError {
  return new MCPError(
    'DOCUMENT_NOT_LOADED',
    'No document is loaded in this session. Use study_document_extract first.'
  );
}

export function postNotFoundError(postId: string): MCPError {
  return new MCPError('POST_NOT_FOUND', `Post not found: ${postId}`, { postId });
}

export function pathNotFoundError(path: string): MCPError {
  return new MCPError('PATH_NOT_FOUND', `Path does not exist: ${path}`, { path });
}

export function fileTooLargeError(path: string, sizeBytes: number, limitBytes: number): MCPError {
  return new MCPError(
    'FILE_TOO_LARGE',
    `File exceeds the ${limitBytes}-byte upload limit: ${path} (${sizeBytes} bytes)`,
    { path, sizeBytes, limitBytes }
  );
}

export function configurationError(message: string, details?: Record<string, unknown>): MCPError {
  return new MCPError('CONFIGURATION_ERROR', message, details);
}
