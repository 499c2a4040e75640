/**
 * MCP Server Error Handling
 *
 * Every tool failure is reported as an MCPError with a category the client
 * can switch on. Malformed model output and a missing model credential are
 * NOT errors: those degrade to empty results upstream.
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

  // Database errors
  | 'DATABASE_NOT_FOUND'
  | 'DATABASE_NOT_SELECTED'
  | 'DATABASE_ALREADY_EXISTS'

  // Ontology store errors
  | 'FILE_NOT_FOUND'
  | 'PROPOSAL_NOT_FOUND'
  | 'PROPOSAL_ALREADY_REVIEWED'

  // LLM provider errors
  | 'LLM_API_ERROR'
  | 'LLM_RATE_LIMIT'

  // File system errors
  | 'PATH_NOT_FOUND'

  // Internal errors
  | 'INTERNAL_ERROR';

// ═══════════════════════════════════════════════════════════════════════════════
// ERROR NAME TO CATEGORY MAPPING
// ═══════════════════════════════════════════════════════════════════════════════

const VALID_CATEGORIES = new Set<string>([
  'VALIDATION_ERROR',
  'DATABASE_NOT_FOUND',
  'DATABASE_NOT_SELECTED',
  'DATABASE_ALREADY_EXISTS',
  'FILE_NOT_FOUND',
  'PROPOSAL_NOT_FOUND',
  'PROPOSAL_ALREADY_REVIEWED',
  'LLM_API_ERROR',
  'LLM_RATE_LIMIT',
  'PATH_NOT_FOUND',
  'INTERNAL_ERROR',
]);

function isErrorCategory(value: unknown): value is ErrorCategory {
  return typeof value === 'string' && VALID_CATEGORIES.has(value);
}

/**
 * Map custom error class names to MCPError categories.
 *
 * LLMError carries its own `.category` (rate limit vs. generic API failure)
 * which wins over this default in fromUnknown().
 */
const ERROR_NAME_TO_CATEGORY: Record<string, ErrorCategory> = {
  ValidationError: 'VALIDATION_ERROR',
  DatabaseError: 'INTERNAL_ERROR',
  LLMError: 'LLM_API_ERROR',
};

/** Error class names whose own `.category` field is trusted */
const SELF_CATEGORIZED_ERROR_NAMES = new Set(['LLMError', 'DatabaseError']);

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
      const mapped = ERROR_NAME_TO_CATEGORY[error.name] ?? defaultCategory;
      const ownCategory = 'category' in error ? error.category : undefined;
      const category =
        SELF_CATEGORIZED_ERROR_NAMES.has(error.name) && isErrorCategory(ownCategory)
          ? ownCategory
          : mapped;

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
// ERROR RESPONSE FORMATTING
// ═══════════════════════════════════════════════════════════════════════════════

export interface ErrorResponse {
  success: false;
  error: {
    category: ErrorCategory;
    message: string;
    details?: Record<string, unknown>;
  };
}

/**
 * Format MCPError for tool response
 */
export function formatErrorResponse(error: MCPError): ErrorResponse {
  return {
    success: false,
    error: {
      category: error.category,
      message: error.message,
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

export function databaseNotSelectedError(): MCPError {
  return new MCPError(
    'DATABASE_NOT_SELECTED',
    'No database selected. Use onto_db_list to see available databases, then onto_db_select to choose one.'
  );
}

export function databaseNotFoundError(name: string, storagePath?: string): MCPError {
  return new MCPError('DATABASE_NOT_FOUND', `Database "${name}" not found`, {
    databaseName: name,
    storagePath,
  });
}

export function databaseAlreadyExistsError(name: string): MCPError {
  return new MCPError('DATABASE_ALREADY_EXISTS', `Database "${name}" already exists`, {
    databaseName: name,
  });
}

export function fileNotFoundError(fileId: string): MCPError {
  return new MCPError(
    'FILE_NOT_FOUND',
    `File not found: ${fileId}. Use onto_file_list to browse ingested files.`,
    { fileId }
  );
}

export function proposalNotFoundError(proposalId: string): MCPError {
  return new MCPError(
    'PROPOSAL_NOT_FOUND',
    `Proposal not found: ${proposalId}. Use onto_proposal_list to browse proposals.`,
    { proposalId }
  );
}

export function proposalAlreadyReviewedError(proposalId: string, status: string): MCPError {
  return new MCPError(
    'PROPOSAL_ALREADY_REVIEWED',
    `Proposal ${proposalId} was already reviewed (status: ${status})`,
    { proposalId, status }
  );
}

export function pathNotFoundError(path: string): MCPError {
  return new MCPError('PATH_NOT_FOUND', `Path does not exist: ${path}`, {
    path,
  });
}
