/**
 * Error type definitions
 */

export enum ErrorType {
  NOT_FOUND = 'NOT_FOUND',
  VALIDATION_ERROR = 'VALIDATION_ERROR',
  PERMISSION_DENIED = 'PERMISSION_DENIED',
  STORE_UNAVAILABLE = 'STORE_UNAVAILABLE',
  STORE_ERROR = 'STORE_ERROR',
  CONFIG_ERROR = 'CONFIG_ERROR',
}

export interface RemindersErrorInfo {
  type: ErrorType;
  code: string;
  message: string;
  details?: unknown;
  recoverable: boolean;
  suggestions?: string[];
}

export interface RemindersErrorOptions {
  details?: unknown;
  recoverable?: boolean;
  suggestions?: string[];
  cause?: unknown;
}

export class RemindersError extends Error implements RemindersErrorInfo {
  type: ErrorType;
  code: string;
  recoverable: boolean;
  details?: unknown;
  suggestions?: string[];

  constructor(type: ErrorType, code: string, message: string, options?: RemindersErrorOptions) {
    super(message, options?.cause !== undefined ? { cause: options.cause } : undefined);
    this.name = 'RemindersError';
    this.type = type;
    this.code = code;
    this.recoverable = options?.recoverable ?? false;
    this.details = options?.details;
    this.suggestions = options?.suggestions;

    Object.setPrototypeOf(this, new.target.prototype);
  }

  toJSON(): RemindersErrorInfo {
    return {
      type: this.type,
      code: this.code,
      message: this.message,
      details: this.details,
      recoverable: this.recoverable,
      suggestions: this.suggestions,
    };
  }
}

/**
 * A reminder or calendar lookup found nothing
 */
export class NotFoundError extends RemindersError {
  constructor(
    public readonly entity: 'reminder' | 'calendar',
    public readonly key: string,
    message = `${entity === 'reminder' ? 'Reminder' : 'Calendar'} '${key}' not found`
  ) {
    super(ErrorType.NOT_FOUND, `${entity.toUpperCase()}_NOT_FOUND`, message, {
      details: { entity, key },
    });
    this.name = 'NotFoundError';
  }
}

export class ValidationError extends RemindersError {
  constructor(message: string, details?: unknown) {
    super(ErrorType.VALIDATION_ERROR, 'INVALID_INPUT', message, { details });
    this.name = 'ValidationError';
  }
}

export class PermissionDeniedError extends RemindersError {
  constructor(message = 'Access to Reminders was denied', cause?: unknown) {
    super(ErrorType.PERMISSION_DENIED, 'ACCESS_DENIED', message, {
      cause,
      suggestions: [
        'Grant access in System Settings > Privacy & Security > Reminders',
        'Grant the terminal or host app Automation access to Reminders',
      ],
    });
    this.name = 'PermissionDeniedError';
  }
}

export class StoreUnavailableError extends RemindersError {
  constructor(message: string) {
    super(ErrorType.STORE_UNAVAILABLE, 'STORE_UNAVAILABLE', message, {
      suggestions: ["Run on macOS, or set store to 'memory'"],
    });
    this.name = 'StoreUnavailableError';
  }
}

export class StoreError extends RemindersError {
  constructor(message: string, cause?: unknown) {
    super(ErrorType.STORE_ERROR, 'STORE_FAILURE', message, { cause, recoverable: true });
    this.name = 'StoreError';
  }
}

export class ConfigError extends RemindersError {
  constructor(message: string, details?: unknown) {
    super(ErrorType.CONFIG_ERROR, 'CONFIG_INVALID', message, { details });
    this.name = 'ConfigError';
  }
}

export class ErrorHandler {
  /**
   * Normalize anything thrown into a RemindersError
   */
  static fromUnknown(error: unknown, context: string): RemindersError {
    if (error instanceof RemindersError) {
      return error;
    }

    const message = error instanceof Error ? error.message : String(error);
    const lowered = message.toLowerCase();

    if (
      lowered.includes('not authorized') ||
      lowered.includes('access denied') ||
      lowered.includes('-1743')
    ) {
      return new PermissionDeniedError(`Access to Reminders was denied: ${context}`, error);
    }

    return new StoreError(`${context}: ${message}`, error);
  }

  static getSuggestions(error: RemindersErrorInfo): string[] {
    return error.suggestions ?? [];
  }
}
