/**
 * Render Error
 *
 * Error classification for the render engine and the render pipeline.
 * Session and renderer code throw these; the renderer converts them into
 * failure results before they reach the output assembler.
 */

/**
 * Error codes for render operations
 */
export type RenderErrorCode =
  // Engine lifecycle
  | 'ENGINE_UNAVAILABLE'
  | 'ENGINE_LAUNCH_FAILED'
  | 'ENGINE_INSTALL_FAILED'
  | 'SESSION_CLOSED'
  // Document capture
  | 'EMPTY_DOCUMENT'
  | 'MISSING_OUTPUT'
  // General
  | 'INVALID_STATE';

/**
 * Standardized error for render operations.
 *
 * @example
 * ```typescript
 * try {
 *   await session.withPage(settings, capture);
 * } catch (error) {
 *   if (RenderError.isRenderError(error) && error.code === 'ENGINE_UNAVAILABLE') {
 *     // the browser could not be relaunched
 *   }
 * }
 * ```
 */
export class RenderError extends Error {
  readonly code: RenderErrorCode;
  readonly cause?: Error;
  readonly context?: Record<string, unknown>;

  constructor(
    message: string,
    code: RenderErrorCode,
    context?: Record<string, unknown>,
    cause?: Error
  ) {
    super(message);
    this.name = 'RenderError';
    this.code = code;
    this.cause = cause;
    this.context = context;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, RenderError);
    }
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      message: this.message,
      code: this.code,
      context: this.context,
      cause: this.cause
        ? {
            name: this.cause.name,
            message: this.cause.message,
          }
        : undefined,
      stack: this.stack,
    };
  }

  static isRenderError(error: unknown): error is RenderError {
    return error instanceof RenderError;
  }

  // ==================== Factory Methods ====================

  static engineUnavailable(context?: Record<string, unknown>): RenderError {
    return new RenderError('Render engine is unavailable', 'ENGINE_UNAVAILABLE', context);
  }

  static engineLaunchFailed(cause: Error, context?: Record<string, unknown>): RenderError {
    return new RenderError(
      `Failed to launch render engine: ${cause.message}`,
      'ENGINE_LAUNCH_FAILED',
      context,
      cause
    );
  }

  static engineInstallFailed(cause: Error, context?: Record<string, unknown>): RenderError {
    return new RenderError(
      `Failed to install render engine: ${cause.message}`,
      'ENGINE_INSTALL_FAILED',
      context,
      cause
    );
  }

  static sessionClosed(): RenderError {
    return new RenderError('Render session has been closed', 'SESSION_CLOSED');
  }

  static emptyDocument(selector: string): RenderError {
    return new RenderError(`Root element not found: ${selector}`, 'EMPTY_DOCUMENT', {
      selector,
    });
  }

  static missingOutput(path: string): RenderError {
    return new RenderError(`Screenshot was not written: ${path}`, 'MISSING_OUTPUT', { path });
  }

  static invalidState(currentState: string, attemptedOperation: string): RenderError {
    return new RenderError(
      `Invalid operation "${attemptedOperation}" in state "${currentState}"`,
      'INVALID_STATE',
      { currentState, attemptedOperation }
    );
  }
}
