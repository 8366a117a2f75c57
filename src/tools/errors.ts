export class ToolServiceError extends Error {
  constructor(
    public message: string,
    public status?: number,
    public originalError?: unknown,
  ) {
    super(message);
    this.name = 'ToolServiceError';
  }
}

export class ToolAuthenticationError extends ToolServiceError {
  constructor(message = 'Tool service authentication failed') {
    super(message, 401);
    this.name = 'ToolAuthenticationError';
  }
}

export class ToolRateLimitError extends ToolServiceError {
  constructor(
    public retryAfterMs: number | null,
    message: string = 'Tool service rate limit exceeded',
  ) {
    super(message, 429);
    this.name = 'ToolRateLimitError';
  }
}

export class ToolNotFoundError extends ToolServiceError {
  constructor(toolName: string) {
    super(`Tool ${toolName} not found`, 404);
    this.name = 'ToolNotFoundError';
  }
}

/** The tool ran and reported a failure */
export class ToolInvocationError extends ToolServiceError {
  constructor(
    public toolName: string,
    message: string,
    status?: number,
  ) {
    super(message, status);
    this.name = 'ToolInvocationError';
  }
}
